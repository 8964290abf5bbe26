/**
 * Deterministic run selection.
 *
 * The seed is the base seed XOR a 64-bit FNV-1a hash of the puzzle id's UTF-8
 * bytes, so the same id picks the same run on every run of the program,
 * whatever the host. The draw uses a private rot-js RNG and leaves the global
 * ROT.RNG (used by level generation) untouched.
 */
import * as ROT from "rot-js";
import type { WallRun } from "../shared/types.js";
import { FNV64_OFFSET_BASIS, FNV64_PRIME, UINT64_MASK, SELECTION_SLACK } from "../shared/constants.js";

const utf8 = new TextEncoder();

export function fnv1a64(text: string): bigint {
  let hash = FNV64_OFFSET_BASIS;
  for (const byte of utf8.encode(text)) {
    hash ^= BigInt(byte);
    hash = (hash * FNV64_PRIME) & UINT64_MASK;
  }
  return hash;
}

export function placementSeed(baseSeed: bigint, puzzleId: string): bigint {
  return (baseSeed ^ fnv1a64(puzzleId)) & UINT64_MASK;
}

/** rot-js seeds are 32-bit: fold the high half into the low half. */
export function foldSeed(seed: bigint): number {
  return Number(((seed >> 32n) ^ seed) & 0xffffffffn);
}

/** Runs whose score is within SELECTION_SLACK of the best, best first. */
export function eligibleRuns(runs: readonly WallRun[]): WallRun[] {
  if (runs.length === 0) return [];
  const sorted = [...runs].sort((a, b) => b.score - a.score);
  const topScore = sorted[0].score;
  return sorted.filter((run) => run.score >= topScore - SELECTION_SLACK);
}

/**
 * Pick one of the near-best runs for a puzzle. Returns null when there are no runs.
 * Ties keep detection order (sort is stable), which keeps the pick reproducible.
 */
export function selectRun(runs: readonly WallRun[], puzzleId: string, baseSeed: bigint): WallRun | null {
  const candidates = eligibleRuns(runs);
  if (candidates.length === 0) return null;

  const rng = ROT.RNG.clone();
  rng.setSeed(foldSeed(placementSeed(baseSeed, puzzleId)));
  const index = Math.floor(rng.getUniform() * candidates.length);
  return candidates[index];
}
