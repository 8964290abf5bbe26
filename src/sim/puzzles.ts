/**
 * Puzzle registry and answer checking.
 *
 * Each puzzle names a handler by type tag ("cipher", "text", …). Handlers are
 * plain strategy objects held in a per-context registry; there are no
 * process-wide tables, so tests can build and reset contexts freely.
 */
import type { Puzzle, PuzzleHandler, PuzzleContext } from "../shared/types.js";
import { decrypt, normalizeCipherText } from "./vigenere.js";

// ── Built-in handlers ────────────────────────────────────────

function normalizedMatch(type: string, normalize: (answer: string) => string): PuzzleHandler {
  return {
    type,
    normalize,
    validate: (expected, submitted) => normalize(submitted) === normalize(expected),
  };
}

/** Whitespace-insensitive, case-insensitive. */
export const cipherHandler = normalizedMatch("cipher", normalizeCipherText);

/** Case-insensitive, ignoring leading and trailing space. */
export const textHandler = normalizedMatch("text", (answer) => answer.trim().toUpperCase());

const BUILT_IN_HANDLERS: readonly PuzzleHandler[] = [cipherHandler, textHandler];

// ── Context lifecycle ────────────────────────────────────────

export function createPuzzleContext(): PuzzleContext {
  const ctx: PuzzleContext = {
    puzzles: new Map<string, Puzzle>(),
    handlers: new Map<string, PuzzleHandler>(),
  };
  for (const handler of BUILT_IN_HANDLERS) registerHandler(ctx, handler);
  return ctx;
}

/** Drop all puzzles and custom handlers, keeping only the built-ins. */
export function resetPuzzleContext(ctx: PuzzleContext): void {
  ctx.puzzles.clear();
  ctx.handlers.clear();
  for (const handler of BUILT_IN_HANDLERS) registerHandler(ctx, handler);
}

// ── Puzzle registry ──────────────────────────────────────────

/** Register (or replace) a puzzle. Puzzles without an id are ignored. */
export function registerPuzzle(ctx: PuzzleContext, puzzle: Puzzle): boolean {
  if (puzzle.id.length === 0) return false;
  ctx.puzzles.set(puzzle.id, puzzle);
  return true;
}

export function getPuzzle(ctx: PuzzleContext, puzzleId: string): Puzzle | null {
  return ctx.puzzles.get(puzzleId) ?? null;
}

export function hasPuzzle(ctx: PuzzleContext, puzzleId: string): boolean {
  return ctx.puzzles.has(puzzleId);
}

export function removePuzzle(ctx: PuzzleContext, puzzleId: string): boolean {
  return ctx.puzzles.delete(puzzleId);
}

export function clearPuzzles(ctx: PuzzleContext): void {
  ctx.puzzles.clear();
}

export function puzzleCount(ctx: PuzzleContext): number {
  return ctx.puzzles.size;
}

// ── Handler registry ─────────────────────────────────────────

export function registerHandler(ctx: PuzzleContext, handler: PuzzleHandler): boolean {
  if (handler.type.length === 0) return false;
  ctx.handlers.set(handler.type.toLowerCase(), handler);
  return true;
}

export function getHandler(ctx: PuzzleContext, type: string): PuzzleHandler | null {
  return ctx.handlers.get(type.toLowerCase()) ?? null;
}

/**
 * The answer a puzzle expects: `data.answer`, or for cipher puzzles without
 * one, the decryption of `data.ciphertext` under `data.key`.
 */
export function expectedAnswer(puzzle: Puzzle): string | null {
  const answer = puzzle.data["answer"];
  if (answer !== undefined) return answer;

  const ciphertext = puzzle.data["ciphertext"];
  const key = puzzle.data["key"];
  if (puzzle.type.toLowerCase() === "cipher" && ciphertext !== undefined && key) {
    return decrypt(ciphertext, key);
  }
  return null;
}

export function checkAnswer(ctx: PuzzleContext, puzzle: Puzzle, submitted: string): boolean {
  const handler = getHandler(ctx, puzzle.type);
  if (!handler) {
    console.warn(`[puzzles] No handler for puzzle type "${puzzle.type}" (puzzle ${puzzle.id})`);
    return false;
  }
  const expected = expectedAnswer(puzzle);
  if (expected === null) return false;
  return handler.validate(expected, submitted);
}
