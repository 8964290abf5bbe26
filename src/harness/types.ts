// ── Harness commands ────────────────────────────────────────

export type HarnessCommand =
  | { kind: "solve"; puzzleId: string; answer: string }
  | { kind: "reserve"; puzzleId: string }
  | { kind: "status"; puzzleId: string }
  | { kind: "map" }
  | { kind: "quit" };

export interface CliArgs {
  level: string | null;
  seed: number;
  width: number;
  height: number;
  enable: boolean;
  baseSeed: bigint;
  minSegment: number | null;
  maxSegment: number | null;
  preferredSegment: number | null;
  script: string | null;
}
