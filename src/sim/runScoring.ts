import type { WallGrid, WallRun } from "../shared/types.js";
import { Orientation } from "../shared/types.js";
import { BOUNDARY_BONUS } from "../shared/constants.js";
import { anyOccupied } from "./wallGrid.js";

/**
 * Score a run: +10 per perpendicular side with no wall along the run's span,
 * minus the distance from the preferred length. Writes the result to `run.score`.
 */
export function scoreRun(run: WallRun, grid: WallGrid, preferredLength: number): number {
  let score = 0;

  if (run.orientation === Orientation.Horizontal) {
    const from = run.anchor.x;
    const to = run.anchor.x + run.length - 1;
    if (!anyOccupied(grid, Orientation.Horizontal, run.anchor.y + 1, from, to)) score += BOUNDARY_BONUS;
    if (!anyOccupied(grid, Orientation.Horizontal, run.anchor.y - 1, from, to)) score += BOUNDARY_BONUS;
  } else {
    const from = run.anchor.y;
    const to = run.anchor.y + run.length - 1;
    if (!anyOccupied(grid, Orientation.Vertical, run.anchor.x + 1, from, to)) score += BOUNDARY_BONUS;
    if (!anyOccupied(grid, Orientation.Vertical, run.anchor.x - 1, from, to)) score += BOUNDARY_BONUS;
  }

  score -= Math.abs(run.length - preferredLength);
  run.score = score;
  return score;
}

export function scoreRuns(runs: readonly WallRun[], grid: WallGrid, preferredLength: number): void {
  for (const run of runs) {
    scoreRun(run, grid, preferredLength);
  }
}
