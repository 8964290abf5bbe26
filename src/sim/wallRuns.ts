/**
 * Run detection: maximal straight stretches of unclaimed wall cells,
 * cut down to portal-sized segments.
 *
 * Rows are scanned left to right, then columns top to bottom. Each scan goes
 * one cell past the bounding box so a run touching the edge is still flushed.
 */
import type { WallCell, WallGrid, WallRun } from "../shared/types.js";
import { Orientation } from "../shared/types.js";
import { getWall, isEmptyGrid } from "./wallGrid.js";

export function findWallRuns(grid: WallGrid, minLength: number, maxLength: number): WallRun[] {
  return [
    ...findHorizontalRuns(grid, minLength, maxLength),
    ...findVerticalRuns(grid, minLength, maxLength),
  ];
}

export function findHorizontalRuns(grid: WallGrid, minLength: number, maxLength: number): WallRun[] {
  const runs: WallRun[] = [];
  if (isEmptyGrid(grid)) return runs;

  for (let y = grid.minY; y <= grid.maxY; y++) {
    let current: WallCell[] = [];
    for (let x = grid.minX; x <= grid.maxX + 1; x++) {
      const cell = getWall(grid, x, y);
      if (cell) {
        current.push(cell);
      } else {
        runs.push(...segmentRun(current, Orientation.Horizontal, minLength, maxLength));
        current = [];
      }
    }
  }

  return runs;
}

export function findVerticalRuns(grid: WallGrid, minLength: number, maxLength: number): WallRun[] {
  const runs: WallRun[] = [];
  if (isEmptyGrid(grid)) return runs;

  for (let x = grid.minX; x <= grid.maxX; x++) {
    let current: WallCell[] = [];
    for (let y = grid.minY; y <= grid.maxY + 1; y++) {
      const cell = getWall(grid, x, y);
      if (cell) {
        current.push(cell);
      } else {
        runs.push(...segmentRun(current, Orientation.Vertical, minLength, maxLength));
        current = [];
      }
    }
  }

  return runs;
}

/**
 * Turn one maximal run into zero or more bounded segments.
 *
 * - shorter than minLength: dropped
 * - within [minLength, maxLength]: kept whole
 * - longer: consecutive strides of maxLength from offset 0; a trailing
 *   piece shorter than minLength is dropped
 *
 * Bounds with minLength below 1 or maxLength below minLength yield nothing.
 */
export function segmentRun(
  cells: readonly WallCell[],
  orientation: Orientation,
  minLength: number,
  maxLength: number,
): WallRun[] {
  if (minLength < 1 || maxLength < minLength) return [];
  if (cells.length < minLength) return [];
  if (cells.length <= maxLength) return [makeRun(cells.slice(), orientation)];

  const segments: WallRun[] = [];
  for (let offset = 0; offset <= cells.length - minLength; offset += maxLength) {
    const length = Math.min(maxLength, cells.length - offset);
    if (length >= minLength) {
      segments.push(makeRun(cells.slice(offset, offset + length), orientation));
    }
  }
  return segments;
}

function makeRun(cells: WallCell[], orientation: Orientation): WallRun {
  const first = cells[0];
  return {
    cells,
    anchor: { x: first.x, y: first.y },
    length: cells.length,
    orientation,
    score: 0,
  };
}
