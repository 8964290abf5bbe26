import type { World, WallCell, WallGrid } from "../shared/types.js";
import { Orientation } from "../shared/types.js";
import { queryEntities, worldToGrid, cellKey } from "./world.js";

/**
 * Wall cells for every positioned wall entity not already part of a portal.
 */
export function collectWallCells(world: World): WallCell[] {
  const cells: WallCell[] = [];
  for (const entity of queryEntities(world, "wall")) {
    if (entity.portal) continue;
    const { x, y } = worldToGrid(entity.pos);
    cells.push({ x, y, entityId: entity.id });
  }
  return cells;
}

/**
 * Build a sparse grid of wall cells, skipping any cell whose key is already claimed.
 * Built fresh for every placement attempt.
 */
export function buildWallGrid(cells: Iterable<WallCell>, alreadyClaimed: ReadonlySet<string> = new Set()): WallGrid {
  const grid: WallGrid = {
    cells: new Map<string, WallCell>(),
    minX: Infinity,
    maxX: -Infinity,
    minY: Infinity,
    maxY: -Infinity,
  };

  for (const cell of cells) {
    const key = cellKey(cell.x, cell.y);
    if (alreadyClaimed.has(key)) continue;
    grid.cells.set(key, cell);
    grid.minX = Math.min(grid.minX, cell.x);
    grid.maxX = Math.max(grid.maxX, cell.x);
    grid.minY = Math.min(grid.minY, cell.y);
    grid.maxY = Math.max(grid.maxY, cell.y);
  }

  return grid;
}

export function hasWall(grid: WallGrid, x: number, y: number): boolean {
  return grid.cells.has(cellKey(x, y));
}

export function getWall(grid: WallGrid, x: number, y: number): WallCell | undefined {
  return grid.cells.get(cellKey(x, y));
}

export function isEmptyGrid(grid: WallGrid): boolean {
  return grid.cells.size === 0;
}

/**
 * True if any cell is occupied on row `fixed` (horizontal) or column `fixed`
 * (vertical) between `from` and `to`, inclusive.
 */
export function anyOccupied(grid: WallGrid, orientation: Orientation, fixed: number, from: number, to: number): boolean {
  for (let i = from; i <= to; i++) {
    const occupied = orientation === Orientation.Horizontal ? hasWall(grid, i, fixed) : hasWall(grid, fixed, i);
    if (occupied) return true;
  }
  return false;
}
