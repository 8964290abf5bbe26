import { describe, it, expect } from "vitest";
import { buildWallGrid, collectWallCells, hasWall, getWall, anyOccupied } from "../src/sim/wallGrid.js";
import { createWorld, addWall, addEntity } from "../src/sim/world.js";
import { EntityType, Orientation } from "../src/shared/types.js";
import type { WallCell } from "../src/shared/types.js";

function cells(coords: Array<[number, number]>): WallCell[] {
  return coords.map(([x, y]) => ({ x, y, entityId: `w_${x}_${y}` }));
}

describe("buildWallGrid", () => {
  it("indexes cells and tracks the bounding rectangle", () => {
    const grid = buildWallGrid(cells([[2, 1], [5, 3], [-1, 4]]));

    expect(grid.cells.size).toBe(3);
    expect(grid.minX).toBe(-1);
    expect(grid.maxX).toBe(5);
    expect(grid.minY).toBe(1);
    expect(grid.maxY).toBe(4);
    expect(hasWall(grid, 5, 3)).toBe(true);
    expect(hasWall(grid, 3, 5)).toBe(false);
    expect(getWall(grid, 2, 1)?.entityId).toBe("w_2_1");
    expect(getWall(grid, 0, 0)).toBeUndefined();
  });

  it("skips already-claimed cells", () => {
    const grid = buildWallGrid(cells([[0, 0], [1, 0], [2, 0]]), new Set(["1,0"]));

    expect(grid.cells.size).toBe(2);
    expect(hasWall(grid, 1, 0)).toBe(false);
    expect(grid.maxX).toBe(2);
  });

  it("is empty for no input", () => {
    const grid = buildWallGrid([]);
    expect(grid.cells.size).toBe(0);
  });
});

describe("anyOccupied", () => {
  const grid = buildWallGrid(cells([[3, 1], [0, 4]]));

  it("checks a row span inclusively", () => {
    expect(anyOccupied(grid, Orientation.Horizontal, 1, 0, 3)).toBe(true);
    expect(anyOccupied(grid, Orientation.Horizontal, 1, 0, 2)).toBe(false);
    expect(anyOccupied(grid, Orientation.Horizontal, 1, 4, 8)).toBe(false);
  });

  it("checks a column span inclusively", () => {
    expect(anyOccupied(grid, Orientation.Vertical, 0, 4, 4)).toBe(true);
    expect(anyOccupied(grid, Orientation.Vertical, 0, 0, 3)).toBe(false);
    expect(anyOccupied(grid, Orientation.Vertical, 3, 0, 2)).toBe(true);
  });
});

describe("collectWallCells", () => {
  it("converts world positions to grid cells with floor division", () => {
    const world = createWorld(4, 4);
    addWall(world, 1, 2);
    addEntity(world, { type: EntityType.Wall, pos: { x: -1, y: -17 }, glyph: "#", wall: { solid: true } });

    const collected = collectWallCells(world);
    expect(collected).toEqual([
      { x: 1, y: 2, entityId: "wall_0" },
      { x: -1, y: -2, entityId: "wall_1" },
    ]);
  });

  it("ignores non-wall entities and walls already turned into portals", () => {
    const world = createWorld(4, 4);
    addWall(world, 0, 0);
    addEntity(world, { type: EntityType.Floor, pos: { x: 16, y: 0 }, glyph: "." });
    const claimed = addWall(world, 2, 0);
    claimed.portal = { puzzleId: "p0", groupId: "portal_p0", segmentIndex: 0, segmentLength: 4, active: true };

    expect(collectWallCells(world).map((c) => c.entityId)).toEqual(["wall_0"]);
  });
});
