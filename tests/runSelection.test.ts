import { describe, it, expect } from "vitest";
import * as ROT from "rot-js";
import { fnv1a64, placementSeed, foldSeed, eligibleRuns, selectRun } from "../src/sim/runSelection.js";
import { findWallRuns } from "../src/sim/wallRuns.js";
import { scoreRuns } from "../src/sim/runScoring.js";
import { buildWallGrid } from "../src/sim/wallGrid.js";
import { Orientation } from "../src/shared/types.js";
import type { WallCell, WallRun } from "../src/shared/types.js";

function rowCells(y: number, fromX: number, toX: number): WallCell[] {
  const out: WallCell[] = [];
  for (let x = fromX; x <= toX; x++) out.push({ x, y, entityId: `w_${x}_${y}` });
  return out;
}

function fakeRun(y: number, score: number): WallRun {
  return {
    cells: rowCells(y, 0, 3),
    anchor: { x: 0, y },
    length: 4,
    orientation: Orientation.Horizontal,
    score,
  };
}

/** Three isolated rows of five: three runs, all scoring 19. */
function threeRows(): WallRun[] {
  const grid = buildWallGrid([...rowCells(0, 0, 4), ...rowCells(3, 0, 4), ...rowCells(6, 0, 4)]);
  const runs = findWallRuns(grid, 4, 5);
  scoreRuns(runs, grid, 4);
  return runs;
}

const HASH_E_ACUTE = 0x0ac21707b7181e01n; // bytes C3 A9

describe("fnv1a64", () => {
  it("matches the reference FNV-1a vectors", () => {
    expect(fnv1a64("")).toBe(0xcbf29ce484222325n);
    expect(fnv1a64("a")).toBe(0xaf63dc4c8601ec8cn);
    expect(fnv1a64("foobar")).toBe(0x85944171f73967e8n);
  });

  it("hashes UTF-8 bytes rather than UTF-16 code units", () => {
    expect(fnv1a64("\u00e9")).toBe(HASH_E_ACUTE);
    expect(fnv1a64("e\u0301")).not.toBe(HASH_E_ACUTE);
  });
});

describe("placementSeed", () => {
  it("xors the base seed with the id hash", () => {
    expect(placementSeed(42n, "")).toBe(0xcbf29ce48422230fn);
    expect(placementSeed(0n, "a")).toBe(0xaf63dc4c8601ec8cn);
  });

  it("folds to 32 bits for rot-js", () => {
    expect(foldSeed(0xcbf29ce48422230fn)).toBe(1339080683);
    expect(foldSeed(0n)).toBe(0);
  });
});

describe("eligibleRuns", () => {
  it("keeps runs within two points of the best, best first", () => {
    const runs = [fakeRun(0, 19), fakeRun(1, 18), fakeRun(2, 17), fakeRun(3, 10), fakeRun(4, 16)];
    expect(eligibleRuns(runs).map((r) => r.anchor.y)).toEqual([0, 1, 2]);
  });

  it("keeps detection order among equal scores", () => {
    const runs = [fakeRun(0, 5), fakeRun(1, 7), fakeRun(2, 7), fakeRun(3, 5)];
    expect(eligibleRuns(runs).map((r) => r.anchor.y)).toEqual([1, 2, 0, 3]);
  });

  it("does not reorder the input", () => {
    const runs = [fakeRun(0, 1), fakeRun(1, 9)];
    eligibleRuns(runs);
    expect(runs.map((r) => r.anchor.y)).toEqual([0, 1]);
  });
});

describe("selectRun", () => {
  it("returns null with no runs", () => {
    expect(selectRun([], "p1", 42n)).toBeNull();
  });

  it("selects the same cells in the same order on every call", () => {
    const baseline = selectRun(threeRows(), "p1", 42n);
    expect(baseline).not.toBeNull();

    for (let i = 0; i < 10; i++) {
      const current = selectRun(threeRows(), "p1", 42n);
      expect(current?.cells).toEqual(baseline?.cells);
    }
  });

  it("returns the five cells of a lone row for p1", () => {
    const grid = buildWallGrid(rowCells(0, 0, 4));
    const runs = findWallRuns(grid, 4, 5);
    scoreRuns(runs, grid, 4);

    const picked = selectRun(runs, "p1", 42n);
    expect(picked?.cells.map((c) => [c.x, c.y])).toEqual([[0, 0], [1, 0], [2, 0], [3, 0], [4, 0]]);
  });

  it("never picks a run outside the slack window", () => {
    const runs = [fakeRun(0, 19), fakeRun(1, 18), fakeRun(2, 10)];
    for (let i = 0; i < 50; i++) {
      expect(selectRun(runs, `p${i}`, 42n)?.anchor.y).not.toBe(2);
    }
  });

  it("spreads different puzzle ids over the eligible runs", () => {
    const runs = threeRows();
    const picked = new Set<number>();
    for (let i = 0; i < 50; i++) {
      const run = selectRun(runs, `p${i}`, 42n);
      if (run) picked.add(run.anchor.y);
    }
    expect([...picked].sort((a, b) => a - b)).toEqual([0, 3, 6]);
  });

  it("leaves the global rot-js RNG untouched", () => {
    ROT.RNG.setSeed(1234);
    const before = ROT.RNG.getState();
    selectRun(threeRows(), "p1", 42n);
    expect(ROT.RNG.getState()).toEqual(before);
  });
});
