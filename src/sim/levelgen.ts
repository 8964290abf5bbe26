import * as ROT from "rot-js";
import type { World, LevelFile, Puzzle } from "../shared/types.js";
import { EntityType } from "../shared/types.js";
import { GLYPHS, MAP_WALL_CHARS, DEFAULT_LEVEL_WIDTH, DEFAULT_LEVEL_HEIGHT } from "../shared/constants.js";
import { createWorld, addWall, addEntity, gridToWorld, cellKey } from "./world.js";

function addFloor(world: World, x: number, y: number): void {
  addEntity(world, { type: EntityType.Floor, pos: gridToWorld({ x, y }), glyph: GLYPHS.floor });
}

/**
 * Build a world from ASCII rows: `#` (or a block glyph) is a wall,
 * `.` a floor, anything else empty space.
 */
export function parseWallMap(rows: readonly string[]): World {
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  const world = createWorld(width, rows.length);

  rows.forEach((row, y) => {
    for (let x = 0; x < row.length; x++) {
      const ch = row[x];
      if (MAP_WALL_CHARS.has(ch)) addWall(world, x, y);
      else if (ch === ".") addFloor(world, x, y);
    }
  });

  return world;
}

/**
 * Open rectangle: walls on the border only.
 */
export function generateArena(width: number, height: number): World {
  const world = createWorld(width, height);
  const arena = new ROT.Map.Arena(width, height);
  arena.create((x, y, wall) => {
    if (wall) addWall(world, x, y);
    else addFloor(world, x, y);
  });
  return world;
}

/**
 * Rooms and corridors from a seeded rot-js Digger. Only walls that touch a
 * floor (including diagonally) become wall tiles; solid rock stays empty.
 */
export function generateLevel(
  seed: number,
  width: number = DEFAULT_LEVEL_WIDTH,
  height: number = DEFAULT_LEVEL_HEIGHT,
): World {
  ROT.RNG.setSeed(seed);

  const digger = new ROT.Map.Digger(width, height, {
    dugPercentage: 0.4,
    roomWidth: [3, 8],
    roomHeight: [3, 6],
  });

  const floors = new Set<string>();
  digger.create((x, y, wall) => {
    if (!wall) floors.add(cellKey(x, y));
  });

  const world = createWorld(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (floors.has(cellKey(x, y))) {
        addFloor(world, x, y);
      } else if (touchesFloor(floors, x, y)) {
        addWall(world, x, y);
      }
    }
  }
  return world;
}

function touchesFloor(floors: ReadonlySet<string>, x: number, y: number): boolean {
  for (let dy = -1; dy <= 1; dy++) {
    for (let dx = -1; dx <= 1; dx++) {
      if ((dx !== 0 || dy !== 0) && floors.has(cellKey(x + dx, y + dy))) return true;
    }
  }
  return false;
}

// ── Level files ──────────────────────────────────────────────

function isStringRecord(value: unknown): value is Record<string, string> {
  if (!value || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === "string");
}

function isPuzzle(value: unknown): value is Puzzle {
  if (!value || typeof value !== "object") return false;
  const p = value as Record<string, unknown>;
  return typeof p.id === "string" && typeof p.type === "string" && isStringRecord(p.data);
}

/** Validate parsed JSON against the level file shape. */
export function isLevelFile(value: unknown): value is LevelFile {
  if (!value || typeof value !== "object") return false;
  const level = value as Record<string, unknown>;
  if (typeof level.name !== "string") return false;
  for (const key of ["seed", "width", "height"]) {
    if (level[key] !== undefined && !Number.isInteger(level[key])) return false;
  }
  if (level.map !== undefined && !(Array.isArray(level.map) && level.map.every((row) => typeof row === "string"))) {
    return false;
  }
  return Array.isArray(level.puzzles) && level.puzzles.every(isPuzzle);
}

/** Parse level JSON text. Throws on malformed JSON or a wrong shape. */
export function parseLevelFile(text: string): LevelFile {
  const raw: unknown = JSON.parse(text);
  if (!isLevelFile(raw)) {
    throw new Error("[levels] Level file is missing a name, puzzles, or has a malformed map");
  }
  return raw;
}

/** World for a level: its ASCII map if present, otherwise generated from its seed. */
export function buildLevelWorld(level: LevelFile): World {
  if (level.map) return parseWallMap(level.map);
  return generateLevel(level.seed ?? 0, level.width, level.height);
}
