// ── Grid ─────────────────────────────────────────────────────
export const TILE_SIZE = 16; // world pixels per tile

// ── Level defaults ───────────────────────────────────────────
export const DEFAULT_LEVEL_WIDTH = 40;
export const DEFAULT_LEVEL_HEIGHT = 20;
export const DEFAULT_LEVEL_SEED = 184201;

// ── Portal placement ─────────────────────────────────────────
export const MIN_SEGMENT_LENGTH = 4;
export const MAX_SEGMENT_LENGTH = 5;
export const PREFERRED_SEGMENT_LENGTH = 4;
export const PLACEMENT_SEED = 42n; // combined with the puzzle id hash
export const BOUNDARY_BONUS = 10; // per clear side of a run
export const SELECTION_SLACK = 2; // runs within this many points of the best stay eligible
export const PORTAL_GROUP_PREFIX = "portal_";

// ── FNV-1a (64-bit) ──────────────────────────────────────────
export const FNV64_OFFSET_BASIS = 0xcbf29ce484222325n;
export const FNV64_PRIME = 0x100000001b3n;
export const UINT64_MASK = 0xffffffffffffffffn;

// ── Glyphs ───────────────────────────────────────────────────
export const GLYPHS = {
  wall: "█",
  floor: "·",
  empty: " ",
  portal: "▒",        // dormant portal tile
  activePortal: "◙",  // open portal tile
} as const;

/** Characters accepted as walls in ASCII level maps. */
export const MAP_WALL_CHARS = new Set(["#", GLYPHS.wall]);
