export * from "./shared/types.js";
export * from "./shared/constants.js";
export { DEFAULT_PORTAL_CONFIG, createPortalConfig, segmentBoundsError } from "./sim/config.js";
export { createWorld, addEntity, addWall, getEntity, queryEntities, worldToGrid, gridToWorld } from "./sim/world.js";
export { buildWallGrid, collectWallCells, hasWall, getWall, anyOccupied } from "./sim/wallGrid.js";
export { findWallRuns, segmentRun } from "./sim/wallRuns.js";
export { scoreRun, scoreRuns } from "./sim/runScoring.js";
export { fnv1a64, placementSeed, eligibleRuns, selectRun } from "./sim/runSelection.js";
export {
  createPortalContext, resetPortalConfig, onPuzzleSolved, reservePortal, findPortalSegment,
  hasClaim, isActive, getClaim, portalState, countPortalTiles, findActivePortalAt,
} from "./sim/portals.js";
export { createPortalRestyler } from "./sim/portalVisuals.js";
export {
  createPuzzleContext, resetPuzzleContext, registerPuzzle, getPuzzle, hasPuzzle, removePuzzle,
  clearPuzzles, puzzleCount, registerHandler, getHandler, checkAnswer, cipherHandler, textHandler,
} from "./sim/puzzles.js";
export { encrypt, decrypt, normalizeCipherText } from "./sim/vigenere.js";
export { createGameContext, submitAnswer } from "./sim/solve.js";
export { parseWallMap, generateArena, generateLevel, parseLevelFile, buildLevelWorld } from "./sim/levelgen.js";
