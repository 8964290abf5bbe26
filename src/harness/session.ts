import type { GameContext, LevelFile, PortalConfig } from "../shared/types.js";
import type { HarnessCommand } from "./types.js";
import { createGameContext, submitAnswer } from "../sim/solve.js";
import { registerPuzzle, hasPuzzle } from "../sim/puzzles.js";
import { reservePortal, portalState, getClaim, countPortalTiles } from "../sim/portals.js";
import { buildLevelWorld } from "../sim/levelgen.js";
import { renderToString } from "../render/terminal.js";

/** Game context for a level, with all of its puzzles registered. */
export function loadLevel(level: LevelFile, config: Partial<PortalConfig> = {}): GameContext {
  const game = createGameContext(buildLevelWorld(level), config);
  for (const puzzle of level.puzzles) {
    if (!registerPuzzle(game.puzzles, puzzle)) {
      console.warn(`[levels] Skipping puzzle without an id in level "${level.name}"`);
    }
  }
  return game;
}

function describeClaim(game: GameContext, puzzleId: string): string {
  const claim = getClaim(game.portals, puzzleId);
  if (!claim) return `${puzzleId}: ${portalState(game.portals, puzzleId)}`;
  const cells = claim.cells.map((c) => `(${c.x},${c.y})`).join(" ");
  return `${puzzleId}: ${portalState(game.portals, puzzleId)} ${claim.groupId} [${cells}]`;
}

/**
 * Run one harness command and return the lines to print.
 */
export function executeCommand(game: GameContext, command: HarnessCommand): string[] {
  switch (command.kind) {
    case "solve": {
      if (!hasPuzzle(game.puzzles, command.puzzleId)) {
        return [`UNKNOWN PUZZLE ${command.puzzleId}`];
      }
      const result = submitAnswer(game, command.puzzleId, command.answer);
      if (!result.correct) return [`INCORRECT ${command.puzzleId}`];
      if (!result.portalOpened) return [`CORRECT ${command.puzzleId} (no portal opened)`];
      return [`CORRECT ${command.puzzleId}`, describeClaim(game, command.puzzleId)];
    }
    case "reserve": {
      if (!hasPuzzle(game.puzzles, command.puzzleId)) {
        return [`UNKNOWN PUZZLE ${command.puzzleId}`];
      }
      const placed = reservePortal(game.portals, command.puzzleId);
      return [placed ? describeClaim(game, command.puzzleId) : `NO PORTAL ${command.puzzleId}`];
    }
    case "status":
      return [describeClaim(game, command.puzzleId)];
    case "map": {
      const tiles = countPortalTiles(game.portals);
      return [renderToString(game.portals.world), `Portal tiles: ${tiles.active} open, ${tiles.inactive} dormant`];
    }
    case "quit":
      return ["Bye."];
  }
}
