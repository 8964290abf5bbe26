import type { GameContext, SubmitResult, World, PortalConfig } from "../shared/types.js";
import { createPuzzleContext, getPuzzle, checkAnswer } from "./puzzles.js";
import { createPortalContext, onPuzzleSolved } from "./portals.js";
import { createPortalRestyler } from "./portalVisuals.js";

/**
 * Wire a puzzle context and a portal context over one world, with tiles
 * restyled as portals open.
 */
export function createGameContext(world: World, config: Partial<PortalConfig> = {}): GameContext {
  return {
    puzzles: createPuzzleContext(),
    portals: createPortalContext(world, config, createPortalRestyler(world)),
  };
}

/**
 * Check a player's answer; a correct one fires the solved event, which opens
 * (placing if needed) the puzzle's portal.
 */
export function submitAnswer(game: GameContext, puzzleId: string, answer: string): SubmitResult {
  const puzzle = getPuzzle(game.puzzles, puzzleId);
  if (!puzzle) return { correct: false, portalOpened: false };

  if (!checkAnswer(game.puzzles, puzzle, answer)) {
    return { correct: false, portalOpened: false };
  }
  return { correct: true, portalOpened: onPuzzleSolved(game.portals, puzzle.id) };
}
