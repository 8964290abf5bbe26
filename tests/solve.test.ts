import { describe, it, expect } from "vitest";
import { createGameContext, submitAnswer } from "../src/sim/solve.js";
import { registerPuzzle } from "../src/sim/puzzles.js";
import { portalState } from "../src/sim/portals.js";
import { parseWallMap } from "../src/sim/levelgen.js";
import { getEntity } from "../src/sim/world.js";
import { PortalState } from "../src/shared/types.js";
import type { GameContext } from "../src/shared/types.js";
import { GLYPHS } from "../src/shared/constants.js";

function game(featureEnabled: boolean): GameContext {
  const ctx = createGameContext(parseWallMap(["#####"]), { featureEnabled });
  registerPuzzle(ctx.puzzles, { id: "riddle", type: "text", data: { answer: "a piano" } });
  registerPuzzle(ctx.puzzles, { id: "door", type: "cipher", data: { ciphertext: "RIJVS UYVJN", key: "KEY" } });
  return ctx;
}

describe("submitAnswer", () => {
  it("reports unknown puzzles as incorrect", () => {
    expect(submitAnswer(game(true), "nope", "anything")).toEqual({ correct: false, portalOpened: false });
  });

  it("leaves the portal alone on a wrong answer", () => {
    const ctx = game(true);
    expect(submitAnswer(ctx, "riddle", "a violin")).toEqual({ correct: false, portalOpened: false });
    expect(portalState(ctx.portals, "riddle")).toBe(PortalState.Unclaimed);
  });

  it("opens a portal on a correct answer and restyles its tiles", () => {
    const ctx = game(true);
    expect(submitAnswer(ctx, "riddle", "A PIANO")).toEqual({ correct: true, portalOpened: true });
    expect(portalState(ctx.portals, "riddle")).toBe(PortalState.ClaimedActive);
    for (let i = 0; i < 5; i++) {
      expect(getEntity(ctx.portals.world, `wall_${i}`)?.glyph).toBe(GLYPHS.activePortal);
    }
  });

  it("is correct without a portal when the feature is off", () => {
    expect(submitAnswer(game(false), "door", "hello world")).toEqual({ correct: true, portalOpened: false });
  });

  it("is correct without a portal when no wall is free", () => {
    const ctx = game(true);
    submitAnswer(ctx, "riddle", "a piano");
    expect(submitAnswer(ctx, "door", "HELLO WORLD")).toEqual({ correct: true, portalOpened: false });
  });

  it("succeeds again when a solved puzzle is answered twice", () => {
    const ctx = game(true);
    submitAnswer(ctx, "riddle", "a piano");
    expect(submitAnswer(ctx, "riddle", "a piano")).toEqual({ correct: true, portalOpened: true });
  });
});
