import type { World, PortalActivationListener } from "../shared/types.js";
import { GLYPHS } from "../shared/constants.js";
import { getEntity } from "./world.js";

/**
 * Activation listener that restyles each opened tile with the portal glyph.
 */
export function createPortalRestyler(world: World): PortalActivationListener {
  return (activation) => {
    const entity = getEntity(world, activation.entityId);
    if (entity) entity.glyph = GLYPHS.activePortal;
  };
}

/** Glyph for a tile as the terminal renderer should draw it. */
export function portalGlyph(active: boolean): string {
  return active ? GLYPHS.activePortal : GLYPHS.portal;
}
