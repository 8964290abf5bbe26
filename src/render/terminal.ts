import type { World } from "../shared/types.js";
import { GLYPHS } from "../shared/constants.js";
import { worldToGrid } from "../sim/world.js";
import { portalGlyph } from "../sim/portalVisuals.js";

/**
 * Render the world to a plain-text string (for headless/harness use).
 * Portal tiles draw as dormant or open portals over their wall glyph.
 */
export function renderToString(world: World): string {
  const rows: string[][] = [];
  for (let y = 0; y < world.height; y++) {
    rows.push(new Array<string>(world.width).fill(GLYPHS.empty));
  }

  for (const entity of world.entities.values()) {
    const { x, y } = worldToGrid(entity.pos);
    if (y < 0 || y >= world.height || x < 0 || x >= world.width) continue;
    rows[y][x] = entity.portal ? portalGlyph(entity.portal.active) : entity.glyph;
  }

  return rows.map((row) => row.join("")).join("\n");
}
