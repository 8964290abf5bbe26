/**
 * Portal placement: turns a wall segment into a puzzle's exit.
 *
 * Per puzzle id:  unclaimed → claimed (inactive) → claimed (active).
 * Solving an unclaimed puzzle claims and activates in one step; solving a
 * dormant one activates it; solving an active one does nothing and still
 * succeeds. Claimed cells never return to the wall index, so two puzzles can
 * never share a tile.
 *
 * Everything runs synchronously inside one call: the index rebuild and the
 * claim cannot interleave with another solve.
 */
import type {
  World, PortalConfig, PortalContext, PortalClaim, PortalClaimView, PortalCell, PortalActivationListener,
  WallRun, Position,
} from "../shared/types.js";
import { PortalState } from "../shared/types.js";
import { PORTAL_GROUP_PREFIX } from "../shared/constants.js";
import { createPortalConfig, segmentBoundsError } from "./config.js";
import { getEntity, worldToGrid, cellKey } from "./world.js";
import { buildWallGrid, collectWallCells } from "./wallGrid.js";
import { findWallRuns } from "./wallRuns.js";
import { scoreRuns } from "./runScoring.js";
import { selectRun } from "./runSelection.js";

export function createPortalContext(
  world: World,
  config: Partial<PortalConfig> = {},
  listener: PortalActivationListener | null = null,
): PortalContext {
  return {
    world,
    config: createPortalConfig(config),
    claims: new Map<string, PortalClaim>(),
    listener,
  };
}

/** Restore default configuration. Claims are kept. */
export function resetPortalConfig(ctx: PortalContext): void {
  ctx.config = createPortalConfig();
}

// ── Queries ──────────────────────────────────────────────────

export function hasClaim(ctx: PortalContext, puzzleId: string): boolean {
  return ctx.claims.has(puzzleId);
}

export function isActive(ctx: PortalContext, puzzleId: string): boolean {
  return ctx.claims.get(puzzleId)?.active ?? false;
}

function viewOf(claim: PortalClaim): PortalClaimView {
  return { ...claim, cells: claim.cells.map((cell) => ({ ...cell })) };
}

export function getClaim(ctx: PortalContext, puzzleId: string): PortalClaimView | null {
  const claim = ctx.claims.get(puzzleId);
  return claim ? viewOf(claim) : null;
}

export function portalState(ctx: PortalContext, puzzleId: string): PortalState {
  const claim = ctx.claims.get(puzzleId);
  if (!claim) return PortalState.Unclaimed;
  return claim.active ? PortalState.ClaimedActive : PortalState.ClaimedInactive;
}

/** Number of claimed wall tiles, split by activation. */
export function countPortalTiles(ctx: PortalContext): { active: number; inactive: number } {
  let active = 0;
  let inactive = 0;
  for (const claim of ctx.claims.values()) {
    if (claim.active) active += claim.cells.length;
    else inactive += claim.cells.length;
  }
  return { active, inactive };
}

/**
 * The active claim whose tile contains a world-space point, if any.
 */
export function findActivePortalAt(ctx: PortalContext, pos: Position): PortalClaimView | null {
  const { x, y } = worldToGrid(pos);
  for (const claim of ctx.claims.values()) {
    if (!claim.active) continue;
    if (claim.cells.some((cell) => cell.x === x && cell.y === y)) return viewOf(claim);
  }
  return null;
}

// ── Placement ────────────────────────────────────────────────

function claimedCellKeys(ctx: PortalContext): Set<string> {
  const keys = new Set<string>();
  for (const claim of ctx.claims.values()) {
    for (const cell of claim.cells) keys.add(cellKey(cell.x, cell.y));
  }
  return keys;
}

/**
 * Run the placement pipeline without claiming anything.
 * Returns null when no wall stretch is long enough, or when the segment
 * bounds on the context were changed to something unusable.
 */
export function findPortalSegment(ctx: PortalContext, puzzleId: string): WallRun | null {
  const boundsError = segmentBoundsError(ctx.config);
  if (boundsError) {
    console.warn(`[portals] Cannot place portal for ${puzzleId}: ${boundsError}`);
    return null;
  }

  const { minSegmentLength, maxSegmentLength, preferredSegmentLength, baseSeed } = ctx.config;
  const grid = buildWallGrid(collectWallCells(ctx.world), claimedCellKeys(ctx));
  const runs = findWallRuns(grid, minSegmentLength, maxSegmentLength);
  if (runs.length === 0) return null;
  scoreRuns(runs, grid, preferredSegmentLength);
  return selectRun(runs, puzzleId, baseSeed);
}

function canPlace(ctx: PortalContext, puzzleId: string): boolean {
  return ctx.config.featureEnabled && puzzleId.length > 0;
}

function claimRun(ctx: PortalContext, puzzleId: string, run: WallRun): PortalClaim {
  const groupId = `${PORTAL_GROUP_PREFIX}${puzzleId}`;
  const cells: PortalCell[] = run.cells.map((cell, segmentIndex) => ({
    x: cell.x,
    y: cell.y,
    entityId: cell.entityId,
    segmentIndex,
  }));

  for (const cell of cells) {
    const entity = getEntity(ctx.world, cell.entityId);
    if (entity) {
      entity.portal = {
        puzzleId,
        groupId,
        segmentIndex: cell.segmentIndex,
        segmentLength: cells.length,
        active: false,
      };
    }
  }

  const claim: PortalClaim = { puzzleId, groupId, cells, active: false };
  ctx.claims.set(puzzleId, claim);
  return claim;
}

function activateClaim(ctx: PortalContext, claim: PortalClaim): void {
  claim.active = true;
  for (const cell of claim.cells) {
    const entity = getEntity(ctx.world, cell.entityId);
    if (entity?.portal) entity.portal.active = true;
    ctx.listener?.({
      entityId: cell.entityId,
      puzzleId: claim.puzzleId,
      groupId: claim.groupId,
      segmentIndex: cell.segmentIndex,
      segmentLength: claim.cells.length,
    });
  }
}

/**
 * Place a dormant portal for a puzzle without opening it.
 * Returns true if a claim exists afterwards (new or pre-existing).
 */
export function reservePortal(ctx: PortalContext, puzzleId: string): boolean {
  if (!canPlace(ctx, puzzleId)) return false;
  if (ctx.claims.has(puzzleId)) return true;

  const run = findPortalSegment(ctx, puzzleId);
  if (!run) return false;
  claimRun(ctx, puzzleId, run);
  return true;
}

/**
 * Open the portal for a solved puzzle, placing it first if needed.
 * Returns false when the feature is off, the id is empty, or no segment fits.
 */
export function onPuzzleSolved(ctx: PortalContext, puzzleId: string): boolean {
  if (!canPlace(ctx, puzzleId)) return false;

  const existing = ctx.claims.get(puzzleId);
  if (existing) {
    if (!existing.active) activateClaim(ctx, existing);
    return true;
  }

  const run = findPortalSegment(ctx, puzzleId);
  if (!run) return false;
  activateClaim(ctx, claimRun(ctx, puzzleId, run));
  return true;
}
