// ── Coordinates ──────────────────────────────────────────────
/** World-space position in pixels. */
export interface Position {
  x: number;
  y: number;
}

/** Integer cell coordinate on the tile grid. */
export interface GridCoord {
  x: number;
  y: number;
}

export enum Orientation {
  Horizontal = "horizontal",
  Vertical = "vertical",
}

// ── Entities ─────────────────────────────────────────────────
export type EntityId = string;

export enum EntityType {
  Wall = "wall",
  Floor = "floor",
}

export interface WallComponent {
  solid: boolean;
}

export interface PortalComponent {
  puzzleId: string;
  groupId: string;
  segmentIndex: number; // 0 = first tile of the run
  segmentLength: number;
  active: boolean;
}

export interface Entity {
  id: EntityId;
  type: EntityType;
  pos: Position;
  glyph: string;
  wall?: WallComponent;
  portal?: PortalComponent;
}

/** Optional components an entity can be queried by. */
export type ComponentKey = "wall" | "portal";

export interface World {
  width: number; // in tiles
  height: number;
  entities: Map<EntityId, Entity>;
  nextId: number;
}

// ── Wall index ───────────────────────────────────────────────
export interface WallCell {
  x: number;
  y: number;
  entityId: EntityId;
}

export interface WallGrid {
  cells: Map<string, WallCell>;
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export interface WallRun {
  cells: WallCell[];
  anchor: GridCoord;
  length: number;
  orientation: Orientation;
  score: number;
}

// ── Portals ──────────────────────────────────────────────────
export interface PortalConfig {
  minSegmentLength: number;
  maxSegmentLength: number;
  preferredSegmentLength: number;
  featureEnabled: boolean;
  baseSeed: bigint;
}

export enum PortalState {
  Unclaimed = "unclaimed",
  ClaimedInactive = "claimed_inactive",
  ClaimedActive = "claimed_active",
}

export interface PortalCell {
  x: number;
  y: number;
  entityId: EntityId;
  segmentIndex: number;
}

export interface PortalClaim {
  puzzleId: string;
  groupId: string;
  cells: PortalCell[];
  active: boolean;
}

/** Detached, read-only copy of a claim handed out by the queries. */
export interface PortalClaimView {
  readonly puzzleId: string;
  readonly groupId: string;
  readonly cells: ReadonlyArray<Readonly<PortalCell>>;
  readonly active: boolean;
}

export interface PortalActivation {
  entityId: EntityId;
  puzzleId: string;
  groupId: string;
  segmentIndex: number;
  segmentLength: number;
}

export type PortalActivationListener = (activation: PortalActivation) => void;

export interface PortalContext {
  world: World;
  config: PortalConfig;
  claims: Map<string, PortalClaim>;
  listener: PortalActivationListener | null;
}

// ── Puzzles ──────────────────────────────────────────────────
export interface Puzzle {
  id: string;
  type: string; // handler tag, e.g. "cipher"
  data: Record<string, string>;
}

export interface PuzzleHandler {
  type: string;
  normalize(answer: string): string;
  validate(expected: string, submitted: string): boolean;
}

export interface PuzzleContext {
  puzzles: Map<string, Puzzle>;
  handlers: Map<string, PuzzleHandler>;
}

export interface GameContext {
  puzzles: PuzzleContext;
  portals: PortalContext;
}

export interface SubmitResult {
  correct: boolean;
  portalOpened: boolean;
}

// ── Level files ──────────────────────────────────────────────
export interface LevelFile {
  name: string;
  seed?: number;
  width?: number; // generated levels only
  height?: number;
  map?: string[];
  puzzles: Puzzle[];
}
