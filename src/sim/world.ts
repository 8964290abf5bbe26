/**
 * Entity arena, the minimal world store the portal engine queries.
 * Entities live in an insertion-ordered Map, so iteration is deterministic.
 */
import type { World, Entity, EntityId, Position, GridCoord, ComponentKey } from "../shared/types.js";
import { EntityType } from "../shared/types.js";
import { TILE_SIZE, GLYPHS } from "../shared/constants.js";

export function createWorld(width: number, height: number): World {
  return {
    width,
    height,
    entities: new Map<EntityId, Entity>(),
    nextId: 0,
  };
}

/** Insert an entity, assigning an id of the form `<type>_<n>` when none is given. */
export function addEntity(world: World, entity: Omit<Entity, "id"> & { id?: EntityId }): Entity {
  const id = entity.id ?? `${entity.type}_${world.nextId}`;
  world.nextId++;
  const stored: Entity = { ...entity, id };
  world.entities.set(id, stored);
  return stored;
}

/** Add a solid wall tile at grid cell (x, y). */
export function addWall(world: World, x: number, y: number): Entity {
  return addEntity(world, {
    type: EntityType.Wall,
    pos: gridToWorld({ x, y }),
    glyph: GLYPHS.wall,
    wall: { solid: true },
  });
}

export function getEntity(world: World, id: EntityId): Entity | undefined {
  return world.entities.get(id);
}

type WithComponents<K extends ComponentKey> = Entity & Required<Pick<Entity, K>>;

function hasComponents<K extends ComponentKey>(entity: Entity, keys: readonly K[]): entity is WithComponents<K> {
  return keys.every((key) => entity[key] !== undefined);
}

/**
 * All entities carrying every listed component, in insertion order.
 */
export function queryEntities<K extends ComponentKey>(world: World, ...keys: K[]): WithComponents<K>[] {
  const matches: WithComponents<K>[] = [];
  for (const entity of world.entities.values()) {
    if (hasComponents(entity, keys)) matches.push(entity);
  }
  return matches;
}

// ── Coordinate conversion ────────────────────────────────────

/** Floor division, so negative world positions land in the cell to their left/above. */
export function worldToGrid(pos: Position): GridCoord {
  return { x: Math.floor(pos.x / TILE_SIZE), y: Math.floor(pos.y / TILE_SIZE) };
}

export function gridToWorld(coord: GridCoord): Position {
  return { x: coord.x * TILE_SIZE, y: coord.y * TILE_SIZE };
}

export function cellKey(x: number, y: number): string {
  return `${x},${y}`;
}
