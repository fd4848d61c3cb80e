import type { Entity } from '../ecs/components';
import { getEntity, getTile, type World } from '../ecs/world';

export function isBlocked(world: World, x: number, y: number): boolean {
  const tile = getTile(world.grid, x, y);
  if (!tile || tile.blocked) {
    return true;
  }
  return world.entities.some((entity) => entity.blocks && entity.x === x && entity.y === y);
}

/** Moves by `(dx, dy)` unless the destination is blocked, in which case nothing happens. */
export function moveBy(world: World, id: number, dx: number, dy: number): boolean {
  const entity = getEntity(world, id);
  const x = entity.x + dx;
  const y = entity.y + dy;
  if (isBlocked(world, x, y)) {
    return false;
  }
  entity.x = x;
  entity.y = y;
  return true;
}

/**
 * Single step in the rough direction of the target. Each axis of the unit
 * vector is rounded on its own, so this is not a path search and can stall
 * against a wall.
 */
export function moveTowards(world: World, id: number, targetX: number, targetY: number): boolean {
  const entity = getEntity(world, id);
  const dx = targetX - entity.x;
  const dy = targetY - entity.y;
  const length = Math.sqrt(dx * dx + dy * dy);
  if (length === 0) {
    return false;
  }
  const stepX = Math.round(dx / length) || 0;
  const stepY = Math.round(dy / length) || 0;
  return moveBy(world, id, stepX, stepY);
}

export function distance(entity: Entity, x: number, y: number): number {
  const dx = x - entity.x;
  const dy = y - entity.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function distanceTo(from: Entity, to: Entity): number {
  return distance(from, to.x, to.y);
}

/** Index of the first entity at `(x, y)` matching `predicate`, or -1. */
export function findEntityAt(world: World, x: number, y: number, predicate: (entity: Entity) => boolean): number {
  return world.entities.findIndex((entity) => entity.x === x && entity.y === y && predicate(entity));
}
