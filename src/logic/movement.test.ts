import { describe, expect, it } from 'vitest';
import { PLAYER, spawnItem, spawnMonster } from '../ecs/world';
import { distanceTo, isBlocked, moveBy, moveTowards } from './movement';
import { arenaWorld } from '../test/helpers';

describe('isBlocked', () => {
  it('reports walls, map edges and blocking entities', () => {
    const world = arenaWorld(5, 5);
    spawnItem(world, 3, 3, 'heal');
    expect(isBlocked(world, 0, 4)).toBe(true);
    expect(isBlocked(world, -1, 4)).toBe(true);
    expect(isBlocked(world, 5, 5)).toBe(true);
    expect(isBlocked(world, 3, 3)).toBe(false);
    expect(isBlocked(world, 4, 4)).toBe(false);
  });
});

describe('moveBy', () => {
  it('moves onto free floor', () => {
    const world = arenaWorld(5, 5);
    expect(moveBy(world, PLAYER, 1, -1)).toBe(true);
    expect(world.entities[PLAYER]).toMatchObject({ x: 6, y: 4 });
  });

  it('drops moves into walls', () => {
    const world = arenaWorld(1, 1);
    expect(moveBy(world, PLAYER, -1, 0)).toBe(false);
    expect(world.entities[PLAYER]).toMatchObject({ x: 1, y: 1 });
  });

  it('drops moves onto a blocking entity', () => {
    const world = arenaWorld(5, 5);
    spawnMonster(world, 6, 5, 'orc');
    expect(moveBy(world, PLAYER, 1, 0)).toBe(false);
    expect(world.entities[PLAYER]).toMatchObject({ x: 5, y: 5 });
  });
});

describe('moveTowards', () => {
  it('steps diagonally towards a diagonal target', () => {
    const world = arenaWorld(5, 5);
    const orc = spawnMonster(world, 2, 2, 'orc');
    moveTowards(world, 1, 5, 5);
    expect(orc).toMatchObject({ x: 3, y: 3 });
  });

  it('rounds each axis of the unit vector separately', () => {
    const world = arenaWorld(5, 5);
    const orc = spawnMonster(world, 1, 4, 'orc');
    // (4, 1) / sqrt(17) rounds to (1, 0)
    moveTowards(world, 1, 5, 5);
    expect(orc).toMatchObject({ x: 2, y: 4 });
  });

  it('stays put when already on the target', () => {
    const world = arenaWorld(5, 5);
    const orc = spawnMonster(world, 2, 2, 'orc');
    expect(moveTowards(world, 1, 2, 2)).toBe(false);
    expect(orc).toMatchObject({ x: 2, y: 2 });
  });

  it('halts when the only step is blocked', () => {
    const world = arenaWorld(5, 5);
    const orc = spawnMonster(world, 1, 5, 'orc');
    spawnMonster(world, 2, 5, 'troll');
    expect(moveTowards(world, 1, 5, 5)).toBe(false);
    expect(orc).toMatchObject({ x: 1, y: 5 });
  });
});

describe('distanceTo', () => {
  it('is euclidean', () => {
    const world = arenaWorld(1, 1);
    const orc = spawnMonster(world, 4, 5, 'orc');
    expect(distanceTo(world.entities[PLAYER], orc)).toBe(5);
  });
});
