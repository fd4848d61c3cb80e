import { createGrid, getPlayer, PLAYER, setFloor, spawnItem, spawnMonster, type GridState, type World } from '../ecs/world';
import { reportCheckFail, reportCheckPass } from '../utils/checks';
import type { ItemKind, MonsterKind } from './balance';
import { isBlocked } from './movement';

export interface Point {
  x: number;
  y: number;
}

/** Room bounds. The outer ring stays wall; only the inside is carved. */
export class Rect {
  readonly x1: number;
  readonly y1: number;
  readonly x2: number;
  readonly y2: number;

  constructor(x: number, y: number, w: number, h: number) {
    this.x1 = x;
    this.y1 = y;
    this.x2 = x + w;
    this.y2 = y + h;
  }

  center(): Point {
    return {
      x: Math.floor((this.x1 + this.x2) / 2),
      y: Math.floor((this.y1 + this.y2) / 2),
    };
  }

  /** Inclusive on both axes, so rooms that merely touch also count. */
  intersectsWith(other: Rect): boolean {
    return this.x1 <= other.x2 && this.x2 >= other.x1 && this.y1 <= other.y2 && this.y2 >= other.y1;
  }

  contains(x: number, y: number): boolean {
    return x > this.x1 && x < this.x2 && y > this.y1 && y < this.y2;
  }
}

export function createRoom(grid: GridState, room: Rect): void {
  for (let y = room.y1 + 1; y < room.y2; y += 1) {
    for (let x = room.x1 + 1; x < room.x2; x += 1) {
      setFloor(grid, x, y);
    }
  }
}

export function createHorizontalTunnel(grid: GridState, x1: number, x2: number, y: number): void {
  for (let x = Math.min(x1, x2); x <= Math.max(x1, x2); x += 1) {
    setFloor(grid, x, y);
  }
}

export function createVerticalTunnel(grid: GridState, y1: number, y2: number, x: number): void {
  for (let y = Math.min(y1, y2); y <= Math.max(y1, y2); y += 1) {
    setFloor(grid, x, y);
  }
}

function connectRooms(world: World, from: Point, to: Point): void {
  if (world.rng.chance(0.5)) {
    createHorizontalTunnel(world.grid, from.x, to.x, from.y);
    createVerticalTunnel(world.grid, from.y, to.y, to.x);
  } else {
    createVerticalTunnel(world.grid, from.y, to.y, from.x);
    createHorizontalTunnel(world.grid, from.x, to.x, to.y);
  }
}

/**
 * Replaces the grid with a freshly carved level and populates it. Everything
 * but the player and the inventory is dropped first. Rejected
 * room candidates are not retried, so a crowded map may hold fewer than
 * `rooms.maxRooms` rooms.
 */
export function generateDungeon(world: World): Rect[] {
  const { width, height } = world.balance.map;
  const { maxRooms, minSize, maxSize } = world.balance.rooms;
  const rng = world.rng;
  world.grid = createGrid(width, height);
  world.entities.length = PLAYER + 1;

  const rooms: Rect[] = [];
  for (let attempt = 0; attempt < maxRooms; attempt += 1) {
    const w = rng.intInclusive(minSize, maxSize);
    const h = rng.intInclusive(minSize, maxSize);
    const x = rng.intInclusive(0, width - w - 1);
    const y = rng.intInclusive(0, height - h - 1);
    const candidate = new Rect(x, y, w, h);
    if (rooms.some((other) => candidate.intersectsWith(other))) {
      continue;
    }

    createRoom(world.grid, candidate);
    const center = candidate.center();
    const previous = rooms[rooms.length - 1];
    if (previous) {
      connectRooms(world, previous.center(), center);
    } else {
      const player = getPlayer(world);
      player.x = center.x;
      player.y = center.y;
    }
    placeObjects(world, candidate);
    rooms.push(candidate);
  }

  checkLayout(world, rooms);
  return rooms;
}

/** Spawns monsters and items inside `room`. Slots landing on a blocked tile are dropped. */
export function placeObjects(world: World, room: Rect): void {
  const { maxRoomMonsters, maxRoomItems } = world.balance.spawns;
  const rng = world.rng;

  const monsterCount = rng.intInclusive(0, maxRoomMonsters);
  for (let i = 0; i < monsterCount; i += 1) {
    const { x, y } = randomInteriorPoint(world, room);
    if (!isBlocked(world, x, y)) {
      spawnMonster(world, x, y, rollMonsterKind(world));
    }
  }

  const itemCount = rng.intInclusive(0, maxRoomItems);
  for (let i = 0; i < itemCount; i += 1) {
    const { x, y } = randomInteriorPoint(world, room);
    if (!isBlocked(world, x, y)) {
      spawnItem(world, x, y, rollItemKind(world));
    }
  }
}

function randomInteriorPoint(world: World, room: Rect): Point {
  return {
    x: world.rng.intInclusive(room.x1 + 1, room.x2 - 1),
    y: world.rng.intInclusive(room.y1 + 1, room.y2 - 1),
  };
}

function rollMonsterKind(world: World): MonsterKind {
  return world.rng.chance(world.balance.spawns.orcChance) ? 'orc' : 'troll';
}

function rollItemKind(world: World): ItemKind {
  const { healChance, lightningChance } = world.balance.spawns;
  const dice = world.rng.next();
  if (dice < healChance) {
    return 'heal';
  }
  if (dice < healChance + lightningChance) {
    return 'lightning';
  }
  return 'confuse';
}

function checkLayout(world: World, rooms: Rect[]): void {
  for (let i = 0; i < rooms.length; i += 1) {
    for (let j = i + 1; j < rooms.length; j += 1) {
      if (rooms[i].intersectsWith(rooms[j])) {
        reportCheckFail('roomsDisjoint', `rooms ${i} and ${j} overlap`);
        return;
      }
    }
  }
  reportCheckPass('roomsDisjoint', `${rooms.length} rooms`);

  const player = getPlayer(world);
  if (rooms.length > 0 && rooms[0].contains(player.x, player.y)) {
    reportCheckPass('playerPlaced');
  } else {
    reportCheckFail('playerPlaced', `player at ${player.x},${player.y}`);
  }
}
