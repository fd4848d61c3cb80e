import type { BalanceConfig, EntityTemplate, FighterTemplate, ItemKind, MonsterKind } from '../logic/balance';
import { EventDispatcher } from '../logic/events/EventDispatcher';
import type { GameEventPayloads } from '../logic/events/GameEvents';
import { createSessionStore, type SessionStore } from '../core/store';
import { isColorName, type ColorName } from '../render/palette';
import { invariant } from '../utils/checks';
import { RNG } from '../utils/rng';
import { BASIC_AI, type Entity, type EntityId, type Fighter } from './components';

/** Index of the player in `World.entities`. Never reassigned. */
export const PLAYER = 0;

export interface TileState {
  blocked: boolean;
  blockSight: boolean;
  explored: boolean;
}

export interface GridState {
  width: number;
  height: number;
  tiles: TileState[];
}

export interface World {
  nextEntityId: EntityId;
  entities: Entity[];
  inventory: Entity[];
  grid: GridState;
  rng: RNG;
  balance: BalanceConfig;
  session: SessionStore;
  dispatcher: EventDispatcher<GameEventPayloads>;
}

export interface WorldOptions {
  rng?: RNG;
  session?: SessionStore;
  dispatcher?: EventDispatcher<GameEventPayloads>;
}

function wallTile(): TileState {
  return { blocked: true, blockSight: true, explored: false };
}

export function createGrid(width: number, height: number): GridState {
  const tiles: TileState[] = [];
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      tiles.push(wallTile());
    }
  }
  return { width, height, tiles };
}

export function gridIndex(grid: GridState, x: number, y: number): number {
  return y * grid.width + x;
}

export function getTile(grid: GridState, x: number, y: number): TileState | undefined {
  if (x < 0 || y < 0 || x >= grid.width || y >= grid.height) {
    return undefined;
  }
  return grid.tiles[gridIndex(grid, x, y)];
}

export function setFloor(grid: GridState, x: number, y: number): void {
  const tile = getTile(grid, x, y);
  if (!tile) {
    return;
  }
  tile.blocked = false;
  tile.blockSight = false;
}

/** Builds a fully walled world holding only the player at index 0. */
export function createWorld(balance: BalanceConfig, options: WorldOptions = {}): World {
  const world: World = {
    nextEntityId: 1,
    entities: [],
    inventory: [],
    grid: createGrid(balance.map.width, balance.map.height),
    rng: options.rng ?? new RNG(),
    balance,
    session: options.session ?? createSessionStore(),
    dispatcher: options.dispatcher ?? new EventDispatcher<GameEventPayloads>(),
  };
  spawnPlayer(world, 0, 0);
  return world;
}

function toColor(color: string): ColorName {
  if (!isColorName(color)) {
    throw new Error(`Unknown entity color "${color}"`);
  }
  return color;
}

export function createEntity(world: World, x: number, y: number, template: EntityTemplate, blocks: boolean): Entity {
  const entity: Entity = {
    id: world.nextEntityId++,
    x,
    y,
    glyph: template.glyph,
    color: toColor(template.color),
    name: template.name,
    blocks,
    alive: false,
    fighter: null,
    ai: null,
    item: null,
  };
  world.entities.push(entity);
  return entity;
}

function fighterFrom(template: FighterTemplate, onDeath: Fighter['onDeath']): Fighter {
  return {
    maxHp: template.hp,
    hp: template.hp,
    defense: template.defense,
    power: template.power,
    onDeath,
  };
}

function spawnPlayer(world: World, x: number, y: number): Entity {
  invariant(world.entities.length === PLAYER, 'player must be the first entity created');
  const template = world.balance.player;
  const player = createEntity(world, x, y, template, true);
  player.alive = true;
  player.fighter = fighterFrom(template, 'player');
  return player;
}

export function spawnMonster(world: World, x: number, y: number, kind: MonsterKind): Entity {
  const template = world.balance.monsters[kind];
  const monster = createEntity(world, x, y, template, true);
  monster.alive = true;
  monster.fighter = fighterFrom(template, 'monster');
  monster.ai = BASIC_AI;
  return monster;
}

export function spawnItem(world: World, x: number, y: number, kind: ItemKind): Entity {
  const item = createEntity(world, x, y, world.balance.items[kind], false);
  item.item = kind;
  return item;
}

export function getPlayer(world: World): Entity {
  const player = world.entities[PLAYER];
  invariant(player !== undefined, 'player entity is missing');
  return player;
}

export function getEntity(world: World, id: number): Entity {
  const entity = world.entities[id];
  invariant(entity !== undefined, `no entity at index ${id}`);
  return entity;
}

/**
 * Returns the two distinct entities at `first` and `second`, in that order,
 * so that both sides of an exchange can be updated in one call. Asking for
 * the same index twice is a logic error.
 */
export function getPair(world: World, first: number, second: number): [Entity, Entity] {
  invariant(first !== second, `entity pair requested with identical index ${first}`);
  const a = world.entities[first];
  const b = world.entities[second];
  invariant(a !== undefined && b !== undefined, `entity pair ${first}/${second} out of range`);
  return [a, b];
}

/** Takes an entity out of the world. Indices after `id` shift down by one. */
export function removeEntity(world: World, id: number): Entity {
  invariant(id !== PLAYER, 'the player cannot be removed from the world');
  const [removed] = world.entities.splice(id, 1);
  invariant(removed !== undefined, `no entity at index ${id}`);
  return removed;
}
