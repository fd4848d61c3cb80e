import { createWorld, type World } from './ecs/world';
import { defaultBalance, loadBalance, type BalanceConfig } from './logic/balance';
import type { FieldOfView, Menu } from './logic/collaborators';
import { generateDungeon, type Rect } from './logic/dungeon';
import { TurnEngine } from './logic/turns';
import { RNG } from './utils/rng';

export interface GameOptions {
  fov: FieldOfView;
  menu: Menu;
  balance?: BalanceConfig;
  rng?: RNG;
}

export interface Game {
  world: World;
  engine: TurnEngine;
  rooms: Rect[];
}

export const WELCOME_MESSAGE = 'Welcome stranger! Prepare to perish in the Tombs of the Ancient Kings.';

/** Generates a level, places the player and greets them. */
export function createGame(options: GameOptions): Game {
  const balance = options.balance ?? defaultBalance;
  const world = createWorld(balance, { rng: options.rng ?? new RNG() });
  const rooms = generateDungeon(world);
  const engine = new TurnEngine(world, { fov: options.fov, menu: options.menu });
  world.session.getState().addMessage(WELCOME_MESSAGE, 'red');
  return { world, engine, rooms };
}

export async function createGameFromFile(path: string, options: Omit<GameOptions, 'balance'>): Promise<Game> {
  const balance = await loadBalance(path);
  return createGame({ ...options, balance });
}
