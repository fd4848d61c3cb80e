import type { ItemKind } from '../logic/balance';
import type { ColorName } from '../render/palette';

export type EntityId = number;

export type DeathCallback = 'player' | 'monster';

export interface Fighter {
  maxHp: number;
  hp: number;
  defense: number;
  power: number;
  onDeath: DeathCallback;
}

/**
 * Monster behaviour. A confused monster keeps the behaviour it had before so
 * that it can be put back unchanged once the confusion wears off.
 */
export type AiState =
  | { type: 'basic' }
  | { type: 'confused'; previous: AiState; numTurns: number };

export interface Entity {
  readonly id: EntityId;
  x: number;
  y: number;
  glyph: string;
  color: ColorName;
  name: string;
  blocks: boolean;
  alive: boolean;
  fighter: Fighter | null;
  ai: AiState | null;
  item: ItemKind | null;
}

export const BASIC_AI: AiState = { type: 'basic' };

export function confusedAi(previous: AiState, numTurns: number): AiState {
  return { type: 'confused', previous, numTurns };
}

/** Nesting depth of confusion wrappers; 0 for a plain behaviour. */
export function confusionDepth(ai: AiState): number {
  let depth = 0;
  let current = ai;
  while (current.type === 'confused') {
    depth += 1;
    current = current.previous;
  }
  return depth;
}
