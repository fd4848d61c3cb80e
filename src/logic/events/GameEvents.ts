import type { ItemUseResult } from '../inventory';
import type { ItemKind } from '../balance';

export enum GameEvent {
  EntityKilled = 'entityKilled',
  ItemPickedUp = 'itemPickedUp',
  ItemUsed = 'itemUsed',
  TurnCompleted = 'turnCompleted',
}

export interface GameEventPayloads {
  [GameEvent.EntityKilled]: {
    entityId: number;
    name: string;
    isPlayer: boolean;
  };
  [GameEvent.ItemPickedUp]: {
    entityId: number;
    kind: ItemKind | null;
  };
  [GameEvent.ItemUsed]: {
    entityId: number;
    kind: ItemKind;
    result: ItemUseResult;
  };
  [GameEvent.TurnCompleted]: {
    turn: number;
    tookTurn: boolean;
  };
  [key: string]: unknown;
}
