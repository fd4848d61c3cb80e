export { createGame, createGameFromFile, WELCOME_MESSAGE, type Game, type GameOptions } from './game';
export {
  BASIC_AI,
  confusedAi,
  confusionDepth,
  type AiState,
  type DeathCallback,
  type Entity,
  type EntityId,
  type Fighter,
} from './ecs/components';
export {
  createWorld,
  getPair,
  getPlayer,
  PLAYER,
  spawnItem,
  spawnMonster,
  type GridState,
  type TileState,
  type World,
} from './ecs/world';
export { createSessionStore, recentMessages, type Message, type SessionState, type SessionStore } from './core/store';
export {
  defaultBalance,
  loadBalance,
  parseBalance,
  type BalanceConfig,
  type ItemKind,
  type MonsterKind,
} from './logic/balance';
export type { FieldOfView, InputSource, Menu, Renderer } from './logic/collaborators';
export { Rect, generateDungeon, placeObjects } from './logic/dungeon';
export { isBlocked, moveBy, moveTowards, distanceTo } from './logic/movement';
export { attack, heal, takeDamage } from './logic/combat';
export { takeAiTurn } from './logic/ai';
export {
  castConfuse,
  castHeal,
  castLightning,
  closestMonster,
  inventoryMenuOptions,
  pickItemUp,
  useItem,
  type ItemUseResult,
} from './logic/inventory';
export { intentForKey, type KeyCode, type KeyInput, type PlayerIntent } from './logic/intents';
export { TurnEngine, type PlayerActionResult, type TurnPhase } from './logic/turns';
export { EventDispatcher } from './logic/events/EventDispatcher';
export { GameEvent, type GameEventPayloads } from './logic/events/GameEvents';
export { buildRenderSnapshot, type RenderEntity, type RenderSnapshot, type RenderTile } from './render/state';
export { Palette, type ColorName } from './render/palette';
export { RNG } from './utils/rng';
export { InvariantViolation, setChecksEnabled } from './utils/checks';
