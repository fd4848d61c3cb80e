import { getEntity, getPlayer, PLAYER, type World } from '../ecs/world';
import { buildRenderSnapshot } from '../render/state';
import type { FieldOfView, InputSource, Menu, Renderer } from './collaborators';
import { takeAiTurn } from './ai';
import { attack } from './combat';
import { GameEvent } from './events/GameEvents';
import { intentForKey, type KeyInput, type PlayerIntent } from './intents';
import { inventoryMenuOptions, pickItemUp, useItem } from './inventory';
import { findEntityAt, moveBy } from './movement';

export type PlayerActionResult = 'tookTurn' | 'didntTakeTurn' | 'exit';

export type TurnPhase = 'awaitingInput' | 'resolvingPlayer' | 'resolvingAi' | 'exited';

export interface TurnEngineConfig {
  readonly fov: FieldOfView;
  readonly menu: Menu;
}

export const INVENTORY_HEADER = 'Press the key next to an item to use it, or any other to cancel.\n';

export class TurnEngine {
  private phaseState: TurnPhase = 'awaitingInput';
  private turnCount = 0;
  private fovOrigin: { x: number; y: number } | null = null;
  private readonly fov: FieldOfView;
  private readonly menu: Menu;

  constructor(
    private readonly world: World,
    config: TurnEngineConfig,
  ) {
    this.fov = config.fov;
    this.menu = config.menu;
    this.refreshFov();
  }

  get phase(): TurnPhase {
    return this.phaseState;
  }

  /** Number of turns in which the monsters got to act. */
  get turn(): number {
    return this.turnCount;
  }

  handleKey(key: KeyInput): PlayerActionResult {
    return this.step(intentForKey(key));
  }

  step(intent: PlayerIntent): PlayerActionResult {
    if (this.phaseState === 'exited') {
      return 'exit';
    }

    this.phaseState = 'resolvingPlayer';
    const result = this.resolvePlayerIntent(intent);
    if (result === 'exit') {
      this.phaseState = 'exited';
      return result;
    }
    this.refreshFov();

    const player = getPlayer(this.world);
    const tookTurn = result === 'tookTurn' && player.alive;
    if (tookTurn) {
      this.phaseState = 'resolvingAi';
      this.runAiPhase();
      this.turnCount += 1;
    }

    this.phaseState = 'awaitingInput';
    this.world.dispatcher.dispatch(GameEvent.TurnCompleted, { turn: this.turnCount, tookTurn });
    return result;
  }

  /** Renders and reads input until the player quits or the input source closes. */
  run(input: InputSource, render: Renderer): void {
    while (this.phaseState !== 'exited') {
      render(buildRenderSnapshot(this.world, this.fov));
      const key = input.poll();
      if (key === null) {
        this.phaseState = 'exited';
        break;
      }
      this.handleKey(key);
    }
  }

  private resolvePlayerIntent(intent: PlayerIntent): PlayerActionResult {
    const alive = getPlayer(this.world).alive;
    switch (intent.type) {
      case 'exit':
        return 'exit';
      case 'toggleFullscreen':
        this.world.session.getState().toggleFullscreen();
        return 'didntTakeTurn';
      case 'move':
        if (!alive) {
          return 'didntTakeTurn';
        }
        this.playerMoveOrAttack(intent.dx, intent.dy);
        return 'tookTurn';
      case 'pickUp':
        if (alive) {
          this.pickUpUnderPlayer();
        }
        return 'didntTakeTurn';
      case 'inventory':
        return alive ? this.openInventory() : 'didntTakeTurn';
      case 'none':
        return 'didntTakeTurn';
      default: {
        const exhaustive: never = intent;
        throw new Error(`Unhandled player intent: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  private playerMoveOrAttack(dx: number, dy: number): void {
    const player = getPlayer(this.world);
    const x = player.x + dx;
    const y = player.y + dy;
    const targetId = findEntityAt(this.world, x, y, (entity) => entity.fighter !== null);
    if (targetId > PLAYER) {
      attack(this.world, PLAYER, targetId);
    } else {
      moveBy(this.world, PLAYER, dx, dy);
    }
  }

  private pickUpUnderPlayer(): void {
    const player = getPlayer(this.world);
    const itemId = findEntityAt(this.world, player.x, player.y, (entity) => entity.item !== null);
    if (itemId > PLAYER) {
      pickItemUp(this.world, itemId);
    }
  }

  private openInventory(): PlayerActionResult {
    const choice = this.menu(INVENTORY_HEADER, inventoryMenuOptions(this.world));
    if (choice === null || choice < 0 || choice >= this.world.inventory.length) {
      return 'didntTakeTurn';
    }
    return useItem(this.world, choice, this.fov) === 'usedUp' ? 'tookTurn' : 'didntTakeTurn';
  }

  private runAiPhase(): void {
    const count = this.world.entities.length;
    for (let id = 0; id < count; id += 1) {
      const entity = getEntity(this.world, id);
      if (entity.alive && entity.ai) {
        takeAiTurn(this.world, id, this.fov);
      }
    }
  }

  private refreshFov(): void {
    const player = getPlayer(this.world);
    if (this.fovOrigin && this.fovOrigin.x === player.x && this.fovOrigin.y === player.y) {
      return;
    }
    const { torchRadius, lightWalls } = this.world.balance.fov;
    this.fov.compute(this.world.grid, player.x, player.y, torchRadius, lightWalls);
    this.fovOrigin = { x: player.x, y: player.y };
  }
}
