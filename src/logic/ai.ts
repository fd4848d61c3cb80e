import { BASIC_AI, confusedAi, type AiState } from '../ecs/components';
import { getEntity, getPlayer, PLAYER, type World } from '../ecs/world';
import { reportCheckPass } from '../utils/checks';
import type { FieldOfView } from './collaborators';
import { attack } from './combat';
import { distanceTo, moveBy, moveTowards } from './movement';

/**
 * Runs one decision for the entity at `id`. The behaviour is taken off the
 * entity while it acts and the returned behaviour is stored back afterwards.
 */
export function takeAiTurn(world: World, id: number, fov: FieldOfView): void {
  const entity = getEntity(world, id);
  const ai = entity.ai;
  if (!ai) {
    return;
  }
  entity.ai = null;
  const next = decide(world, id, ai, fov);
  // dead entities stay inert
  if (entity.alive) {
    entity.ai = next;
  }
}

function decide(world: World, id: number, ai: AiState, fov: FieldOfView): AiState {
  switch (ai.type) {
    case 'basic':
      return basicTurn(world, id, fov);
    case 'confused':
      return confusedTurn(world, id, ai.previous, ai.numTurns);
    default: {
      const exhaustive: never = ai;
      throw new Error(`Unhandled AI state: ${JSON.stringify(exhaustive)}`);
    }
  }
}

function basicTurn(world: World, id: number, fov: FieldOfView): AiState {
  const monster = getEntity(world, id);
  if (!fov.isVisible(monster.x, monster.y)) {
    return BASIC_AI;
  }
  const player = getPlayer(world);
  if (distanceTo(monster, player) >= 2) {
    moveTowards(world, id, player.x, player.y);
  } else if (player.fighter && player.fighter.hp > 0) {
    attack(world, id, PLAYER);
  }
  return BASIC_AI;
}

function confusedTurn(world: World, id: number, previous: AiState, numTurns: number): AiState {
  if (numTurns >= 0) {
    moveBy(world, id, world.rng.intInclusive(-1, 1), world.rng.intInclusive(-1, 1));
    return confusedAi(previous, numTurns - 1);
  }
  const monster = getEntity(world, id);
  world.session.getState().addMessage(`The ${monster.name} is no longer confused!`, 'red');
  reportCheckPass('confusionRestored', monster.name);
  return previous;
}
