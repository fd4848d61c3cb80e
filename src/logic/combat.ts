import type { Entity } from '../ecs/components';
import { getEntity, getPair, type World } from '../ecs/world';
import { GameEvent } from './events/GameEvents';

export function attack(world: World, attackerId: number, defenderId: number): void {
  const [attacker, defender] = getPair(world, attackerId, defenderId);
  if (!attacker.fighter || !defender.fighter) {
    return;
  }
  const damage = attacker.fighter.power - defender.fighter.defense;
  const { addMessage } = world.session.getState();
  if (damage > 0) {
    addMessage(`${capitalize(attacker.name)} attacks ${defender.name} for ${damage} hit points.`, 'white');
    applyDamage(world, defender, damage);
  } else {
    addMessage(`${capitalize(attacker.name)} attacks ${defender.name} but it has no effect!`, 'white');
  }
}

export function takeDamage(world: World, id: number, amount: number): void {
  applyDamage(world, getEntity(world, id), amount);
}

export function heal(world: World, id: number, amount: number): void {
  const fighter = getEntity(world, id).fighter;
  if (!fighter || amount <= 0) {
    return;
  }
  fighter.hp = Math.min(fighter.maxHp, fighter.hp + amount);
}

function applyDamage(world: World, entity: Entity, amount: number): void {
  const fighter = entity.fighter;
  if (!fighter || amount <= 0) {
    return;
  }
  const wasStanding = fighter.hp > 0;
  fighter.hp -= amount;
  if (!wasStanding || fighter.hp > 0) {
    return;
  }
  entity.alive = false;
  switch (fighter.onDeath) {
    case 'player':
      playerDeath(world, entity);
      break;
    case 'monster':
      monsterDeath(world, entity);
      break;
    default: {
      const exhaustive: never = fighter.onDeath;
      throw new Error(`Unhandled death callback: ${String(exhaustive)}`);
    }
  }
}

function playerDeath(world: World, player: Entity): void {
  world.session.getState().addMessage('You died!', 'red');
  player.glyph = '%';
  player.color = 'darkRed';
  world.dispatcher.dispatch(GameEvent.EntityKilled, { entityId: player.id, name: player.name, isPlayer: true });
}

function monsterDeath(world: World, monster: Entity): void {
  world.session.getState().addMessage(`${capitalize(monster.name)} is dead!`, 'orange');
  world.dispatcher.dispatch(GameEvent.EntityKilled, { entityId: monster.id, name: monster.name, isPlayer: false });
  monster.glyph = '%';
  monster.color = 'darkRed';
  monster.blocks = false;
  monster.fighter = null;
  monster.ai = null;
  monster.name = `remains of ${monster.name}`;
}

function capitalize(text: string): string {
  return text.length === 0 ? text : text[0].toUpperCase() + text.slice(1);
}
