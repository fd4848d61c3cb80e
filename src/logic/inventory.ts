import { BASIC_AI, confusedAi } from '../ecs/components';
import { getEntity, getPlayer, PLAYER, removeEntity, type World } from '../ecs/world';
import type { ItemKind } from './balance';
import type { FieldOfView } from './collaborators';
import { heal, takeDamage } from './combat';
import { GameEvent } from './events/GameEvents';
import { distanceTo } from './movement';

export type ItemUseResult = 'usedUp' | 'cancelled';

type ItemEffect = (world: World, fov: FieldOfView) => ItemUseResult;

const EMPTY_INVENTORY_LABEL = 'Inventory is empty.';

/** Moves the item at world index `id` into the inventory. */
export function pickItemUp(world: World, id: number): boolean {
  const item = getEntity(world, id);
  const { addMessage } = world.session.getState();
  if (world.inventory.length >= world.balance.inventory.capacity) {
    addMessage(`Your inventory is full, cannot pick up ${item.name}.`, 'red');
    return false;
  }
  removeEntity(world, id);
  world.inventory.push(item);
  addMessage(`You picked up a ${item.name}!`, 'green');
  world.dispatcher.dispatch(GameEvent.ItemPickedUp, { entityId: item.id, kind: item.item });
  return true;
}

export function inventoryMenuOptions(world: World): string[] {
  if (world.inventory.length === 0) {
    return [EMPTY_INVENTORY_LABEL];
  }
  return world.inventory.map((item) => item.name);
}

export function useItem(world: World, index: number, fov: FieldOfView): ItemUseResult {
  const item = world.inventory[index];
  const { addMessage } = world.session.getState();
  if (!item) {
    return 'cancelled';
  }
  if (!item.item) {
    addMessage(`The ${item.name} cannot be used.`, 'white');
    return 'cancelled';
  }
  const kind = item.item;
  const result = ITEM_EFFECTS[kind](world, fov);
  if (result === 'usedUp') {
    world.inventory.splice(index, 1);
  } else {
    addMessage('Cancelled', 'white');
  }
  world.dispatcher.dispatch(GameEvent.ItemUsed, { entityId: item.id, kind, result });
  return result;
}

export function castHeal(world: World): ItemUseResult {
  const fighter = getPlayer(world).fighter;
  const { addMessage } = world.session.getState();
  if (!fighter) {
    return 'cancelled';
  }
  if (fighter.hp === fighter.maxHp) {
    addMessage('You are already at full health.', 'red');
    return 'cancelled';
  }
  addMessage('Your wounds start to feel better!', 'lightViolet');
  heal(world, PLAYER, world.balance.effects.healAmount);
  return 'usedUp';
}

export function castLightning(world: World, fov: FieldOfView): ItemUseResult {
  const { damage, range } = world.balance.effects.lightning;
  const { addMessage } = world.session.getState();
  const targetId = closestMonster(world, range, fov);
  if (targetId === null) {
    addMessage('No enemy is close enough to strike.', 'red');
    return 'cancelled';
  }
  const target = getEntity(world, targetId);
  addMessage(
    `A lightning bolt strikes the ${target.name} with a loud thunder! The damage is ${damage} hit points.`,
    'lightBlue',
  );
  takeDamage(world, targetId, damage);
  return 'usedUp';
}

export function castConfuse(world: World, fov: FieldOfView): ItemUseResult {
  const { range, numTurns } = world.balance.effects.confuse;
  const { addMessage } = world.session.getState();
  const targetId = closestMonster(world, range, fov);
  if (targetId === null) {
    addMessage('No enemy is close enough to confuse.', 'red');
    return 'cancelled';
  }
  const target = getEntity(world, targetId);
  target.ai = confusedAi(target.ai ?? BASIC_AI, numTurns);
  addMessage(`The eyes of the ${target.name} look vacant, as it starts to stumble around!`, 'lightGreen');
  return 'usedUp';
}

const ITEM_EFFECTS: Record<ItemKind, ItemEffect> = {
  heal: (world) => castHeal(world),
  lightning: castLightning,
  confuse: castConfuse,
};

/**
 * Index of the nearest visible monster no farther than `maxRange`. Only a
 * strictly shorter distance replaces the current pick, so the entity scanned
 * first wins a tie.
 */
export function closestMonster(world: World, maxRange: number, fov: FieldOfView): number | null {
  const player = getPlayer(world);
  let closestId: number | null = null;
  let closestDistance = Infinity;
  for (let id = 0; id < world.entities.length; id += 1) {
    const entity = world.entities[id];
    if (id === PLAYER || !entity.fighter || !entity.ai || !fov.isVisible(entity.x, entity.y)) {
      continue;
    }
    const dist = distanceTo(player, entity);
    if (dist <= maxRange && dist < closestDistance) {
      closestId = id;
      closestDistance = dist;
    }
  }
  return closestId;
}
