import { describe, expect, it, vi } from 'vitest';
import { BASIC_AI, confusedAi } from '../ecs/components';
import { PLAYER, spawnItem, spawnMonster } from '../ecs/world';
import { GameEvent } from './events/GameEvents';
import { closestMonster, inventoryMenuOptions, pickItemUp, useItem } from './inventory';
import { arenaWorld, messageTexts, StubFov } from '../test/helpers';

function carry(world: ReturnType<typeof arenaWorld>, kind: 'heal' | 'lightning' | 'confuse'): void {
  spawnItem(world, world.entities[PLAYER].x, world.entities[PLAYER].y, kind);
  pickItemUp(world, world.entities.length - 1);
}

describe('pickItemUp', () => {
  it('moves the item from the world into the inventory', () => {
    const world = arenaWorld(5, 5);
    const potion = spawnItem(world, 5, 5, 'heal');
    const picked = vi.fn();
    world.dispatcher.on(GameEvent.ItemPickedUp, picked);

    expect(pickItemUp(world, 1)).toBe(true);

    expect(world.entities).toHaveLength(1);
    expect(world.inventory).toEqual([potion]);
    expect(messageTexts(world)).toEqual(['You picked up a healing potion!']);
    expect(picked).toHaveBeenCalledWith({ entityId: potion.id, kind: 'heal' });
  });

  it('rejects a tenth item', () => {
    const world = arenaWorld(5, 5);
    for (let i = 0; i < 9; i += 1) {
      carry(world, 'heal');
    }
    const extra = spawnItem(world, 5, 5, 'confuse');

    expect(pickItemUp(world, 1)).toBe(false);

    expect(world.inventory).toHaveLength(9);
    expect(world.entities[1]).toBe(extra);
    expect(messageTexts(world).at(-1)).toBe('Your inventory is full, cannot pick up scroll of confusion.');
  });
});

describe('inventoryMenuOptions', () => {
  it('lists item names or a placeholder', () => {
    const world = arenaWorld(5, 5);
    expect(inventoryMenuOptions(world)).toEqual(['Inventory is empty.']);
    carry(world, 'heal');
    carry(world, 'lightning');
    expect(inventoryMenuOptions(world)).toEqual(['healing potion', 'scroll of lightning bolt']);
  });
});

describe('healing potion', () => {
  it('is cancelled at full health', () => {
    const world = arenaWorld(5, 5);
    carry(world, 'heal');
    world.session.getState().clearMessages();

    expect(useItem(world, 0, new StubFov())).toBe('cancelled');

    expect(world.entities[PLAYER].fighter?.hp).toBe(30);
    expect(world.inventory).toHaveLength(1);
    expect(messageTexts(world)).toEqual(['You are already at full health.', 'Cancelled']);
  });

  it('restores the configured amount', () => {
    const world = arenaWorld(5, 5);
    carry(world, 'heal');
    const fighter = world.entities[PLAYER].fighter;
    if (!fighter) throw new Error('player without fighter');
    fighter.hp = 10;
    const used = vi.fn();
    world.dispatcher.on(GameEvent.ItemUsed, used);

    expect(useItem(world, 0, new StubFov())).toBe('usedUp');

    expect(fighter.hp).toBe(14);
    expect(world.inventory).toHaveLength(0);
    expect(messageTexts(world).at(-1)).toBe('Your wounds start to feel better!');
    expect(used).toHaveBeenCalledWith(expect.objectContaining({ kind: 'heal', result: 'usedUp' }));
  });
});

describe('scroll of lightning bolt', () => {
  it('is cancelled without a visible target', () => {
    const world = arenaWorld(5, 5);
    const orc = spawnMonster(world, 7, 5, 'orc');
    carry(world, 'lightning');
    world.session.getState().clearMessages();

    expect(useItem(world, 0, new StubFov().hide(7, 5))).toBe('cancelled');

    expect(orc.fighter?.hp).toBe(10);
    expect(world.entities[PLAYER].fighter?.hp).toBe(30);
    expect(world.inventory).toHaveLength(1);
    expect(messageTexts(world)).toEqual(['No enemy is close enough to strike.', 'Cancelled']);
  });

  it('strikes the closest monster', () => {
    const world = arenaWorld(5, 5);
    const orc = spawnMonster(world, 8, 5, 'orc');
    const troll = spawnMonster(world, 7, 5, 'troll');
    carry(world, 'lightning');
    world.session.getState().clearMessages();

    expect(useItem(world, 0, new StubFov())).toBe('usedUp');

    expect(orc.fighter?.hp).toBe(10);
    expect(troll.name).toBe('remains of troll');
    expect(world.inventory).toHaveLength(0);
    expect(messageTexts(world)).toEqual([
      'A lightning bolt strikes the troll with a loud thunder! The damage is 40 hit points.',
      'Troll is dead!',
    ]);
  });
});

describe('scroll of lightning bolt range', () => {
  it('is cancelled when the only monster stands just outside the range', () => {
    const world = arenaWorld(1, 1);
    const orc = spawnMonster(world, 6, 3, 'orc');
    carry(world, 'lightning');
    world.session.getState().clearMessages();

    expect(useItem(world, 0, new StubFov())).toBe('cancelled');
    expect(orc.name).toBe('orc');
    expect(orc.fighter?.hp).toBe(10);
    expect(world.inventory).toHaveLength(1);
    expect(messageTexts(world)).toEqual(['No enemy is close enough to strike.', 'Cancelled']);
  });
});

describe('scroll of confusion', () => {
  it('wraps the current behaviour', () => {
    const world = arenaWorld(5, 5);
    const orc = spawnMonster(world, 5, 8, 'orc');
    carry(world, 'confuse');

    expect(useItem(world, 0, new StubFov())).toBe('usedUp');

    expect(orc.ai).toEqual(confusedAi(BASIC_AI, 10));
    expect(messageTexts(world).at(-1)).toBe('The eyes of the orc look vacant, as it starts to stumble around!');
  });

  it('is cancelled when nobody is in range', () => {
    const world = arenaWorld(1, 1);
    spawnMonster(world, 10, 10, 'orc');
    carry(world, 'confuse');
    world.session.getState().clearMessages();

    expect(useItem(world, 0, new StubFov())).toBe('cancelled');
    expect(messageTexts(world)).toEqual(['No enemy is close enough to confuse.', 'Cancelled']);
  });
});

describe('useItem', () => {
  it('reports entities without an effect', () => {
    const world = arenaWorld(5, 5);
    carry(world, 'heal');
    world.inventory[0].item = null;
    world.session.getState().clearMessages();

    expect(useItem(world, 0, new StubFov())).toBe('cancelled');
    expect(world.inventory).toHaveLength(1);
    expect(messageTexts(world)).toEqual(['The healing potion cannot be used.']);
  });
});

describe('closestMonster', () => {
  it('keeps the first monster on a tie', () => {
    const world = arenaWorld(5, 5);
    spawnMonster(world, 5, 8, 'orc');
    spawnMonster(world, 8, 5, 'troll');
    expect(closestMonster(world, 5, new StubFov())).toBe(1);
  });

  it('never reaches past the range bound', () => {
    const world = arenaWorld(1, 5);
    spawnMonster(world, 7, 5, 'orc');
    expect(closestMonster(world, 5, new StubFov())).toBeNull();
    spawnMonster(world, 6, 5, 'troll');
    expect(closestMonster(world, 5, new StubFov())).toBe(2);
  });

  it('ignores a diagonal monster just past the range', () => {
    const world = arenaWorld(1, 1);
    spawnMonster(world, 6, 3, 'orc');
    expect(closestMonster(world, 5, new StubFov())).toBeNull();
    spawnMonster(world, 4, 5, 'troll');
    expect(closestMonster(world, 5, new StubFov())).toBe(2);
  });

  it('skips items, corpses and monsters without AI', () => {
    const world = arenaWorld(5, 5);
    spawnItem(world, 6, 5, 'heal');
    const sleeper = spawnMonster(world, 5, 6, 'orc');
    sleeper.ai = null;
    spawnMonster(world, 4, 4, 'orc').fighter = null;
    expect(closestMonster(world, 5, new StubFov())).toBeNull();
  });
});
