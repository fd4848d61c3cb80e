import { readFile } from 'node:fs/promises';
import balanceJson from '../../config/balance.json';
import { isColorName } from '../render/palette';

export interface EntityTemplate {
  glyph: string;
  color: string;
  name: string;
}

export interface FighterTemplate extends EntityTemplate {
  hp: number;
  defense: number;
  power: number;
}

export type MonsterKind = 'orc' | 'troll';

export type ItemKind = 'heal' | 'lightning' | 'confuse';

export interface BalanceConfig {
  map: {
    width: number;
    height: number;
  };
  rooms: {
    maxRooms: number;
    minSize: number;
    maxSize: number;
  };
  spawns: {
    maxRoomMonsters: number;
    maxRoomItems: number;
    orcChance: number;
    healChance: number;
    lightningChance: number;
  };
  player: FighterTemplate;
  monsters: Record<MonsterKind, FighterTemplate>;
  items: Record<ItemKind, EntityTemplate>;
  effects: {
    healAmount: number;
    lightning: {
      damage: number;
      range: number;
    };
    confuse: {
      range: number;
      numTurns: number;
    };
  };
  inventory: {
    capacity: number;
  };
  fov: {
    torchRadius: number;
    lightWalls: boolean;
  };
  messages: {
    panelLines: number;
  };
}

export const defaultBalance: BalanceConfig = balanceJson;

let cachedBalance: { path: string; config: BalanceConfig } | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function templateColors(config: BalanceConfig): Array<[string, string]> {
  return [
    ['player', config.player.color],
    ...Object.entries(config.monsters).map(([kind, t]): [string, string] => [`monsters.${kind}`, t.color]),
    ...Object.entries(config.items).map(([kind, t]): [string, string] => [`items.${kind}`, t.color]),
  ];
}

type Section = Record<string, unknown>;

function section(value: unknown, where: string): Section {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new Error(`Balance config section "${where}" must be an object`);
  }
  return value;
}

function numberAt(source: Section, key: string, fallback: number, where: string): number {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Balance config ${where}.${key} must be a finite number`);
  }
  return value;
}

function stringAt(source: Section, key: string, fallback: string, where: string): string {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new Error(`Balance config ${where}.${key} must be a string`);
  }
  return value;
}

function booleanAt(source: Section, key: string, fallback: boolean, where: string): boolean {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new Error(`Balance config ${where}.${key} must be a boolean`);
  }
  return value;
}

function entityTemplate(raw: unknown, base: EntityTemplate, where: string): EntityTemplate {
  const source = section(raw, where);
  return {
    glyph: stringAt(source, 'glyph', base.glyph, where),
    color: stringAt(source, 'color', base.color, where),
    name: stringAt(source, 'name', base.name, where),
  };
}

function fighterTemplate(raw: unknown, base: FighterTemplate, where: string): FighterTemplate {
  const source = section(raw, where);
  return {
    ...entityTemplate(source, base, where),
    hp: numberAt(source, 'hp', base.hp, where),
    defense: numberAt(source, 'defense', base.defense, where),
    power: numberAt(source, 'power', base.power, where),
  };
}

/** Overlays a parsed JSON document onto the bundled defaults, field by field, and checks the result. */
export function parseBalance(raw: unknown): BalanceConfig {
  if (!isRecord(raw)) {
    throw new Error('Balance config must be a JSON object');
  }
  const d = defaultBalance;
  const map = section(raw.map, 'map');
  const rooms = section(raw.rooms, 'rooms');
  const spawns = section(raw.spawns, 'spawns');
  const monsters = section(raw.monsters, 'monsters');
  const items = section(raw.items, 'items');
  const effects = section(raw.effects, 'effects');
  const lightning = section(effects.lightning, 'effects.lightning');
  const confuse = section(effects.confuse, 'effects.confuse');
  const inventory = section(raw.inventory, 'inventory');
  const fov = section(raw.fov, 'fov');
  const messages = section(raw.messages, 'messages');

  const config: BalanceConfig = {
    map: {
      width: numberAt(map, 'width', d.map.width, 'map'),
      height: numberAt(map, 'height', d.map.height, 'map'),
    },
    rooms: {
      maxRooms: numberAt(rooms, 'maxRooms', d.rooms.maxRooms, 'rooms'),
      minSize: numberAt(rooms, 'minSize', d.rooms.minSize, 'rooms'),
      maxSize: numberAt(rooms, 'maxSize', d.rooms.maxSize, 'rooms'),
    },
    spawns: {
      maxRoomMonsters: numberAt(spawns, 'maxRoomMonsters', d.spawns.maxRoomMonsters, 'spawns'),
      maxRoomItems: numberAt(spawns, 'maxRoomItems', d.spawns.maxRoomItems, 'spawns'),
      orcChance: numberAt(spawns, 'orcChance', d.spawns.orcChance, 'spawns'),
      healChance: numberAt(spawns, 'healChance', d.spawns.healChance, 'spawns'),
      lightningChance: numberAt(spawns, 'lightningChance', d.spawns.lightningChance, 'spawns'),
    },
    player: fighterTemplate(raw.player, d.player, 'player'),
    monsters: {
      orc: fighterTemplate(monsters.orc, d.monsters.orc, 'monsters.orc'),
      troll: fighterTemplate(monsters.troll, d.monsters.troll, 'monsters.troll'),
    },
    items: {
      heal: entityTemplate(items.heal, d.items.heal, 'items.heal'),
      lightning: entityTemplate(items.lightning, d.items.lightning, 'items.lightning'),
      confuse: entityTemplate(items.confuse, d.items.confuse, 'items.confuse'),
    },
    effects: {
      healAmount: numberAt(effects, 'healAmount', d.effects.healAmount, 'effects'),
      lightning: {
        damage: numberAt(lightning, 'damage', d.effects.lightning.damage, 'effects.lightning'),
        range: numberAt(lightning, 'range', d.effects.lightning.range, 'effects.lightning'),
      },
      confuse: {
        range: numberAt(confuse, 'range', d.effects.confuse.range, 'effects.confuse'),
        numTurns: numberAt(confuse, 'numTurns', d.effects.confuse.numTurns, 'effects.confuse'),
      },
    },
    inventory: {
      capacity: numberAt(inventory, 'capacity', d.inventory.capacity, 'inventory'),
    },
    fov: {
      torchRadius: numberAt(fov, 'torchRadius', d.fov.torchRadius, 'fov'),
      lightWalls: booleanAt(fov, 'lightWalls', d.fov.lightWalls, 'fov'),
    },
    messages: {
      panelLines: numberAt(messages, 'panelLines', d.messages.panelLines, 'messages'),
    },
  };

  for (const [where, color] of templateColors(config)) {
    if (!isColorName(color)) {
      throw new Error(`Unknown color "${color}" in balance config at ${where}`);
    }
  }
  if (config.rooms.minSize > config.rooms.maxSize) {
    throw new Error('Balance config rooms.minSize must not exceed rooms.maxSize');
  }
  if (config.rooms.maxSize + 1 >= Math.min(config.map.width, config.map.height)) {
    throw new Error('Balance config rooms.maxSize does not fit the map');
  }
  if (config.inventory.capacity < 1) {
    throw new Error('Balance config inventory.capacity must be at least 1');
  }
  return config;
}

export async function loadBalance(path: string): Promise<BalanceConfig> {
  if (cachedBalance && cachedBalance.path === path) {
    return cachedBalance.config;
  }
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new Error(`Failed to load balance config from ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new Error(`Balance config at ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const config = parseBalance(json);
  cachedBalance = { path, config };
  return config;
}
