import { getPlayer, gridIndex, type World } from '../ecs/world';
import { recentMessages, type Message } from '../core/store';
import type { FieldOfView } from '../logic/collaborators';
import type { ColorName } from './palette';

export interface RenderTile {
  x: number;
  y: number;
  wall: boolean;
  visible: boolean;
  explored: boolean;
}

export interface RenderEntity {
  id: number;
  x: number;
  y: number;
  glyph: string;
  color: ColorName;
  name: string;
  blocks: boolean;
}

export interface HudState {
  hp: number;
  maxHp: number;
  inventoryCount: number;
  fullscreen: boolean;
}

export interface RenderSnapshot {
  width: number;
  height: number;
  tiles: RenderTile[];
  entities: RenderEntity[];
  messages: Message[];
  hud: HudState;
}

/**
 * Everything a frame needs. Tiles in view are marked explored on the world
 * grid as a side effect; explored tiles never go back to unexplored.
 */
export function buildRenderSnapshot(
  world: World,
  fov: FieldOfView,
  maxMessages: number = world.balance.messages.panelLines,
): RenderSnapshot {
  const { grid } = world;
  const tiles: RenderTile[] = [];
  for (let y = 0; y < grid.height; y += 1) {
    for (let x = 0; x < grid.width; x += 1) {
      const tile = grid.tiles[gridIndex(grid, x, y)];
      const visible = fov.isVisible(x, y);
      if (visible) {
        tile.explored = true;
      }
      tiles.push({ x, y, wall: tile.blockSight, visible, explored: tile.explored });
    }
  }

  // non-blocking entities first so monsters and the player draw on top of items and corpses
  const entities: RenderEntity[] = world.entities
    .filter((entity) => fov.isVisible(entity.x, entity.y))
    .map((entity) => ({
      id: entity.id,
      x: entity.x,
      y: entity.y,
      glyph: entity.glyph,
      color: entity.color,
      name: entity.name,
      blocks: entity.blocks,
    }))
    .sort((a, b) => Number(a.blocks) - Number(b.blocks));

  const fighter = getPlayer(world).fighter;
  const session = world.session.getState();
  return {
    width: grid.width,
    height: grid.height,
    tiles,
    entities,
    messages: recentMessages(session, maxMessages),
    hud: {
      hp: fighter?.hp ?? 0,
      maxHp: fighter?.maxHp ?? 0,
      inventoryCount: world.inventory.length,
      fullscreen: session.fullscreen,
    },
  };
}
