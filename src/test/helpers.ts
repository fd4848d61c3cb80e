import { createWorld, getPlayer, setFloor, type World } from '../ecs/world';
import { defaultBalance, type BalanceConfig } from '../logic/balance';
import type { FieldOfView, Menu } from '../logic/collaborators';
import { setChecksEnabled } from '../utils/checks';
import { RNG } from '../utils/rng';

setChecksEnabled(false);

/** Replays `values` from `next()`, then keeps returning `fallback`. */
export class SequenceRng extends RNG {
  private readonly values: number[];

  constructor(values: number[], private readonly fallback = 0) {
    super(1);
    this.values = values.slice();
  }

  next(): number {
    return this.values.shift() ?? this.fallback;
  }

  remaining(): number {
    return this.values.length;
  }
}

export class StubFov implements FieldOfView {
  readonly computed: Array<{ x: number; y: number; radius: number }> = [];
  private readonly hidden = new Set<string>();

  constructor(private allVisible = true) {}

  static none(): StubFov {
    return new StubFov(false);
  }

  hide(x: number, y: number): this {
    this.hidden.add(`${x},${y}`);
    return this;
  }

  setAllVisible(value: boolean): void {
    this.allVisible = value;
  }

  compute(_grid: unknown, x: number, y: number, radius: number): void {
    this.computed.push({ x, y, radius });
  }

  isVisible(x: number, y: number): boolean {
    return this.allVisible && !this.hidden.has(`${x},${y}`);
  }
}

export function pickFirst(): Menu {
  return () => 0;
}

export function cancelMenu(): Menu {
  return () => null;
}

export function testBalance(overrides: Partial<BalanceConfig> = {}): BalanceConfig {
  return { ...defaultBalance, map: { width: 12, height: 12 }, ...overrides };
}

/**
 * A walled box with an open floor inside (1..width-2 on both axes) and the
 * player standing at `(px, py)`.
 */
export function arenaWorld(px = 5, py = 5, rng: RNG = new SequenceRng([]), balance = testBalance()): World {
  const world = createWorld(balance, { rng });
  for (let y = 1; y < balance.map.height - 1; y += 1) {
    for (let x = 1; x < balance.map.width - 1; x += 1) {
      setFloor(world.grid, x, y);
    }
  }
  const player = getPlayer(world);
  player.x = px;
  player.y = py;
  return world;
}

export function messageTexts(world: World): string[] {
  return world.session.getState().messages.map((m) => m.text);
}
