import type { GridState } from '../ecs/world';
import type { RenderSnapshot } from '../render/state';
import type { KeyInput } from './intents';

/**
 * Field of view computed outside the simulation. `isVisible` answers for the
 * most recent `compute` call and is trusted for AI activation, targeting and
 * drawing alike.
 */
export interface FieldOfView {
  compute(grid: GridState, x: number, y: number, radius: number, lightWalls: boolean): void;
  isVisible(x: number, y: number): boolean;
}

/** Shows `options` under `header`; resolves to the picked index or `null`. */
export type Menu = (header: string, options: readonly string[]) => number | null;

export interface InputSource {
  /** Next key event, or `null` once the window has been closed. */
  poll(): KeyInput | null;
}

export type Renderer = (snapshot: RenderSnapshot) => void;
