export type KeyCode = 'up' | 'down' | 'left' | 'right' | 'enter' | 'escape' | 'char' | 'other';

export interface KeyInput {
  code: KeyCode;
  /** The typed character for `code: 'char'`. */
  printable?: string;
  alt?: boolean;
}

export type PlayerIntent =
  | { type: 'move'; dx: number; dy: number }
  | { type: 'pickUp' }
  | { type: 'inventory' }
  | { type: 'toggleFullscreen' }
  | { type: 'exit' }
  | { type: 'none' };

const MOVES: Partial<Record<KeyCode, [number, number]>> = {
  up: [0, -1],
  down: [0, 1],
  left: [-1, 0],
  right: [1, 0],
};

export function intentForKey(key: KeyInput): PlayerIntent {
  if (key.code === 'enter' && key.alt) {
    return { type: 'toggleFullscreen' };
  }
  if (key.code === 'escape') {
    return { type: 'exit' };
  }
  const move = MOVES[key.code];
  if (move) {
    return { type: 'move', dx: move[0], dy: move[1] };
  }
  if (key.code === 'char') {
    if (key.printable === 'g') {
      return { type: 'pickUp' };
    }
    if (key.printable === 'i') {
      return { type: 'inventory' };
    }
  }
  return { type: 'none' };
}
