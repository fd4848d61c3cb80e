import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import type { ColorName } from '../render/palette';

export interface Message {
  text: string;
  color: ColorName;
}

/** Everything the presentation layer reads besides the map and the entities. */
export interface SessionState {
  messages: Message[];
  fullscreen: boolean;
  addMessage: (text: string, color: ColorName) => void;
  toggleFullscreen: () => void;
  clearMessages: () => void;
}

export function createSessionStore() {
  return createStore<SessionState>()(
    immer((set) => ({
      messages: [],
      fullscreen: false,
      addMessage: (text, color) =>
        set((s) => {
          s.messages.push({ text, color });
        }),
      toggleFullscreen: () =>
        set((s) => {
          s.fullscreen = !s.fullscreen;
        }),
      clearMessages: () =>
        set((s) => {
          s.messages = [];
        }),
    })),
  );
}

export type SessionStore = ReturnType<typeof createSessionStore>;

/** Newest message first, at most `maxLines` entries. */
export function recentMessages(state: Pick<SessionState, 'messages'>, maxLines: number): Message[] {
  if (maxLines <= 0) {
    return [];
  }
  return state.messages.slice(-maxLines).reverse();
}
