export type EventMap = Record<string, unknown>;

export type EventListener<Events extends EventMap, K extends keyof Events> = (payload: Events[K]) => void;

type AnyListener<Events extends EventMap> = EventListener<Events, keyof Events>;

/** Synchronous typed pub/sub. Listeners run in subscription order. */
export class EventDispatcher<Events extends EventMap> {
  private readonly listeners = new Map<keyof Events, AnyListener<Events>[]>();

  on<K extends keyof Events>(event: K, listener: EventListener<Events, K>): () => void {
    const bucket = this.listeners.get(event) ?? [];
    bucket.push(listener as AnyListener<Events>);
    this.listeners.set(event, bucket);
    return () => this.off(event, listener);
  }

  once<K extends keyof Events>(event: K, listener: EventListener<Events, K>): () => void {
    const wrapped: EventListener<Events, K> = (payload) => {
      this.off(event, wrapped);
      listener(payload);
    };
    return this.on(event, wrapped);
  }

  off<K extends keyof Events>(event: K, listener: EventListener<Events, K>): void {
    const bucket = this.listeners.get(event);
    if (!bucket) {
      return;
    }
    const remaining = bucket.filter((entry) => entry !== listener);
    if (remaining.length === 0) {
      this.listeners.delete(event);
    } else {
      this.listeners.set(event, remaining);
    }
  }

  listenerCount(event: keyof Events): number {
    return this.listeners.get(event)?.length ?? 0;
  }

  clear(): void {
    this.listeners.clear();
  }

  dispatch<K extends keyof Events>(event: K, payload: Events[K]): void {
    const bucket = this.listeners.get(event);
    if (!bucket) {
      return;
    }
    for (const listener of bucket.slice()) {
      (listener as EventListener<Events, K>)(payload);
    }
  }
}
