type Listener<Args extends unknown[]> = (...args: Args) => void;

type ListenerTable<Events extends { [K in keyof Events]: unknown[] }> = {
  [K in keyof Events]?: Set<Listener<Events[K]>>;
};

/** Event map entries are the argument tuples of each event. */
export class TypedEventEmitter<
  Events extends { [K in keyof Events]: unknown[] },
> {
  private listeners: ListenerTable<Events> = {};

  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
    const set = this.listeners[event] ?? new Set<Listener<Events[K]>>();
    set.add(listener);
    this.listeners[event] = set;
    return this;
  }

  off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
    this.listeners[event]?.delete(listener);
    return this;
  }

  emit<K extends keyof Events>(event: K, ...args: Events[K]): boolean {
    const set = this.listeners[event];
    if (!set || set.size === 0) return false;
    for (const listener of [...set]) listener(...args);
    return true;
  }

  removeAllListeners(): this {
    this.listeners = {};
    return this;
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }
}
