type Listener<T> = (payload: T) => void;

type ListenerMap<Events> = { [K in keyof Events]?: Listener<Events[K]>[] };

/**
 * Typed publish/subscribe bus. `Events` maps event names to payload types.
 */
export class EventBus<Events extends object> {
  private listeners: ListenerMap<Events> = {};

  public on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const list = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;

    // Returns the unsubscribe function
    return () => {
      this.off(event, listener);
    };
  }

  public off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): void {
    const list = this.listeners[event];
    if (!list) {
      return;
    }
    this.listeners[event] = list.filter((l) => l !== listener);
  }

  public emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const list = this.listeners[event];
    if (!list) {
      return;
    }
    // Copy so listeners may unsubscribe while being notified
    [...list].forEach((listener) => {
      listener(payload);
    });
  }

  public clear(): void {
    this.listeners = {};
  }
}
