// engine/event-bus.ts — Typed observer for combat notifications

export type Unsubscribe = () => void;

type Handler<E> = (event: E) => void;

function isEventOfType<E extends { type: string }, T extends E['type']>(
  event: E,
  type: T,
): event is Extract<E, { type: T }> {
  return event.type === type;
}

/**
 * Listeners are keyed by the event's `type` discriminant. A handler that
 * throws is logged and skipped so the remaining listeners still run.
 */
export class EventBus<E extends { type: string }> {
  private readonly listeners = new Map<E['type'], Set<Handler<E>>>();
  private readonly anyListeners = new Set<Handler<E>>();

  on<T extends E['type']>(type: T, handler: Handler<Extract<E, { type: T }>>): Unsubscribe {
    const wrapped: Handler<E> = (event) => {
      if (isEventOfType(event, type)) handler(event);
    };

    let handlers = this.listeners.get(type);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(type, handlers);
    }
    handlers.add(wrapped);

    let removed = false;
    return () => {
      if (removed) return;
      removed = true;
      const current = this.listeners.get(type);
      if (!current) return;
      current.delete(wrapped);
      if (current.size === 0) this.listeners.delete(type);
    };
  }

  once<T extends E['type']>(type: T, handler: Handler<Extract<E, { type: T }>>): Unsubscribe {
    const unsubscribe = this.on(type, (event) => {
      unsubscribe();
      handler(event);
    });
    return unsubscribe;
  }

  /** Receives every event, after the typed listeners. */
  onAny(handler: Handler<E>): Unsubscribe {
    this.anyListeners.add(handler);
    return () => {
      this.anyListeners.delete(handler);
    };
  }

  emit(event: E): void {
    const handlers = this.listeners.get(event.type);
    const queue = [...(handlers ?? []), ...this.anyListeners];

    for (const handler of queue) {
      try {
        handler(event);
      } catch (error) {
        console.error(`[combat] Unhandled '${event.type}' event handler error`, error);
      }
    }
  }

  clear(): void {
    this.listeners.clear();
    this.anyListeners.clear();
  }

  listenerCount(type?: E['type']): number {
    if (type === undefined) {
      let total = this.anyListeners.size;
      for (const handlers of this.listeners.values()) total += handlers.size;
      return total;
    }
    return this.listeners.get(type)?.size ?? 0;
  }
}
