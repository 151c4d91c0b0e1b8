/**
 * EventEmitter - Minimal synchronous event emitter used by controls and the grid.
 */

/**
 * Handler signature. Declared through a method so that handlers taking a
 * concrete payload type can be registered.
 */
export type EventHandler = {
  bivarianceHack(...args: unknown[]): void;
}['bivarianceHack'];

export class EventEmitter {
  private listeners: Map<string, Set<EventHandler>> = new Map();

  /**
   * Register a handler for an event.
   */
  on(event: string, handler: EventHandler): void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }
    handlers.add(handler);
  }

  /**
   * Remove a handler for an event.
   */
  off(event: string, handler: EventHandler): void {
    const handlers = this.listeners.get(event);
    if (!handlers) {
      return;
    }
    handlers.delete(handler);
    if (handlers.size === 0) {
      this.listeners.delete(event);
    }
  }

  /**
   * Register a handler that is removed after its first call.
   */
  once(event: string, handler: EventHandler): void {
    const wrapper: EventHandler = (...args: unknown[]) => {
      this.off(event, wrapper);
      handler(...args);
    };
    this.on(event, wrapper);
  }

  /**
   * Call every handler registered for an event.
   * A throwing handler is logged and does not stop the others.
   */
  emit(event: string, ...args: unknown[]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) {
      return;
    }
    for (const handler of Array.from(handlers)) {
      try {
        handler(...args);
      } catch (error) {
        console.error(`[EventEmitter] Error in handler for "${event}":`, error);
      }
    }
  }

  removeAllListeners(event?: string): void {
    if (event === undefined) {
      this.listeners.clear();
    } else {
      this.listeners.delete(event);
    }
  }

  listenerCount(event: string): number {
    return this.listeners.get(event)?.size ?? 0;
  }
}
