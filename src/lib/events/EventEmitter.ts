import { createLogger } from '../utils/logger';

/**
 * Event name → handler argument tuple.
 */
export type EventMap<T> = { [K in keyof T]: unknown[] };

type HandlerSets<T extends EventMap<T>> = {
  [K in keyof T]?: Set<(...args: T[K]) => void>;
};

const logger = createLogger('EventEmitter');

export class EventEmitter<TEvents extends EventMap<TEvents> = Record<string, unknown[]>> {
  private handlers: HandlerSets<TEvents> = {};

  on<K extends keyof TEvents>(event: K, handler: (...args: TEvents[K]) => void): void {
    let handlers = this.handlers[event];
    if (!handlers) {
      handlers = new Set();
      this.handlers[event] = handlers;
    }
    handlers.add(handler);
  }

  off<K extends keyof TEvents>(event: K, handler: (...args: TEvents[K]) => void): void {
    const handlers = this.handlers[event];
    if (!handlers) return;

    handlers.delete(handler);
    if (handlers.size === 0) {
      delete this.handlers[event];
    }
  }

  once<K extends keyof TEvents>(event: K, handler: (...args: TEvents[K]) => void): void {
    const wrapper = (...args: TEvents[K]): void => {
      this.off(event, wrapper);
      handler(...args);
    };
    this.on(event, wrapper);
  }

  emit<K extends keyof TEvents>(event: K, ...args: TEvents[K]): void {
    const handlers = this.handlers[event];
    if (!handlers) return;

    // Copy so handlers that unsubscribe don't disturb the iteration
    for (const handler of [...handlers]) {
      try {
        handler(...args);
      } catch (error) {
        logger.error(`Error in handler for '${String(event)}':`, error);
      }
    }
  }

  listenerCount(event: keyof TEvents): number {
    return this.handlers[event]?.size ?? 0;
  }

  removeAllListeners(event?: keyof TEvents): void {
    if (event === undefined) {
      this.handlers = {};
    } else {
      delete this.handlers[event];
    }
  }
}
