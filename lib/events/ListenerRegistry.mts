/**
 * Listener Registry
 *
 * Typed listener bookkeeping for the bridge's operator-facing events.
 * Listeners run synchronously in registration order; one that throws is
 * logged and does not stop the others.
 */

import { describeError } from '../StreamProtocol.mjs';
import { createLogger, type Logger } from '../logging/logger.mjs';
import type { EventListener, UnsubscribeFunction } from '../types.mjs';

export class ListenerRegistry<Events extends { [K in keyof Events]: unknown[] }> {
  private listeners: { [K in keyof Events]?: EventListener<Events[K]>[] } = {};
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('ListenerRegistry');
  }

  /**
   * Add a listener; the returned function removes it again
   */
  on<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): UnsubscribeFunction {
    const list = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;

    return () => {
      this.off(event, listener);
    };
  }

  off<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): boolean {
    const list = this.listeners[event];
    if (!list) return false;

    const index = list.indexOf(listener);
    if (index === -1) return false;

    list.splice(index, 1);
    if (list.length === 0) {
      delete this.listeners[event];
    }
    return true;
  }

  emit<K extends keyof Events>(event: K, ...args: Events[K]): void {
    const list = this.listeners[event];
    if (!list) return;

    for (const listener of [...list]) {
      try {
        listener(...args);
      } catch (error) {
        this.logger.error(`Error in ${String(event)} listener`, {
          error: describeError(error),
        });
      }
    }
  }

  clear(): void {
    this.listeners = {};
  }
}
