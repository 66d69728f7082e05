/**
 * Guest Event System
 *
 * Page-side pub/sub. Handlers run in subscription order; removal is by
 * handler identity, so re-subscribing after an unsubscribe starts fresh.
 */

import type { BridgeValue, Logger } from '../shared/types';
import { consoleLogger } from '../shared/types';

export type EventHandler = (data: BridgeValue) => void;

/**
 * Any number of handlers per event name. Subscribing the same handler twice
 * to one name is a single subscription: it runs once per publish and one
 * unsubscribe removes it.
 */
export class EventBus {
  private listeners = new Map<string, Set<EventHandler>>();

  constructor(private readonly logger: Pick<Logger, 'error'> = consoleLogger) {}

  /**
   * Returns unsubscribe function
   */
  subscribe(event: string, handler: EventHandler): () => void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(handler);
    return () => this.unsubscribe(event, handler);
  }

  unsubscribe(event: string, handler: EventHandler): void {
    const set = this.listeners.get(event);
    if (!set) return;
    set.delete(handler);
    if (set.size === 0) {
      this.listeners.delete(event);
    }
  }

  /**
   * Deliver to every current subscriber. A throwing handler is logged
   * and the rest still run.
   */
  publish(event: string, data: BridgeValue): void {
    const set = this.listeners.get(event);
    if (!set) return;
    for (const handler of [...set]) {
      try {
        handler(data);
      } catch (error) {
        this.logger.error(`[trellis] Event handler error (${event}):`, error);
      }
    }
  }

  listenerCount(event: string): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  /** Drop every subscription without notifying anyone */
  clear(): void {
    this.listeners.clear();
  }
}
