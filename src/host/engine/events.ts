/**
 * Event System for windows and apps
 * Manages typed listeners with leak detection
 */

import type { Logger } from '../../shared/types';

export type Listener<T> = (data: T) => void;

export class EventManager<Events extends object> {
  private listeners: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};
  private maxListeners = 10;
  private warnedEvents = new Set<keyof Events>();

  constructor(
    private logger: Pick<Logger, 'warn' | 'error'>,
    private debug = false,
    private logPrefix = '[trellis]'
  ) {}

  /**
   * Emit event to all registered listeners, in registration order.
   * A throwing listener is logged and does not stop the others.
   */
  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const listeners = this.listeners[event];
    if (!listeners) return;
    for (const listener of [...listeners]) {
      try {
        listener(data);
      } catch (error) {
        this.logger.error(`${this.logPrefix} Event listener error (${String(event)}):`, error);
      }
    }
  }

  /**
   * Register event listener
   * Returns unsubscribe function
   */
  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    let listeners = this.listeners[event];
    if (!listeners) {
      listeners = new Set();
      this.listeners[event] = listeners;
    }
    listeners.add(listener);

    if (this.debug && listeners.size > this.maxListeners && !this.warnedEvents.has(event)) {
      this.logger.warn(
        `${this.logPrefix} Possible listener leak detected. ` +
          `${listeners.size} listeners added for event "${String(event)}". ` +
          `Use setMaxListeners() to increase limit.`
      );
      this.warnedEvents.add(event);
    }

    return () => {
      const current = this.listeners[event];
      current?.delete(listener);
      if (this.warnedEvents.has(event) && (current?.size ?? 0) <= this.maxListeners) {
        this.warnedEvents.delete(event);
      }
    };
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }

  setMaxListeners(n: number): void {
    this.maxListeners = n;
  }

  removeAllListeners(): void {
    this.listeners = {};
    this.warnedEvents.clear();
  }
}
