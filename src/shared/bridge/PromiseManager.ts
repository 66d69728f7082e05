/**
 * trellis/shared/bridge - Promise Manager (pending-call table)
 *
 * Handles the lifecycle of calls awaiting a reply from the other side:
 * - Allocation of correlation ids
 * - Timeout management
 * - Settlement, at most once per id
 * - Rejection of everything outstanding on teardown
 */

import { BridgeClosedError, CallTimeoutError } from '../errors';
import { consoleLogger, type Logger } from '../types';

export type PromiseSettleResult =
  | { status: 'fulfilled'; value: unknown }
  | { status: 'rejected'; reason: unknown };

export interface PromiseManagerOptions {
  /**
   * Timeout in milliseconds. Set to 0 to disable.
   * Default: 30000 (30 seconds)
   */
  timeout?: number;

  /**
   * Prefix for generated ids, e.g. `e` gives `e_1`, `e_2`...
   * Default: `p`
   */
  idPrefix?: string;

  logger?: Logger;

  /**
   * Debug mode
   */
  debug?: boolean;
}

interface PendingPromise {
  label: string;
  resolve: (value: unknown) => void;
  reject: (reason: unknown) => void;
  timerId?: ReturnType<typeof setTimeout>;
}

export interface PendingHandle<T> {
  id: string;
  promise: Promise<T>;
}

/**
 * PromiseManager - owns every call awaiting a reply
 *
 * The entry is removed from the table before its promise is settled, so
 * whichever of "reply arrives" and "timer fires" comes second finds nothing
 * and does nothing.
 */
export class PromiseManager {
  private promiseIdCounter = 0;
  private pendingPromises = new Map<string, PendingPromise>();
  private readonly timeout: number;
  private readonly idPrefix: string;
  private readonly logger: Logger;
  private readonly debug: boolean;

  constructor(options: PromiseManagerOptions = {}) {
    this.timeout = options.timeout ?? 30000;
    this.idPrefix = options.idPrefix ?? 'p';
    this.logger = options.logger ?? consoleLogger;
    this.debug = options.debug ?? false;
  }

  /**
   * Allocate a fresh id and a promise settled by `settle()`, a timeout or `clear()`.
   * `label` names the call in timeout errors.
   */
  create(label: string): PendingHandle<unknown>;
  create<T>(label: string, map: (value: unknown) => T): PendingHandle<T>;
  create<T>(label: string, map?: (value: unknown) => T): PendingHandle<unknown> {
    const id = `${this.idPrefix}_${++this.promiseIdCounter}`;
    const pending = this.createPending(id, label);
    return { id, promise: map ? pending.then(map) : pending };
  }

  /**
   * Create a pending promise for an id allocated elsewhere
   */
  createPending(promiseId: string, label = promiseId): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const entry: PendingPromise = { label, resolve, reject };

      if (this.timeout > 0) {
        entry.timerId = setTimeout(() => {
          if (this.pendingPromises.get(promiseId) !== entry) return;
          this.pendingPromises.delete(promiseId);
          if (this.debug) {
            this.logger.warn(`[PromiseManager] ${label} timed out after ${this.timeout}ms`);
          }
          reject(new CallTimeoutError(label, this.timeout));
        }, this.timeout);
      }

      this.pendingPromises.set(promiseId, entry);
    });
  }

  /**
   * Settle a pending promise with a result.
   * Returns false when the id is unknown or already settled.
   */
  settle(promiseId: string, result: PromiseSettleResult): boolean {
    const pending = this.pendingPromises.get(promiseId);
    if (!pending) {
      if (this.debug) {
        this.logger.warn(`[PromiseManager] No pending promise found for ID: ${promiseId}`);
      }
      return false;
    }

    if (pending.timerId) {
      clearTimeout(pending.timerId);
    }
    this.pendingPromises.delete(promiseId);

    if (result.status === 'fulfilled') {
      pending.resolve(result.value);
    } else {
      pending.reject(result.reason);
    }

    if (this.debug) {
      this.logger.log(`[PromiseManager] ${pending.label} settled (${result.status})`);
    }
    return true;
  }

  hasPending(promiseId: string): boolean {
    return this.pendingPromises.has(promiseId);
  }

  get pendingCount(): number {
    return this.pendingPromises.size;
  }

  /**
   * Reject every outstanding promise (teardown)
   */
  clear(reason: Error = new BridgeClosedError()): void {
    const entries = [...this.pendingPromises.values()];
    this.pendingPromises.clear();
    for (const pending of entries) {
      if (pending.timerId) {
        clearTimeout(pending.timerId);
      }
      pending.reject(reason);
    }
  }
}
