/**
 * Function Registry - Host Side (RPC registry)
 *
 * Maps a function name to the host handler a guest may call by that name.
 * Owned by one window; never shared through globals.
 */

import { consoleLogger, type BridgeValue, type Logger } from './types';

/**
 * A host handler runs on the owner loop and must return promptly.
 * Slow work belongs behind a returned promise.
 */
export type FunctionHandler = (...args: BridgeValue[]) => BridgeValue | Promise<BridgeValue>;

export type InvokeResult =
  | { status: 'missing' }
  | { status: 'returned'; value: BridgeValue | Promise<BridgeValue> }
  | { status: 'threw'; error: unknown };

export interface FunctionRegistryOptions {
  logger?: Logger;
  debug?: boolean;
}

export class FunctionRegistry {
  private functions = new Map<string, FunctionHandler>();
  private readonly logger: Logger;
  private readonly debug: boolean;

  constructor(options: FunctionRegistryOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.debug = options.debug ?? false;
  }

  /**
   * Bind a handler; a later bind with the same name replaces it
   */
  bind(name: string, handler: FunctionHandler): void {
    if (this.debug && this.functions.has(name)) {
      this.logger.warn(`[trellis] Function "${name}" rebound`);
    }
    this.functions.set(name, handler);
  }

  unbind(name: string): boolean {
    return this.functions.delete(name);
  }

  /**
   * Invoke a handler synchronously. Never throws: a missing name and a
   * throwing handler are both reported in the result.
   */
  invoke(name: string, args: BridgeValue[]): InvokeResult {
    const fn = this.functions.get(name);
    if (!fn) {
      if (this.debug) {
        this.logger.warn(`[trellis] Function "${name}" not found`);
      }
      return { status: 'missing' };
    }
    try {
      return { status: 'returned', value: fn(...args) };
    } catch (error) {
      this.logger.error(`[trellis] Function "${name}" threw error:`, error);
      return { status: 'threw', error };
    }
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  names(): string[] {
    return [...this.functions.keys()];
  }

  clear(): void {
    this.functions.clear();
  }

  get size(): number {
    return this.functions.size;
  }
}
