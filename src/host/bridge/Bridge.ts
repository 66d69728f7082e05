/**
 * trellis/host/bridge - Bridge Channel
 *
 * The single conduit between the host and one guest page:
 * - dispatch() decodes and routes everything the guest sends
 * - sendEvent() / invokeRemoteEval() are the outbound direction
 * - destroy() rejects whatever is still pending
 *
 * All methods are expected to run on the window's owner loop.
 */

import { PromiseManager } from '../../shared/bridge/PromiseManager';
import {
  BridgeClosedError,
  CallTimeoutError,
  errorMessage,
  RemoteCallError,
  ScriptError,
  WireFormatError,
} from '../../shared/errors';
import type { FunctionRegistry } from '../../shared/FunctionRegistry';
import { mergeStyle } from '../../shared/style';
import type { DragRegion, WindowStyle } from '../../shared/style-types';
import {
  type BridgeMessage,
  type BridgeValue,
  type CallMessage,
  consoleLogger,
  type JsValue,
  type Logger,
  STYLE_CHANGE_EVENT,
  toJsValue,
} from '../../shared/types';
import { encodeMessage, tryDecodeMessage } from '../../shared/wire';

/**
 * Receiver of guest style requests; the window implements it on top of the reconciler
 */
export interface StyleTarget {
  readonly style: WindowStyle;
  /** Commit a complete model */
  applyStyle(next: WindowStyle): void;
  setDragRegions(regions: DragRegion[]): void;
}

/**
 * Receiver of guest window commands
 */
export interface WindowCommandSink {
  /** Returns false when the op is unknown or its value unusable */
  execute(op: string, value: BridgeValue | undefined): boolean;
}

/**
 * Events that are not routed internally: `(eventName, payload as JSON text)`
 */
export type MessageListener = (event: string, payloadJson: string) => void;

/**
 * Bridge options
 */
export interface BridgeOptions {
  /**
   * Delivers encoded text into the guest. Called in send order.
   */
  postToGuest: (raw: string) => void;

  /**
   * Host functions callable by the guest
   */
  functions: FunctionRegistry;

  /**
   * Style requests are dropped when absent
   */
  styleTarget?: StyleTarget;

  /**
   * Window ops are dropped when absent
   */
  windowCommands?: WindowCommandSink;

  /**
   * Generic callback for user-domain events
   */
  onMessage?: MessageListener;

  /**
   * Remote evaluation timeout in milliseconds, default 30000.
   * Set to 0 to disable.
   */
  callTimeout?: number;

  /**
   * Prefix for log lines, default `[trellis:bridge]`
   */
  logPrefix?: string;

  debug?: boolean;

  logger?: Logger;
}

export interface BridgeStats {
  received: number;
  dropped: number;
  callsHandled: number;
  unknownCalls: number;
  timeouts: number;
  forwarded: number;
}

const MAX_LABEL_SCRIPT = 60;

function evalLabel(script: string): string {
  const body =
    script.length > MAX_LABEL_SCRIPT ? `${script.slice(0, MAX_LABEL_SCRIPT)}...` : script;
  return `evalRemote(${body})`;
}

/**
 * Bridge - host end of the channel
 */
export class Bridge {
  private readonly postToGuest: (raw: string) => void;
  private readonly functions: FunctionRegistry;
  private readonly styleTarget?: StyleTarget;
  private readonly windowCommands?: WindowCommandSink;
  private onMessage?: MessageListener;
  private readonly logger: Logger;
  private readonly logPrefix: string;
  private readonly debug: boolean;
  private readonly pending: PromiseManager;
  private closed = false;

  private stats: BridgeStats = {
    received: 0,
    dropped: 0,
    callsHandled: 0,
    unknownCalls: 0,
    timeouts: 0,
    forwarded: 0,
  };

  constructor(options: BridgeOptions) {
    this.postToGuest = options.postToGuest;
    this.functions = options.functions;
    this.styleTarget = options.styleTarget;
    this.windowCommands = options.windowCommands;
    this.onMessage = options.onMessage;
    this.logger = options.logger ?? consoleLogger;
    this.logPrefix = options.logPrefix ?? '[trellis:bridge]';
    this.debug = options.debug ?? false;

    this.pending = new PromiseManager({
      timeout: options.callTimeout ?? 30000,
      idPrefix: 'e',
      logger: this.logger,
      debug: this.debug,
    });
  }

  // ============ Inbound ============

  /**
   * Decode and route one message from the guest. Never throws.
   */
  dispatch(raw: string | Uint8Array): void {
    if (this.closed) return;
    this.stats.received++;

    const decoded = tryDecodeMessage(raw);
    if (!decoded.ok) {
      this.drop(decoded.error);
      return;
    }

    const message = decoded.message;
    if (this.debug) {
      this.logger.log(`${this.logPrefix} <- ${message.type}`);
    }

    try {
      this.route(message);
    } catch (error) {
      this.logger.error(`${this.logPrefix} Failed to handle ${message.type} message:`, error);
      this.refuse(message, errorMessage(error));
    }
  }

  private route(message: BridgeMessage): void {
    switch (message.type) {
      case 'callResult':
        if ('error' in message) {
          this.pending.settle(message.id, {
            status: 'rejected',
            reason: new RemoteCallError('evalRemote', message.error),
          });
        } else {
          this.pending.settle(message.id, { status: 'fulfilled', value: message.value });
        }
        return;

      case 'call':
        this.handleCall(message);
        return;

      case 'styleRequest': {
        if (!this.styleTarget) {
          this.logger.warn(`${this.logPrefix} Style request ignored: no style target`);
          this.refuse(message, 'No style target');
          return;
        }
        const next = mergeStyle(this.styleTarget.style, message.style);
        this.styleTarget.applyStyle(next);
        this.sendEvent(STYLE_CHANGE_EVENT, this.styleTarget.style);
        this.acknowledge(message.id);
        return;
      }

      case 'dragRegions':
        if (!this.styleTarget) {
          this.logger.warn(`${this.logPrefix} Drag regions ignored: no style target`);
          this.refuse(message, 'No style target');
          return;
        }
        this.styleTarget.setDragRegions(message.regions);
        this.sendEvent(STYLE_CHANGE_EVENT, this.styleTarget.style);
        this.acknowledge(message.id);
        return;

      case 'windowOp': {
        const handled = this.windowCommands?.execute(message.op, message.value) ?? false;
        if (!handled && this.debug) {
          this.logger.log(`${this.logPrefix} Window op ignored: ${message.op}`);
        }
        this.acknowledge(message.id);
        return;
      }

      case 'event':
        this.forward(message.name, message.payload);
        return;

      case 'eval':
        // Evaluation requests only travel host -> guest
        this.drop(new WireFormatError('Unexpected eval message from guest'));
        return;
    }
  }

  private handleCall(message: CallMessage): void {
    const { id, name, args } = message;
    const result = this.functions.invoke(name, args);

    switch (result.status) {
      case 'missing':
        this.stats.unknownCalls++;
        this.reply(id, { error: `Unknown function: ${name}` });
        return;

      case 'threw':
        this.reply(id, { error: errorMessage(result.error) });
        return;

      case 'returned': {
        this.stats.callsHandled++;
        const value = result.value;
        if (value instanceof Promise) {
          void value.then(
            (resolved) => this.reply(id, { value: resolved }),
            (error: unknown) => this.reply(id, { error: errorMessage(error) })
          );
          return;
        }
        this.reply(id, { value });
        return;
      }
    }
  }

  private forward(name: string, payload: BridgeValue): void {
    if (!this.onMessage) {
      if (this.debug) {
        this.logger.log(`${this.logPrefix} No listener for event "${name}"`);
      }
      return;
    }
    this.stats.forwarded++;
    try {
      this.onMessage(name, JSON.stringify(payload));
    } catch (error) {
      this.logger.error(`${this.logPrefix} Message listener error:`, error);
    }
  }

  private drop(error: WireFormatError): void {
    this.stats.dropped++;
    this.logger.warn(`${this.logPrefix} Dropped malformed message: ${error.message}`, error.issues);
  }

  private acknowledge(id: string | undefined): void {
    if (id !== undefined) {
      this.reply(id, { value: null });
    }
  }

  /**
   * Answer an acknowledged request with an error instead of leaving it to time out
   */
  private refuse(message: BridgeMessage, reason: string): void {
    switch (message.type) {
      case 'styleRequest':
      case 'dragRegions':
      case 'windowOp':
        if (message.id !== undefined) {
          this.reply(message.id, { error: reason });
        }
        return;
      default:
        return;
    }
  }

  private reply(id: string, outcome: { value: BridgeValue | undefined } | { error: string }): void {
    if ('error' in outcome) {
      this.post({ type: 'callResult', id, error: outcome.error });
    } else {
      this.post({ type: 'callResult', id, value: outcome.value ?? null });
    }
  }

  // ============ Outbound ============

  /**
   * Publish an event to the guest's subscribers
   */
  sendEvent(name: string, payload: BridgeValue = null): void {
    this.post({ type: 'event', name, payload });
  }

  /**
   * Evaluate a script in the guest and resolve with its (narrowed) result.
   * Rejects with CallTimeoutError when no reply arrives in time, ScriptError
   * when the script throws, BridgeClosedError on teardown.
   */
  invokeRemoteEval(script: string): Promise<JsValue> {
    if (this.closed) {
      return Promise.reject(new BridgeClosedError());
    }

    const label = evalLabel(script);
    const { id, promise } = this.pending.create(label, toJsValue);
    const result = promise.catch((error: unknown) => {
      if (error instanceof RemoteCallError) {
        throw new ScriptError(script, error.message);
      }
      if (error instanceof CallTimeoutError) {
        this.stats.timeouts++;
      }
      throw error;
    });

    if (!this.post({ type: 'eval', id, script })) {
      this.pending.settle(id, {
        status: 'rejected',
        reason: new BridgeClosedError(`Could not deliver ${label}`),
      });
    }
    return result;
  }

  /**
   * Returns false when the message could not be delivered
   */
  private post(message: BridgeMessage): boolean {
    if (this.closed) return false;
    if (this.debug) {
      this.logger.log(`${this.logPrefix} -> ${message.type}`);
    }
    try {
      this.postToGuest(encodeMessage(message));
      return true;
    } catch (error) {
      this.logger.error(`${this.logPrefix} Failed to post ${message.type} to guest:`, error);
      return false;
    }
  }

  // ============ Lifecycle ============

  setMessageListener(listener: MessageListener | undefined): void {
    this.onMessage = listener;
  }

  get pendingCount(): number {
    return this.pending.pendingCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getStats(): BridgeStats {
    return { ...this.stats };
  }

  /**
   * Tear down: reject every pending evaluation with BridgeClosedError.
   * Later dispatch/sendEvent calls are no-ops.
   */
  destroy(): void {
    if (this.closed) return;
    this.closed = true;
    this.pending.clear(new BridgeClosedError());
    this.onMessage = undefined;
  }
}

