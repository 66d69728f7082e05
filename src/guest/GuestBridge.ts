/**
 * Guest Bridge
 *
 * The page end of the channel: the `trellis` API that page scripts use,
 * plus the receive path the host posts into.
 */

import { z } from 'zod';
import { type DesktopPlatform, detectPlatform } from '../platform/default/DefaultProvider';
import { PromiseManager } from '../shared/bridge/PromiseManager';
import { BridgeClosedError, RemoteCallError, WireFormatError } from '../shared/errors';
import type { DragRegion, PartialWindowStyle } from '../shared/style-types';
import {
  type BridgeMessage,
  type BridgeValue,
  consoleLogger,
  type EvalMessage,
  type Logger,
  PAGE_STYLE_EVENT,
  SCREENSHOT_FUNCTION,
  type WindowOpName,
} from '../shared/types';
import { dragRegionSchema, partialStyleSchema } from '../shared/style-schema';
import { bridgeValueSchema, encodeMessage, parseWireValue, tryDecodeMessage } from '../shared/wire';
import { VERSION } from '../version';
import { EventBus, type EventHandler } from './EventBus';

const dragRegionListSchema = z.array(dragRegionSchema);

export type DragRegionInput = Omit<DragRegion, 'isDraggable'> & { isDraggable?: boolean };

/**
 * The fixed script-facing API
 */
export interface GuestBridgeApi {
  readonly version: string;
  readonly platform: DesktopPlatform;

  send(event: string, data?: BridgeValue): void;
  on(event: string, handler: EventHandler): () => void;
  off(event: string, handler: EventHandler): void;

  /** Invoke a host-bound function */
  call(name: string, ...args: BridgeValue[]): Promise<BridgeValue>;

  /** Resolves once the host has applied the change */
  setStyle(style: PartialWindowStyle): Promise<void>;
  /** Replaces every region set before */
  setDragRegions(regions: DragRegionInput[]): Promise<void>;

  setTitle(title: string): void;
  minimize(): void;
  maximize(): void;
  restore(): void;
  close(): void;
  setAlwaysOnTop(enabled: boolean): void;
  setFullscreen(enabled: boolean): void;
  setZoom(factor: number): void;
  openDevTools(docked?: boolean): void;
  print(): void;

  /** Base64 PNG of the current viewport */
  captureScreenshot(): Promise<string>;
}

export interface GuestBridgeOptions {
  /** Delivers encoded text to the host */
  sendToHost: (raw: string) => void;

  /**
   * Runs host evaluation requests. Default: indirect global eval.
   */
  evaluate?: (script: string) => unknown;

  /**
   * Installs host-computed page CSS (scrollbars, selection). Default: ignored.
   */
  applyPageCss?: (css: string) => void;

  /** Used to report `platform` */
  userAgent?: string;

  /** Milliseconds, default 30000; 0 disables */
  callTimeout?: number;

  logger?: Logger;

  debug?: boolean;
}

export interface GuestBridge {
  readonly api: GuestBridgeApi;
  /** Handle one message posted by the host. Never throws. */
  receive(raw: string): void;
  readonly pendingCount: number;
  destroy(): void;
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/** Evaluation results the host can represent; structured values become null */
function toReplyValue(value: unknown): BridgeValue {
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    default:
      return null;
  }
}

/** Host replies are already validated; this only narrows the type */
function asBridgeValue(value: unknown): BridgeValue {
  const parsed = bridgeValueSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function ignore(): void {}

export function createGuestBridge(options: GuestBridgeOptions): GuestBridge {
  const logger = options.logger ?? consoleLogger;
  const debug = options.debug ?? false;
  // eslint-disable-next-line no-eval
  const evaluate = options.evaluate ?? ((script: string): unknown => (0, eval)(script));
  const applyPageCss = options.applyPageCss;
  const bus = new EventBus(logger);
  const pending = new PromiseManager({
    timeout: options.callTimeout ?? 30000,
    idPrefix: 'c',
    logger,
    debug,
  });
  let closed = false;

  // ============ Outbound ============

  function post(message: BridgeMessage): boolean {
    if (closed) return false;
    try {
      options.sendToHost(encodeMessage(message));
      return true;
    } catch (error) {
      logger.error(`[trellis:guest] Failed to send ${message.type} to host:`, error);
      return false;
    }
  }

  /**
   * Send a message that the host answers with a callResult
   */
  function request<T>(
    label: string,
    build: (id: string) => BridgeMessage,
    map: (value: unknown) => T
  ): Promise<T> {
    if (closed) {
      return Promise.reject(new BridgeClosedError());
    }
    const { id, promise } = pending.create(label, map);
    if (!post(build(id))) {
      pending.settle(id, {
        status: 'rejected',
        reason: new BridgeClosedError(`Could not deliver ${label}`),
      });
    }
    return promise;
  }

  function windowOp(op: WindowOpName, value?: BridgeValue): void {
    post(value === undefined ? { type: 'windowOp', op } : { type: 'windowOp', op, value });
  }

  function call(name: string, ...args: BridgeValue[]): Promise<BridgeValue> {
    const label = `trellis.call('${name}')`;
    return request(label, (id) => ({ type: 'call', id, name, args }), asBridgeValue).catch(
      (error: unknown) => {
        if (error instanceof RemoteCallError) {
          throw new RemoteCallError(name, error.message);
        }
        throw error;
      }
    );
  }

  // ============ Inbound ============

  function replyToEval(message: EvalMessage): void {
    let result: unknown;
    try {
      result = evaluate(message.script);
    } catch (error) {
      post({ type: 'callResult', id: message.id, error: describeError(error) });
      return;
    }

    if (result instanceof Promise) {
      void result.then(
        (value: unknown) => post({ type: 'callResult', id: message.id, value: toReplyValue(value) }),
        (error: unknown) => post({ type: 'callResult', id: message.id, error: describeError(error) })
      );
      return;
    }
    post({ type: 'callResult', id: message.id, value: toReplyValue(result) });
  }

  function route(message: BridgeMessage): void {
    switch (message.type) {
      case 'event':
        if (message.name === PAGE_STYLE_EVENT) {
          const css = typeof message.payload === 'string' ? message.payload : '';
          applyPageCss?.(css);
          return;
        }
        bus.publish(message.name, message.payload);
        return;

      case 'callResult':
        if ('error' in message) {
          pending.settle(message.id, {
            status: 'rejected',
            reason: new RemoteCallError('', message.error),
          });
        } else {
          pending.settle(message.id, { status: 'fulfilled', value: message.value });
        }
        return;

      case 'eval':
        replyToEval(message);
        return;

      default:
        drop(new WireFormatError(`Unexpected ${message.type} message from host`));
    }
  }

  function drop(error: WireFormatError): void {
    logger.warn(`[trellis:guest] Dropped malformed message: ${error.message}`, error.issues);
  }

  function receive(raw: string): void {
    if (closed) return;
    const decoded = tryDecodeMessage(raw);
    if (!decoded.ok) {
      drop(decoded.error);
      return;
    }
    if (debug) {
      logger.log(`[trellis:guest] <- ${decoded.message.type}`);
    }
    try {
      route(decoded.message);
    } catch (error) {
      logger.error(`[trellis:guest] Failed to handle ${decoded.message.type} message:`, error);
    }
  }

  // ============ API ============

  const api: GuestBridgeApi = {
    version: VERSION,
    platform: detectPlatform(options.userAgent ?? ''),

    send(event, data = null) {
      post({ type: 'event', name: event, payload: data });
    },
    on: (event, handler) => bus.subscribe(event, handler),
    off: (event, handler) => bus.unsubscribe(event, handler),

    call,

    async setStyle(style) {
      const patch = parseWireValue(partialStyleSchema, style, 'style');
      await request(
        'trellis.setStyle()',
        (id) => ({ type: 'styleRequest', style: patch, id }),
        ignore
      );
    },
    async setDragRegions(regions) {
      // isDraggable defaults to true in the schema
      const normalized = parseWireValue(dragRegionListSchema, regions, 'drag regions');
      await request(
        'trellis.setDragRegions()',
        (id) => ({ type: 'dragRegions', regions: normalized, id }),
        ignore
      );
    },

    setTitle: (title) => windowOp('setTitle', title),
    minimize: () => windowOp('minimize'),
    maximize: () => windowOp('maximize'),
    restore: () => windowOp('restore'),
    close: () => windowOp('close'),
    setAlwaysOnTop: (enabled) => windowOp('alwaysOnTop', enabled),
    setFullscreen: (enabled) => windowOp('fullscreen', enabled),
    setZoom: (factor) => windowOp('zoom', factor),
    openDevTools: (docked = false) => windowOp('devTools', docked),
    print: () => windowOp('print'),

    async captureScreenshot() {
      const data = await call(SCREENSHOT_FUNCTION);
      if (typeof data !== 'string') {
        throw new RemoteCallError(SCREENSHOT_FUNCTION, 'Screenshot returned no image data');
      }
      return data;
    },
  };

  return {
    api,
    receive,
    get pendingCount() {
      return pending.pendingCount;
    },
    destroy() {
      if (closed) return;
      closed = true;
      bus.clear();
      pending.clear(new BridgeClosedError());
    },
  };
}
