/**
 * trellis/shared - Protocol Type System
 *
 * Shared between the host (native shell) and the guest (page script).
 * Everything that crosses the boundary is plain JSON.
 */

import type { DragRegion, PartialWindowStyle } from './style-types';

// ============================================
// Values
// ============================================

/**
 * Primitive values that survive the wire unchanged
 */
export type JsonPrimitive = null | boolean | number | string;

/**
 * Any JSON-representable value carried by the bridge
 */
export type BridgeValue = JsonPrimitive | BridgeValueArray | BridgeValueObject;

export interface BridgeValueArray extends Array<BridgeValue> {}

export interface BridgeValueObject {
  [key: string]: BridgeValue;
}

/**
 * Result of a remote script evaluation, narrowed to what the
 * native side can represent: absent, boolean, number or text.
 */
export type JsValue = JsonPrimitive;

// ============================================
// Reserved routing keys
// ============================================

/**
 * Event names the bridge handles internally. A guest event with one of
 * these names is never forwarded to the generic message callback.
 */
export const ReservedEvent = {
  CallResult: '__callResult',
  Call: '__call',
  SetStyle: '__setStyle',
  SetDragRegions: '__setDragRegions',
  WindowOp: '__windowOp',
} as const;

export type ReservedEventName = (typeof ReservedEvent)[keyof typeof ReservedEvent];

const RESERVED_NAMES: ReadonlySet<string> = new Set(Object.values(ReservedEvent));

export function isReservedEvent(name: string): name is ReservedEventName {
  return RESERVED_NAMES.has(name);
}

/** Published to the guest after every committed style change */
export const STYLE_CHANGE_EVENT = 'trellis:styleChange';

/** Published to the guest when a custom context menu is requested */
export const CONTEXT_MENU_EVENT = 'trellis:contextMenu';

/** Host -> guest: page-level CSS derived from the style model */
export const PAGE_STYLE_EVENT = '__pageStyle';

/** Host-bound function serving guest screenshot requests */
export const SCREENSHOT_FUNCTION = '__captureScreenshot';

// ============================================
// Window commands
// ============================================

export const WINDOW_OPS = [
  'minimize',
  'maximize',
  'restore',
  'close',
  'setTitle',
  'alwaysOnTop',
  'fullscreen',
  'zoom',
  'devTools',
  'print',
] as const;

export type WindowOpName = (typeof WINDOW_OPS)[number];

// ============================================
// Bridge messages
// ============================================

/**
 * Fire-and-forget pub/sub notification
 */
export interface EventMessage {
  type: 'event';
  name: string;
  payload: BridgeValue;
}

/**
 * Guest invokes a host-bound function; exactly one reply keyed by id
 */
export interface CallMessage {
  type: 'call';
  id: string;
  name: string;
  args: BridgeValue[];
}

/**
 * Reply to a call or an evaluation. Exactly one of value/error is set.
 */
export type CallResultMessage =
  | { type: 'callResult'; id: string; value: BridgeValue }
  | { type: 'callResult'; id: string; error: string };

/**
 * Guest requests a style mutation
 */
export interface StyleRequestMessage {
  type: 'styleRequest';
  style: PartialWindowStyle;
  /** When present the host acknowledges with a callResult */
  id?: string;
}

/**
 * Guest replaces the drag region list
 */
export interface DragRegionsMessage {
  type: 'dragRegions';
  regions: DragRegion[];
  id?: string;
}

/**
 * Guest issues a window command. `op` is kept as text so the
 * dispatcher can ignore vocabulary it does not know.
 */
export interface WindowOpMessage {
  type: 'windowOp';
  op: string;
  value?: BridgeValue;
  id?: string;
}

/**
 * Host asks the guest to evaluate a script and reply with a callResult
 */
export interface EvalMessage {
  type: 'eval';
  id: string;
  script: string;
}

export type BridgeMessage =
  | EventMessage
  | CallMessage
  | CallResultMessage
  | StyleRequestMessage
  | DragRegionsMessage
  | WindowOpMessage
  | EvalMessage;

export type BridgeMessageType = BridgeMessage['type'];

// ============================================
// Logging
// ============================================

/**
 * Injected logger, defaults to console
 */
export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export const consoleLogger: Logger = {
  log: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * Narrow an arbitrary decoded value to a JsValue; structured values become null
 */
export function toJsValue(value: unknown): JsValue {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case 'boolean':
    case 'number':
    case 'string':
      return value;
    default:
      return null;
  }
}
