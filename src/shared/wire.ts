/**
 * trellis/shared - Wire Codec
 *
 * Bridge messages travel as JSON text with a `type` discriminator.
 * Decoding validates every variant and fails closed with WireFormatError.
 */

import { z } from 'zod';
import { WireFormatError } from './errors';
import { partialStyleSchema, dragRegionSchema } from './style-schema';
import {
  type BridgeMessage,
  type BridgeMessageType,
  type BridgeValue,
  type CallResultMessage,
  isReservedEvent,
  ReservedEvent,
  type ReservedEventName,
} from './types';

// ============================================
// Schemas
// ============================================

export const bridgeValueSchema: z.ZodType<BridgeValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(bridgeValueSchema),
    z.record(bridgeValueSchema),
  ])
);

const id = z.string().min(1);

const eventSchema = z.object({
  type: z.literal('event'),
  name: z.string().min(1),
  payload: bridgeValueSchema.default(null),
});

const callSchema = z.object({
  type: z.literal('call'),
  id,
  name: z.string().min(1),
  args: z.array(bridgeValueSchema).default([]),
});

const callResultSchema = z
  .object({
    type: z.literal('callResult'),
    id,
    value: bridgeValueSchema.optional(),
    error: z.string().optional(),
  })
  .transform((msg, ctx): CallResultMessage => {
    if (msg.error !== undefined && msg.value === undefined) {
      return { type: 'callResult', id: msg.id, error: msg.error };
    }
    if (msg.value !== undefined && msg.error === undefined) {
      return { type: 'callResult', id: msg.id, value: msg.value };
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'exactly one of value or error must be set',
    });
    return z.NEVER;
  });

const styleRequestSchema = z.object({
  type: z.literal('styleRequest'),
  style: partialStyleSchema,
  id: id.optional(),
});

const dragRegionsSchema = z.object({
  type: z.literal('dragRegions'),
  regions: z.array(dragRegionSchema),
  id: id.optional(),
});

const windowOpSchema = z.object({
  type: z.literal('windowOp'),
  op: z.string().min(1),
  value: bridgeValueSchema.optional(),
  id: id.optional(),
});

const evalSchema = z.object({
  type: z.literal('eval'),
  id,
  script: z.string(),
});

const MESSAGE_SCHEMAS: Record<BridgeMessageType, z.ZodType<BridgeMessage, z.ZodTypeDef, unknown>> = {
  event: eventSchema,
  call: callSchema,
  callResult: callResultSchema,
  styleRequest: styleRequestSchema,
  dragRegions: dragRegionsSchema,
  windowOp: windowOpSchema,
  eval: evalSchema,
};

function isMessageType(type: string): type is BridgeMessageType {
  return Object.prototype.hasOwnProperty.call(MESSAGE_SCHEMAS, type);
}

const envelopeSchema = z.object({ type: z.string() }).passthrough();

// ============================================
// Reserved event normalisation
// ============================================

function withType(payload: BridgeValue, type: BridgeMessageType): unknown {
  if (payload === null || typeof payload !== 'object' || Array.isArray(payload)) {
    return payload;
  }
  return { ...payload, type };
}

/**
 * A guest event carrying a reserved name is re-read as the typed message
 * it stands for. The reshaped value still goes through full validation.
 */
const RESERVED_SHAPES: Record<
  ReservedEventName,
  { type: Exclude<BridgeMessageType, 'event'>; reshape: (payload: BridgeValue) => unknown }
> = {
  [ReservedEvent.CallResult]: {
    type: 'callResult',
    reshape: (payload) => withType(payload, 'callResult'),
  },
  [ReservedEvent.Call]: { type: 'call', reshape: (payload) => withType(payload, 'call') },
  [ReservedEvent.SetStyle]: {
    type: 'styleRequest',
    reshape: (payload) => ({ type: 'styleRequest', style: payload }),
  },
  [ReservedEvent.SetDragRegions]: {
    type: 'dragRegions',
    reshape: (payload) => ({ type: 'dragRegions', regions: payload }),
  },
  [ReservedEvent.WindowOp]: {
    type: 'windowOp',
    reshape: (payload) => withType(payload, 'windowOp'),
  },
};

// ============================================
// Codec
// ============================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function parseAs(type: BridgeMessageType, value: unknown): BridgeMessage {
  const result = MESSAGE_SCHEMAS[type].safeParse(value);
  if (!result.success) {
    throw new WireFormatError(`Invalid ${type} message`, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Validate one field before it goes on the wire, so a bad value fails at the
 * caller instead of being dropped by the receiver.
 * @throws WireFormatError naming `what`
 */
export function parseWireValue<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new WireFormatError(`Invalid ${what}`, formatIssues(result.error));
  }
  return result.data;
}

const textDecoder = new TextDecoder();

/**
 * Decode raw wire text into a validated BridgeMessage.
 * @throws WireFormatError on malformed JSON, unknown type or invalid fields
 */
export function decodeMessage(raw: string | Uint8Array): BridgeMessage {
  const text = typeof raw === 'string' ? raw : textDecoder.decode(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new WireFormatError(
      `Malformed JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const envelope = envelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    throw new WireFormatError('Message is not an object with a type', formatIssues(envelope.error));
  }
  const { type } = envelope.data;
  if (!isMessageType(type)) {
    throw new WireFormatError(`Unknown message type: ${type}`);
  }

  const message = parseAs(type, parsed);
  if (message.type === 'event' && isReservedEvent(message.name)) {
    const shape = RESERVED_SHAPES[message.name];
    return parseAs(shape.type, shape.reshape(message.payload));
  }
  return message;
}

export type DecodeResult = { ok: true; message: BridgeMessage } | { ok: false; error: WireFormatError };

/**
 * Non-throwing variant of decodeMessage
 */
export function tryDecodeMessage(raw: string | Uint8Array): DecodeResult {
  try {
    return { ok: true, message: decodeMessage(raw) };
  } catch (error) {
    if (error instanceof WireFormatError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Encode a message as wire text
 */
export function encodeMessage(message: BridgeMessage): string {
  return JSON.stringify(message);
}
