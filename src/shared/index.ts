/**
 * trellis/shared - protocol and style types used on both ends of the bridge
 */

export * from './types';
export * from './style-types';
export * from './errors';
export {
  BLACK,
  buildPageCss,
  cloneStyle,
  defaultWindowStyle,
  hexColor,
  isPresetName,
  mergeStyle,
  PRESET_NAMES,
  rgb,
  rgba,
  stylePreset,
  TRANSPARENT,
  WHITE,
} from './style';
export { partialStyleSchema, type PartialStyleInput } from './style-schema';
export {
  bridgeValueSchema,
  decodeMessage,
  type DecodeResult,
  encodeMessage,
  tryDecodeMessage,
} from './wire';
export {
  type FunctionHandler,
  FunctionRegistry,
  type FunctionRegistryOptions,
  type InvokeResult,
} from './FunctionRegistry';
export {
  type PendingHandle,
  PromiseManager,
  type PromiseManagerOptions,
  type PromiseSettleResult,
} from './bridge/PromiseManager';
