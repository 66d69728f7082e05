/**
 * trellis
 *
 * Bridge protocol and window style reconciler for web views hosted in a native shell
 */

export * from './shared';
export * from './host';
export * from './platform';
export * from './guest';
export { SUPPORTED_ENGINE_MAJOR, VERSION } from './version';
