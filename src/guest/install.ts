/**
 * Installs the frozen `trellis` API on the page's global object
 */

import {
  createGuestBridge,
  type GuestBridge,
  type GuestBridgeApi,
  type GuestBridgeOptions,
} from './GuestBridge';

declare global {
  // eslint-disable-next-line no-var
  var trellis: GuestBridgeApi | undefined;
}

export interface GuestGlobal {
  trellis?: GuestBridgeApi;
}

export function installGuestBridge(target: GuestGlobal, options: GuestBridgeOptions): GuestBridge {
  if (target.trellis) {
    throw new Error('[trellis] Guest bridge is already installed');
  }
  const bridge = createGuestBridge(options);
  Object.defineProperty(target, 'trellis', {
    value: Object.freeze(bridge.api),
    enumerable: true,
    writable: false,
    configurable: true,
  });
  return bridge;
}
