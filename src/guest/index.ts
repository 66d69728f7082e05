export { EventBus, type EventHandler } from './EventBus';
export {
  createGuestBridge,
  type DragRegionInput,
  type GuestBridge,
  type GuestBridgeApi,
  type GuestBridgeOptions,
} from './GuestBridge';
export { installGuestBridge, type GuestGlobal } from './install';
