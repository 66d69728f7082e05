/**
 * trellis/host
 *
 * Native side of the bridge: app lifecycle, windows, style reconciliation
 */

export { App, type AppOptions, type CreateWindowDeps } from './App';
export {
  BrowserWindow,
  type BrowserWindowDeps,
  type NavigationListener,
  ZOOM_STEP,
  zoomLevel,
} from './BrowserWindow';
export {
  type AppConfig,
  type AppConfigInput,
  appConfigSchema,
  type ConfigResult,
  parseAppConfig,
  parseWindowConfig,
  resolveUserAgent,
  resolveWindowStyle,
  type WindowConfig,
  type WindowConfigInput,
  windowConfigSchema,
} from './config';
export {
  Bridge,
  type BridgeOptions,
  type BridgeStats,
  type MessageListener,
  type StyleTarget,
  type WindowCommandSink,
} from './bridge/Bridge';
export { EventManager, type Listener } from './engine/events';
export { type Task, TaskQueue, type TaskQueueOptions } from './engine/TaskQueue';
export type * from './engine/types';
export { backgroundAlpha, StyleReconciler, type StyleReconcilerOptions } from './style/StyleReconciler';
export { isWindowOp, WindowCommands, type WindowCommandTarget } from './style/WindowCommands';
