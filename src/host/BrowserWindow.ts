/**
 * BrowserWindow - one web view plus the native window around it
 *
 * Owns the bridge, the function registry, the style reconciler and the
 * owner task queue for its page. Everything the guest sends is posted to
 * the queue and handled there, one message at a time.
 */

import type { PlatformCapabilityProvider } from '../platform/types/provider';
import { WindowError } from '../shared/errors';
import { type FunctionHandler, FunctionRegistry } from '../shared/FunctionRegistry';
import { buildPageCss, mergeStyle } from '../shared/style';
import type {
  Color,
  DragRegion,
  MacOSVibrancy,
  PartialWindowStyle,
  ShadowStyle,
  WindowStyle,
  WindowsMaterial,
} from '../shared/style-types';
import { ContextMenuStyle, FullscreenMode } from '../shared/style-types';
import {
  type BridgeValue,
  CONTEXT_MENU_EVENT,
  consoleLogger,
  type JsValue,
  type Logger,
  PAGE_STYLE_EVENT,
  SCREENSHOT_FUNCTION,
  STYLE_CHANGE_EVENT,
} from '../shared/types';
import { Bridge, type StyleTarget } from './bridge/Bridge';
import { resolveWindowStyle, type WindowConfig } from './config';
import { EventManager, type Listener } from './engine/events';
import { TaskQueue } from './engine/TaskQueue';
import type {
  BrowserHost,
  ConsoleEvent,
  ContextMenuOutcome,
  ContextMenuParams,
  FindResult,
  LoadEvent,
  NavigationRequest,
  WindowEventMap,
  WindowState,
} from './engine/types';
import { StyleReconciler } from './style/StyleReconciler';
import { type WindowCommandTarget, WindowCommands } from './style/WindowCommands';

export interface BrowserWindowDeps {
  host: BrowserHost;
  provider: PlatformCapabilityProvider;
  /** Delivers encoded bridge text into the page */
  postToGuest: (raw: string) => void;
  /** Shared owner queue; it stays open when the window closes. Default: a queue of its own */
  taskQueue?: TaskQueue;
  /** Remote evaluation timeout, default 30000 */
  callTimeout?: number;
  logger?: Logger;
  debug?: boolean;
}

export type NavigationListener = (request: NavigationRequest) => void;

/** Each zoom step multiplies the factor by this */
export const ZOOM_STEP = 1.2;

/**
 * Engine zoom level for a zoom factor: 1 is level 0, each level is one step
 */
export function zoomLevel(factor: number): number {
  return Math.log(factor) / Math.log(ZOOM_STEP);
}

let nextWindowId = 1;

export class BrowserWindow implements WindowCommandTarget {
  readonly id = nextWindowId++;
  readonly config: WindowConfig;

  private readonly host: BrowserHost;
  private readonly reconciler: StyleReconciler;
  private readonly functions: FunctionRegistry;
  private readonly bridge: Bridge;
  private readonly queue: TaskQueue;
  private readonly ownsQueue: boolean;
  private readonly events: EventManager<WindowEventMap>;
  private readonly navigationListeners = new Set<NavigationListener>();
  private readonly logger: Logger;
  private readonly logPrefix: string;
  private closed = false;

  constructor(config: WindowConfig, deps: BrowserWindowDeps) {
    this.config = config;
    this.host = deps.host;
    this.logger = deps.logger ?? consoleLogger;
    this.logPrefix = `[trellis:window:${this.id}]`;
    const debug = deps.debug ?? false;

    this.events = new EventManager<WindowEventMap>(this.logger, debug, this.logPrefix);
    this.ownsQueue = deps.taskQueue === undefined;
    this.queue =
      deps.taskQueue ?? new TaskQueue({ logger: this.logger, logPrefix: this.logPrefix });
    this.reconciler = new StyleReconciler(deps.provider, {
      logger: this.logger,
      debug,
      logPrefix: `${this.logPrefix}[style]`,
    });
    this.functions = new FunctionRegistry({ logger: this.logger, debug });

    const reconciler = this.reconciler;
    const styleTarget: StyleTarget = {
      get style() {
        return reconciler.style;
      },
      applyStyle: (next) => this.commitStyle(next),
      setDragRegions: (regions) => {
        reconciler.setDragRegions(regions);
        this.events.emit('styleChange', reconciler.style);
      },
    };

    this.bridge = new Bridge({
      postToGuest: deps.postToGuest,
      functions: this.functions,
      styleTarget,
      windowCommands: new WindowCommands(this),
      onMessage: (name, payloadJson) => this.events.emit('message', { name, payloadJson }),
      callTimeout: deps.callTimeout,
      logPrefix: `${this.logPrefix}[bridge]`,
      logger: this.logger,
      debug,
    });

    this.functions.bind(SCREENSHOT_FUNCTION, () => this.captureScreenshot());

    this.reconciler.apply(resolveWindowStyle(config));
    if (config.title) {
      this.host.setTitle(config.title);
    }
  }

  // ============ Guest and bridge ============

  /**
   * Accept raw text from the page. Handled on the owner queue.
   */
  receive(raw: string | Uint8Array): void {
    if (this.closed) return;
    this.queue.post(() => this.bridge.dispatch(raw));
  }

  sendMessage(event: string, payload: BridgeValue = null): void {
    this.assertOpen();
    this.bridge.sendEvent(event, payload);
  }

  evalRemote(script: string): Promise<JsValue> {
    this.assertOpen();
    return this.bridge.invokeRemoteEval(script);
  }

  bindFunction(name: string, handler: FunctionHandler): void {
    this.assertOpen();
    this.functions.bind(name, handler);
  }

  unbindFunction(name: string): boolean {
    return this.functions.unbind(name);
  }

  get pendingEvaluations(): number {
    return this.bridge.pendingCount;
  }

  // ============ Style ============

  get style(): WindowStyle {
    return this.reconciler.style;
  }

  /**
   * Replace the whole style model
   */
  setStyle(style: WindowStyle): void {
    this.assertOpen();
    this.commitStyle(style);
    this.bridge.sendEvent(STYLE_CHANGE_EVENT, this.style);
  }

  /**
   * Change the named fields only
   */
  updateStyle(partial: PartialWindowStyle): void {
    this.setStyle(mergeStyle(this.style, partial));
  }

  setCornerRadius(radius: number): void {
    this.mutate(() => this.reconciler.setCornerRadius(radius));
  }

  setMacOSVibrancy(vibrancy: MacOSVibrancy): void {
    this.mutate(() => this.reconciler.setMacOSVibrancy(vibrancy));
  }

  setWindowsMaterial(material: WindowsMaterial): void {
    this.mutate(() => this.reconciler.setWindowsMaterial(material));
  }

  setBackgroundColor(color: Color): void {
    this.mutate(() => this.reconciler.setBackgroundColor(color));
  }

  setShadow(shadow: ShadowStyle): void {
    this.mutate(() => this.reconciler.setShadow(shadow));
  }

  setResizable(resizable: boolean): void {
    this.mutate(() => this.reconciler.setResizable(resizable));
  }

  setDragRegions(regions: readonly DragRegion[]): void {
    this.mutate(() => this.reconciler.setDragRegions(regions));
  }

  private mutate(change: () => void): void {
    this.assertOpen();
    change();
    this.events.emit('styleChange', this.style);
    this.bridge.sendEvent(STYLE_CHANGE_EVENT, this.style);
  }

  /**
   * Apply a complete model and sync page-level state. The guest is
   * notified by the caller.
   */
  private commitStyle(next: WindowStyle): void {
    const previous = this.reconciler.style;
    this.reconciler.apply(next);

    if (next.zoomFactor !== previous.zoomFactor && next.zoomFactor > 0) {
      this.host.setZoomLevel(zoomLevel(next.zoomFactor));
    }
    if (next.devTools !== previous.devTools) {
      if (next.devTools) {
        this.host.showDevTools(next.devToolsDocked);
      } else {
        this.host.closeDevTools();
      }
    }
    if (next.fullscreen === FullscreenMode.Disabled && this.host.getState() === 'fullscreen') {
      this.host.setFullscreen(false);
    }

    this.bridge.sendEvent(PAGE_STYLE_EVENT, buildPageCss(next));
    this.events.emit('styleChange', next);
  }

  // ============ Window commands ============

  get state(): WindowState {
    return this.host.getState();
  }

  minimize(): void {
    this.assertOpen();
    if (this.state !== 'minimized') this.host.minimize();
  }

  maximize(): void {
    this.assertOpen();
    if (this.state !== 'maximized') this.host.maximize();
  }

  restore(): void {
    this.assertOpen();
    if (this.state !== 'normal') this.host.restore();
  }

  setTitle(title: string): void {
    this.assertOpen();
    this.host.setTitle(title);
  }

  setAlwaysOnTop(enabled: boolean): void {
    this.assertOpen();
    if (this.style.alwaysOnTop === enabled) return;
    this.setStyle(mergeStyle(this.style, { alwaysOnTop: enabled }));
  }

  setFullscreen(enabled: boolean): void {
    this.assertOpen();
    if (enabled && this.style.fullscreen === FullscreenMode.Disabled) return;
    if ((this.state === 'fullscreen') === enabled) return;
    this.host.setFullscreen(enabled);
  }

  /**
   * Ignored when zoom is not allowed or the factor is not positive
   */
  setZoom(factor: number): void {
    this.assertOpen();
    if (!this.style.allowZoom || !(factor > 0)) return;
    if (factor === this.style.zoomFactor) return;
    this.setStyle(mergeStyle(this.style, { zoomFactor: factor }));
  }

  zoomIn(): void {
    this.setZoom(this.style.zoomFactor * ZOOM_STEP);
  }

  zoomOut(): void {
    this.setZoom(this.style.zoomFactor / ZOOM_STEP);
  }

  resetZoom(): void {
    this.setZoom(1);
  }

  openDevTools(docked = false): void {
    this.assertOpen();
    this.host.showDevTools(docked);
  }

  closeDevTools(): void {
    this.assertOpen();
    this.host.closeDevTools();
  }

  print(): void {
    this.assertOpen();
    this.host.print();
  }

  /**
   * Base64-encoded PNG of the current viewport
   */
  async captureScreenshot(): Promise<string> {
    this.assertOpen();
    const png = await this.host.captureScreenshot();
    return Buffer.from(png).toString('base64');
  }

  // ============ Navigation ============

  onNavigation(listener: NavigationListener): () => void {
    this.navigationListeners.add(listener);
    return () => {
      this.navigationListeners.delete(listener);
    };
  }

  /**
   * Ask every navigation listener; any of them may deny
   */
  requestNavigation(
    url: string,
    options: { isRedirect?: boolean; isMainFrame?: boolean } = {}
  ): boolean {
    const request: NavigationRequest = {
      url,
      isRedirect: options.isRedirect ?? false,
      isMainFrame: options.isMainFrame ?? true,
      allow: true,
    };
    for (const listener of [...this.navigationListeners]) {
      try {
        listener(request);
      } catch (error) {
        this.logger.error(`${this.logPrefix} Navigation listener error:`, error);
      }
    }
    return request.allow;
  }

  navigate(url: string): void {
    this.assertOpen();
    if (!this.requestNavigation(url)) {
      throw new WindowError('NavigationBlocked', `Navigation to ${url} was blocked`);
    }
    this.host.loadURL(url);
  }

  // ============ Context menu ============

  handleContextMenu(params: ContextMenuParams): ContextMenuOutcome {
    switch (this.style.contextMenu) {
      case ContextMenuStyle.Default:
        return 'native';
      case ContextMenuStyle.Disabled:
        return 'suppressed';
      case ContextMenuStyle.Custom:
        this.bridge.sendEvent(CONTEXT_MENU_EVENT, {
          x: params.x,
          y: params.y,
          selectionText: params.selectionText,
          linkUrl: params.linkUrl,
          editable: params.editable,
        });
        return 'suppressed';
    }
  }

  // ============ Notifications ============

  on<K extends keyof WindowEventMap>(event: K, listener: Listener<WindowEventMap[K]>): () => void {
    return this.events.on(event, listener);
  }

  fireLoad(event: LoadEvent): void {
    if (this.closed) return;
    if (!event.isError) {
      this.bridge.sendEvent(PAGE_STYLE_EVENT, buildPageCss(this.style));
    }
    this.events.emit('load', event);
  }

  fireConsole(event: ConsoleEvent): void {
    if (!this.closed) this.events.emit('console', event);
  }

  fireTitle(title: string): void {
    if (!this.closed) this.events.emit('title', title);
  }

  fireFocus(focused: boolean): void {
    if (!this.closed) this.events.emit('focus', focused);
  }

  fireFind(result: FindResult): void {
    if (!this.closed) this.events.emit('find', result);
  }

  // ============ Lifecycle ============

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Close the window. Pending evaluations reject with BridgeClosedError and
   * every later command throws WindowError('InvalidState').
   */
  close(): void {
    if (this.closed) return;
    this.events.emit('close', undefined);
    this.closed = true;
    this.bridge.destroy();
    if (this.ownsQueue) {
      this.queue.close();
    }
    this.host.close();
    this.events.removeAllListeners();
    this.navigationListeners.clear();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new WindowError('InvalidState', `Window ${this.id} is closed`);
    }
  }
}
