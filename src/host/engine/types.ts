/**
 * Window Types and Interfaces
 */

import type { WindowStyle } from '../../shared/style-types';

// ============ Engine-side collaborator ============

export type WindowState = 'normal' | 'minimized' | 'maximized' | 'fullscreen';

/**
 * Operations the rendering engine offers on one browser window.
 * Supplied by the embedding shell; everything behind it is out of process.
 */
export interface BrowserHost {
  getState(): WindowState;
  minimize(): void;
  maximize(): void;
  restore(): void;
  close(): void;
  setTitle(title: string): void;
  setFullscreen(enabled: boolean): void;
  /** Engine zoom level, where 0 is 100% and each step is a factor of 1.2 */
  setZoomLevel(level: number): void;
  showDevTools(docked: boolean): void;
  closeDevTools(): void;
  print(): void;
  /** PNG bytes of the current viewport */
  captureScreenshot(): Promise<Uint8Array>;
  loadURL(url: string): void;
  findText?(text: string, options: FindOptions): void;
  stopFinding?(clearSelection: boolean): void;
}

export interface FindOptions {
  forward: boolean;
  matchCase: boolean;
  findNext: boolean;
}

// ============ Notifications ============

export interface LoadEvent {
  url: string;
  httpStatus: number;
  isError: boolean;
  errorText: string;
}

export type ConsoleLevel = 'debug' | 'info' | 'warning' | 'error';

export interface ConsoleEvent {
  level: ConsoleLevel;
  message: string;
  source: string;
  line: number;
}

export interface FindResult {
  identifier: number;
  count: number;
  finalUpdate: boolean;
}

/**
 * Mutable navigation request handed to each navigation listener in turn.
 * Any listener may set `allow` to false.
 */
export interface NavigationRequest {
  readonly url: string;
  readonly isRedirect: boolean;
  readonly isMainFrame: boolean;
  allow: boolean;
}

export interface ContextMenuParams {
  x: number;
  y: number;
  /** Text selected in the page, if any */
  selectionText: string;
  linkUrl: string;
  editable: boolean;
}

export type ContextMenuOutcome = 'native' | 'suppressed';

/**
 * Host-side window notifications
 */
export type WindowEventMap = {
  load: LoadEvent;
  console: ConsoleEvent;
  title: string;
  /** true when focus was gained */
  focus: boolean;
  find: FindResult;
  /** User-domain guest events not routed internally */
  message: { name: string; payloadJson: string };
  styleChange: WindowStyle;
  close: undefined;
};
