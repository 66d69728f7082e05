/**
 * PlatformCapabilityProvider Interface
 *
 * Abstracts the native window manipulation each operating system offers.
 * One method per reconciler operation; the reconciler decides when to call,
 * the provider only knows how.
 *
 * - PlatformCapabilityProvider: the per-window adapter.
 * - Native*Binding: the thin native surface a provider drives. Supplied by
 *   the embedding shell, held weakly so a destroyed window is never touched.
 */

import type {
  ChromeMode,
  Color,
  DragRegion,
  MacOSVibrancy,
  ShadowStyle,
  TitlebarStyle,
  WindowsMaterial,
} from '../../shared/style-types';

/**
 * Platforms a provider can target
 */
export enum PlatformKind {
  MacOS = 'macos',
  Windows = 'windows',
  Linux = 'linux',
  /** In-memory provider, no native window */
  Recording = 'recording',
}

/**
 * Reconciler operations, in the order they are applied
 */
export const STYLE_OPERATIONS = [
  'chromeMode',
  'transparency',
  'backgroundColor',
  'vibrancy',
  'windowsMaterial',
  'shadow',
  'cornerRadius',
  'resizable',
  'alwaysOnTop',
  'skipTaskbar',
  'dragRegions',
] as const;

export type StyleOperation = (typeof STYLE_OPERATIONS)[number];

export type ResizeButtons = {
  resizable: boolean;
  minimizable: boolean;
  maximizable: boolean;
};

/**
 * Operations throw UnsupportedOperationError for capabilities the platform
 * does not have. They are silent no-ops once the native window is gone.
 */
export interface PlatformCapabilityProvider {
  readonly platform: PlatformKind;

  /** Window structure only; resizing is left to `setResizable`, which always follows */
  setChromeMode(mode: ChromeMode, titlebar: TitlebarStyle): void;

  /** Translucent when `transparent` or `opacity` < 1 */
  setTransparent(transparent: boolean, opacity: number): void;

  /**
   * @param alpha 0..1, already resolved against the window's translucency
   */
  setBackgroundColor(color: Color, alpha: number): void;

  setMacOSVibrancy(vibrancy: MacOSVibrancy): void;

  setWindowsMaterial(material: WindowsMaterial): void;

  setShadow(shadow: ShadowStyle): void;

  setCornerRadius(radius: number): void;

  setResizable(buttons: ResizeButtons): void;

  setAlwaysOnTop(enabled: boolean): void;

  setSkipTaskbar(enabled: boolean): void;

  /** Replaces every previously set region */
  setDragRegions(regions: readonly DragRegion[]): void;
}

// ============ Native bindings ============

export type CocoaStyleMaskFlag =
  | 'titled'
  | 'closable'
  | 'miniaturizable'
  | 'resizable'
  | 'fullSizeContentView'
  | 'borderless';

export type CocoaStandardButton = 'close' | 'miniaturize' | 'zoom';

/** Components in 0..1 */
export interface FloatColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface CocoaWindowBinding {
  getStyleMask(): CocoaStyleMaskFlag[];
  setStyleMask(flags: CocoaStyleMaskFlag[]): void;
  setTitlebarAppearsTransparent(transparent: boolean): void;
  setTitleVisible(visible: boolean): void;
  setOpaque(opaque: boolean): void;
  setBackgroundColor(color: FloatColor): void;
  removeVisualEffectViews(): void;
  /** NSVisualEffectMaterial, behind-window blending */
  addVisualEffectView(material: string): void;
  setHasShadow(enabled: boolean): void;
  invalidateShadow(): void;
  setContentCornerRadius(radius: number): void;
  setFloating(floating: boolean): void;
  setZoomButtonEnabled(enabled: boolean): void;
  /** False when the window has no such button */
  setStandardButtonOrigin(button: CocoaStandardButton, x: number, y: number): boolean;
  notifyMoveOrResizeStarted(): void;
}

export interface DwmMargins {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

export interface Win32WindowBinding {
  /** OS build number, e.g. 22631 */
  readonly buildNumber: number;
  getStyle(): number;
  setStyle(style: number): void;
  getExStyle(): number;
  setExStyle(style: number): void;
  /** 0..255 */
  setLayeredAlpha(alpha: number): void;
  /** False when DWM refuses the attribute */
  setDwmAttribute(attribute: number, value: number): boolean;
  extendFrameIntoClientArea(margins: DwmMargins): void;
  setTopmost(topmost: boolean): void;
  setBackgroundBrush(r: number, g: number, b: number): void;
  /** Re-evaluate the frame after style bit changes */
  refreshFrame(): void;
  invalidateHitTest(): void;
}

export interface GtkWindowBinding {
  setDecorated(decorated: boolean): void;
  /** False when the screen has no RGBA visual */
  useRgbaVisual(): boolean;
  setAppPaintable(paintable: boolean): void;
  overrideBackgroundColor(color: FloatColor): void;
  /** _MOTIF_WM_HINTS decorations field */
  setMotifDecorations(decorations: number): void;
  loadCss(css: string): void;
  setResizable(resizable: boolean): void;
  setKeepAbove(above: boolean): void;
  setSkipTaskbarHint(skip: boolean): void;
}

/**
 * Native window handle handed over by the shell
 */
export type NativeWindowHandle =
  | { kind: 'cocoa'; window: CocoaWindowBinding }
  | { kind: 'win32'; window: Win32WindowBinding }
  | { kind: 'gtk'; window: GtkWindowBinding };
