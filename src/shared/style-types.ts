/**
 * Shared Window Style Type Definitions
 *
 * The style model is the complete declarative description of a window's
 * appearance. Host and guest exchange it (or a partial of it) as JSON, so
 * every enum is string-valued.
 */

// ============================================
// Enumerations
// ============================================

/**
 * How much native window chrome surrounds the web content
 */
export enum ChromeMode {
  /** Full browser UI */
  Full = 'full',
  /** Standard OS titlebar, no browser UI */
  NativeTitlebar = 'nativeTitlebar',
  /** No chrome at all; the page draws everything */
  Frameless = 'frameless',
  /** OS window controls kept, titlebar drawn by the page */
  CustomTitlebar = 'customTitlebar',
}

/**
 * NSVisualEffectView materials (macOS only)
 */
export enum MacOSVibrancy {
  None = 'none',
  Sidebar = 'sidebar',
  Menu = 'menu',
  Popover = 'popover',
  HudWindow = 'hudWindow',
  UnderWindowBackground = 'underWindowBackground',
  UnderPageBackground = 'underPageBackground',
  Titlebar = 'titlebar',
  HeaderView = 'headerView',
  Sheet = 'sheet',
  WindowBackground = 'windowBackground',
  ContentBackground = 'contentBackground',
  FullScreenUI = 'fullScreenUI',
}

/**
 * DWM system backdrops (Windows 11 only)
 */
export enum WindowsMaterial {
  None = 'none',
  Mica = 'mica',
  MicaAlt = 'micaAlt',
  Acrylic = 'acrylic',
  Tabbed = 'tabbed',
}

export enum FullscreenMode {
  Disabled = 'disabled',
  Native = 'native',
  /** No escape via keyboard shortcut */
  Kiosk = 'kiosk',
}

export enum ScrollbarStyle {
  Default = 'default',
  Hidden = 'hidden',
  /** Thin scrollbar drawn over content */
  Overlay = 'overlay',
}

export enum ContextMenuStyle {
  Default = 'default',
  /** Native menu suppressed, guest is notified instead */
  Custom = 'custom',
  Disabled = 'disabled',
}

// ============================================
// Value types
// ============================================

/**
 * 8-bit RGBA color
 */
export type Color = {
  r: number;
  g: number;
  b: number;
  a: number;
};

export type TitlebarButtonPosition = {
  x: number;
  y: number;
};

export type TitlebarStyle = {
  visible: boolean;
  title: string;
  backgroundColor: Color;
  foregroundColor: Color;
  height: number;
  showTitle: boolean;
  showIcon: boolean;
  iconPath: string;
  transparentWhenInactive: boolean;
  /** Hide the titlebar but keep traffic lights floating over content */
  macosHidden: boolean;
  /** Traffic light origin; null keeps the system position */
  macosButtonPosition: TitlebarButtonPosition | null;
};

export type ShadowStyle = {
  enabled: boolean;
  color: Color;
  blur: number;
  spread: number;
  offsetX: number;
  offsetY: number;
};

/**
 * Rectangle in page coordinates that drags (or explicitly does not drag) the window
 */
export type DragRegion = {
  x: number;
  y: number;
  width: number;
  height: number;
  isDraggable: boolean;
};

// ============================================
// Style model
// ============================================

/**
 * Fully populated window style. Never partially mutated: every change
 * produces a new object. Plain JSON data, so it crosses the bridge as is.
 */
export type WindowStyle = {
  chromeMode: ChromeMode;
  titlebar: TitlebarStyle;

  // Background
  backgroundColor: Color;
  /** 0..1 */
  backgroundOpacity: number;
  transparent: boolean;

  // Platform materials; each provider ignores the one it cannot render
  macosVibrancy: MacOSVibrancy;
  windowsMaterial: WindowsMaterial;

  shadow: ShadowStyle;
  cornerRadius: number;

  // Behaviour
  resizable: boolean;
  minimizable: boolean;
  maximizable: boolean;
  alwaysOnTop: boolean;
  skipTaskbar: boolean;
  fullscreen: FullscreenMode;

  dragRegions: DragRegion[];

  // Page-level
  scrollbar: ScrollbarStyle;
  contextMenu: ContextMenuStyle;
  devTools: boolean;
  devToolsDocked: boolean;
  zoomFactor: number;
  allowZoom: boolean;
  allowTextSelection: boolean;
};

/**
 * Style fields a guest (or a preset) may name; nested groups merge per field
 */
export type PartialWindowStyle = Partial<Omit<WindowStyle, 'titlebar' | 'shadow'>> & {
  titlebar?: Partial<TitlebarStyle>;
  shadow?: Partial<ShadowStyle>;
};

export type StylePresetName = 'fullBrowser' | 'fullCustom' | 'macosModern' | 'windows11Mica';
