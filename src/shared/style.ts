/**
 * Window style defaults, presets and merge rules
 */

import {
  ChromeMode,
  type Color,
  ContextMenuStyle,
  FullscreenMode,
  MacOSVibrancy,
  type PartialWindowStyle,
  ScrollbarStyle,
  type StylePresetName,
  type WindowStyle,
  WindowsMaterial,
} from './style-types';

// ============ Colors ============

export function rgba(r: number, g: number, b: number, a: number): Color {
  return { r, g, b, a };
}

export function rgb(r: number, g: number, b: number): Color {
  return { r, g, b, a: 255 };
}

/**
 * Color from a packed 0xAARRGGBB value
 */
export function hexColor(argb: number): Color {
  return {
    r: (argb >>> 16) & 0xff,
    g: (argb >>> 8) & 0xff,
    b: argb & 0xff,
    a: (argb >>> 24) & 0xff,
  };
}

export const TRANSPARENT: Readonly<Color> = Object.freeze(rgba(0, 0, 0, 0));
export const WHITE: Readonly<Color> = Object.freeze(rgb(255, 255, 255));
export const BLACK: Readonly<Color> = Object.freeze(rgb(0, 0, 0));

// ============ Defaults ============

/**
 * A fresh default style. Each call returns an independent object.
 */
export function defaultWindowStyle(): WindowStyle {
  return {
    chromeMode: ChromeMode.NativeTitlebar,
    titlebar: {
      visible: true,
      title: '',
      backgroundColor: rgb(245, 245, 245),
      foregroundColor: rgb(0, 0, 0),
      height: 38,
      showTitle: true,
      showIcon: false,
      iconPath: '',
      transparentWhenInactive: false,
      macosHidden: false,
      macosButtonPosition: null,
    },
    backgroundColor: rgb(255, 255, 255),
    backgroundOpacity: 1,
    transparent: false,
    macosVibrancy: MacOSVibrancy.None,
    windowsMaterial: WindowsMaterial.None,
    shadow: {
      enabled: true,
      color: rgba(0, 0, 0, 80),
      blur: 20,
      spread: 0,
      offsetX: 0,
      offsetY: 4,
    },
    cornerRadius: 0,
    resizable: true,
    minimizable: true,
    maximizable: true,
    alwaysOnTop: false,
    skipTaskbar: false,
    fullscreen: FullscreenMode.Native,
    dragRegions: [],
    scrollbar: ScrollbarStyle.Default,
    contextMenu: ContextMenuStyle.Default,
    devTools: false,
    devToolsDocked: false,
    zoomFactor: 1,
    allowZoom: true,
    allowTextSelection: true,
  };
}

export function cloneStyle(style: WindowStyle): WindowStyle {
  return structuredClone(style);
}

// ============ Merge ============

/** Drop keys explicitly set to undefined so they cannot erase base fields */
function definedOnly<T extends object>(value: T): T {
  const out = { ...value };
  for (const [key, field] of Object.entries(out)) {
    if (field === undefined) Reflect.deleteProperty(out, key);
  }
  return out;
}

/**
 * Merge the fields named in `partial` into a copy of `base`.
 *
 * `titlebar` and `shadow` merge per field; `dragRegions` replaces the
 * whole list. `base` is never modified.
 */
export function mergeStyle(base: WindowStyle, partial: PartialWindowStyle): WindowStyle {
  const { titlebar, shadow, ...flat } = definedOnly(partial);
  const next: WindowStyle = { ...cloneStyle(base), ...structuredClone(flat) };
  if (titlebar) {
    next.titlebar = { ...next.titlebar, ...structuredClone(definedOnly(titlebar)) };
  }
  if (shadow) {
    next.shadow = { ...next.shadow, ...structuredClone(definedOnly(shadow)) };
  }
  return next;
}

// ============ Presets ============

const PRESETS: Record<StylePresetName, (vibrancy?: MacOSVibrancy) => PartialWindowStyle> = {
  fullBrowser: () => ({ chromeMode: ChromeMode.Full }),
  fullCustom: () => ({
    chromeMode: ChromeMode.Frameless,
    transparent: true,
    backgroundOpacity: 0,
    shadow: { enabled: false },
    scrollbar: ScrollbarStyle.Hidden,
    contextMenu: ContextMenuStyle.Disabled,
  }),
  macosModern: (vibrancy = MacOSVibrancy.WindowBackground) => ({
    chromeMode: ChromeMode.CustomTitlebar,
    titlebar: { macosHidden: true, height: 0 },
    macosVibrancy: vibrancy,
    backgroundOpacity: 0.85,
    shadow: { blur: 30 },
  }),
  windows11Mica: () => ({
    windowsMaterial: WindowsMaterial.Mica,
    backgroundOpacity: 0,
    transparent: true,
  }),
};

export const PRESET_NAMES = Object.keys(PRESETS).filter(isPresetName);

export function isPresetName(name: string): name is StylePresetName {
  return Object.prototype.hasOwnProperty.call(PRESETS, name);
}

/**
 * Full style for a named preset, built on the defaults
 */
export function stylePreset(name: StylePresetName, vibrancy?: MacOSVibrancy): WindowStyle {
  return mergeStyle(defaultWindowStyle(), PRESETS[name](vibrancy));
}

// ============ Page CSS ============

const HIDDEN_SCROLLBAR_CSS =
  '::-webkit-scrollbar{display:none}*{-ms-overflow-style:none;scrollbar-width:none}';

const OVERLAY_SCROLLBAR_CSS =
  '::-webkit-scrollbar{width:8px;height:8px}' +
  '::-webkit-scrollbar-track{background:transparent}' +
  '::-webkit-scrollbar-thumb{background:rgba(0,0,0,.3);border-radius:4px}';

const NO_SELECTION_CSS = '*{user-select:none;-webkit-user-select:none}';

/**
 * CSS the page needs to honour the style's scrollbar and selection settings.
 * Empty when the defaults apply.
 */
export function buildPageCss(style: WindowStyle): string {
  let css = '';
  switch (style.scrollbar) {
    case ScrollbarStyle.Hidden:
      css += HIDDEN_SCROLLBAR_CSS;
      break;
    case ScrollbarStyle.Overlay:
      css += OVERLAY_SCROLLBAR_CSS;
      break;
    default:
      break;
  }
  if (!style.allowTextSelection) {
    css += NO_SELECTION_CSS;
  }
  return css;
}
