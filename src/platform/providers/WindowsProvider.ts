/**
 * WindowsProvider - Win32 style bits and DWM attributes
 */

import { ChromeMode, WindowsMaterial } from '../../shared/style-types';
import type {
  Color,
  DragRegion,
  MacOSVibrancy,
  ShadowStyle,
  TitlebarStyle,
} from '../../shared/style-types';
import {
  type DwmMargins,
  type PlatformCapabilityProvider,
  PlatformKind,
  type ResizeButtons,
  type Win32WindowBinding,
} from '../types/provider';
import { NativeProvider } from './NativeProvider';

// ============ Win32 constants ============

export const WS = {
  POPUP: 0x80000000,
  CAPTION: 0x00c00000,
  SYSMENU: 0x00080000,
  THICKFRAME: 0x00040000,
  MINIMIZEBOX: 0x00020000,
  MAXIMIZEBOX: 0x00010000,
} as const;

export const WS_EX = {
  TOOLWINDOW: 0x00000080,
  APPWINDOW: 0x00040000,
  LAYERED: 0x00080000,
} as const;

export const DWMWA = {
  NCRENDERING_POLICY: 2,
  WINDOW_CORNER_PREFERENCE: 33,
  SYSTEMBACKDROP_TYPE: 38,
  /** Undocumented pre-22H2 Mica switch */
  MICA_EFFECT: 1029,
} as const;

const DWMNCRP_DISABLED = 1;
const DWMNCRP_ENABLED = 2;

const DWMWCP_DONOTROUND = 1;
const DWMWCP_ROUND = 2;
const DWMWCP_ROUNDSMALL = 3;

/** First Windows 11 build */
export const WINDOWS_11_BUILD = 22000;

const BACKDROP: Record<WindowsMaterial, number> = {
  [WindowsMaterial.None]: 1,
  [WindowsMaterial.Mica]: 2,
  [WindowsMaterial.MicaAlt]: 2,
  [WindowsMaterial.Acrylic]: 3,
  [WindowsMaterial.Tabbed]: 4,
};

const NO_MARGINS: DwmMargins = { left: 0, right: 0, top: 0, bottom: 0 };
const SHEET_MARGINS: DwmMargins = { left: -1, right: -1, top: -1, bottom: -1 };

/** Set or clear bits, keeping the result an unsigned 32-bit value */
function toggle(value: number, bits: number, on: boolean): number {
  return (on ? value | bits : value & ~bits) >>> 0;
}

/** Corner preference for a requested radius */
export function cornerPreference(radius: number): number {
  if (radius <= 0) return DWMWCP_DONOTROUND;
  if (radius <= 4) return DWMWCP_ROUNDSMALL;
  return DWMWCP_ROUND;
}

export class WindowsProvider
  extends NativeProvider<Win32WindowBinding>
  implements PlatformCapabilityProvider
{
  readonly platform = PlatformKind.Windows;

  setChromeMode(mode: ChromeMode, _titlebar: TitlebarStyle): void {
    const win = this.window;
    if (!win) return;

    let style = win.getStyle();
    switch (mode) {
      case ChromeMode.Full:
        return;

      case ChromeMode.NativeTitlebar:
        style = toggle(style, WS.POPUP, false);
        style = toggle(style, WS.CAPTION | WS.SYSMENU | WS.THICKFRAME, true);
        break;

      case ChromeMode.Frameless:
        style = toggle(style, WS.CAPTION | WS.THICKFRAME, false);
        style = toggle(style, WS.POPUP, true);
        break;

      case ChromeMode.CustomTitlebar:
        style = toggle(style, WS.POPUP | WS.THICKFRAME, false);
        style = toggle(style, WS.CAPTION | WS.SYSMENU, true);
        break;
    }
    win.setStyle(style);

    if (mode === ChromeMode.CustomTitlebar) {
      win.extendFrameIntoClientArea(SHEET_MARGINS);
    }
    win.refreshFrame();
  }

  setTransparent(transparent: boolean, opacity: number): void {
    const win = this.window;
    if (!win) return;
    const translucent = transparent || opacity < 1;
    win.setExStyle(toggle(win.getExStyle(), WS_EX.LAYERED, translucent));
    if (translucent) {
      win.setLayeredAlpha(Math.round(Math.min(1, Math.max(0, opacity)) * 255));
    }
  }

  setBackgroundColor(color: Color, _alpha: number): void {
    this.window?.setBackgroundBrush(color.r, color.g, color.b);
  }

  setMacOSVibrancy(_vibrancy: MacOSVibrancy): void {
    this.unsupported('vibrancy');
  }

  setWindowsMaterial(material: WindowsMaterial): void {
    const win = this.window;
    if (!win) return;

    let backdrop = BACKDROP[material];
    if (material === WindowsMaterial.Mica && win.buildNumber < WINDOWS_11_BUILD) {
      backdrop = BACKDROP[WindowsMaterial.Acrylic];
    }

    if (!win.setDwmAttribute(DWMWA.SYSTEMBACKDROP_TYPE, backdrop)) {
      win.setDwmAttribute(DWMWA.MICA_EFFECT, material === WindowsMaterial.None ? 0 : 1);
    }

    if (material !== WindowsMaterial.None) {
      win.extendFrameIntoClientArea(SHEET_MARGINS);
    }
  }

  setShadow(shadow: ShadowStyle): void {
    const win = this.window;
    if (!win) return;
    win.setDwmAttribute(
      DWMWA.NCRENDERING_POLICY,
      shadow.enabled ? DWMNCRP_ENABLED : DWMNCRP_DISABLED
    );
    win.extendFrameIntoClientArea(shadow.enabled ? { ...NO_MARGINS, bottom: 1 } : NO_MARGINS);
  }

  setCornerRadius(radius: number): void {
    const win = this.window;
    if (!win) return;
    if (win.buildNumber < WINDOWS_11_BUILD) {
      this.unsupported('cornerRadius');
    }
    win.setDwmAttribute(DWMWA.WINDOW_CORNER_PREFERENCE, cornerPreference(radius));
  }

  setResizable({ resizable, minimizable, maximizable }: ResizeButtons): void {
    const win = this.window;
    if (!win) return;
    let style = win.getStyle();
    // THICKFRAME doubles as the sizing border, frameless windows included
    style = toggle(style, WS.THICKFRAME, resizable);
    style = toggle(style, WS.MAXIMIZEBOX, resizable && maximizable);
    style = toggle(style, WS.MINIMIZEBOX, minimizable);
    win.setStyle(style);
    win.refreshFrame();
  }

  setAlwaysOnTop(enabled: boolean): void {
    this.window?.setTopmost(enabled);
  }

  setSkipTaskbar(enabled: boolean): void {
    const win = this.window;
    if (!win) return;
    let exStyle = win.getExStyle();
    exStyle = toggle(exStyle, WS_EX.TOOLWINDOW, enabled);
    exStyle = toggle(exStyle, WS_EX.APPWINDOW, !enabled);
    win.setExStyle(exStyle);
  }

  setDragRegions(_regions: readonly DragRegion[]): void {
    this.window?.invalidateHitTest();
  }
}
