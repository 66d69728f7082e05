/**
 * MacOSProvider - Cocoa window chrome, materials and behaviour
 */

import { ChromeMode, MacOSVibrancy, type WindowsMaterial } from '../../shared/style-types';
import type { Color, DragRegion, ShadowStyle, TitlebarStyle } from '../../shared/style-types';
import {
  type CocoaStyleMaskFlag,
  type CocoaWindowBinding,
  type PlatformCapabilityProvider,
  PlatformKind,
  type ResizeButtons,
} from '../types/provider';
import { NativeProvider, toFloatColor } from './NativeProvider';

/** Horizontal distance between traffic lights */
const BUTTON_SPACING = 20;

function withFlag(
  mask: CocoaStyleMaskFlag[],
  flag: CocoaStyleMaskFlag,
  on: boolean
): CocoaStyleMaskFlag[] {
  const rest = mask.filter((f) => f !== flag);
  return on ? [...rest, flag] : rest;
}

export class MacOSProvider
  extends NativeProvider<CocoaWindowBinding>
  implements PlatformCapabilityProvider
{
  readonly platform = PlatformKind.MacOS;

  setChromeMode(mode: ChromeMode, titlebar: TitlebarStyle): void {
    const win = this.window;
    if (!win) return;

    switch (mode) {
      case ChromeMode.Full:
        return;

      case ChromeMode.NativeTitlebar:
        win.setStyleMask(['titled', 'closable', 'miniaturizable']);
        win.setTitlebarAppearsTransparent(false);
        win.setTitleVisible(true);
        break;

      case ChromeMode.Frameless:
        win.setStyleMask(['borderless']);
        break;

      case ChromeMode.CustomTitlebar:
        win.setStyleMask(['titled', 'closable', 'miniaturizable', 'fullSizeContentView']);
        if (titlebar.macosHidden) {
          win.setTitlebarAppearsTransparent(true);
          win.setTitleVisible(false);
        } else {
          win.setTitlebarAppearsTransparent(titlebar.transparentWhenInactive);
          win.setTitleVisible(titlebar.showTitle);
        }
        break;
    }

    const origin = titlebar.macosButtonPosition;
    if (origin && mode !== ChromeMode.Frameless) {
      // Stop at the first missing button; the rest would be misaligned
      if (!win.setStandardButtonOrigin('close', origin.x, origin.y)) return;
      if (!win.setStandardButtonOrigin('miniaturize', origin.x + BUTTON_SPACING, origin.y)) return;
      win.setStandardButtonOrigin('zoom', origin.x + BUTTON_SPACING * 2, origin.y);
    }
  }

  setTransparent(transparent: boolean, opacity: number): void {
    this.window?.setOpaque(!(transparent || opacity < 1));
  }

  setBackgroundColor(color: Color, alpha: number): void {
    this.window?.setBackgroundColor(toFloatColor(color, alpha));
  }

  setMacOSVibrancy(vibrancy: MacOSVibrancy): void {
    const win = this.window;
    if (!win) return;
    win.removeVisualEffectViews();
    if (vibrancy === MacOSVibrancy.None) return;
    win.addVisualEffectView(vibrancy);
  }

  setWindowsMaterial(_material: WindowsMaterial): void {
    this.unsupported('windowsMaterial');
  }

  setShadow(shadow: ShadowStyle): void {
    const win = this.window;
    if (!win) return;
    win.setHasShadow(shadow.enabled);
    win.invalidateShadow();
  }

  setCornerRadius(radius: number): void {
    this.window?.setContentCornerRadius(Math.max(0, radius));
  }

  setResizable({ resizable, minimizable, maximizable }: ResizeButtons): void {
    const win = this.window;
    if (!win) return;
    let mask = win.getStyleMask();
    mask = withFlag(mask, 'resizable', resizable);
    mask = withFlag(mask, 'miniaturizable', minimizable);
    win.setStyleMask(mask);
    win.setZoomButtonEnabled(resizable && maximizable);
  }

  setAlwaysOnTop(enabled: boolean): void {
    this.window?.setFloating(enabled);
  }

  setSkipTaskbar(_enabled: boolean): void {
    this.unsupported('skipTaskbar');
  }

  setDragRegions(_regions: readonly DragRegion[]): void {
    // Dragging itself is resolved by the engine; the window only needs to re-query
    this.window?.notifyMoveOrResizeStarted();
  }
}
