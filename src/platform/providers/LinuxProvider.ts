/**
 * LinuxProvider - GTK window decorations and compositing
 */

import { ChromeMode } from '../../shared/style-types';
import type {
  Color,
  DragRegion,
  MacOSVibrancy,
  ShadowStyle,
  TitlebarStyle,
  WindowsMaterial,
} from '../../shared/style-types';
import {
  type GtkWindowBinding,
  type PlatformCapabilityProvider,
  PlatformKind,
  type ResizeButtons,
} from '../types/provider';
import { NativeProvider, toFloatColor } from './NativeProvider';

/** MWM_DECOR_ALL / MWM_DECOR_BORDER */
const MWM_DECOR_ALL = 1;
const MWM_DECOR_BORDER = 2;

export function cornerRadiusCss(radius: number): string {
  return `window { border-radius: ${Math.max(0, radius)}px; }`;
}

export class LinuxProvider
  extends NativeProvider<GtkWindowBinding>
  implements PlatformCapabilityProvider
{
  readonly platform = PlatformKind.Linux;

  setChromeMode(mode: ChromeMode, _titlebar: TitlebarStyle): void {
    this.window?.setDecorated(mode === ChromeMode.Full || mode === ChromeMode.NativeTitlebar);
  }

  setTransparent(transparent: boolean, opacity: number): void {
    const win = this.window;
    if (!win) return;
    if (!(transparent || opacity < 1)) {
      win.setAppPaintable(false);
      return;
    }
    // Without a compositor there is nothing to blend against
    win.setAppPaintable(win.useRgbaVisual());
  }

  setBackgroundColor(color: Color, alpha: number): void {
    this.window?.overrideBackgroundColor(toFloatColor(color, alpha));
  }

  setMacOSVibrancy(_vibrancy: MacOSVibrancy): void {
    this.unsupported('vibrancy');
  }

  setWindowsMaterial(_material: WindowsMaterial): void {
    this.unsupported('windowsMaterial');
  }

  setShadow(shadow: ShadowStyle): void {
    this.window?.setMotifDecorations(shadow.enabled ? MWM_DECOR_ALL : MWM_DECOR_BORDER);
  }

  setCornerRadius(radius: number): void {
    this.window?.loadCss(cornerRadiusCss(radius));
  }

  setResizable({ resizable }: ResizeButtons): void {
    this.window?.setResizable(resizable);
  }

  setAlwaysOnTop(enabled: boolean): void {
    this.window?.setKeepAbove(enabled);
  }

  setSkipTaskbar(enabled: boolean): void {
    this.window?.setSkipTaskbarHint(enabled);
  }

  setDragRegions(_regions: readonly DragRegion[]): void {
    // The engine resolves drag regions itself on GTK
  }
}
