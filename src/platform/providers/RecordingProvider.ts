/**
 * RecordingProvider - keeps a log of every operation instead of touching a window
 *
 * Used by the `plan` command and by tests. With `emulate`, operations the
 * emulated platform lacks throw UnsupportedOperationError exactly like the
 * native provider would.
 */

import { UnsupportedOperationError } from '../../shared/errors';
import type {
  ChromeMode,
  Color,
  DragRegion,
  MacOSVibrancy,
  ShadowStyle,
  TitlebarStyle,
  WindowsMaterial,
} from '../../shared/style-types';
import {
  type PlatformCapabilityProvider,
  PlatformKind,
  type ResizeButtons,
  type StyleOperation,
} from '../types/provider';
import type { BridgeValue } from '../../shared/types';

export interface RecordedOperation {
  operation: StyleOperation;
  args: BridgeValue[];
  /** False when the emulated platform rejected the operation */
  supported: boolean;
}

/**
 * Operations each platform cannot perform
 */
export const UNSUPPORTED_OPERATIONS: Record<PlatformKind, readonly StyleOperation[]> = {
  [PlatformKind.MacOS]: ['windowsMaterial', 'skipTaskbar'],
  [PlatformKind.Windows]: ['vibrancy'],
  [PlatformKind.Linux]: ['vibrancy', 'windowsMaterial'],
  [PlatformKind.Recording]: [],
};

export interface RecordingProviderOptions {
  emulate?: PlatformKind;
  /** Operations that throw a plain Error, to exercise failure handling */
  failing?: Iterable<StyleOperation>;
}

export class RecordingProvider implements PlatformCapabilityProvider {
  readonly platform: PlatformKind;
  readonly operations: RecordedOperation[] = [];
  private readonly unsupported: ReadonlySet<StyleOperation>;
  private readonly failing: Set<StyleOperation>;

  constructor(options: RecordingProviderOptions = {}) {
    this.platform = options.emulate ?? PlatformKind.Recording;
    this.unsupported = new Set(UNSUPPORTED_OPERATIONS[this.platform]);
    this.failing = new Set(options.failing ?? []);
  }

  /** Operation names in call order */
  get calls(): StyleOperation[] {
    return this.operations.map((entry) => entry.operation);
  }

  clear(): void {
    this.operations.length = 0;
  }

  /** Stop failing an operation, e.g. to see it retried */
  recover(operation: StyleOperation): void {
    this.failing.delete(operation);
  }

  setChromeMode(mode: ChromeMode, titlebar: TitlebarStyle): void {
    this.record('chromeMode', [mode, { ...titlebar }]);
  }

  setTransparent(transparent: boolean, opacity: number): void {
    this.record('transparency', [transparent, opacity]);
  }

  setBackgroundColor(color: Color, alpha: number): void {
    this.record('backgroundColor', [{ ...color }, alpha]);
  }

  setMacOSVibrancy(vibrancy: MacOSVibrancy): void {
    this.record('vibrancy', [vibrancy]);
  }

  setWindowsMaterial(material: WindowsMaterial): void {
    this.record('windowsMaterial', [material]);
  }

  setShadow(shadow: ShadowStyle): void {
    this.record('shadow', [{ ...shadow, color: { ...shadow.color } }]);
  }

  setCornerRadius(radius: number): void {
    this.record('cornerRadius', [radius]);
  }

  setResizable(buttons: ResizeButtons): void {
    this.record('resizable', [{ ...buttons }]);
  }

  setAlwaysOnTop(enabled: boolean): void {
    this.record('alwaysOnTop', [enabled]);
  }

  setSkipTaskbar(enabled: boolean): void {
    this.record('skipTaskbar', [enabled]);
  }

  setDragRegions(regions: readonly DragRegion[]): void {
    this.record(
      'dragRegions',
      regions.map((region) => ({ ...region }))
    );
  }

  private record(operation: StyleOperation, args: BridgeValue[]): void {
    const supported = !this.unsupported.has(operation);
    this.operations.push({ operation, args, supported });
    if (!supported) {
      throw new UnsupportedOperationError(operation, this.platform);
    }
    if (this.failing.has(operation)) {
      throw new Error(`${operation} failed`);
    }
  }
}

