/**
 * StyleReconciler
 *
 * Drives a PlatformCapabilityProvider from a complete WindowStyle. Every
 * operation remembers the input it last ran with and is skipped while that
 * input is unchanged, so applying the same model twice costs nothing.
 */

import { UnsupportedOperationError } from '../../shared/errors';
import { defaultWindowStyle } from '../../shared/style';
import type {
  Color,
  DragRegion,
  MacOSVibrancy,
  ShadowStyle,
  WindowStyle,
  WindowsMaterial,
} from '../../shared/style-types';
import { consoleLogger, type Logger } from '../../shared/types';
import {
  type PlatformCapabilityProvider,
  STYLE_OPERATIONS,
  type StyleOperation,
} from '../../platform/types/provider';

export interface StyleReconcilerOptions {
  /** Initial model; nothing is applied until `apply` */
  style?: WindowStyle;
  logger?: Logger;
  debug?: boolean;
  logPrefix?: string;
}

/**
 * Opacity the background is painted with
 */
export function backgroundAlpha(style: WindowStyle): number {
  return style.transparent || style.backgroundOpacity < 1
    ? style.backgroundOpacity
    : style.backgroundColor.a / 255;
}

type Step = {
  /** Serialised input; the step is skipped while this is unchanged */
  key: (style: WindowStyle) => string;
  run: (provider: PlatformCapabilityProvider, style: WindowStyle) => void;
};

const STEPS: Record<StyleOperation, Step> = {
  chromeMode: {
    key: (s) => JSON.stringify([s.chromeMode, s.titlebar]),
    run: (p, s) => p.setChromeMode(s.chromeMode, s.titlebar),
  },
  transparency: {
    key: (s) => JSON.stringify([s.transparent, s.backgroundOpacity]),
    run: (p, s) => p.setTransparent(s.transparent, s.backgroundOpacity),
  },
  backgroundColor: {
    key: (s) => JSON.stringify([s.backgroundColor, backgroundAlpha(s)]),
    run: (p, s) => p.setBackgroundColor(s.backgroundColor, backgroundAlpha(s)),
  },
  vibrancy: {
    key: (s) => s.macosVibrancy,
    run: (p, s) => p.setMacOSVibrancy(s.macosVibrancy),
  },
  windowsMaterial: {
    key: (s) => s.windowsMaterial,
    run: (p, s) => p.setWindowsMaterial(s.windowsMaterial),
  },
  shadow: {
    key: (s) => JSON.stringify(s.shadow),
    run: (p, s) => p.setShadow(s.shadow),
  },
  cornerRadius: {
    key: (s) => String(s.cornerRadius),
    run: (p, s) => p.setCornerRadius(s.cornerRadius),
  },
  resizable: {
    key: (s) => JSON.stringify([s.resizable, s.minimizable, s.maximizable]),
    run: (p, s) =>
      p.setResizable({
        resizable: s.resizable,
        minimizable: s.minimizable,
        maximizable: s.maximizable,
      }),
  },
  alwaysOnTop: {
    key: (s) => String(s.alwaysOnTop),
    run: (p, s) => p.setAlwaysOnTop(s.alwaysOnTop),
  },
  skipTaskbar: {
    key: (s) => String(s.skipTaskbar),
    run: (p, s) => p.setSkipTaskbar(s.skipTaskbar),
  },
  dragRegions: {
    key: (s) => JSON.stringify(s.dragRegions),
    run: (p, s) => p.setDragRegions(s.dragRegions),
  },
};

export class StyleReconciler {
  private model: WindowStyle;
  private applied = new Map<StyleOperation, string>();
  private readonly logger: Logger;
  private readonly debug: boolean;
  private readonly logPrefix: string;

  constructor(
    private readonly provider: PlatformCapabilityProvider,
    options: StyleReconcilerOptions = {}
  ) {
    this.model = options.style ?? defaultWindowStyle();
    this.logger = options.logger ?? consoleLogger;
    this.debug = options.debug ?? false;
    this.logPrefix = options.logPrefix ?? '[trellis:style]';
  }

  /** Current model (treat as read-only) */
  get style(): WindowStyle {
    return this.model;
  }

  /**
   * Replace the model and bring the native window in line with it
   */
  apply(style: WindowStyle): void {
    this.model = style;
    for (const operation of STYLE_OPERATIONS) {
      this.run(operation);
    }
  }

  // ============ Direct mutators ============

  setCornerRadius(radius: number): void {
    this.update({ cornerRadius: radius }, 'cornerRadius');
  }

  setMacOSVibrancy(vibrancy: MacOSVibrancy): void {
    this.update({ macosVibrancy: vibrancy }, 'vibrancy');
  }

  setWindowsMaterial(material: WindowsMaterial): void {
    this.update({ windowsMaterial: material }, 'windowsMaterial');
  }

  setBackgroundColor(color: Color): void {
    this.update({ backgroundColor: { ...color } }, 'backgroundColor');
  }

  setShadow(shadow: ShadowStyle): void {
    this.update({ shadow: { ...shadow, color: { ...shadow.color } } }, 'shadow');
  }

  setResizable(resizable: boolean): void {
    this.update({ resizable }, 'resizable');
  }

  /** Replaces every previously set region */
  setDragRegions(regions: readonly DragRegion[]): void {
    this.update({ dragRegions: regions.map((region) => ({ ...region })) }, 'dragRegions');
  }

  /**
   * Forget what was applied, e.g. after the native window was recreated.
   * The next `apply` re-runs every operation.
   */
  reset(): void {
    this.applied.clear();
  }

  /** Whether the last run of an operation is remembered as applied */
  isApplied(operation: StyleOperation): boolean {
    return this.applied.has(operation);
  }

  // ============ Internals ============

  private update(patch: Partial<WindowStyle>, operation: StyleOperation): void {
    this.model = { ...this.model, ...patch };
    this.run(operation);
  }

  private run(operation: StyleOperation): void {
    const step = STEPS[operation];
    const key = step.key(this.model);
    if (this.applied.get(operation) === key) return;

    try {
      step.run(this.provider, this.model);
    } catch (error) {
      if (error instanceof UnsupportedOperationError) {
        if (this.debug) {
          this.logger.log(`${this.logPrefix} ${error.message}, skipped`);
        }
      } else {
        this.logger.error(`${this.logPrefix} ${operation} failed:`, error);
        this.applied.delete(operation);
        return;
      }
    }

    this.applied.set(operation, key);

    if (operation === 'chromeMode') {
      // New chrome replaces native state the later operations configured
      const index = STYLE_OPERATIONS.indexOf(operation);
      for (const later of STYLE_OPERATIONS.slice(index + 1)) {
        this.applied.delete(later);
      }
    }
  }
}
