/**
 * Shared plumbing for providers that drive a native window binding
 */

import { UnsupportedOperationError } from '../../shared/errors';
import type { Color } from '../../shared/style-types';
import type { FloatColor, PlatformKind, StyleOperation } from '../types/provider';

export abstract class NativeProvider<Binding extends object> {
  abstract readonly platform: PlatformKind;

  private readonly ref: WeakRef<Binding>;

  constructor(binding: Binding) {
    this.ref = new WeakRef(binding);
  }

  /** Undefined once the native window has been collected */
  protected get window(): Binding | undefined {
    return this.ref.deref();
  }

  protected unsupported(operation: StyleOperation): never {
    throw new UnsupportedOperationError(operation, this.platform);
  }
}

export function toFloatColor(color: Color, alpha: number): FloatColor {
  return {
    r: color.r / 255,
    g: color.g / 255,
    b: color.b / 255,
    a: Math.min(1, Math.max(0, alpha)),
  };
}
