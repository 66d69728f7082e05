/**
 * Reconciliation plans: which provider operations a fresh window receives
 */

import {
  type DesktopPlatform,
  detectPlatform,
  handleKindFor,
} from '../platform/default/DefaultProvider';
import { type RecordedOperation, RecordingProvider } from '../platform/providers/RecordingProvider';
import { PlatformKind } from '../platform/types/provider';
import { buildPageCss } from '../shared/style';
import type { WindowStyle } from '../shared/style-types';
import type { Logger } from '../shared/types';
import { parseWindowConfig, resolveWindowStyle } from '../host/config';
import { StyleReconciler } from '../host/style/StyleReconciler';

export interface PlanOptions {
  preset?: string;
  /** Default: the current platform */
  platform?: string;
  logger?: Logger;
  /** Log the operations the platform skips */
  debug?: boolean;
}

export interface StylePlan {
  platform: DesktopPlatform;
  style: WindowStyle;
  operations: RecordedOperation[];
  pageCss: string;
}

const PLATFORMS: readonly DesktopPlatform[] = [
  PlatformKind.MacOS,
  PlatformKind.Windows,
  PlatformKind.Linux,
];

function parsePlatform(name: string | undefined): DesktopPlatform {
  if (name === undefined) return detectPlatform();
  const platform = PLATFORMS.find((candidate) => candidate === name);
  if (!platform) {
    throw new Error(`Unknown platform "${name}" (expected ${PLATFORMS.join(', ')})`);
  }
  return platform;
}

/**
 * Run a full reconcile of `style` (a partial style object) against a
 * provider emulating the chosen platform.
 */
export function planStyle(style: unknown = {}, options: PlanOptions = {}): StylePlan {
  const platform = parsePlatform(options.platform);
  const parsed = parseWindowConfig({ preset: options.preset, style });
  if (!parsed.ok) {
    throw new Error(`Invalid style: ${parsed.issues.join('; ')}`);
  }

  const resolved = resolveWindowStyle(parsed.config);
  const provider = new RecordingProvider({ emulate: platform });
  const reconciler = new StyleReconciler(provider, {
    logger: options.logger,
    debug: options.debug,
    logPrefix: '[trellis:plan]',
  });
  reconciler.apply(resolved);

  return {
    platform,
    style: resolved,
    operations: [...provider.operations],
    pageCss: buildPageCss(resolved),
  };
}

export function formatOperation(entry: RecordedOperation, index: number): string {
  const args = entry.args.map((arg) => JSON.stringify(arg)).join(', ');
  const note = entry.supported ? '' : ' [unsupported]';
  return `${index + 1}. ${entry.operation}(${args})${note}`;
}

export function formatPlan(plan: StylePlan): string {
  return [
    `platform: ${plan.platform} (${handleKindFor(plan.platform)} handle)`,
    ...plan.operations.map((entry, index) => `  ${formatOperation(entry, index)}`),
    'page css:',
    `  ${plan.pageCss || '(none)'}`,
  ].join('\n');
}
