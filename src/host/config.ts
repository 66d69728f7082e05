/**
 * App and window configuration: schemas, defaults and validation
 */

import { z } from 'zod';
import { defaultWindowStyle, mergeStyle, stylePreset } from '../shared/style';
import { partialStyleSchema } from '../shared/style-schema';
import type { WindowStyle } from '../shared/style-types';
import { VERSION } from '../version';

// ============ App ============

export const appConfigSchema = z
  .object({
    name: z.string().min(1).default('TrellisApp'),
    version: z.string().min(1).default('1.0.0'),
    /** Empty means `<name>/<version> Trellis/<VERSION>` */
    userAgent: z.string().default(''),
    cachePath: z.string().default(''),
    logPath: z.string().default(''),
    enableGPU: z.boolean().default(true),
    enableWebGL: z.boolean().default(true),
    enableMedia: z.boolean().default(true),
    enableNotifications: z.boolean().default(false),
    /** Development only */
    ignoreCertificateErrors: z.boolean().default(false),
    remoteDebugging: z.boolean().default(false),
    remoteDebugPort: z.number().int().min(1).max(65535).default(9222),
    logToConsole: z.boolean().default(true),
    /** Extra engine command-line switches */
    engineFlags: z.array(z.string().startsWith('--')).default([]),
  })
  .strict();

export type AppConfigInput = z.input<typeof appConfigSchema>;
export type AppConfig = z.output<typeof appConfigSchema>;

// ============ Window ============

const presetSchema = z.enum(['fullBrowser', 'fullCustom', 'macosModern', 'windows11Mica']);

export const windowConfigSchema = z
  .object({
    title: z.string().default(''),
    url: z.string().default('about:blank'),
    width: z.number().int().positive().default(1280),
    height: z.number().int().positive().default(800),
    minWidth: z.number().int().nonnegative().default(400),
    minHeight: z.number().int().nonnegative().default(300),
    /** 0 = unbounded */
    maxWidth: z.number().int().nonnegative().default(0),
    maxHeight: z.number().int().nonnegative().default(0),
    /** -1 = centered */
    x: z.number().int().default(-1),
    y: z.number().int().default(-1),
    /** Applied before `style` */
    preset: presetSchema.optional(),
    style: partialStyleSchema.default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.maxWidth > 0 && config.maxWidth < config.minWidth) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxWidth'],
        message: 'maxWidth must be 0 or at least minWidth',
      });
    }
    if (config.maxHeight > 0 && config.maxHeight < config.minHeight) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxHeight'],
        message: 'maxHeight must be 0 or at least minHeight',
      });
    }
  });

export type WindowConfigInput = z.input<typeof windowConfigSchema>;
export type WindowConfig = z.output<typeof windowConfigSchema>;

// ============ Helpers ============

export type ConfigResult<T> = { ok: true; config: T } | { ok: false; issues: string[] };

function toResult<I, T>(parsed: z.SafeParseReturnType<I, T>): ConfigResult<T> {
  if (parsed.success) {
    return { ok: true, config: parsed.data };
  }
  return {
    ok: false,
    issues: parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    ),
  };
}

export function parseAppConfig(input: unknown): ConfigResult<AppConfig> {
  return toResult(appConfigSchema.safeParse(input));
}

export function parseWindowConfig(input: unknown): ConfigResult<WindowConfig> {
  return toResult(windowConfigSchema.safeParse(input));
}

export function resolveUserAgent(config: AppConfig): string {
  return config.userAgent || `${config.name}/${config.version} Trellis/${VERSION}`;
}

/**
 * The initial full style of a window: defaults, then preset, then overrides
 */
export function resolveWindowStyle(config: WindowConfig): WindowStyle {
  const base = config.preset ? stylePreset(config.preset) : defaultWindowStyle();
  return mergeStyle(base, config.style);
}
