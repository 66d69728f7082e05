/**
 * zod schemas for style fields arriving over the wire or from config files
 */

import { z } from 'zod';
import {
  ChromeMode,
  ContextMenuStyle,
  FullscreenMode,
  MacOSVibrancy,
  ScrollbarStyle,
  WindowsMaterial,
} from './style-types';

const channel = z.number().int().min(0).max(255);

export const colorSchema = z.object({
  r: channel,
  g: channel,
  b: channel,
  a: channel.default(255),
});

export const dragRegionSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
  isDraggable: z.boolean().default(true),
});

export const titlebarPatchSchema = z
  .object({
    visible: z.boolean(),
    title: z.string(),
    backgroundColor: colorSchema,
    foregroundColor: colorSchema,
    height: z.number().int().nonnegative(),
    showTitle: z.boolean(),
    showIcon: z.boolean(),
    iconPath: z.string(),
    transparentWhenInactive: z.boolean(),
    macosHidden: z.boolean(),
    macosButtonPosition: z.object({ x: z.number(), y: z.number() }).nullable(),
  })
  .partial();

export const shadowPatchSchema = z
  .object({
    enabled: z.boolean(),
    color: colorSchema,
    blur: z.number().nonnegative(),
    spread: z.number(),
    offsetX: z.number(),
    offsetY: z.number(),
  })
  .partial();

/**
 * Any subset of the style model. Unknown keys are stripped.
 */
export const partialStyleSchema = z
  .object({
    chromeMode: z.nativeEnum(ChromeMode),
    titlebar: titlebarPatchSchema,
    backgroundColor: colorSchema,
    backgroundOpacity: z.number().min(0).max(1),
    transparent: z.boolean(),
    macosVibrancy: z.nativeEnum(MacOSVibrancy),
    windowsMaterial: z.nativeEnum(WindowsMaterial),
    shadow: shadowPatchSchema,
    cornerRadius: z.number().int().nonnegative(),
    resizable: z.boolean(),
    minimizable: z.boolean(),
    maximizable: z.boolean(),
    alwaysOnTop: z.boolean(),
    skipTaskbar: z.boolean(),
    fullscreen: z.nativeEnum(FullscreenMode),
    dragRegions: z.array(dragRegionSchema),
    scrollbar: z.nativeEnum(ScrollbarStyle),
    contextMenu: z.nativeEnum(ContextMenuStyle),
    devTools: z.boolean(),
    devToolsDocked: z.boolean(),
    zoomFactor: z.number().positive(),
    allowZoom: z.boolean(),
    allowTextSelection: z.boolean(),
  })
  .partial();

export type PartialStyleInput = z.input<typeof partialStyleSchema>;
