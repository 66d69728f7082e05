/**
 * WindowCommands - maps guest window ops onto a command target
 *
 * Holds no state of its own. Whether a command changes anything (maximize
 * on a maximized window, say) is for the target to decide.
 */

import { z } from 'zod';
import type { BridgeValue, WindowOpName } from '../../shared/types';
import { WINDOW_OPS } from '../../shared/types';
import type { WindowCommandSink } from '../bridge/Bridge';

export interface WindowCommandTarget {
  minimize(): void;
  maximize(): void;
  restore(): void;
  close(): void;
  setTitle(title: string): void;
  setAlwaysOnTop(enabled: boolean): void;
  setFullscreen(enabled: boolean): void;
  setZoom(factor: number): void;
  openDevTools(docked: boolean): void;
  print(): void;
}

const titleValue = z.string();
const flagValue = z.boolean();
const zoomValue = z.number().finite().positive();
const dockedValue = z
  .boolean()
  .nullish()
  .transform((docked) => docked ?? false);

type Command = (target: WindowCommandTarget, value: BridgeValue | undefined) => boolean;

/** Runs `apply` only when `value` parses */
function withValue<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  apply: (target: WindowCommandTarget, value: T) => void
): Command {
  return (target, value) => {
    const parsed = schema.safeParse(value);
    if (!parsed.success) return false;
    apply(target, parsed.data);
    return true;
  };
}

function bare(apply: (target: WindowCommandTarget) => void): Command {
  return (target) => {
    apply(target);
    return true;
  };
}

const COMMANDS: Record<WindowOpName, Command> = {
  minimize: bare((t) => t.minimize()),
  maximize: bare((t) => t.maximize()),
  restore: bare((t) => t.restore()),
  close: bare((t) => t.close()),
  setTitle: withValue(titleValue, (t, title) => t.setTitle(title)),
  alwaysOnTop: withValue(flagValue, (t, on) => t.setAlwaysOnTop(on)),
  fullscreen: withValue(flagValue, (t, on) => t.setFullscreen(on)),
  zoom: withValue(zoomValue, (t, factor) => t.setZoom(factor)),
  // Absent or null means undocked
  devTools: withValue(dockedValue, (t, docked) => t.openDevTools(docked)),
  print: bare((t) => t.print()),
};

export function isWindowOp(op: string): op is WindowOpName {
  return WINDOW_OPS.some((name) => name === op);
}

export class WindowCommands implements WindowCommandSink {
  constructor(private readonly target: WindowCommandTarget) {}

  /**
   * Returns whether a command ran. Unknown ops and missing or
   * ill-typed values are ignored.
   */
  execute(op: string, value: BridgeValue | undefined): boolean {
    if (!isWindowOp(op)) return false;
    return COMMANDS[op](this.target, value);
  }
}
