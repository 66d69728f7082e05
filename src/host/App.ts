/**
 * App - process-wide entry point
 *
 * Validates the app configuration, checks the engine version, enforces a
 * single running instance and creates windows that share one owner queue.
 */

import { createDefaultProvider } from '../platform/default/DefaultProvider';
import type { NativeWindowHandle, PlatformCapabilityProvider } from '../platform/types/provider';
import { AppError, errorMessage, WindowError } from '../shared/errors';
import { consoleLogger, type Logger } from '../shared/types';
import { SUPPORTED_ENGINE_MAJOR, VERSION } from '../version';
import { BrowserWindow } from './BrowserWindow';
import { type AppConfig, parseAppConfig, parseWindowConfig, resolveUserAgent } from './config';
import { type Task, TaskQueue } from './engine/TaskQueue';
import type { BrowserHost } from './engine/types';

export interface AppOptions {
  /** Version of the rendering engine in use, e.g. "1.4.0" */
  engineVersion?: string;

  /**
   * Engine start-up. Returning false or throwing fails creation with InitFailed.
   */
  init?: (config: AppConfig) => boolean | void;

  /** Default: a queue drained on a microtask */
  taskQueue?: TaskQueue;

  /** Default: console, or nothing when `logToConsole` is off */
  logger?: Logger;

  debug?: boolean;
}

export interface CreateWindowDeps {
  host: BrowserHost;
  postToGuest: (raw: string) => void;
  /** Takes precedence over `handle` */
  provider?: PlatformCapabilityProvider;
  handle?: NativeWindowHandle;
  callTimeout?: number;
}

const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function engineMajor(version: string): number {
  return Number.parseInt(version.split('.')[0] ?? '', 10);
}

export class App {
  private static current: App | null = null;

  readonly config: AppConfig;
  readonly userAgent: string;

  private readonly queue: TaskQueue;
  private readonly logger: Logger;
  private readonly debug: boolean;
  private readonly openWindows = new Set<BrowserWindow>();
  private finish?: () => void;
  private quitting = false;
  private stopped = false;

  private constructor(config: AppConfig, options: AppOptions, logger: Logger) {
    this.config = config;
    this.userAgent = resolveUserAgent(config);
    this.logger = logger;
    this.debug = options.debug ?? false;
    this.queue = options.taskQueue ?? new TaskQueue({ logger, logPrefix: '[trellis:app]' });
  }

  /**
   * @throws AppError with code InvalidArguments, VersionMismatch, AlreadyRunning or InitFailed
   */
  static create(config: unknown = {}, options: AppOptions = {}): App {
    const parsed = parseAppConfig(config);
    if (!parsed.ok) {
      throw new AppError('InvalidArguments', `Invalid app config: ${parsed.issues.join('; ')}`);
    }

    if (options.engineVersion !== undefined) {
      const major = engineMajor(options.engineVersion);
      if (major !== SUPPORTED_ENGINE_MAJOR) {
        throw new AppError(
          'VersionMismatch',
          `Engine ${options.engineVersion} is not supported (expected ${SUPPORTED_ENGINE_MAJOR}.x)`
        );
      }
    }

    if (App.current) {
      throw new AppError('AlreadyRunning', `${App.current.config.name} is already running`);
    }

    const logger = options.logger ?? (parsed.config.logToConsole ? consoleLogger : silentLogger);

    if (options.init) {
      let ok: boolean | void;
      try {
        ok = options.init(parsed.config);
      } catch (error) {
        throw new AppError('InitFailed', `Engine initialization failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      if (ok === false) {
        throw new AppError('InitFailed', 'Engine initialization failed');
      }
    }

    const app = new App(parsed.config, options, logger);
    App.current = app;
    if (app.debug) {
      logger.log(`[trellis:app] ${app.userAgent} started`);
    }
    return app;
  }

  static version(): string {
    return VERSION;
  }

  // ============ Windows ============

  /**
   * @throws WindowError('CreateFailed') on bad config or a provider failure
   */
  createWindow(config: unknown, deps: CreateWindowDeps): BrowserWindow {
    if (this.stopped) {
      throw new WindowError('CreateFailed', 'App has quit');
    }

    const parsed = parseWindowConfig(config);
    if (!parsed.ok) {
      throw new WindowError('CreateFailed', `Invalid window config: ${parsed.issues.join('; ')}`);
    }

    let win: BrowserWindow;
    try {
      const provider = deps.provider ?? (deps.handle && createDefaultProvider(deps.handle));
      if (!provider) {
        throw new Error('No platform provider or native window handle');
      }
      win = new BrowserWindow(parsed.config, {
        host: deps.host,
        provider,
        postToGuest: deps.postToGuest,
        taskQueue: this.queue,
        callTimeout: deps.callTimeout,
        logger: this.logger,
        debug: this.debug,
      });
    } catch (error) {
      throw new WindowError('CreateFailed', `Window creation failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.openWindows.add(win);
    win.on('close', () => this.onWindowClosed(win));
    deps.host.loadURL(parsed.config.url);
    return win;
  }

  get windows(): BrowserWindow[] {
    return [...this.openWindows];
  }

  private onWindowClosed(win: BrowserWindow): void {
    this.openWindows.delete(win);
    if (this.openWindows.size === 0 && !this.quitting) {
      this.stop();
    }
  }

  // ============ Loop ============

  /**
   * Resolves once `quit()` is called or the last window closes
   */
  run(): Promise<void> {
    if (this.stopped) return Promise.resolve();
    return new Promise((resolve) => {
      const previous = this.finish;
      this.finish = () => {
        previous?.();
        resolve();
      };
    });
  }

  /**
   * Close every window and end `run()`
   */
  quit(): void {
    if (this.stopped) return;
    this.quitting = true;
    for (const win of [...this.openWindows]) {
      win.close();
    }
    this.stop();
  }

  private stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    if (App.current === this) {
      App.current = null;
    }
    this.finish?.();
    this.finish = undefined;
  }

  /**
   * Run `task` on the owner queue
   */
  postUITask(task: Task): void {
    this.queue.post(task);
  }

  /** True while running a task on the owner queue */
  isUIThread(): boolean {
    return this.queue.isDraining;
  }

  get isRunning(): boolean {
    return !this.stopped;
  }
}
