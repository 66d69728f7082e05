/**
 * trellis/host - App Tests
 */

import { afterEach, describe, expect, test, vi } from 'vitest';
import { RecordingProvider } from '../platform/providers/RecordingProvider';
import { AppError, WindowError } from '../shared/errors';
import { VERSION } from '../version';
import { App } from './App';
import type { BrowserHost } from './engine/types';

function createHost() {
  return {
    getState: vi.fn(() => 'normal' as const),
    minimize: vi.fn(),
    maximize: vi.fn(),
    restore: vi.fn(),
    close: vi.fn(),
    setTitle: vi.fn(),
    setFullscreen: vi.fn(),
    setZoomLevel: vi.fn(),
    showDevTools: vi.fn(),
    closeDevTools: vi.fn(),
    print: vi.fn(),
    captureScreenshot: vi.fn(async () => new Uint8Array()),
    loadURL: vi.fn(),
  } satisfies BrowserHost;
}

function createLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('App', () => {
  const apps: App[] = [];

  function create(config: unknown = {}, engineVersion = '1.2.0'): App {
    const app = App.create(config, { engineVersion, logger: createLogger() });
    apps.push(app);
    return app;
  }

  function openWindow(app: App, config: unknown = { url: 'https://example.test/' }) {
    const host = createHost();
    const win = app.createWindow(config, {
      host,
      provider: new RecordingProvider(),
      postToGuest: vi.fn(),
    });
    return { host, win };
  }

  afterEach(() => {
    for (const app of apps.splice(0)) app.quit();
  });

  // ============ Creation ============

  describe('create', () => {
    test('should apply config defaults', () => {
      const app = create({ name: 'Notes', version: '2.0.0' });
      expect(app.config.remoteDebugPort).toBe(9222);
      expect(app.config.enableGPU).toBe(true);
      expect(app.userAgent).toBe(`Notes/2.0.0 Trellis/${VERSION}`);
      expect(app.isRunning).toBe(true);
    });

    test('should reject invalid config with InvalidArguments', () => {
      const error = thrown(() => create({ remoteDebugPort: 70000 }));
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ code: 'InvalidArguments' });
    });

    test('should reject unknown keys', () => {
      expect(thrown(() => create({ colour: 'red' }))).toMatchObject({ code: 'InvalidArguments' });
    });

    test('should reject an unsupported engine major', () => {
      expect(thrown(() => create({}, '2.0.1'))).toMatchObject({
        code: 'VersionMismatch',
        message: 'Engine 2.0.1 is not supported (expected 1.x)',
      });
    });

    test('should allow only one running instance', () => {
      create({ name: 'First' });
      expect(thrown(() => create())).toMatchObject({
        code: 'AlreadyRunning',
        message: 'First is already running',
      });
    });

    test('should free the slot after quit', () => {
      const first = create();
      first.quit();
      expect(create().isRunning).toBe(true);
    });

    test('should fail with InitFailed when init returns false', () => {
      const error = thrown(() => App.create({}, { init: () => false, logger: createLogger() }));
      expect(error).toMatchObject({ code: 'InitFailed', message: 'Engine initialization failed' });
    });

    test('should keep the cause when init throws', () => {
      const cause = new Error('no GPU');
      const error = thrown(() =>
        App.create({}, {
          init: () => {
            throw cause;
          },
          logger: createLogger(),
        })
      );
      expect(error).toMatchObject({
        code: 'InitFailed',
        message: 'Engine initialization failed: no GPU',
        cause,
      });
    });

    test('should not take the slot when init fails', () => {
      thrown(() => App.create({}, { init: () => false, logger: createLogger() }));
      expect(create().isRunning).toBe(true);
    });

    test('should pass the parsed config to init', () => {
      const init = vi.fn(() => true);
      apps.push(App.create({ name: 'Notes' }, { init, logger: createLogger() }));
      expect(init).toHaveBeenCalledWith(expect.objectContaining({ name: 'Notes', enableMedia: true }));
    });

    test('should report the library version', () => {
      expect(App.version()).toBe(VERSION);
    });
  });

  // ============ Windows ============

  describe('createWindow', () => {
    test('should load the configured URL and track the window', () => {
      const app = create();
      const { host, win } = openWindow(app);
      expect(host.loadURL).toHaveBeenCalledWith('https://example.test/');
      expect(app.windows).toEqual([win]);
    });

    test('should reject invalid window config with CreateFailed', () => {
      const app = create();
      const error = thrown(() => openWindow(app, { width: -5 }));
      expect(error).toBeInstanceOf(WindowError);
      expect(error).toMatchObject({ code: 'CreateFailed' });
    });

    test('should need a provider or a native handle', () => {
      const app = create();
      const error = thrown(() =>
        app.createWindow({}, { host: createHost(), postToGuest: vi.fn() })
      );
      expect(error).toMatchObject({
        code: 'CreateFailed',
        message: 'Window creation failed: No platform provider or native window handle',
      });
    });

    test('should refuse new windows after quit', () => {
      const app = create();
      app.quit();
      expect(thrown(() => openWindow(app))).toMatchObject({
        code: 'CreateFailed',
        message: 'App has quit',
      });
    });

    test('should stop tracking a closed window', () => {
      const app = create();
      const a = openWindow(app);
      const b = openWindow(app);
      a.win.close();
      expect(app.windows).toEqual([b.win]);
      expect(app.isRunning).toBe(true);
    });
  });

  // ============ Loop ============

  describe('run', () => {
    test('should resolve when the last window closes', async () => {
      const app = create();
      const { win } = openWindow(app);
      const done = vi.fn();
      void app.run().then(done);

      await flush();
      expect(done).not.toHaveBeenCalled();

      win.close();
      await flush();
      expect(done).toHaveBeenCalledTimes(1);
      expect(app.isRunning).toBe(false);
    });

    test('should close every window on quit', async () => {
      const app = create();
      const a = openWindow(app);
      const b = openWindow(app);
      const running = app.run();

      app.quit();
      await running;

      expect(a.host.close).toHaveBeenCalledTimes(1);
      expect(b.host.close).toHaveBeenCalledTimes(1);
      expect(a.win.isClosed).toBe(true);
      expect(app.windows).toEqual([]);
    });

    test('should resolve immediately after quit', async () => {
      const app = create();
      app.quit();
      await expect(app.run()).resolves.toBeUndefined();
    });
  });

  describe('owner queue', () => {
    test('should run posted tasks on the queue', async () => {
      const app = create();
      const seen: boolean[] = [];
      app.postUITask(() => seen.push(app.isUIThread()));
      expect(app.isUIThread()).toBe(false);
      await flush();
      expect(seen).toEqual([true]);
    });

    test('should keep the shared queue alive when one window closes', async () => {
      const app = create();
      const a = openWindow(app);
      openWindow(app);
      a.win.close();

      const task = vi.fn();
      app.postUITask(task);
      await flush();
      expect(task).toHaveBeenCalledTimes(1);
    });
  });
});
