/**
 * trellis/host - BrowserWindow Tests
 *
 * The page end runs in-process: a real guest bridge is wired back to back
 * with the window, so each test exercises the full round trip.
 */

import { afterEach, beforeEach, describe, expect, type Mock, test, vi } from 'vitest';
import { createGuestBridge, type GuestBridge } from '../guest/GuestBridge';
import { RecordingProvider } from '../platform/providers/RecordingProvider';
import { STYLE_OPERATIONS } from '../platform/types/provider';
import { BridgeClosedError, WindowError } from '../shared/errors';
import { ContextMenuStyle, ScrollbarStyle } from '../shared/style-types';
import type { BridgeValue } from '../shared/types';
import { BrowserWindow, zoomLevel } from './BrowserWindow';
import { windowConfigSchema, type WindowConfigInput } from './config';
import type { BrowserHost, WindowState } from './engine/types';

function createHost() {
  let state: WindowState = 'normal';
  return {
    getState: vi.fn(() => state),
    minimize: vi.fn(() => {
      state = 'minimized';
    }),
    maximize: vi.fn(() => {
      state = 'maximized';
    }),
    restore: vi.fn(() => {
      state = 'normal';
    }),
    close: vi.fn(),
    setTitle: vi.fn(),
    setFullscreen: vi.fn((enabled: boolean) => {
      state = enabled ? 'fullscreen' : 'normal';
    }),
    setZoomLevel: vi.fn(),
    showDevTools: vi.fn(),
    closeDevTools: vi.fn(),
    print: vi.fn(),
    captureScreenshot: vi.fn(async () => new Uint8Array([137, 80, 78, 71])),
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

describe('BrowserWindow', () => {
  let host: ReturnType<typeof createHost>;
  let provider: RecordingProvider;
  let logger: ReturnType<typeof createLogger>;
  let applyPageCss: Mock<(css: string) => void>;
  let guest: GuestBridge;
  let win: BrowserWindow;

  function open(config: WindowConfigInput = { title: 'Notes' }): void {
    applyPageCss = vi.fn<(css: string) => void>();
    guest = createGuestBridge({
      sendToHost: (raw) => win.receive(raw),
      evaluate: (script) => (script === '1+1' ? 2 : null),
      applyPageCss,
      logger,
    });
    win = new BrowserWindow(windowConfigSchema.parse(config), {
      host,
      provider,
      postToGuest: (raw) => guest.receive(raw),
      logger,
    });
  }

  beforeEach(() => {
    host = createHost();
    provider = new RecordingProvider();
    logger = createLogger();
    open();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('construction', () => {
    test('should apply the initial style and title', () => {
      expect(provider.calls).toEqual([...STYLE_OPERATIONS]);
      expect(host.setTitle).toHaveBeenCalledWith('Notes');
    });

    test('should start from a preset with overrides', () => {
      provider = new RecordingProvider();
      open({ preset: 'fullCustom', style: { cornerRadius: 10 } });

      expect(win.style.chromeMode).toBe('frameless');
      expect(win.style.transparent).toBe(true);
      expect(win.style.cornerRadius).toBe(10);
    });
  });

  describe('guest calls', () => {
    test('should run bound functions for the guest', async () => {
      win.bindFunction('add', (a, b) => Number(a) + Number(b));

      await expect(guest.api.call('add', 2, 3)).resolves.toBe(5);
    });

    test('should report unknown functions to the guest', async () => {
      await expect(guest.api.call('missing')).rejects.toThrow('Unknown function: missing');
    });

    test('should stop serving a function once unbound', async () => {
      win.bindFunction('ping', () => 'pong');
      expect(win.unbindFunction('ping')).toBe(true);

      await expect(guest.api.call('ping')).rejects.toThrow('Unknown function: ping');
    });
  });

  describe('evalRemote()', () => {
    test('should evaluate in the page and resolve with the result', async () => {
      await expect(win.evalRemote('1+1')).resolves.toBe(2);
      expect(win.pendingEvaluations).toBe(0);
    });

    test('should time out when the page never answers', async () => {
      vi.useFakeTimers();
      const silent = new BrowserWindow(windowConfigSchema.parse({}), {
        host: createHost(),
        provider: new RecordingProvider(),
        postToGuest: () => undefined,
        logger,
      });

      const result = silent.evalRemote('1+1');
      const assertion = expect(result).rejects.toThrow('evalRemote(1+1) timed out after 30000ms');
      vi.advanceTimersByTime(30000);

      await assertion;
    });
  });

  describe('style', () => {
    test('should merge a guest request, touch only what changed and notify once', async () => {
      const guestListener = vi.fn();
      const hostListener = vi.fn();
      guest.api.on('trellis:styleChange', guestListener);
      win.on('styleChange', hostListener);
      provider.clear();

      await guest.api.setStyle({ cornerRadius: 12 });

      expect(provider.calls).toEqual(['cornerRadius']);
      expect(win.style.cornerRadius).toBe(12);
      expect(win.style.resizable).toBe(true);
      expect(guestListener).toHaveBeenCalledTimes(1);
      expect(guestListener.mock.calls[0]?.[0]).toMatchObject({ cornerRadius: 12 });
      expect(hostListener).toHaveBeenCalledTimes(1);
    });

    test('should touch only the changed field after a direct resize change', async () => {
      win.setResizable(false);
      provider.clear();

      await guest.api.setStyle({ cornerRadius: 12 });

      expect(provider.calls).toEqual(['cornerRadius']);
    });

    test('should reject an invalid guest style before any timeout', async () => {
      vi.useFakeTimers();
      const styleListener = vi.fn();
      win.on('styleChange', styleListener);

      await expect(guest.api.setStyle({ cornerRadius: -5 })).rejects.toMatchObject({
        name: 'WireFormatError',
        message: 'Invalid style',
      });
      expect(guest.pendingCount).toBe(0);
      expect(styleListener).not.toHaveBeenCalled();
      expect(win.style.cornerRadius).toBe(0);
    });

    test('should replace drag regions from the guest', async () => {
      await guest.api.setDragRegions([{ x: 0, y: 0, width: 200, height: 30 }]);
      await guest.api.setDragRegions([{ x: 0, y: 0, width: 400, height: 40 }]);

      expect(win.style.dragRegions).toEqual([
        { x: 0, y: 0, width: 400, height: 40, isDraggable: true },
      ]);
    });

    test('should push page CSS on every commit', () => {
      win.updateStyle({ allowTextSelection: false });

      expect(applyPageCss).toHaveBeenLastCalledWith('*{user-select:none;-webkit-user-select:none}');
    });

    test('should notify both sides after a direct mutator', () => {
      const guestListener = vi.fn<(data: BridgeValue) => void>();
      guest.api.on('trellis:styleChange', guestListener);
      provider.clear();

      win.setCornerRadius(6);

      expect(provider.calls).toEqual(['cornerRadius']);
      expect(guestListener).toHaveBeenCalledTimes(1);
    });
  });

  describe('window commands', () => {
    test('should run guest window ops on the owner queue', async () => {
      guest.api.maximize();
      expect(host.maximize).not.toHaveBeenCalled();

      await flush();
      expect(host.maximize).toHaveBeenCalledTimes(1);
    });

    test('should not repeat a command the window already satisfies', async () => {
      guest.api.maximize();
      guest.api.maximize();
      await flush();

      expect(host.maximize).toHaveBeenCalledTimes(1);
    });

    test('should set the title from the guest', async () => {
      guest.api.setTitle('Draft');
      await flush();

      expect(host.setTitle).toHaveBeenLastCalledWith('Draft');
    });

    test('should keep always-on-top in the style model', () => {
      provider.clear();
      win.setAlwaysOnTop(true);

      expect(win.style.alwaysOnTop).toBe(true);
      expect(provider.calls).toEqual(['alwaysOnTop']);
    });

    test('should toggle fullscreen only when it changes', () => {
      win.setFullscreen(true);
      win.setFullscreen(true);
      win.setFullscreen(false);

      expect(host.setFullscreen.mock.calls).toEqual([[true], [false]]);
    });
  });

  describe('zoom', () => {
    test('should convert factors to engine zoom levels', () => {
      expect(zoomLevel(1)).toBe(0);
      expect(zoomLevel(1.44)).toBeCloseTo(2);
    });

    test('should step by 1.2', () => {
      win.zoomIn();
      expect(win.style.zoomFactor).toBeCloseTo(1.2);
      expect(host.setZoomLevel).toHaveBeenLastCalledWith(1);

      win.resetZoom();
      expect(win.style.zoomFactor).toBe(1);
      expect(host.setZoomLevel).toHaveBeenLastCalledWith(0);
    });

    test('should ignore zoom when not allowed or not positive', () => {
      win.setZoom(0);
      win.setZoom(-1);
      win.updateStyle({ allowZoom: false });
      win.setZoom(2);

      expect(host.setZoomLevel).not.toHaveBeenCalled();
      expect(win.style.zoomFactor).toBe(1);
    });
  });

  describe('screenshots', () => {
    test('should hand the guest a base64 PNG', async () => {
      await expect(guest.api.captureScreenshot()).resolves.toBe('iVBORw==');
    });
  });

  describe('navigation', () => {
    test('should let any listener deny a navigation', () => {
      win.onNavigation((request) => {
        if (request.url.startsWith('https://blocked.example')) {
          request.allow = false;
        }
      });

      expect(win.requestNavigation('https://blocked.example/page')).toBe(false);
      expect(win.requestNavigation('https://docs.example/')).toBe(true);
    });

    test('should throw NavigationBlocked instead of loading a denied URL', () => {
      win.onNavigation((request) => {
        request.allow = false;
      });

      const error = thrown(() => win.navigate('https://blocked.example/'));

      expect(error).toBeInstanceOf(WindowError);
      expect(error).toMatchObject({
        code: 'NavigationBlocked',
        message: 'Navigation to https://blocked.example/ was blocked',
      });
      expect(host.loadURL).not.toHaveBeenCalled();
    });

    test('should load allowed URLs', () => {
      win.navigate('https://docs.example/');

      expect(host.loadURL).toHaveBeenCalledWith('https://docs.example/');
    });
  });

  describe('context menu', () => {
    const params = { x: 10, y: 20, selectionText: 'hello', linkUrl: '', editable: false };

    test('should leave the native menu alone by default', () => {
      expect(win.handleContextMenu(params)).toBe('native');
    });

    test('should hand custom menus to the guest', () => {
      const handler = vi.fn();
      guest.api.on('trellis:contextMenu', handler);
      win.updateStyle({ contextMenu: ContextMenuStyle.Custom });

      expect(win.handleContextMenu(params)).toBe('suppressed');
      expect(handler).toHaveBeenCalledWith(params);
    });
  });

  describe('notifications', () => {
    test('should forward user events from the guest', async () => {
      const listener = vi.fn();
      win.on('message', listener);

      guest.api.send('chat', { text: 'hi' });
      await flush();

      expect(listener).toHaveBeenCalledWith({ name: 'chat', payloadJson: '{"text":"hi"}' });
    });

    test('should push page CSS after a successful load', () => {
      const onLoad = vi.fn();
      win.on('load', onLoad);
      win.updateStyle({ scrollbar: ScrollbarStyle.Hidden });
      applyPageCss.mockClear();

      const event = { url: 'https://docs.example/', httpStatus: 200, isError: false, errorText: '' };
      win.fireLoad(event);

      expect(applyPageCss).toHaveBeenCalledWith(
        '::-webkit-scrollbar{display:none}*{-ms-overflow-style:none;scrollbar-width:none}'
      );
      expect(onLoad).toHaveBeenCalledWith(event);
    });

    test('should relay engine notifications to listeners', () => {
      const onTitle = vi.fn();
      const onFocus = vi.fn();
      win.on('title', onTitle);
      win.on('focus', onFocus);

      win.fireTitle('Inbox');
      win.fireFocus(true);

      expect(onTitle).toHaveBeenCalledWith('Inbox');
      expect(onFocus).toHaveBeenCalledWith(true);
    });
  });

  describe('close()', () => {
    test('should reject pending evaluations and refuse later commands', async () => {
      const stuck = new BrowserWindow(windowConfigSchema.parse({}), {
        host,
        provider: new RecordingProvider(),
        postToGuest: () => undefined,
        logger,
      });
      const onClose = vi.fn();
      stuck.on('close', onClose);
      const pending = stuck.evalRemote('1+1');
      const assertion = expect(pending).rejects.toBeInstanceOf(BridgeClosedError);

      stuck.close();

      await assertion;
      expect(onClose).toHaveBeenCalledTimes(1);
      expect(host.close).toHaveBeenCalledTimes(1);
      expect(stuck.isClosed).toBe(true);
      expect(thrown(() => stuck.minimize())).toMatchObject({
        name: 'WindowError',
        code: 'InvalidState',
      });
      expect(() => stuck.evalRemote('1')).toThrow(WindowError);
    });

    test('should close when the guest asks', async () => {
      guest.api.close();
      await flush();

      expect(win.isClosed).toBe(true);
      expect(host.close).toHaveBeenCalledTimes(1);
    });
  });
});
