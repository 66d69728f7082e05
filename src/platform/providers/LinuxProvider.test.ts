import { describe, expect, test, vi } from 'vitest';
import { UnsupportedOperationError } from '../../shared/errors';
import { defaultWindowStyle, rgb } from '../../shared/style';
import { ChromeMode, MacOSVibrancy, WindowsMaterial } from '../../shared/style-types';
import type { GtkWindowBinding } from '../types/provider';
import { cornerRadiusCss, LinuxProvider } from './LinuxProvider';

function createGtkWindow(hasRgbaVisual = true) {
  return {
    setDecorated: vi.fn(),
    useRgbaVisual: vi.fn(() => hasRgbaVisual),
    setAppPaintable: vi.fn(),
    overrideBackgroundColor: vi.fn(),
    setMotifDecorations: vi.fn(),
    loadCss: vi.fn(),
    setResizable: vi.fn(),
    setKeepAbove: vi.fn(),
    setSkipTaskbarHint: vi.fn(),
  } satisfies GtkWindowBinding;
}

const titlebar = defaultWindowStyle().titlebar;

describe('LinuxProvider', () => {
  test('should keep decorations only for browser and native chrome', () => {
    const window = createGtkWindow();
    const provider = new LinuxProvider(window);

    provider.setChromeMode(ChromeMode.Full, titlebar);
    provider.setChromeMode(ChromeMode.NativeTitlebar, titlebar);
    provider.setChromeMode(ChromeMode.Frameless, titlebar);
    provider.setChromeMode(ChromeMode.CustomTitlebar, titlebar);

    expect(window.setDecorated.mock.calls).toEqual([[true], [true], [false], [false]]);
  });

  describe('setTransparent()', () => {
    test('should paint through an RGBA visual when translucent', () => {
      const window = createGtkWindow();
      new LinuxProvider(window).setTransparent(true, 0);

      expect(window.useRgbaVisual).toHaveBeenCalledTimes(1);
      expect(window.setAppPaintable).toHaveBeenCalledWith(true);
    });

    test('should stay opaque without a compositor', () => {
      const window = createGtkWindow(false);
      new LinuxProvider(window).setTransparent(false, 0.5);

      expect(window.setAppPaintable).toHaveBeenCalledWith(false);
    });

    test('should not touch the visual for opaque windows', () => {
      const window = createGtkWindow();
      new LinuxProvider(window).setTransparent(false, 1);

      expect(window.useRgbaVisual).not.toHaveBeenCalled();
      expect(window.setAppPaintable).toHaveBeenCalledWith(false);
    });
  });

  test('should override the background with the resolved alpha', () => {
    const window = createGtkWindow();
    new LinuxProvider(window).setBackgroundColor(rgb(0, 0, 255), 0.25);

    expect(window.overrideBackgroundColor).toHaveBeenCalledWith({ r: 0, g: 0, b: 1, a: 0.25 });
  });

  test('should round corners through GTK CSS', () => {
    const window = createGtkWindow();
    new LinuxProvider(window).setCornerRadius(10);

    expect(window.loadCss).toHaveBeenCalledWith('window { border-radius: 10px; }');
    expect(cornerRadiusCss(-3)).toBe('window { border-radius: 0px; }');
  });

  test('should map window behaviour onto window manager hints', () => {
    const window = createGtkWindow();
    const provider = new LinuxProvider(window);

    provider.setResizable({ resizable: false, minimizable: true, maximizable: true });
    provider.setAlwaysOnTop(true);
    provider.setSkipTaskbar(true);

    expect(window.setResizable).toHaveBeenCalledWith(false);
    expect(window.setKeepAbove).toHaveBeenCalledWith(true);
    expect(window.setSkipTaskbarHint).toHaveBeenCalledWith(true);
  });

  test('should accept drag regions without touching the window', () => {
    const window = createGtkWindow();
    expect(() =>
      new LinuxProvider(window).setDragRegions([
        { x: 0, y: 0, width: 10, height: 10, isDraggable: true },
      ])
    ).not.toThrow();
  });

  test('should reject platform materials', () => {
    const provider = new LinuxProvider(createGtkWindow());

    expect(() => provider.setMacOSVibrancy(MacOSVibrancy.Sidebar)).toThrow(
      UnsupportedOperationError
    );
    expect(() => provider.setWindowsMaterial(WindowsMaterial.Acrylic)).toThrow(
      'windowsMaterial is not supported on linux'
    );
  });
});
