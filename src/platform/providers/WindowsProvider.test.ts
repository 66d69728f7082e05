import { describe, expect, test, vi } from 'vitest';
import { defaultWindowStyle } from '../../shared/style';
import { ChromeMode, MacOSVibrancy, WindowsMaterial } from '../../shared/style-types';
import type { Win32WindowBinding } from '../types/provider';
import { cornerPreference, DWMWA, WindowsProvider, WS, WS_EX } from './WindowsProvider';

const OVERLAPPED_WINDOW =
  WS.CAPTION | WS.SYSMENU | WS.THICKFRAME | WS.MINIMIZEBOX | WS.MAXIMIZEBOX;

function createWin32Window(buildNumber = 22631) {
  const state: { style: number; exStyle: number } = { style: OVERLAPPED_WINDOW, exStyle: WS_EX.APPWINDOW };
  const window = {
    buildNumber,
    getStyle: vi.fn(() => state.style),
    setStyle: vi.fn((style: number) => {
      state.style = style;
    }),
    getExStyle: vi.fn(() => state.exStyle),
    setExStyle: vi.fn((exStyle: number) => {
      state.exStyle = exStyle;
    }),
    setLayeredAlpha: vi.fn(),
    setDwmAttribute: vi.fn((_attribute: number, _value: number) => true),
    extendFrameIntoClientArea: vi.fn(),
    setTopmost: vi.fn(),
    setBackgroundBrush: vi.fn(),
    refreshFrame: vi.fn(),
    invalidateHitTest: vi.fn(),
  } satisfies Win32WindowBinding;
  return { window, state };
}

const titlebar = defaultWindowStyle().titlebar;

describe('WindowsProvider', () => {
  describe('setChromeMode()', () => {
    test('should swap caption and frame for a popup when frameless', () => {
      const { window, state } = createWin32Window();
      new WindowsProvider(window).setChromeMode(ChromeMode.Frameless, titlebar);

      expect(state.style).toBe((WS.POPUP | WS.SYSMENU | WS.MINIMIZEBOX | WS.MAXIMIZEBOX) >>> 0);
      expect(window.refreshFrame).toHaveBeenCalledTimes(1);
    });

    test('should give resizable frameless windows a sizing border', () => {
      const { window, state } = createWin32Window();
      const provider = new WindowsProvider(window);
      provider.setChromeMode(ChromeMode.Frameless, titlebar);
      provider.setResizable({ resizable: true, minimizable: true, maximizable: true });

      expect(state.style).toBe(
        (WS.POPUP | WS.SYSMENU | WS.THICKFRAME | WS.MINIMIZEBOX | WS.MAXIMIZEBOX) >>> 0
      );
    });

    test('should drop the frame and extend into the client area for a custom titlebar', () => {
      const { window, state } = createWin32Window();
      new WindowsProvider(window).setChromeMode(ChromeMode.CustomTitlebar, titlebar);

      expect(state.style).toBe(WS.CAPTION | WS.SYSMENU | WS.MINIMIZEBOX | WS.MAXIMIZEBOX);
      expect(window.extendFrameIntoClientArea).toHaveBeenCalledWith({
        left: -1,
        right: -1,
        top: -1,
        bottom: -1,
      });
    });

    test('should restore the standard frame for the native titlebar', () => {
      const { window, state } = createWin32Window();
      const provider = new WindowsProvider(window);

      provider.setChromeMode(ChromeMode.Frameless, titlebar);
      provider.setChromeMode(ChromeMode.NativeTitlebar, titlebar);

      expect(state.style).toBe(OVERLAPPED_WINDOW);
    });
  });

  test('should make translucent windows layered', () => {
    const { window, state } = createWin32Window();
    const provider = new WindowsProvider(window);

    provider.setTransparent(true, 0.5);
    expect(state.exStyle).toBe(WS_EX.APPWINDOW | WS_EX.LAYERED);
    expect(window.setLayeredAlpha).toHaveBeenCalledWith(128);

    provider.setTransparent(false, 1);
    expect(state.exStyle).toBe(WS_EX.APPWINDOW);
    expect(window.setLayeredAlpha).toHaveBeenCalledTimes(1);
  });

  describe('setWindowsMaterial()', () => {
    test('should set the system backdrop on Windows 11', () => {
      const { window } = createWin32Window();
      new WindowsProvider(window).setWindowsMaterial(WindowsMaterial.Mica);

      expect(window.setDwmAttribute.mock.calls).toEqual([[DWMWA.SYSTEMBACKDROP_TYPE, 2]]);
      expect(window.extendFrameIntoClientArea).toHaveBeenCalledTimes(1);
    });

    test('should fall back from Mica to Acrylic on older builds', () => {
      const { window } = createWin32Window(19045);
      new WindowsProvider(window).setWindowsMaterial(WindowsMaterial.Mica);

      expect(window.setDwmAttribute).toHaveBeenCalledWith(DWMWA.SYSTEMBACKDROP_TYPE, 3);
    });

    test('should use the legacy Mica attribute when the backdrop is refused', () => {
      const { window } = createWin32Window();
      window.setDwmAttribute.mockReturnValueOnce(false);
      new WindowsProvider(window).setWindowsMaterial(WindowsMaterial.Tabbed);

      expect(window.setDwmAttribute.mock.calls).toEqual([
        [DWMWA.SYSTEMBACKDROP_TYPE, 4],
        [DWMWA.MICA_EFFECT, 1],
      ]);
    });

    test('should not extend the frame for no material', () => {
      const { window } = createWin32Window();
      new WindowsProvider(window).setWindowsMaterial(WindowsMaterial.None);

      expect(window.setDwmAttribute).toHaveBeenCalledWith(DWMWA.SYSTEMBACKDROP_TYPE, 1);
      expect(window.extendFrameIntoClientArea).not.toHaveBeenCalled();
    });
  });

  describe('setCornerRadius()', () => {
    test('should map the radius to a corner preference', () => {
      expect(cornerPreference(0)).toBe(1);
      expect(cornerPreference(4)).toBe(3);
      expect(cornerPreference(8)).toBe(2);
    });

    test('should be unsupported before Windows 11', () => {
      const { window } = createWin32Window(19045);
      const provider = new WindowsProvider(window);

      expect(() => provider.setCornerRadius(8)).toThrow('cornerRadius is not supported on windows');
      expect(window.setDwmAttribute).not.toHaveBeenCalled();
    });
  });

  test('should hide the taskbar button with a tool window', () => {
    const { window, state } = createWin32Window();
    new WindowsProvider(window).setSkipTaskbar(true);

    expect(state.exStyle).toBe(WS_EX.TOOLWINDOW);
  });

  test('should clear the maximize box when not maximizable', () => {
    const { window, state } = createWin32Window();
    new WindowsProvider(window).setResizable({
      resizable: true,
      minimizable: true,
      maximizable: false,
    });

    expect(state.style).toBe(WS.CAPTION | WS.SYSMENU | WS.THICKFRAME | WS.MINIMIZEBOX);
  });

  test('should reject vibrancy', () => {
    const { window } = createWin32Window();
    expect(() => new WindowsProvider(window).setMacOSVibrancy(MacOSVibrancy.Menu)).toThrow(
      'vibrancy is not supported on windows'
    );
  });
});
