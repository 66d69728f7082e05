/**
 * DefaultProvider - picks the capability provider for a native window handle
 *
 * Selection is by handle kind:
 * - cocoa: MacOSProvider
 * - win32: WindowsProvider
 * - gtk:   LinuxProvider
 */

import { LinuxProvider } from '../providers/LinuxProvider';
import { MacOSProvider } from '../providers/MacOSProvider';
import { WindowsProvider } from '../providers/WindowsProvider';
import { type NativeWindowHandle, type PlatformCapabilityProvider, PlatformKind } from '../types/provider';

export function createDefaultProvider(handle: NativeWindowHandle): PlatformCapabilityProvider {
  switch (handle.kind) {
    case 'cocoa':
      return new MacOSProvider(handle.window);
    case 'win32':
      return new WindowsProvider(handle.window);
    case 'gtk':
      return new LinuxProvider(handle.window);
  }
}

export type DesktopPlatform = Exclude<PlatformKind, PlatformKind.Recording>;

/**
 * Desktop platform from a Node `process.platform` value or a user-agent string.
 * Anything unrecognised is treated as Linux.
 */
export function detectPlatform(hint: string = process.platform): DesktopPlatform {
  if (hint === 'darwin' || /Macintosh|Mac OS X/.test(hint)) {
    return PlatformKind.MacOS;
  }
  if (hint === 'win32' || /Windows/.test(hint)) {
    return PlatformKind.Windows;
  }
  return PlatformKind.Linux;
}

/** Handle kind native to a platform */
export function handleKindFor(platform: DesktopPlatform): NativeWindowHandle['kind'] {
  switch (platform) {
    case PlatformKind.MacOS:
      return 'cocoa';
    case PlatformKind.Windows:
      return 'win32';
    case PlatformKind.Linux:
      return 'gtk';
  }
}
