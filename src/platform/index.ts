export * from './types/provider';
export { NativeProvider } from './providers/NativeProvider';
export { MacOSProvider } from './providers/MacOSProvider';
export { WindowsProvider, cornerPreference, WINDOWS_11_BUILD } from './providers/WindowsProvider';
export { LinuxProvider, cornerRadiusCss } from './providers/LinuxProvider';
export {
  RecordingProvider,
  UNSUPPORTED_OPERATIONS,
  type RecordedOperation,
  type RecordingProviderOptions,
} from './providers/RecordingProvider';
export {
  createDefaultProvider,
  detectPlatform,
  handleKindFor,
  type DesktopPlatform,
} from './default/DefaultProvider';
