/**
 * Error types shared by host and guest
 */

/**
 * Raw message could not be decoded into a BridgeMessage
 */
export class WireFormatError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'WireFormatError';
  }
}

/**
 * A pending call was not answered within its window
 */
export class CallTimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
  }
}

/**
 * The channel was torn down while the call was outstanding
 */
export class BridgeClosedError extends Error {
  constructor(message = 'Bridge channel closed') {
    super(message);
    this.name = 'BridgeClosedError';
  }
}

/**
 * The remote side answered a call with an error
 */
export class RemoteCallError extends Error {
  constructor(
    public readonly functionName: string,
    message: string
  ) {
    super(message);
    this.name = 'RemoteCallError';
  }
}

/**
 * Raised by a capability provider for an operation the platform lacks.
 * The reconciler treats it as a no-op.
 */
export class UnsupportedOperationError extends Error {
  constructor(
    public readonly operation: string,
    public readonly platform: string
  ) {
    super(`${operation} is not supported on ${platform}`);
    this.name = 'UnsupportedOperationError';
  }
}

// ============================================
// Host application surface
// ============================================

export type AppErrorCode = 'InitFailed' | 'InvalidArguments' | 'AlreadyRunning' | 'VersionMismatch';

export type WindowErrorCode = 'CreateFailed' | 'InvalidState' | 'ScriptException' | 'NavigationBlocked';

export class AppError extends Error {
  constructor(
    public readonly code: AppErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

export class WindowError extends Error {
  constructor(
    public readonly code: WindowErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'WindowError';
  }
}

/**
 * Remote evaluation threw inside the page
 */
export class ScriptError extends WindowError {
  constructor(
    public readonly script: string,
    message: string
  ) {
    super('ScriptException', message);
    this.name = 'ScriptError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
