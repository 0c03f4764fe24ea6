/**
 * Error types and helpers shared by the watcher, the debounce stages and the
 * config loader.
 */

// Helper type for error-like objects
export interface ErrorLike {
  message?: unknown;
  code?: unknown;
  [key: string]: unknown;
}

export function isErrorLike(value: unknown): value is ErrorLike {
  return typeof value === 'object' && value !== null;
}

export function getErrorMessage(error: unknown): string {
  if (isErrorLike(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Node system error code (ENOENT, EACCES, ...) if present
 */
export function getErrorCode(error: unknown): string | undefined {
  if (isErrorLike(error) && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

/**
 * The watch target cannot be turned into an absolute path.
 */
export class ResolutionError extends Error {
  constructor(readonly target: unknown, reason: string) {
    super(`Cannot resolve watch target ${JSON.stringify(String(target))}: ${reason}`);
    this.name = 'ResolutionError';
  }
}

/**
 * The filesystem event subsystem could not be initialized.
 */
export class SubsystemError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SubsystemError';
  }
}

export class ChannelClosedError extends Error {
  constructor() {
    super('send on closed channel');
    this.name = 'ChannelClosedError';
  }
}

export class ConfigParseError extends Error {
  constructor(readonly filename: string, message: string, cause?: unknown) {
    super(`${filename}: ${message}`, { cause });
    this.name = 'ConfigParseError';
  }
}

export class ConfigValidationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigValidationError';
  }
}
