export type EngineErrorCode = 'NotFound' | 'NetworkError' | 'Corrupt' | 'IOError';

/**
 * Base class for every failure surfaced by the engine cache.
 * Cancellation is not an error and never produces one of these.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
    this.code = code;
  }
}

export class EngineNotFoundError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NotFound', message, options);
    this.name = 'EngineNotFoundError';
  }
}

export class EngineNetworkError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NetworkError', message, options);
    this.name = 'EngineNetworkError';
  }
}

export class EngineCorruptError extends EngineError {
  readonly expected: string;
  readonly actual: string;

  constructor(message: string, expected: string, actual: string) {
    super('Corrupt', message);
    this.name = 'EngineCorruptError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class EngineIOError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IOError', message, options);
    this.name = 'EngineIOError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keeps engine errors as they are and wraps anything else (fs failures mostly) as IOError
 */
export function toEngineError(error: unknown): EngineError {
  if (error instanceof EngineError) {
    return error;
  }
  return new EngineIOError(errorMessage(error), { cause: error });
}

/**
 * What a failed install surfaces: a configuration problem, or an engine error
 */
export type InstallError = EngineError | ConfigError;

export function toInstallError(error: unknown): InstallError {
  return error instanceof ConfigError ? error : toEngineError(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
