export const ErrorCode = {
  CONFIG: 'CONFIG',
  AUTH: 'AUTH',
  FETCH: 'FETCH',
  IO: 'IO',
  USAGE: 'USAGE',
} as const;
export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class InsightsError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'InsightsError';
  }
}

/** Bad or missing credentials file, or an invalid environment value. */
export class ConfigError extends InsightsError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.CONFIG, message, details);
    this.name = 'ConfigError';
  }
}

export class AuthError extends InsightsError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.AUTH, message, details);
    this.name = 'AuthError';
  }
}

export class FetchError extends InsightsError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.FETCH, message, details);
    this.name = 'FetchError';
  }
}

/** Raised when an optional output file cannot be written. */
export class IOError extends InsightsError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.IO, message, details);
    this.name = 'IOError';
  }
}

export class UsageError extends InsightsError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.USAGE, message, details);
    this.name = 'UsageError';
  }
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function exitCodeFor(err: unknown): number {
  if (err instanceof InsightsError && err.code === ErrorCode.USAGE) {
    return EXIT_USAGE;
  }
  return EXIT_FAILURE;
}
