/**
 * Error codes used throughout histree.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'GlobPatternError'
  // Runtime errors (exit code 1)
  | 'RepositoryAccessError'
  | 'CacheCorruptionError'
  | 'ConcurrentWriterError'
  | 'CommitReadError'
  | 'ProcessError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all histree errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProcessError', 'git log exited early', {
 *   cause: originalError,
 *   details: { exitCode: 128 }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a `--glob` pattern cannot be compiled.
 * Raised at startup, before any scanning happens.
 */
export class GlobPatternError extends AppError {
  /** The rejected pattern */
  public readonly pattern: string;

  constructor(pattern: string, message: string, options: AppErrorOptions = {}) {
    super('GlobPatternError', `Invalid glob pattern "${pattern}": ${message}`, options);
    this.pattern = pattern;
  }
}

/**
 * Error thrown when there is no readable git repository at the given location.
 */
export class RepositoryAccessError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('RepositoryAccessError', message, options);
  }
}

/**
 * Error raised when cache records cannot be parsed.
 * Recoverable: the store drops the bad records and keeps going.
 */
export class CacheCorruptionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('CacheCorruptionError', message, options);
  }
}

/**
 * Error thrown when another live session holds the cache write lock.
 */
export class ConcurrentWriterError extends AppError {
  /** Path of the lock file that is held */
  public readonly lockPath: string;

  constructor(lockPath: string, message: string, options: AppErrorOptions = {}) {
    super('ConcurrentWriterError', message, options);
    this.lockPath = lockPath;
  }
}

/**
 * Error describing why a single commit could not be read.
 * Contained per commit: the commit is skipped and recorded.
 */
export class CommitReadError extends AppError {
  /** The commit that failed */
  public readonly commitId: string;

  constructor(commitId: string, message: string, options: AppErrorOptions = {}) {
    super('CommitReadError', message, options);
    this.commitId = commitId;
  }
}

/**
 * Error thrown when a subprocess fails.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Maps an error to the process exit code the CLI should use.
 */
export function exitCodeFor(error: unknown): number {
  if (
    error instanceof ConfigError ||
    error instanceof UsageError ||
    error instanceof GlobPatternError
  ) {
    return 2;
  }
  return 1;
}
