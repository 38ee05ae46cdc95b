/**
 * Error codes used throughout treecat.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'PathError'
  | 'ReadError'
  | 'ClipboardError'
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
 * Base error class for all treecat errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('PathError', 'Root path is not readable', {
 *   cause: originalError,
 *   details: { path: 'src' }
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
 * Error thrown when collection options are invalid.
 * User-correctable - suggests fixing the options passed in.
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
 * Error raised for a root path that does not exist or cannot be read.
 * Fatal for that root only; the remaining roots are still collected.
 */
export class PathError extends AppError {
  /** The root path as it was given */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('PathError', message, { ...options, details: options.details ?? { path } });
    this.path = path;
  }
}

/**
 * Error for a file that became unreadable between listing and reading.
 * Never propagated out of a run; it ends up as a `read-error` skip.
 */
export class ReadError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ReadError', message, options);
  }
}

/**
 * Error thrown when the system clipboard utility is missing or fails.
 */
export class ClipboardError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ClipboardError', message, options);
  }
}

/**
 * Converts an unknown thrown value into an Error without losing the original.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Exit code for an error raised out of a run.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}
