/**
 * Severity levels in ascending order; `silent` disables all output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Interface for logging throughout treecat.
 *
 * Collected file content is written to stdout, so implementations must keep
 * diagnostics off that stream.
 *
 * @example
 * ```typescript
 * logger.info('Processing completed');
 * logger.error(new Error('Failed'), 'Operation failed');
 *
 * // Create a child logger with additional context
 * const rootLogger = logger.child({ root: 'src' });
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority, hidden unless --verbose) */
  debug(message: string): void;
  /** Log an informational message */
  info(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   * @param bindings - Key-value pairs to include in all child logs
   */
  child(bindings: Record<string, unknown>): Logger;
}
