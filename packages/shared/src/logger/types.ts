/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Interface for logging throughout the harness.
 *
 * @example
 * ```typescript
 * logger.info('Cloning repository');
 * logger.error(new Error('Failed'), 'Could not append attempt record');
 *
 * // Create a child logger with additional context
 * const taskLogger = logger.child({ task: 'calc-001' });
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority, disabled unless verbose) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message. This is the highest severity.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   * @param bindings - Key-value pairs to include in all child logs
   */
  child(bindings: Record<string, unknown>): Logger;
}
