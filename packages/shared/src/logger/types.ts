import type { HistoryEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout histree.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log(createEvent(sessionId, { type: 'ScanStarted', payload }));
 *
 * // Standard logging
 * logger.info('Scan finished');
 * logger.error(new Error('Failed'), 'Could not read commit');
 *
 * // Create a child logger with additional context
 * const scoped = logger.child({ scope: 'src/lib' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured session event.
   */
  log(event: HistoryEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   */
  trace(event: HistoryEvent, message: string): MaybePromise<void>;

  /** Log a debug message (only shown when verbose output is on) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
