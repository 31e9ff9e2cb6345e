/**
 * Logging Contract
 *
 * Minimal logger interface shared by the collection, providers and the
 * search controller. Components take an optional logger so they never
 * depend on a specific implementation; the CLI's BaseCommand is the one
 * used at runtime.
 *
 * @module logging
 */

/**
 * Minimal logger interface.
 */
export interface Logger {
  /** Log debug-level message (typically hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}
