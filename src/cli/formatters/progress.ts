/**
 * Progress Formatters
 *
 * Spinner for long-running operations and duration formatting.
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora from 'ora';
import chalk from 'chalk';

type Spinner = ReturnType<typeof ora>;

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Suppress all spinner output (quiet mode) */
  silent?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Searching...');
 * spinner.start();
 *
 * const count = await controller.search(query);
 * if (controller.errorMessage) {
 *   spinner.stop();
 * } else {
 *   spinner.succeed(`Found ${count} cities`);
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Spinner;
  private readonly isTTY: boolean;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.isTTY = process.stdout.isTTY === true;

    // Not a TTY: ora prints plain lines instead of animating
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: this.isTTY,
      isSilent: options.silent === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @example
 * formatDuration(850);    // "850ms"
 * formatDuration(1500);   // "1.5s"
 * formatDuration(95000);  // "1m 35s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a spinner for a single operation.
 */
export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
