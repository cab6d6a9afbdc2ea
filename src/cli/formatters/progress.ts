/**
 * Progress Formatters
 *
 * Spinner for long-running operations such as downloads.
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Output stream (default: stdout) */
  stream?: NodeJS.WriteStream;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * Animates only on a TTY; otherwise the final state is printed as one line.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Checking for updates...');
 * spinner.start();
 *
 * const outcome = await useCases.updateRouteDatabase();
 * if (outcome.updated) {
 *   spinner.succeed('Route database updated');
 * } else {
 *   spinner.fail('Update failed');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    const stream = options.stream ?? process.stdout;
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: stream.isTTY === true,
      stream,
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

  update(text: string): this {
    this.spinner.text = text;
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

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  /**
   * Stop spinner without any symbol.
   */
  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @param ms - Duration in milliseconds
 * @returns Formatted duration string
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

export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
