/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  createSpinner,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';

// Table formatters
export {
  formatTable,
  formatDate,
  formatRating,
  truncate,
  padLeft,
  padRight,
  type TableColumn,
} from './tables.js';
