/**
 * Table Formatters
 *
 * Fixed-width text tables for summit, route and post listings.
 *
 * @module cli/formatters/tables
 */

import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

export interface TableColumn {
  header: string;
  width: number;
  align?: 'left' | 'right';
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Truncate a string to a maximum length.
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Visible length of a string, ignoring ANSI color codes.
 */
function visibleLength(str: string): number {
  return str.replace(/\x1b\[[0-9;]*m/g, '').length;
}

/**
 * Pad a string to a fixed width.
 */
export function padRight(str: string, width: number): string {
  return str + ' '.repeat(Math.max(0, width - visibleLength(str)));
}

export function padLeft(str: string, width: number): string {
  return ' '.repeat(Math.max(0, width - visibleLength(str))) + str;
}

/**
 * Format a date as YYYY-MM-DD (UTC).
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Average rating with one decimal, `-` without ratings.
 */
export function formatRating(rating: number | null): string {
  return rating === null ? '-' : rating.toFixed(1);
}

// ============================================================================
// Table
// ============================================================================

/**
 * Render a table as lines: header, divider, one line per row.
 *
 * Cells are truncated to their column width; columns are separated by
 * two spaces.
 */
export function formatTable(columns: TableColumn[], rows: string[][]): string[] {
  const renderRow = (cells: string[]) =>
    columns
      .map((column, i) => {
        const cell = truncate(cells[i] ?? '', column.width);
        return column.align === 'right' ? padLeft(cell, column.width) : padRight(cell, column.width);
      })
      .join('  ')
      .trimEnd();

  const totalWidth = columns.reduce((sum, column) => sum + column.width, 0) + 2 * (columns.length - 1);

  return [
    chalk.bold(renderRow(columns.map((column) => column.header))),
    chalk.dim('-'.repeat(totalWidth)),
    ...rows.map(renderRow),
  ];
}
