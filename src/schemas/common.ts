/**
 * Common Zod Schemas - Shared types used across the data model
 */

import { z } from 'zod';

// ============================================
// Timestamp Schema
// ============================================

/**
 * Loose ISO-8601 shape: a date, optionally followed by a time of day
 * (separated by `T` or a space) with optional fraction and UTC offset.
 */
const ISO8601_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * ISO-8601 timestamp string, parsed into a `Date`.
 *
 * @example
 * TimestampSchema.parse('2025-11-28T19:59:37.245Z'); // Date
 */
export const TimestampSchema = z.string().transform((value, ctx) => {
  const date = ISO8601_PATTERN.test(value) ? new Date(value) : null;
  if (date === null || Number.isNaN(date.getTime())) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ISO-8601 timestamp: "${value}"`,
    });
    return z.NEVER;
  }
  return date;
});

/**
 * Non-negative integer, as stored in version columns and fields.
 */
export const VersionPartSchema = z.number().int().nonnegative();

// ============================================
// Issue Formatting
// ============================================

/**
 * Render zod issues as a single line: `path: message; path: message`.
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
}
