/**
 * Route Database Row Schemas
 *
 * Validation of rows returned by better-sqlite3. Column names follow
 * `routedb/schema.ts`.
 */

import { z } from 'zod';
import { TimestampSchema, VersionPartSchema } from './common.js';

/**
 * Schema version columns of the metadata row. Read once per start.
 */
export const MetadataVersionRowSchema = z.object({
  schema_version_major: VersionPartSchema,
  schema_version_minor: VersionPartSchema,
});

export const MetadataDetailsRowSchema = z.object({
  compile_time: z.string().nullable(),
  vendor: z.string().nullable(),
});

export const SummitRowSchema = z
  .object({
    id: z.number().int(),
    summit_name: z.string(),
  })
  .transform((row) => ({ id: row.id, name: row.summit_name }));

export const RouteRowSchema = z
  .object({
    id: z.number().int(),
    route_name: z.string(),
    route_grade: z.string(),
    rating: z.number().nullable(),
  })
  .transform((row) => ({
    id: row.id,
    name: row.route_name,
    grade: row.route_grade,
    rating: row.rating,
  }));

export const PostRowSchema = z
  .object({
    user_name: z.string(),
    post_date: TimestampSchema,
    comment: z.string(),
    rating: z.number().int(),
  })
  .transform((row) => ({
    userName: row.user_name,
    postDate: row.post_date,
    comment: row.comment,
    rating: row.rating,
  }));
