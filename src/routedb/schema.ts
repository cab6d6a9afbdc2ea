/**
 * Route Database Schema
 *
 * Table and column names of the route database file, plus the schema version
 * this application supports. Always use these constants when referring to a
 * table or column so that schema changes stay in one place.
 *
 * @module routedb/schema
 */

import { Version } from './version.js';

/**
 * The schema version currently supported (and required) by this application.
 */
export const SUPPORTED_SCHEMA_VERSION = new Version(1, 0);

/**
 * File name of the live route database inside the data directory.
 */
export const ROUTE_DB_FILE_NAME = 'routes.sqlite';

/**
 * Static metadata about the database itself. Contains exactly one row which never changes.
 */
export const METADATA_TABLE = {
  name: 'database_metadata',
  columns: {
    majorVersion: 'schema_version_major',
    minorVersion: 'schema_version_minor',
    compileTime: 'compile_time',
    vendor: 'vendor',
  },
} as const;

export const SUMMITS_TABLE = {
  name: 'summits',
  columns: {
    id: 'id',
    name: 'summit_name',
  },
} as const;

export const ROUTES_TABLE = {
  name: 'routes',
  columns: {
    id: 'id',
    summitId: 'summit_id',
    name: 'route_name',
    grade: 'route_grade',
  },
} as const;

export const POSTS_TABLE = {
  name: 'posts',
  columns: {
    id: 'id',
    routeId: 'route_id',
    userName: 'user_name',
    postDate: 'post_date',
    comment: 'comment',
    rating: 'rating',
  },
} as const;
