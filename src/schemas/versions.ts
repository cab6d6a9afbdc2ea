/**
 * Schema Version Registry
 *
 * Persisted JSON files include a schemaVersion field for migration support.
 * Each file type has an independent version number (simple integers).
 * Not to be confused with the MAJOR.MINOR schema version of the route
 * database itself (see `routedb/version.ts`).
 */

/**
 * Current schema versions for all persisted JSON files.
 * Increment when making breaking changes to a schema.
 */
export const SCHEMA_VERSIONS = {
  /** User preferences (config.json) */
  globalConfig: 1,
} as const;

export type SchemaType = keyof typeof SCHEMA_VERSIONS;
