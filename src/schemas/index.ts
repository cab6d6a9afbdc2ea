/**
 * Zod Schemas for All Data Types
 *
 * Central export point for all schema definitions.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS, type SchemaType } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export { TimestampSchema, VersionPartSchema, formatZodIssues } from './common.js';

// ============================================================================
// Update Service
// ============================================================================

export {
  OtaMetadataRecordSchema,
  OtaMetadataListSchema,
  type OtaMetadataRecord,
} from './ota.js';

// ============================================================================
// Route Database Rows
// ============================================================================

export {
  MetadataVersionRowSchema,
  MetadataDetailsRowSchema,
  SummitRowSchema,
  RouteRowSchema,
  PostRowSchema,
} from './routedb.js';
