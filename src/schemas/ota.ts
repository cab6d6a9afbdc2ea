/**
 * Update Service Schemas
 *
 * JSON format of the update service's route database listing:
 *
 * ```json
 * [
 *   {
 *     "downloadUrl": "files/routedb_20251128.sqlite",
 *     "schemaVersionMajor": 1,
 *     "schemaVersionMinor": 0,
 *     "creationDate": "2025-11-28T19:59:37.245Z"
 *   }
 * ]
 * ```
 *
 * Any element missing a field, or with an unparsable creation date, makes the
 * whole listing invalid.
 */

import { z } from 'zod';
import { TimestampSchema, VersionPartSchema } from './common.js';

/**
 * A single route database offered by the update service.
 */
export const OtaMetadataRecordSchema = z.object({
  /** URL relative to the service base URL from which the file can be downloaded */
  downloadUrl: z.string().min(1),
  schemaVersionMajor: VersionPartSchema,
  schemaVersionMinor: VersionPartSchema,
  creationDate: TimestampSchema,
});

export type OtaMetadataRecord = z.infer<typeof OtaMetadataRecordSchema>;

export const OtaMetadataListSchema = z.array(OtaMetadataRecordSchema);
