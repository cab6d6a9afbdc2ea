/**
 * Route Database Manager
 *
 * Library entry point: route database lifecycle, update selection and
 * installation, plus the use cases built on them.
 *
 * @example
 * ```typescript
 * import { OtaUpdateSource, RouteDbStore, RouteDbUseCases } from 'routedb-manager';
 *
 * const useCases = new RouteDbUseCases({
 *   storage: new RouteDbStore(),
 *   updateSource: new OtaUpdateSource({ baseUrl: 'https://ota.example.org/routedb/' }),
 *   presentation,
 * });
 * await useCases.startRouteDb();
 * await useCases.updateRouteDatabase();
 * ```
 *
 * @module routedb-manager
 */

export * from './routedb/index.js';
export * from './ota/index.js';
export * from './usecases/index.js';
export * from './storage/index.js';
export { OtaMetadataRecordSchema, OtaMetadataListSchema, type OtaMetadataRecord } from './schemas/ota.js';
