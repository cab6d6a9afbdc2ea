/**
 * Route Database Module
 *
 * @module routedb
 */

export * from './types.js';
export * from './errors.js';
export { Version } from './version.js';
export * from './schema.js';
export { RouteDbStore, type RouteDbStoreOptions, type RouteDbMetadata } from './store.js';
export { selectUpdateCandidate } from './selector.js';
export {
  RouteDbInstaller,
  NO_ROUTE_DB_MESSAGE,
  formatRouteDbLabel,
  type RouteDbInstallerOptions,
} from './installer.js';
