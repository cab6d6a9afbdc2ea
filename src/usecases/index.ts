/**
 * Use Cases Module
 *
 * @module usecases
 */

export {
  RouteDbUseCases,
  DEFAULT_ROUTES_SORT_ORDER,
  DEFAULT_POSTS_SORT_ORDER,
  type RouteDbUseCasesOptions,
} from './routedb.js';
export type { PresentationBoundary } from './presentation.js';
