/**
 * Presentation Boundary
 *
 * Everything the use cases report to the user goes through this interface.
 * The CLI implements it with a terminal presenter; tests record the calls.
 *
 * @module usecases/presentation
 */

import type {
  Post,
  PostsSortOrder,
  Route,
  RouteDbStatusListener,
  RoutesSortOrder,
  Summit,
} from '../routedb/types.js';

export interface PresentationBoundary extends RouteDbStatusListener {
  updateSummitList(summits: Summit[]): void;
  updateRouteList(summit: Summit, routes: Route[], sortOrder: RoutesSortOrder): void;
  updatePostList(route: Route, posts: Post[], sortOrder: PostsSortOrder): void;
}
