/**
 * Route Database Use Cases
 *
 * Entry points of the application: starting the route database, replacing it
 * from a local file or the update service, and browsing its contents.
 *
 * @module usecases/routedb
 */

import type { FetchError } from '../routedb/errors.js';
import { RouteDbInstaller, type RouteDbInstallerOptions } from '../routedb/installer.js';
import {
  silentLogger,
  type Logger,
  type Post,
  type PostsSortOrder,
  type Result,
  type Route,
  type RouteDbReader,
  type RouteDbStatus,
  type RouteDbStorage,
  type RoutesSortOrder,
  type Summit,
  type UpdateCandidate,
  type UpdateOutcome,
  type UpdateSource,
} from '../routedb/types.js';
import type { ConfigStore, GlobalConfig } from '../storage/config.js';
import type { PresentationBoundary } from './presentation.js';

// ============================================================================
// Types
// ============================================================================

export interface RouteDbUseCasesOptions {
  storage: RouteDbStorage & RouteDbReader;
  updateSource: UpdateSource;
  presentation: PresentationBoundary;
  /** Persisted sort orders; without it the defaults are used and nothing is saved */
  preferences?: ConfigStore;
  logger?: Logger;
  installerFactory?: (options: RouteDbInstallerOptions) => RouteDbInstaller;
}

export const DEFAULT_ROUTES_SORT_ORDER: RoutesSortOrder = 'name';
export const DEFAULT_POSTS_SORT_ORDER: PostsSortOrder = 'newestFirst';

type SortPreferences = Pick<GlobalConfig, 'routesSortOrder' | 'postsSortOrder'>;

// ============================================================================
// Use Cases
// ============================================================================

export class RouteDbUseCases {
  private readonly storage: RouteDbStorage & RouteDbReader;
  private readonly presentation: PresentationBoundary;
  private readonly preferences: ConfigStore | undefined;
  private readonly logger: Logger;
  private readonly installer: RouteDbInstaller;

  constructor(options: RouteDbUseCasesOptions) {
    this.storage = options.storage;
    this.presentation = options.presentation;
    this.preferences = options.preferences;
    this.logger = options.logger ?? silentLogger;

    const createInstaller =
      options.installerFactory ?? ((installerOptions) => new RouteDbInstaller(installerOptions));
    this.installer = createInstaller({
      storage: options.storage,
      updateSource: options.updateSource,
      presentation: options.presentation,
      logger: this.logger,
    });
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Connect to the live route database, as done on application start.
   */
  async startRouteDb(): Promise<RouteDbStatus> {
    return this.installer.startStorage();
  }

  /**
   * Replace the live route database with a local file.
   */
  async importRouteDbFile(filePath: string): Promise<RouteDbStatus> {
    return this.installer.installFromLocalFile(filePath);
  }

  /**
   * Install the best update offered by the update service, if any.
   */
  async updateRouteDatabase(): Promise<UpdateOutcome> {
    return this.installer.updateFromRemote();
  }

  /**
   * Look for an update without installing it.
   */
  async checkForUpdate(): Promise<Result<UpdateCandidate | null, FetchError>> {
    return this.installer.findUpdate();
  }

  // --------------------------------------------------------------------------
  // Browsing
  // --------------------------------------------------------------------------

  /**
   * @throws {StoreStateError} If the route database is not started
   */
  async showSummitList(nameFilter?: string): Promise<Summit[]> {
    const summits = this.storage.retrieveSummits(nameFilter);
    this.presentation.updateSummitList(summits);
    return summits;
  }

  /**
   * Present the routes of a summit.
   *
   * Without `sortOrder` the persisted order is used; an explicit one is
   * persisted for next time.
   *
   * @returns The routes, or null if the summit does not exist
   * @throws {StoreStateError} If the route database is not started
   */
  async showRouteList(summitId: number, sortOrder?: RoutesSortOrder): Promise<Route[] | null> {
    const summit = this.storage.retrieveSummit(summitId);
    if (summit === null) {
      return null;
    }

    const order = await this.resolveSortOrder(
      sortOrder,
      DEFAULT_ROUTES_SORT_ORDER,
      (config) => config.routesSortOrder,
      (routesSortOrder) => ({ routesSortOrder })
    );
    const routes = this.storage.retrieveRoutesOfSummit(summitId, order);
    this.presentation.updateRouteList(summit, routes, order);
    return routes;
  }

  /**
   * Present the posts about a route. Sort order handling as in
   * {@link RouteDbUseCases.showRouteList}.
   *
   * @returns The posts, or null if the route does not exist
   * @throws {StoreStateError} If the route database is not started
   */
  async showPostList(routeId: number, sortOrder?: PostsSortOrder): Promise<Post[] | null> {
    const route = this.storage.retrieveRoute(routeId);
    if (route === null) {
      return null;
    }

    const order = await this.resolveSortOrder(
      sortOrder,
      DEFAULT_POSTS_SORT_ORDER,
      (config) => config.postsSortOrder,
      (postsSortOrder) => ({ postsSortOrder })
    );
    const posts = this.storage.retrievePostsOfRoute(routeId, order);
    this.presentation.updatePostList(route, posts, order);
    return posts;
  }

  // --------------------------------------------------------------------------
  // Preferences
  // --------------------------------------------------------------------------

  /**
   * Preference failures never abort browsing: they are logged and the
   * default order is used.
   */
  private async resolveSortOrder<T extends string>(
    requested: T | undefined,
    fallback: T,
    select: (config: GlobalConfig) => T | undefined,
    toChanges: (order: T) => SortPreferences
  ): Promise<T> {
    if (this.preferences === undefined) {
      return requested ?? fallback;
    }

    if (requested !== undefined) {
      try {
        await this.preferences.update(toChanges(requested));
      } catch (error) {
        this.logger.warn('Unable to save sort order preference', error);
      }
      return requested;
    }

    try {
      return select(await this.preferences.load()) ?? fallback;
    } catch (error) {
      this.logger.warn('Unable to load sort order preference', error);
      return fallback;
    }
  }
}
