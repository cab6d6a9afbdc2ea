/**
 * Route Database Type Definitions
 *
 * Shared contracts between the store, the update source, the candidate
 * selector and the installer.
 *
 * @module routedb/types
 */

import type { FetchError, ImportError, StorageStartingError } from './errors.js';

// ============================================================================
// Result
// ============================================================================

/**
 * Outcome of an operation that can fail in an expected way.
 * Same shape as zod's `safeParse` result.
 */
export type Result<T, E> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function err<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface.
 * Allows components to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger that discards everything. Default for components constructed without one.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ============================================================================
// Update Candidates
// ============================================================================

/**
 * How well a remote database matches the schema version this application supports.
 *
 * - `exactMatch`: same major and minor version
 * - `backwardCompatible`: same major, newer minor version
 */
export type CompatibilityMode = 'exactMatch' | 'backwardCompatible';

/**
 * A remotely offered route database that could replace the local one.
 */
export interface UpdateCandidate {
  /** Locator of the file, relative to the update service base URL */
  identifier: string;
  /** When the database was built: newer date = more current data */
  creationDate: Date;
  compatibilityMode: CompatibilityMode;
}

// ============================================================================
// Domain Rows
// ============================================================================

export interface Summit {
  id: number;
  name: string;
}

export interface Route {
  id: number;
  name: string;
  grade: string;
  /** Average rating of all posts about this route, null if there are none */
  rating: number | null;
}

export interface Post {
  userName: string;
  postDate: Date;
  comment: string;
  rating: number;
}

export const ROUTES_SORT_ORDERS = ['name', 'grade', 'rating'] as const;
export type RoutesSortOrder = (typeof ROUTES_SORT_ORDERS)[number];

export const POSTS_SORT_ORDERS = ['newestFirst', 'oldestFirst'] as const;
export type PostsSortOrder = (typeof POSTS_SORT_ORDERS)[number];

// ============================================================================
// Status
// ============================================================================

/**
 * Route database availability, as reported to the presentation layer after
 * every start or install attempt.
 */
export type RouteDbStatus =
  | {
      activated: true;
      /** Creation date of the active database, null if it could not be determined */
      creationDate: Date | null;
      /** Short identifying label (creation date as YYYY-MM-DD, or "unknown") */
      label: string;
    }
  | {
      activated: false;
      /** Message for the user */
      message: string;
      /** Technical reason, if known */
      reason?: string;
    };

/**
 * Result of an attempt to update the route database from the update service.
 */
export type UpdateOutcome =
  | { updated: false; reason: 'unavailable' | 'up-to-date' | 'download-failed' }
  | { updated: true; candidate: UpdateCandidate; status: RouteDbStatus };

// ============================================================================
// Component Boundaries
// ============================================================================

/**
 * Lifecycle operations of the route database store the installer relies on.
 */
export interface RouteDbStorage {
  start(): Promise<Result<void, StorageStartingError>>;
  stop(): void;
  isConnected(): boolean;
  importFile(sourcePath: string): Promise<Result<void, ImportError>>;
  getCreationDate(): Promise<Date>;
}

/**
 * Read operations on a started route database.
 */
export interface RouteDbReader {
  retrieveSummits(nameFilter?: string): Summit[];
  retrieveSummit(summitId: number): Summit | null;
  retrieveRoutesOfSummit(summitId: number, sortOrder: RoutesSortOrder): Route[];
  retrieveRoute(routeId: number): Route | null;
  retrievePostsOfRoute(routeId: number, sortOrder: PostsSortOrder): Post[];
}

/**
 * Source of remote route database updates.
 */
export interface UpdateSource {
  /** Retrieve all remote databases this application can use. */
  listCandidates(): Promise<Result<UpdateCandidate[], FetchError>>;

  /** Download the given candidate into a new temporary file and return its path. */
  materialize(candidate: UpdateCandidate): Promise<Result<string, FetchError>>;

  /** Delete every temporary file created by {@link UpdateSource.materialize}. */
  cleanup(): Promise<void>;
}

/**
 * Receiver of route database status changes.
 */
export interface RouteDbStatusListener {
  updateRouteDbStatus(status: RouteDbStatus): void;
}
