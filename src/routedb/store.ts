/**
 * Route Database Store
 *
 * Owns the connection to the local route database file. The store is either
 * disconnected (initial state) or connected to a database whose schema version
 * is accepted by the supported version.
 *
 * ```
 * Disconnected --start() ok--> Connected --stop()--> Disconnected
 *      |  ^
 *      +--+ start() failed / importFile()
 * ```
 *
 * @module routedb/store
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs/promises';
import { formatZodIssues, TimestampSchema } from '../schemas/common.js';
import {
  MetadataDetailsRowSchema,
  MetadataVersionRowSchema,
  PostRowSchema,
  RouteRowSchema,
  SummitRowSchema,
} from '../schemas/routedb.js';
import { atomicCopyFile, fileExists } from '../storage/atomic.js';
import { getRouteDbPath } from '../storage/paths.js';
import { StoreStateError, type ImportError, type StorageStartingError } from './errors.js';
import {
  METADATA_TABLE,
  POSTS_TABLE,
  ROUTES_TABLE,
  SUMMITS_TABLE,
  SUPPORTED_SCHEMA_VERSION,
} from './schema.js';
import {
  err,
  ok,
  silentLogger,
  type Logger,
  type Post,
  type PostsSortOrder,
  type Result,
  type Route,
  type RouteDbReader,
  type RouteDbStorage,
  type RoutesSortOrder,
  type Summit,
} from './types.js';
import { Version } from './version.js';

// ============================================================================
// Types
// ============================================================================

export interface RouteDbStoreOptions {
  /** Location of the live database file (default: `<dataDir>/routes.sqlite`) */
  dbPath?: string;
  /** Schema version that must accept the database's version (default: {@link SUPPORTED_SCHEMA_VERSION}) */
  supportedVersion?: Version;
  logger?: Logger;
}

/**
 * Contents of the metadata row of a connected database.
 */
export interface RouteDbMetadata {
  schemaVersion: Version;
  /** When the database was compiled, null if not recorded or unparsable */
  compileTime: Date | null;
  vendor: string | null;
}

// ============================================================================
// SQL
// ============================================================================

const M = METADATA_TABLE.columns;
const S = SUMMITS_TABLE.columns;
const R = ROUTES_TABLE.columns;
const P = POSTS_TABLE.columns;

const SELECT_VERSION_SQL =
  `SELECT ${M.majorVersion}, ${M.minorVersion} FROM ${METADATA_TABLE.name} LIMIT 1`;

const SELECT_DETAILS_SQL =
  `SELECT ${M.compileTime}, ${M.vendor} FROM ${METADATA_TABLE.name} LIMIT 1`;

const SELECT_SUMMITS_SQL =
  `SELECT ${S.id}, ${S.name} FROM ${SUMMITS_TABLE.name} ` +
  `WHERE ${S.name} LIKE ? ESCAPE '\\' ORDER BY ${S.name}`;

const SELECT_SUMMIT_SQL = `SELECT ${S.id}, ${S.name} FROM ${SUMMITS_TABLE.name} WHERE ${S.id} = ?`;

/** Routes with the average rating of their posts, null without posts. */
const SELECT_ROUTES_BASE_SQL =
  `SELECT r.${R.id} AS id, r.${R.name} AS route_name, r.${R.grade} AS route_grade, ` +
  `AVG(p.${P.rating}) AS rating ` +
  `FROM ${ROUTES_TABLE.name} r LEFT JOIN ${POSTS_TABLE.name} p ON p.${P.routeId} = r.${R.id}`;

const ROUTES_ORDER_BY: Record<RoutesSortOrder, string> = {
  name: `r.${R.name} ASC`,
  grade: `r.${R.grade} ASC, r.${R.name} ASC`,
  rating: `rating DESC, r.${R.name} ASC`,
};

const POSTS_ORDER_BY: Record<PostsSortOrder, string> = {
  newestFirst: `${P.postDate} DESC`,
  oldestFirst: `${P.postDate} ASC`,
};

/**
 * Escape LIKE wildcards so that a name filter matches literally.
 */
function likeSubstring(filter: string): string {
  return `%${filter.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

// ============================================================================
// Store
// ============================================================================

/**
 * Route database store backed by better-sqlite3.
 *
 * @example
 * ```typescript
 * const store = new RouteDbStore({ dbPath: '/data/routes.sqlite' });
 * const started = await store.start();
 * if (started.success) {
 *   console.log(store.retrieveSummits('Falken'));
 * }
 * ```
 */
export class RouteDbStore implements RouteDbStorage, RouteDbReader {
  readonly dbPath: string;
  private readonly supportedVersion: Version;
  private readonly logger: Logger;
  private db: Database.Database | null = null;

  constructor(options: RouteDbStoreOptions = {}) {
    this.dbPath = options.dbPath ?? getRouteDbPath();
    this.supportedVersion = options.supportedVersion ?? SUPPORTED_SCHEMA_VERSION;
    this.logger = options.logger ?? silentLogger;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Open the database file and verify its schema version.
   *
   * On any failure the store stays disconnected.
   */
  async start(): Promise<Result<void, StorageStartingError>> {
    if (this.db !== null) {
      return ok(undefined);
    }

    let db: Database.Database;
    try {
      db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
    } catch (error) {
      this.logger.debug(`[routedb-store] Unable to open ${this.dbPath}`, error);
      return err({ kind: 'inaccessible', path: this.dbPath, cause: error });
    }

    const version = this.readSchemaVersion(db);
    if (!version.success) {
      db.close();
      return version;
    }

    if (!this.supportedVersion.accepts(version.data)) {
      db.close();
      return err({
        kind: 'incompatible',
        path: this.dbPath,
        foundVersion: version.data,
        requiredVersion: this.supportedVersion,
      });
    }

    this.db = db;
    this.logger.info(
      `[routedb-store] Connected to ${this.dbPath} (schema ${version.data.toString()})`
    );
    return ok(undefined);
  }

  /**
   * Close the connection. Does nothing when already disconnected.
   */
  stop(): void {
    if (this.db === null) {
      return;
    }
    this.db.close();
    this.db = null;
    this.logger.debug(`[routedb-store] Disconnected from ${this.dbPath}`);
  }

  isConnected(): boolean {
    return this.db !== null;
  }

  /**
   * Replace the database file with a copy of `sourcePath`.
   *
   * The source is not validated; call {@link RouteDbStore.start} afterwards.
   *
   * @throws {StoreStateError} If the store is connected
   */
  async importFile(sourcePath: string): Promise<Result<void, ImportError>> {
    if (this.db !== null) {
      throw new StoreStateError('Cannot import a route database while the store is connected');
    }

    if (!(await fileExists(sourcePath))) {
      return err({ kind: 'source-not-found', sourcePath });
    }

    try {
      await atomicCopyFile(sourcePath, this.dbPath);
    } catch (error) {
      return err({
        kind: 'copy-failed',
        sourcePath,
        destinationPath: this.dbPath,
        cause: error,
      });
    }

    this.logger.info(`[routedb-store] Imported ${sourcePath}`);
    return ok(undefined);
  }

  // --------------------------------------------------------------------------
  // Metadata
  // --------------------------------------------------------------------------

  /**
   * When the connected database was built.
   *
   * Uses the recorded compile time and falls back to the file's
   * modification time.
   *
   * @throws {StoreStateError} If the store is disconnected
   */
  async getCreationDate(): Promise<Date> {
    const { compileTime } = this.getMetadata();
    if (compileTime !== null) {
      return compileTime;
    }
    const stat = await fs.stat(this.dbPath);
    return stat.mtime;
  }

  /**
   * @throws {StoreStateError} If the store is disconnected
   */
  getMetadata(): RouteDbMetadata {
    const db = this.requireConnection();

    const version = this.readSchemaVersion(db);
    if (!version.success) {
      throw new StoreStateError(`Metadata of ${this.dbPath} became unreadable`);
    }

    const details = MetadataDetailsRowSchema.safeParse(db.prepare(SELECT_DETAILS_SQL).get());
    if (!details.success) {
      this.logger.debug(
        `[routedb-store] No usable metadata details: ${formatZodIssues(details.error)}`
      );
      return { schemaVersion: version.data, compileTime: null, vendor: null };
    }

    const compileTime =
      details.data.compile_time === null
        ? null
        : TimestampSchema.safeParse(details.data.compile_time);

    return {
      schemaVersion: version.data,
      compileTime: compileTime?.success ? compileTime.data : null,
      vendor: details.data.vendor,
    };
  }

  // --------------------------------------------------------------------------
  // Read Operations
  // --------------------------------------------------------------------------

  /**
   * Summits whose name contains `nameFilter` (case-insensitive), ordered by name.
   */
  retrieveSummits(nameFilter = ''): Summit[] {
    const rows = this.requireConnection().prepare(SELECT_SUMMITS_SQL).all(likeSubstring(nameFilter));
    return rows.map((row) => SummitRowSchema.parse(row));
  }

  retrieveSummit(summitId: number): Summit | null {
    const row = this.requireConnection().prepare(SELECT_SUMMIT_SQL).get(summitId);
    return row === undefined ? null : SummitRowSchema.parse(row);
  }

  retrieveRoutesOfSummit(summitId: number, sortOrder: RoutesSortOrder): Route[] {
    const sql =
      `${SELECT_ROUTES_BASE_SQL} WHERE r.${R.summitId} = ? ` +
      `GROUP BY r.${R.id} ORDER BY ${ROUTES_ORDER_BY[sortOrder]}`;
    const rows = this.requireConnection().prepare(sql).all(summitId);
    return rows.map((row) => RouteRowSchema.parse(row));
  }

  retrieveRoute(routeId: number): Route | null {
    const sql = `${SELECT_ROUTES_BASE_SQL} WHERE r.${R.id} = ? GROUP BY r.${R.id}`;
    const row = this.requireConnection().prepare(sql).get(routeId);
    return row === undefined ? null : RouteRowSchema.parse(row);
  }

  retrievePostsOfRoute(routeId: number, sortOrder: PostsSortOrder): Post[] {
    const sql =
      `SELECT ${P.userName}, ${P.postDate}, ${P.comment}, ${P.rating} ` +
      `FROM ${POSTS_TABLE.name} WHERE ${P.routeId} = ? ORDER BY ${POSTS_ORDER_BY[sortOrder]}`;
    const rows = this.requireConnection().prepare(sql).all(routeId);
    return rows.map((row) => PostRowSchema.parse(row));
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private requireConnection(): Database.Database {
    if (this.db === null) {
      throw new StoreStateError('Route database is not connected');
    }
    return this.db;
  }

  /**
   * Read the schema version from the metadata table. Exactly one query.
   */
  private readSchemaVersion(db: Database.Database): Result<Version, StorageStartingError> {
    let row: unknown;
    try {
      row = db.prepare(SELECT_VERSION_SQL).get();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err({ kind: 'invalid-format', path: this.dbPath, reason });
    }

    if (row === undefined) {
      return err({ kind: 'invalid-format', path: this.dbPath, reason: 'metadata table is empty' });
    }

    const parsed = MetadataVersionRowSchema.safeParse(row);
    if (!parsed.success) {
      return err({
        kind: 'invalid-format',
        path: this.dbPath,
        reason: formatZodIssues(parsed.error),
      });
    }

    const { schema_version_major: major, schema_version_minor: minor } = parsed.data;
    if (minor >= Version.MINOR_LIMIT) {
      return err({
        kind: 'invalid-format',
        path: this.dbPath,
        reason: `minor version ${minor} is out of range`,
      });
    }
    return ok(new Version(major, minor));
  }
}
