/**
 * Route Database Installer
 *
 * Orchestrates replacing the live route database, either from a local file
 * or from the best remote update. This is the single place where typed
 * failures are turned into a {@link RouteDbStatus} for the user. Installing
 * and updating never throw.
 *
 * @module routedb/installer
 */

import {
  describeFetchError,
  describeImportError,
  describeStorageStartingError,
  type FetchError,
} from './errors.js';
import { selectUpdateCandidate } from './selector.js';
import {
  ok,
  silentLogger,
  type Logger,
  type Result,
  type RouteDbStatus,
  type RouteDbStatusListener,
  type RouteDbStorage,
  type UpdateCandidate,
  type UpdateOutcome,
  type UpdateSource,
} from './types.js';

/**
 * Shown whenever no usable route database is active.
 */
export const NO_ROUTE_DB_MESSAGE = 'No route data available - please import a route database file';

export interface RouteDbInstallerOptions {
  storage: RouteDbStorage;
  updateSource: UpdateSource;
  presentation: RouteDbStatusListener;
  logger?: Logger;
}

/**
 * Short label of a route database: its creation date as `YYYY-MM-DD` (UTC).
 */
export function formatRouteDbLabel(creationDate: Date | null): string {
  return creationDate === null ? 'unknown' : creationDate.toISOString().slice(0, 10);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RouteDbInstaller {
  private readonly storage: RouteDbStorage;
  private readonly updateSource: UpdateSource;
  private readonly presentation: RouteDbStatusListener;
  private readonly logger: Logger;

  constructor(options: RouteDbInstallerOptions) {
    this.storage = options.storage;
    this.updateSource = options.updateSource;
    this.presentation = options.presentation;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Start the store on the live database and report the resulting status.
   */
  async startStorage(): Promise<RouteDbStatus> {
    return this.report('start route database', () => this.activate());
  }

  /**
   * Replace the live database with `filePath` and restart the store.
   *
   * A failed import is logged and the store is restarted anyway, so the
   * previous database stays active when the new file could not be copied.
   * The resulting status is reported to the presentation and returned.
   */
  async installFromLocalFile(filePath: string): Promise<RouteDbStatus> {
    return this.report(`install ${filePath}`, () => this.install(filePath));
  }

  /**
   * Look for a remote database newer than the live one without downloading it.
   *
   * Nothing is proposed while a database is connected whose creation date
   * cannot be read, since no candidate can be shown to be newer.
   *
   * @returns The best candidate, or null if the live database is up to date
   */
  async findUpdate(): Promise<Result<UpdateCandidate | null, FetchError>> {
    const listed = await this.updateSource.listCandidates();
    if (!listed.success) {
      this.logger.warn(`[installer] ${describeFetchError(listed.error)}`);
      return listed;
    }
    this.logger.debug(`[installer] ${listed.data.length} compatible update(s) offered`);

    let currentDate: Date | null = null;
    if (this.storage.isConnected()) {
      try {
        currentDate = await this.storage.getCreationDate();
      } catch (error) {
        this.logger.warn('[installer] Unable to determine route database creation date', error);
        return ok(null);
      }
    }
    return ok(selectUpdateCandidate(currentDate, listed.data));
  }

  /**
   * Download and install the best remote update, if there is one newer than
   * the live database.
   */
  async updateFromRemote(): Promise<UpdateOutcome> {
    let found: Result<UpdateCandidate | null, FetchError>;
    try {
      found = await this.findUpdate();
    } catch (error) {
      this.logger.error('[installer] Unexpected failure while looking for updates', error);
      return { updated: false, reason: 'unavailable' };
    }
    if (!found.success) {
      return { updated: false, reason: 'unavailable' };
    }

    const candidate = found.data;
    if (candidate === null) {
      this.logger.info('[installer] Route database is up to date');
      return { updated: false, reason: 'up-to-date' };
    }

    try {
      this.logger.info(
        `[installer] Downloading ${candidate.identifier} (${formatRouteDbLabel(candidate.creationDate)})`
      );
      const materialized = await this.updateSource.materialize(candidate);
      if (!materialized.success) {
        this.logger.warn(`[installer] ${describeFetchError(materialized.error)}`);
        return { updated: false, reason: 'download-failed' };
      }

      const status = await this.installFromLocalFile(materialized.data);
      return { updated: true, candidate, status };
    } catch (error) {
      this.logger.error('[installer] Unexpected failure during update', error);
      return { updated: false, reason: 'download-failed' };
    } finally {
      await this.cleanup();
    }
  }

  private async report(
    action: string,
    produce: () => Promise<RouteDbStatus>
  ): Promise<RouteDbStatus> {
    let status: RouteDbStatus;
    try {
      status = await produce();
    } catch (error) {
      this.logger.error(`[installer] Unexpected failure: ${action}`, error);
      status = { activated: false, message: NO_ROUTE_DB_MESSAGE, reason: errorMessage(error) };
    }

    this.presentation.updateRouteDbStatus(status);
    return status;
  }

  private async install(filePath: string): Promise<RouteDbStatus> {
    if (this.storage.isConnected()) {
      this.storage.stop();
    }

    const imported = await this.storage.importFile(filePath);
    if (!imported.success) {
      this.logger.warn(`[installer] ${describeImportError(imported.error)}`);
    }

    return this.activate();
  }

  private async activate(): Promise<RouteDbStatus> {
    const started = await this.storage.start();
    if (!started.success) {
      const reason = describeStorageStartingError(started.error);
      this.logger.warn(`[installer] ${reason}`);
      return { activated: false, message: NO_ROUTE_DB_MESSAGE, reason };
    }

    const creationDate = await this.currentCreationDate();
    return { activated: true, creationDate, label: formatRouteDbLabel(creationDate) };
  }

  /**
   * Creation date of the connected database, null if it cannot be read.
   */
  private async currentCreationDate(): Promise<Date | null> {
    try {
      return await this.storage.getCreationDate();
    } catch (error) {
      this.logger.warn('[installer] Unable to determine route database creation date', error);
      return null;
    }
  }

  private async cleanup(): Promise<void> {
    try {
      await this.updateSource.cleanup();
    } catch (error) {
      this.logger.debug('[installer] Cleanup of temporary files failed', error);
    }
  }
}
