/**
 * Over-the-Air Update Source
 *
 * Lists the route databases offered by the update service, keeps the ones
 * this application can use, and downloads a chosen one into a temporary
 * directory.
 *
 * @module ota/source
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { formatZodIssues } from '../schemas/common.js';
import { OtaMetadataListSchema, type OtaMetadataRecord } from '../schemas/ota.js';
import type { FetchError } from '../routedb/errors.js';
import { SUPPORTED_SCHEMA_VERSION } from '../routedb/schema.js';
import {
  err,
  ok,
  silentLogger,
  type CompatibilityMode,
  type Logger,
  type Result,
  type UpdateCandidate,
  type UpdateSource,
} from '../routedb/types.js';
import type { Version } from '../routedb/version.js';
import { getTempRoot } from '../storage/paths.js';
import { FetchHttpClient, UnexpectedContentTypeError, type HttpClient } from './http.js';

// ============================================================================
// Types
// ============================================================================

export interface OtaUpdateSourceOptions {
  /** Base URL of the update service; relative URLs are resolved against it */
  baseUrl: string;
  /** Path of the listing, relative to the base URL (default: api.php) */
  endpoint?: string;
  /** Schema version of this application (default: {@link SUPPORTED_SCHEMA_VERSION}) */
  supportedVersion?: Version;
  http?: HttpClient;
  /** Directory under which download directories are created (default: OS temp dir) */
  tempRoot?: string;
  logger?: Logger;
}

export const DEFAULT_OTA_ENDPOINT = 'api.php';

/** File name of a downloaded database inside its temporary directory. */
export const DOWNLOAD_FILE_NAME = 'routedb.sqlite';

const TEMP_DIR_PREFIX = 'routedb-';

// ============================================================================
// Update Source
// ============================================================================

/**
 * Update source backed by the HTTP update service.
 *
 * Temporary directories created by {@link OtaUpdateSource.materialize} belong
 * to the source until {@link OtaUpdateSource.cleanup} is called.
 *
 * @example
 * ```typescript
 * const source = new OtaUpdateSource({ baseUrl: 'https://ota.example.org/routedb/' });
 * const listed = await source.listCandidates();
 * ```
 */
export class OtaUpdateSource implements UpdateSource {
  readonly baseUrl: string;
  private readonly endpoint: string;
  private readonly supportedVersion: Version;
  private readonly http: HttpClient;
  private readonly tempRoot: string;
  private readonly logger: Logger;
  private tempDirs: string[] = [];

  constructor(options: OtaUpdateSourceOptions) {
    // Without a trailing slash, URL resolution would drop the last path segment
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.endpoint = options.endpoint ?? DEFAULT_OTA_ENDPOINT;
    this.supportedVersion = options.supportedVersion ?? SUPPORTED_SCHEMA_VERSION;
    this.http = options.http ?? new FetchHttpClient();
    this.tempRoot = options.tempRoot ?? getTempRoot();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Retrieve the listing and return the candidates with an acceptable schema.
   *
   * A single malformed record rejects the whole listing.
   */
  async listCandidates(): Promise<Result<UpdateCandidate[], FetchError>> {
    const resolved = this.resolve(this.endpoint);
    if (!resolved.success) {
      return resolved;
    }
    const url = resolved.data;

    let body: string;
    try {
      body = await this.http.retrieveJsonResource(url);
    } catch (error) {
      if (error instanceof UnexpectedContentTypeError) {
        return err({ kind: 'format', url, reason: error.message });
      }
      return err({ kind: 'transport', url, cause: error });
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err({ kind: 'format', url, reason: `invalid JSON (${reason})` });
    }

    const parsed = OtaMetadataListSchema.safeParse(data);
    if (!parsed.success) {
      return err({ kind: 'format', url, reason: formatZodIssues(parsed.error) });
    }

    const candidates = parsed.data.flatMap((record): UpdateCandidate[] => {
      const compatibilityMode = this.compatibilityOf(record);
      if (compatibilityMode === null) {
        return [];
      }
      return [
        {
          identifier: record.downloadUrl,
          creationDate: record.creationDate,
          compatibilityMode,
        },
      ];
    });

    this.logger.debug(
      `[ota] ${parsed.data.length} database(s) listed, ${candidates.length} compatible`
    );
    return ok(candidates);
  }

  /**
   * Download `candidate` into a fresh temporary directory.
   *
   * @returns Path of the downloaded file
   */
  async materialize(candidate: UpdateCandidate): Promise<Result<string, FetchError>> {
    const resolved = this.resolve(candidate.identifier);
    if (!resolved.success) {
      return resolved;
    }
    const url = resolved.data;

    let dir: string;
    try {
      dir = await fs.mkdtemp(path.join(this.tempRoot, TEMP_DIR_PREFIX));
    } catch (error) {
      return err({ kind: 'write-failed', path: this.tempRoot, cause: error });
    }
    this.tempDirs.push(dir);

    let bytes: Uint8Array;
    try {
      bytes = await this.http.retrieveBinaryResource(url);
    } catch (error) {
      return err({ kind: 'transport', url, cause: error });
    }

    const filePath = path.join(dir, DOWNLOAD_FILE_NAME);
    try {
      await fs.writeFile(filePath, bytes);
    } catch (error) {
      return err({ kind: 'write-failed', path: filePath, cause: error });
    }

    this.logger.debug(`[ota] Downloaded ${url} (${bytes.byteLength} bytes) to ${filePath}`);
    return ok(filePath);
  }

  /**
   * Remove every temporary directory created since the last cleanup.
   * Failures are logged and otherwise ignored.
   */
  async cleanup(): Promise<void> {
    const dirs = this.tempDirs;
    this.tempDirs = [];

    await Promise.all(
      dirs.map(async (dir) => {
        try {
          await fs.rm(dir, { recursive: true, force: true });
        } catch (error) {
          this.logger.debug(`[ota] Unable to remove ${dir}`, error);
        }
      })
    );
  }

  private resolve(reference: string): Result<string, FetchError> {
    try {
      return ok(new URL(reference, this.baseUrl).toString());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err({
        kind: 'format',
        url: reference,
        reason: `cannot resolve against ${this.baseUrl} (${reason})`,
      });
    }
  }

  private compatibilityOf(record: OtaMetadataRecord): CompatibilityMode | null {
    if (
      record.schemaVersionMajor !== this.supportedVersion.major ||
      record.schemaVersionMinor < this.supportedVersion.minor
    ) {
      return null;
    }
    return record.schemaVersionMinor === this.supportedVersion.minor
      ? 'exactMatch'
      : 'backwardCompatible';
  }
}
