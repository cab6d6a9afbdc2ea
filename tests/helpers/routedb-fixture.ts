/**
 * Route database fixtures for tests.
 *
 * Files are created with better-sqlite3 from the SQL under tests/fixtures.
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

const FIXTURES_DIR = path.join(__dirname, '..', 'fixtures');

export interface RouteDbFixtureOptions {
  major?: number;
  minor?: number;
  /** Metadata compile time (default: 2025-03-01T12:00:00.000Z, null to leave it out) */
  compileTime?: string | null;
  vendor?: string | null;
  /** Insert the summits, routes and posts of routedb-content.sql (default: true) */
  withContent?: boolean;
  /** Create the tables but no metadata row */
  withoutMetadataRow?: boolean;
}

export const FIXTURE_COMPILE_TIME = '2025-03-01T12:00:00.000Z';

/**
 * Create a route database file at `filePath`, replacing any existing file.
 */
export function createRouteDbFile(filePath: string, options: RouteDbFixtureOptions = {}): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.rmSync(filePath, { force: true });

  const db = new Database(filePath);
  try {
    db.exec(fs.readFileSync(path.join(FIXTURES_DIR, 'routedb-schema.sql'), 'utf-8'));
    if (!options.withoutMetadataRow) {
      db.prepare(
        'INSERT INTO database_metadata (schema_version_major, schema_version_minor, compile_time, vendor) VALUES (?, ?, ?, ?)'
      ).run(
        options.major ?? 1,
        options.minor ?? 0,
        options.compileTime === undefined ? FIXTURE_COMPILE_TIME : options.compileTime,
        options.vendor === undefined ? 'test-vendor' : options.vendor
      );
    }
    if (options.withContent ?? true) {
      db.exec(fs.readFileSync(path.join(FIXTURES_DIR, 'routedb-content.sql'), 'utf-8'));
    }
  } finally {
    db.close();
  }
  return filePath;
}

/**
 * Read a route database file into memory, for byte-level comparisons.
 */
export function readRouteDbBytes(filePath: string): Buffer {
  return fs.readFileSync(filePath);
}

export async function createTempDir(prefix = 'routedb-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}
