/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * ~/.routedb/                  # Default data directory
 * ├── config.json              # User preferences
 * └── routes.sqlite            # The live route database
 * ```
 *
 * Temporary downloads live under the OS temp directory and never inside the
 * data directory.
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';
import { ROUTE_DB_FILE_NAME } from '../routedb/schema.js';

/**
 * Gets the root data directory for the application.
 *
 * Uses the `ROUTEDB_DATA_DIR` environment variable if set,
 * otherwise defaults to `~/.routedb/`.
 *
 * @returns Absolute path to the data directory
 * @example
 * ```typescript
 * // With env var set
 * process.env.ROUTEDB_DATA_DIR = '/custom/path';
 * getDataDir(); // '/custom/path'
 *
 * // Without env var (default)
 * getDataDir(); // '/Users/username/.routedb'
 * ```
 */
export function getDataDir(): string {
  return resolveDataDir(process.env.ROUTEDB_DATA_DIR);
}

/**
 * Resolves a configured data directory: `~` is expanded, relative paths are
 * resolved against the working directory, and an empty value selects the default.
 */
export function resolveDataDir(configured: string | undefined): string {
  if (configured) {
    if (configured.startsWith('~')) {
      return path.join(os.homedir(), configured.slice(1));
    }
    return path.resolve(configured);
  }

  return path.join(os.homedir(), '.routedb');
}

/**
 * Gets the path of the live route database file.
 *
 * There is exactly one live route database at any time; imports always
 * replace this file.
 *
 * @param dataDir - Data directory, defaults to {@link getDataDir}
 */
export function getRouteDbPath(dataDir: string = getDataDir()): string {
  return path.join(dataDir, ROUTE_DB_FILE_NAME);
}

/**
 * Gets the path to the global config.json file.
 *
 * @param dataDir - Data directory, defaults to {@link getDataDir}
 */
export function getGlobalConfigPath(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'config.json');
}

/**
 * Gets the directory under which temporary downloads are created.
 */
export function getTempRoot(): string {
  return os.tmpdir();
}
