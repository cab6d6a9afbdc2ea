/**
 * Global Config Storage
 *
 * User preferences stored at ~/.routedb/config.json: the update service
 * override and the last used sort orders of the route and post lists.
 *
 * @module storage/config
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { POSTS_SORT_ORDERS, ROUTES_SORT_ORDERS } from '../routedb/types.js';
import { atomicWriteJson, isErrnoException, readJson } from './atomic.js';
import { getGlobalConfigPath } from './paths.js';

/**
 * Global configuration schema
 */
export const GlobalConfigSchema = z.object({
  /** Schema version for forward compatibility */
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.globalConfig),

  /** Base URL of the update service, overrides ROUTEDB_OTA_BASE_URL */
  otaBaseUrl: z.string().url().optional(),

  /** Sort order last used for route lists */
  routesSortOrder: z.enum(ROUTES_SORT_ORDERS).optional(),

  /** Sort order last used for post lists */
  postsSortOrder: z.enum(POSTS_SORT_ORDERS).optional(),
});

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

/**
 * Default configuration when no config file exists
 */
export const DEFAULT_GLOBAL_CONFIG: GlobalConfig = {
  schemaVersion: SCHEMA_VERSIONS.globalConfig,
};

/**
 * Save global config to disk
 *
 * @param config - The global config to save
 * @param dataDir - Data directory, defaults to the configured one
 */
export async function saveGlobalConfig(config: GlobalConfig, dataDir?: string): Promise<void> {
  const validated = GlobalConfigSchema.parse(config);
  await atomicWriteJson(getGlobalConfigPath(dataDir), validated);
}

/**
 * Load global config from disk
 *
 * Returns default config if file doesn't exist.
 *
 * @param dataDir - Data directory, defaults to the configured one
 * @throws Error if config file exists but is invalid
 */
export async function loadGlobalConfig(dataDir?: string): Promise<GlobalConfig> {
  const filePath = getGlobalConfigPath(dataDir);

  let data: unknown;
  try {
    data = await readJson(filePath);
  } catch (error) {
    if (error instanceof Error && isErrnoException(error.cause) && error.cause.code === 'ENOENT') {
      return DEFAULT_GLOBAL_CONFIG;
    }
    throw error;
  }

  return GlobalConfigSchema.parse(data);
}

/**
 * Read-modify-write of selected config fields.
 *
 * @returns The saved config
 */
export async function updateGlobalConfig(
  changes: Partial<Omit<GlobalConfig, 'schemaVersion'>>,
  dataDir?: string
): Promise<GlobalConfig> {
  const current = await loadGlobalConfig(dataDir);
  const updated = { ...current, ...changes };
  await saveGlobalConfig(updated, dataDir);
  return updated;
}

// ============================================
// Config Store
// ============================================

/**
 * Access to the persisted preferences, injectable for tests.
 */
export interface ConfigStore {
  load(): Promise<GlobalConfig>;
  update(changes: Partial<Omit<GlobalConfig, 'schemaVersion'>>): Promise<GlobalConfig>;
}

/**
 * Config store backed by config.json in the given data directory.
 */
export function createFileConfigStore(dataDir?: string): ConfigStore {
  return {
    load: () => loadGlobalConfig(dataDir),
    update: (changes) => updateGlobalConfig(changes, dataDir),
  };
}
