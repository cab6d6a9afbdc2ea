/**
 * Storage Layer
 *
 * File-based persistence for the route database file and user preferences.
 * All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export { getDataDir, resolveDataDir, getRouteDbPath, getGlobalConfigPath, getTempRoot } from './paths.js';

// Atomic operations
export {
  atomicWriteJson,
  atomicCopyFile,
  readJson,
  fileExists,
  isErrnoException,
} from './atomic.js';

// Config operations
export {
  GlobalConfigSchema,
  DEFAULT_GLOBAL_CONFIG,
  saveGlobalConfig,
  loadGlobalConfig,
  updateGlobalConfig,
  createFileConfigStore,
  type GlobalConfig,
  type ConfigStore,
} from './config.js';
