/**
 * CLI Version Information
 *
 * @module cli/version
 */

import { SUPPORTED_SCHEMA_VERSION } from '../routedb/schema.js';

/**
 * Current CLI version.
 * Should match package.json version.
 */
export const VERSION = '1.0.0';

/**
 * Get version information for display.
 *
 * @returns Formatted version string
 */
export function getVersionInfo(): string {
  return `Route Database Manager v${VERSION} (route database schema ${SUPPORTED_SCHEMA_VERSION.toString()})`;
}
