/**
 * Route Database Error Taxonomy
 *
 * Recoverable failures are modelled as tagged unions returned inside a
 * {@link Result}; each family has an exhaustive `describe*` function used
 * wherever a failure is turned into a log line or a status message.
 *
 * Programming errors (invalid version numbers, calling an operation in the
 * wrong store state) are thrown as `Error` subclasses instead.
 *
 * @module routedb/errors
 */

import type { Version } from './version.js';

// ============================================================================
// Thrown Errors
// ============================================================================

/**
 * Thrown when a {@link Version} is constructed from invalid components.
 */
export class VersionValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VersionValidationError';
  }
}

/**
 * Thrown when a store operation is called in a state that does not allow it,
 * e.g. importing a file while connected or reading while disconnected.
 */
export class StoreStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreStateError';
  }
}

// ============================================================================
// Storage Starting Errors
// ============================================================================

/**
 * Reasons why the route database could not be started.
 *
 * - `inaccessible`: the file is missing, unreadable or refused by the engine
 * - `invalid-format`: the file opens but lacks the expected metadata
 * - `incompatible`: the metadata is present but its schema is not accepted
 */
export type StorageStartingError =
  | { kind: 'inaccessible'; path: string; cause: unknown }
  | { kind: 'invalid-format'; path: string; reason: string }
  | {
      kind: 'incompatible';
      path: string;
      foundVersion: Version;
      requiredVersion: Version;
    };

// ============================================================================
// Import Errors
// ============================================================================

/**
 * Reasons why a database file could not be imported.
 */
export type ImportError =
  | { kind: 'source-not-found'; sourcePath: string }
  | {
      kind: 'copy-failed';
      sourcePath: string;
      destinationPath: string;
      cause: unknown;
    };

// ============================================================================
// Fetch Errors
// ============================================================================

/**
 * Reasons why the update service could not deliver candidates or files.
 *
 * - `transport`: network problem, timeout or HTTP error status
 * - `format`: a URL could not be resolved, or the service answered with
 *   something other than the expected JSON
 * - `write-failed`: a download could not be stored locally
 */
export type FetchError =
  | { kind: 'transport'; url: string; cause: unknown }
  | { kind: 'format'; url: string; reason: string }
  | { kind: 'write-failed'; path: string; cause: unknown };

// ============================================================================
// Descriptions
// ============================================================================

/**
 * Compile-time exhaustiveness guard for `switch` statements over tagged unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function describeStorageStartingError(error: StorageStartingError): string {
  switch (error.kind) {
    case 'inaccessible':
      return `Route database at ${error.path} is not accessible: ${causeMessage(error.cause)}`;
    case 'invalid-format':
      return `Route database at ${error.path} has an invalid format: ${error.reason}`;
    case 'incompatible':
      return (
        `Route database at ${error.path} uses schema version ${error.foundVersion.toString()}, ` +
        `which is not accepted by the supported version ${error.requiredVersion.toString()}`
      );
    default:
      return assertNever(error);
  }
}

export function describeImportError(error: ImportError): string {
  switch (error.kind) {
    case 'source-not-found':
      return `Import file not found: ${error.sourcePath}`;
    case 'copy-failed':
      return (
        `Failed to copy ${error.sourcePath} to ${error.destinationPath}: ` +
        causeMessage(error.cause)
      );
    default:
      return assertNever(error);
  }
}

export function describeFetchError(error: FetchError): string {
  switch (error.kind) {
    case 'transport':
      return `Request to ${error.url} failed: ${causeMessage(error.cause)}`;
    case 'format':
      return `Unexpected response from ${error.url}: ${error.reason}`;
    case 'write-failed':
      return `Unable to store download at ${error.path}: ${causeMessage(error.cause)}`;
    default:
      return assertNever(error);
  }
}
