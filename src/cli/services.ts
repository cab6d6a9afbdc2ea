/**
 * CLI Service Wiring
 *
 * Builds the store, update source and use cases for one command invocation,
 * and runs command handlers against them.
 *
 * @module cli/services
 */

import { config } from '../config/index.js';
import { FetchHttpClient, type HttpClient } from '../ota/http.js';
import { OtaUpdateSource } from '../ota/source.js';
import { RouteDbStore } from '../routedb/store.js';
import { createFileConfigStore, type ConfigStore } from '../storage/config.js';
import { getRouteDbPath } from '../storage/paths.js';
import { RouteDbUseCases } from '../usecases/routedb.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from './base-command.js';
import { CliPresenter } from './presenter.js';

// ============================================================================
// Types
// ============================================================================

export interface CliServices {
  store: RouteDbStore;
  updateSource: OtaUpdateSource;
  presenter: CliPresenter;
  preferences: ConfigStore;
  useCases: RouteDbUseCases;
}

/**
 * Replacements for the parts of the wiring that reach outside the process.
 */
export interface CliServiceOverrides {
  http?: HttpClient;
  tempRoot?: string;
}

// ============================================================================
// Wiring
// ============================================================================

/**
 * Create the services for the data directory of `base`.
 *
 * The update service URL comes from the persisted preferences when set there,
 * otherwise from the environment.
 */
export async function createServices(
  base: BaseCommand,
  overrides: CliServiceOverrides = {}
): Promise<CliServices> {
  const logger = base.toLogger();
  const preferences = createFileConfigStore(base.dataDir);
  const saved = await preferences.load();

  const store = new RouteDbStore({ dbPath: getRouteDbPath(base.dataDir), logger });
  const updateSource = new OtaUpdateSource({
    baseUrl: saved.otaBaseUrl ?? config.ota.baseUrl,
    endpoint: config.ota.endpoint,
    http: overrides.http ?? new FetchHttpClient({ timeoutMs: config.ota.timeoutMs }),
    tempRoot: overrides.tempRoot,
    logger,
  });
  const presenter = new CliPresenter(base);

  const useCases = new RouteDbUseCases({
    storage: store,
    updateSource,
    presentation: presenter,
    preferences,
    logger,
  });

  return { store, updateSource, presenter, preferences, useCases };
}

/**
 * Run a command handler with fresh services and exit with its code.
 *
 * The route database is always disconnected before exiting.
 */
export async function runCommand(
  base: BaseCommand,
  handler: (services: CliServices) => Promise<ExitCode>
): Promise<void> {
  let services: CliServices | null = null;
  let code: ExitCode;

  try {
    services = await createServices(base);
    code = await handler(services);
  } catch (error) {
    services?.store.stop();
    const message = error instanceof Error ? error.message : String(error);
    base.abort(message, EXIT_CODES.ERROR, error);
  }

  services.store.stop();
  if (code !== EXIT_CODES.SUCCESS) {
    base.exit(code);
  }
}
