/**
 * Update Command
 *
 * Installs the newest compatible route database offered by the update
 * service, or with --check only reports whether there is one.
 *
 * @module cli/commands/db/update
 */

import type { Command } from 'commander';
import { assertNever, describeFetchError } from '../../../routedb/errors.js';
import { formatRouteDbLabel } from '../../../routedb/installer.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../../base-command.js';
import { ProgressSpinner } from '../../formatters/progress.js';
import { runCommand, type CliServices } from '../../services.js';

// ============================================================================
// Types
// ============================================================================

export interface UpdateOptions {
  /** Only look for an update, do not install it */
  check?: boolean;
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerUpdateCommand(program: Command): void {
  program
    .command('update')
    .description('Update the route database from the update service')
    .option('-c, --check', 'Only check whether an update is available')
    .action(async (options: UpdateOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runCommand(base, (services) => handleUpdate(options, base, services));
    });
}

/**
 * Handle the update command.
 *
 * The live database is connected first (if usable) so that only newer
 * databases are considered.
 */
export async function handleUpdate(
  options: UpdateOptions,
  base: BaseCommand,
  services: CliServices
): Promise<ExitCode> {
  const started = await services.store.start();
  base.debug(started.success ? 'Live route database connected' : 'No usable live route database');

  if (options.check) {
    return checkOnly(base, services);
  }

  const spinner = new ProgressSpinner(`Checking ${services.updateSource.baseUrl} for updates...`);
  services.presenter.attachSpinner(spinner);
  spinner.start();

  try {
    const outcome = await services.useCases.updateRouteDatabase();
    if (outcome.updated) {
      return outcome.status.activated ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR;
    }

    switch (outcome.reason) {
      case 'up-to-date':
        spinner.succeed('Route database is up to date');
        return EXIT_CODES.SUCCESS;
      case 'unavailable':
        spinner.fail('Update service is not available');
        return EXIT_CODES.API_ERROR;
      case 'download-failed':
        spinner.fail('Download of the route database failed');
        return EXIT_CODES.API_ERROR;
      default:
        return assertNever(outcome.reason);
    }
  } finally {
    services.presenter.attachSpinner(null);
    if (spinner.isSpinning()) {
      spinner.stop();
    }
  }
}

async function checkOnly(base: BaseCommand, services: CliServices): Promise<ExitCode> {
  const found = await services.useCases.checkForUpdate();
  if (!found.success) {
    base.fail(describeFetchError(found.error));
    return EXIT_CODES.API_ERROR;
  }

  if (found.data === null) {
    base.success('Route database is up to date');
    return EXIT_CODES.SUCCESS;
  }

  const candidate = found.data;
  base.info(
    `Update available: ${formatRouteDbLabel(candidate.creationDate)} ` +
      `(${candidate.compatibilityMode === 'exactMatch' ? 'exact schema match' : 'newer schema'})`
  );
  return EXIT_CODES.SUCCESS;
}
