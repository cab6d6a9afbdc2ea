/**
 * Status Command
 *
 * Starts the live route database and shows whether it is usable.
 *
 * @module cli/commands/db/status
 */

import type { Command } from 'commander';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../../base-command.js';
import { runCommand, type CliServices } from '../../services.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the state of the local route database')
    .action(async (_options: unknown, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runCommand(base, (services) => handleStatus(base, services));
    });
}

/**
 * Handle the status command.
 */
export async function handleStatus(base: BaseCommand, services: CliServices): Promise<ExitCode> {
  base.debug(`Route database: ${services.store.dbPath}`);
  const status = await services.useCases.startRouteDb();
  if (!status.activated) {
    return EXIT_CODES.NOT_FOUND;
  }

  const metadata = services.store.getMetadata();
  base.keyValue('Schema version', metadata.schemaVersion.toString());
  if (metadata.vendor !== null) {
    base.keyValue('Vendor', metadata.vendor);
  }
  base.keyValue('Location', services.store.dbPath);
  return EXIT_CODES.SUCCESS;
}
