/**
 * Import Command
 *
 * Replaces the live route database with a local file.
 *
 * @module cli/commands/db/import
 */

import * as path from 'node:path';
import type { Command } from 'commander';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../../base-command.js';
import { runCommand, type CliServices } from '../../services.js';

export function registerImportCommand(program: Command): void {
  program
    .command('import <file>')
    .description('Import a route database file')
    .action(async (file: string, _options: unknown, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runCommand(base, (services) => handleImport(file, base, services));
    });
}

/**
 * Handle the import command.
 *
 * The previous database stays active if the file cannot be copied, so the
 * exit code only reflects whether a usable database is active afterwards.
 */
export async function handleImport(
  file: string,
  base: BaseCommand,
  services: CliServices
): Promise<ExitCode> {
  const sourcePath = path.resolve(file);
  base.info(`Importing ${sourcePath}`);

  const status = await services.useCases.importRouteDbFile(sourcePath);
  return status.activated ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR;
}
