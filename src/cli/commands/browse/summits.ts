/**
 * Summits Command
 *
 * Lists the summits of the route database, optionally filtered by name.
 *
 * @module cli/commands/browse/summits
 */

import type { Command } from 'commander';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../../base-command.js';
import { runCommand, type CliServices } from '../../services.js';
import { openRouteDb } from '../shared.js';

export function registerSummitsCommand(program: Command): void {
  program
    .command('summits [filter]')
    .description('List summits, optionally only those whose name contains <filter>')
    .action(async (filter: string | undefined, _options: unknown, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runCommand(base, (services) => handleSummits(filter, base, services));
    });
}

export async function handleSummits(
  filter: string | undefined,
  base: BaseCommand,
  services: CliServices
): Promise<ExitCode> {
  if (!(await openRouteDb(base, services))) {
    return EXIT_CODES.NOT_FOUND;
  }
  await services.useCases.showSummitList(filter);
  return EXIT_CODES.SUCCESS;
}
