/**
 * Routes Command
 *
 * Lists the routes on a summit with their average rating.
 *
 * @module cli/commands/browse/routes
 */

import { Option, type Command } from 'commander';
import { ROUTES_SORT_ORDERS, type RoutesSortOrder } from '../../../routedb/types.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../../base-command.js';
import { runCommand, type CliServices } from '../../services.js';
import { openRouteDb, parseId } from '../shared.js';

export interface RoutesOptions {
  /** Sort order; the saved one is used when omitted */
  sort?: RoutesSortOrder;
}

export function registerRoutesCommand(program: Command): void {
  program
    .command('routes <summitId>')
    .description('List the routes on a summit')
    .addOption(
      new Option('-s, --sort <order>', 'Sort order (remembered for next time)').choices(
        ROUTES_SORT_ORDERS
      )
    )
    .action(async (summitId: string, options: RoutesOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runCommand(base, (services) => handleRoutes(summitId, options, base, services));
    });
}

export async function handleRoutes(
  summitId: string,
  options: RoutesOptions,
  base: BaseCommand,
  services: CliServices
): Promise<ExitCode> {
  const id = parseId(summitId);
  if (id === null) {
    base.fail(`Invalid summit ID: ${summitId}`);
    return EXIT_CODES.USAGE_ERROR;
  }

  if (!(await openRouteDb(base, services))) {
    return EXIT_CODES.NOT_FOUND;
  }

  const routes = await services.useCases.showRouteList(id, options.sort);
  if (routes === null) {
    base.fail(`Summit not found: ${id}`);
    return EXIT_CODES.NOT_FOUND;
  }
  return EXIT_CODES.SUCCESS;
}
