/**
 * Helpers shared by command handlers.
 *
 * @module cli/commands/shared
 */

import chalk from 'chalk';
import { describeStorageStartingError } from '../../routedb/errors.js';
import { NO_ROUTE_DB_MESSAGE } from '../../routedb/installer.js';
import type { BaseCommand } from '../base-command.js';
import type { CliServices } from '../services.js';

/**
 * Connect to the live route database without reporting a status line.
 *
 * @returns false (after telling the user) if there is no usable database
 */
export async function openRouteDb(base: BaseCommand, services: CliServices): Promise<boolean> {
  const started = await services.store.start();
  if (started.success) {
    return true;
  }

  base.fail(NO_ROUTE_DB_MESSAGE);
  console.log(chalk.dim(`  ${describeStorageStartingError(started.error)}`));
  return false;
}

/**
 * Parse a positive integer ID given on the command line.
 */
export function parseId(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
