/**
 * Route Database Commands
 *
 * - status: Show the state of the local route database
 * - import: Replace it with a local file
 * - update: Replace it with the newest remote database
 *
 * @module cli/commands/db
 */

import type { Command } from 'commander';
import { registerStatusCommand } from './status.js';
import { registerImportCommand } from './import.js';
import { registerUpdateCommand } from './update.js';

export function registerDbCommands(program: Command): void {
  registerStatusCommand(program);
  registerImportCommand(program);
  registerUpdateCommand(program);
}

export { handleStatus } from './status.js';
export { handleImport } from './import.js';
export { handleUpdate, type UpdateOptions } from './update.js';
