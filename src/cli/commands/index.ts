/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerDbCommands } from './db/index.js';
import { registerBrowseCommands } from './browse/index.js';
import { registerConfigCommand } from './config.js';

/**
 * Register all CLI commands with the program.
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerDbCommands(program);
  registerBrowseCommands(program);
  registerConfigCommand(program);
}

/**
 * Get help text for all available commands.
 *
 * @returns Array of command help entries
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'status', description: 'Show the state of the local route database' },
    { name: 'import <file>', description: 'Import a route database file' },
    { name: 'update [--check]', description: 'Update the route database from the update service' },
    { name: 'summits [filter]', description: 'List summits' },
    { name: 'routes <summitId> [--sort <order>]', description: 'List the routes on a summit' },
    { name: 'posts <routeId> [--sort <order>]', description: 'List the posts about a route' },
    { name: 'config show', description: 'Show current configuration' },
    { name: 'config set <key> <value>', description: 'Set a configuration value' },
  ];
}
