#!/usr/bin/env node
/**
 * Route Database Manager CLI
 *
 * Main entry point for the routedb CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   routedb --help
 *   routedb status
 *   routedb import ./routes-2025-11-28.sqlite
 *   routedb update --check
 *   routedb routes 42 --sort rating
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION, getVersionInfo } from './version.js';
import { BaseCommand, EXIT_CODES, attachBaseCommand, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @returns Configured commander Program instance
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('routedb')
    .description('Route Database Manager - keep the local climbing route database up to date')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.routedb)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    const baseCommand = new BaseCommand(opts);

    attachBaseCommand(thisCommand, baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.abort('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }

    baseCommand.debug(getVersionInfo());
  });

  // Register all subcommands
  registerCommands(program);

  // Global error handling
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(0);
    }
    process.exit(err.exitCode);
  });

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    // Error already handled by commander or base command
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(1);
  }
}

// Compiled as CommonJS, so there is no import.meta entry check
if (require.main === module) {
  void main();
}
