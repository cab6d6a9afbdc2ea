/**
 * Base Command
 *
 * Terminal output shared by the `routedb` commands and the presenter. Global
 * flags (`--verbose`, `--quiet`, `--no-color`, `--data-dir`) are resolved
 * once per invocation and stored on the root program.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import type { Logger } from '../routedb/types.js';
import { getDataDir } from '../storage/paths.js';

/**
 * Global options as parsed by commander.
 */
export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** false after `--no-color` */
  color?: boolean;
  dataDir?: string;
}

/**
 * Process exit codes of the `routedb` binary.
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  /** Invalid arguments or option values */
  USAGE_ERROR: 2,
  /** No route database, or no summit/route with the given ID */
  NOT_FOUND: 3,
  /** Update service unreachable or the download failed */
  API_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const BASE_COMMAND_KEY = '_baseCommand';

/**
 * Output helpers bound to one invocation's global options.
 *
 * Informational output is suppressed by `--quiet`; failures, warnings and
 * errors are always shown. Without color (or when stdout is not a TTY) the
 * status markers fall back to `[OK]` and `[FAIL]`.
 */
export class BaseCommand {
  readonly verbose: boolean;
  readonly quiet: boolean;
  readonly dataDir: string;
  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.verbose = options.verbose === true;
    this.quiet = options.quiet === true;
    this.dataDir = options.dataDir ?? getDataDir();
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  /** Only shown with `--verbose`. */
  debug(message: string, ...args: unknown[]): void {
    if (this.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.quiet) {
      console.log(message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  success(message: string): void {
    if (!this.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  blank(): void {
    if (!this.quiet) {
      console.log();
    }
  }

  /**
   * Blank line, bold title, and an `=` underline of the same width.
   */
  section(title: string): void {
    if (this.quiet) {
      return;
    }
    console.log();
    console.log(chalk.bold(title));
    console.log(chalk.dim('='.repeat(title.length)));
  }

  keyValue(key: string, value: string | number): void {
    if (!this.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  /**
   * Print an error and end the process. The stack of `cause` is printed in
   * verbose mode.
   */
  abort(message: string, code: ExitCode = EXIT_CODES.ERROR, cause?: unknown): never {
    console.error(chalk.red(`Error: ${message}`));
    if (this.verbose && cause instanceof Error) {
      console.error(chalk.dim(cause.stack ?? cause.message));
    }
    process.exit(code);
  }

  exit(code: ExitCode): never {
    process.exit(code);
  }

  /**
   * Logger for the installer, update source and store. Their debug and
   * info lines only appear with `--verbose`.
   */
  toLogger(): Logger {
    return {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.debug(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => {
        console.error(chalk.red(`Error: ${message}`), ...args);
      },
    };
  }
}

/**
 * Store `base` on the root program for the handlers of this invocation.
 */
export function attachBaseCommand(program: Command, base: BaseCommand): void {
  program.setOptionValue(BASE_COMMAND_KEY, base);
}

/**
 * BaseCommand of the invocation `cmd` belongs to. Nested subcommands look
 * it up on the root program; a default one is returned if none was stored.
 */
export function getBaseCommand(cmd: Command): BaseCommand {
  let root = cmd;
  while (root.parent) {
    root = root.parent;
  }
  const base: unknown = root.getOptionValue(BASE_COMMAND_KEY);
  return base instanceof BaseCommand ? base : new BaseCommand({});
}
