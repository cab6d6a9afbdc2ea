/**
 * Config Commands
 *
 * Show and change the persisted preferences in <dataDir>/config.json.
 *
 * @module cli/commands/config
 */

import type { Command } from 'commander';
import { config } from '../../config/index.js';
import { assertNever } from '../../routedb/errors.js';
import { err, ok, type Result } from '../../routedb/types.js';
import { formatZodIssues } from '../../schemas/common.js';
import { GlobalConfigSchema, type GlobalConfig } from '../../storage/config.js';
import { getGlobalConfigPath } from '../../storage/paths.js';
import { DEFAULT_POSTS_SORT_ORDER, DEFAULT_ROUTES_SORT_ORDER } from '../../usecases/routedb.js';
import { EXIT_CODES, getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { runCommand, type CliServices } from '../services.js';

// ============================================================================
// Settings
// ============================================================================

/**
 * Keys that can be changed with `config set`.
 */
export const SETTABLE_CONFIG_KEYS = ['otaBaseUrl', 'routesSortOrder', 'postsSortOrder'] as const;
export type SettableConfigKey = (typeof SETTABLE_CONFIG_KEYS)[number];

type ConfigChanges = Partial<Pick<GlobalConfig, SettableConfigKey>>;

function isSettableConfigKey(key: string): key is SettableConfigKey {
  return SETTABLE_CONFIG_KEYS.some((settable) => settable === key);
}

/**
 * Validate a `config set` argument pair.
 */
export function parseConfigSetting(key: string, value: string): Result<ConfigChanges, string> {
  if (!isSettableConfigKey(key)) {
    return err(`Unknown config key: ${key} (expected one of ${SETTABLE_CONFIG_KEYS.join(', ')})`);
  }

  const shape = GlobalConfigSchema.shape;
  switch (key) {
    case 'otaBaseUrl': {
      const parsed = shape.otaBaseUrl.safeParse(value);
      return parsed.success
        ? ok({ otaBaseUrl: parsed.data })
        : err(`Invalid value for ${key}: ${formatZodIssues(parsed.error)}`);
    }
    case 'routesSortOrder': {
      const parsed = shape.routesSortOrder.safeParse(value);
      return parsed.success
        ? ok({ routesSortOrder: parsed.data })
        : err(`Invalid value for ${key}: ${formatZodIssues(parsed.error)}`);
    }
    case 'postsSortOrder': {
      const parsed = shape.postsSortOrder.safeParse(value);
      return parsed.success
        ? ok({ postsSortOrder: parsed.data })
        : err(`Invalid value for ${key}: ${formatZodIssues(parsed.error)}`);
    }
    default:
      return assertNever(key);
  }
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('View and manage configuration');

  configCmd
    .command('show')
    .description('Show current configuration')
    .action(async (_options: unknown, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runCommand(base, (services) => handleConfigShow(base, services));
    });

  configCmd
    .command('set <key> <value>')
    .description(`Set a configuration value (${SETTABLE_CONFIG_KEYS.join(', ')})`)
    .action(async (key: string, value: string, _options: unknown, cmd: Command) => {
      const base = getBaseCommand(cmd);
      await runCommand(base, (services) => handleConfigSet(key, value, base, services));
    });
}

export async function handleConfigShow(base: BaseCommand, services: CliServices): Promise<ExitCode> {
  const saved = await services.preferences.load();

  base.section('Configuration');
  base.keyValue('Data directory', base.dataDir);
  base.keyValue('Config file', getGlobalConfigPath(base.dataDir));
  base.keyValue('Route database', services.store.dbPath);
  base.keyValue(
    'Update service',
    saved.otaBaseUrl ?? `${config.ota.baseUrl} (from environment)`
  );
  base.keyValue('Update endpoint', config.ota.endpoint);
  base.keyValue('Routes sort order', saved.routesSortOrder ?? `${DEFAULT_ROUTES_SORT_ORDER} (default)`);
  base.keyValue('Posts sort order', saved.postsSortOrder ?? `${DEFAULT_POSTS_SORT_ORDER} (default)`);
  return EXIT_CODES.SUCCESS;
}

export async function handleConfigSet(
  key: string,
  value: string,
  base: BaseCommand,
  services: CliServices
): Promise<ExitCode> {
  const parsed = parseConfigSetting(key, value);
  if (!parsed.success) {
    base.fail(parsed.error);
    return EXIT_CODES.USAGE_ERROR;
  }

  await services.preferences.update(parsed.data);
  base.success(`Set ${key} = ${value}`);
  return EXIT_CODES.SUCCESS;
}
