/**
 * Configuration Module
 *
 * Loads and validates environment variables for the route database manager.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { DEFAULT_OTA_ENDPOINT } from '../ota/source.js';
import { resolveDataDir } from '../storage/paths.js';

export const DEFAULT_OTA_BASE_URL = 'https://ota.example.org/routedb/';
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Data directory
  ROUTEDB_DATA_DIR: z.string().optional(),

  // Update service
  ROUTEDB_OTA_BASE_URL: z.string().url().default(DEFAULT_OTA_BASE_URL),
  ROUTEDB_OTA_ENDPOINT: z.string().min(1).default(DEFAULT_OTA_ENDPOINT),
  ROUTEDB_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

function buildConfig(env: Env) {
  return {
    // Environment
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    // Data directory
    dataDir: resolveDataDir(env.ROUTEDB_DATA_DIR),

    // Update service
    ota: {
      baseUrl: env.ROUTEDB_OTA_BASE_URL,
      endpoint: env.ROUTEDB_OTA_ENDPOINT,
      timeoutMs: env.ROUTEDB_HTTP_TIMEOUT_MS,
    },
  } as const;
}

export type Config = ReturnType<typeof buildConfig>;

/**
 * Validate an environment and derive the configuration from it.
 *
 * @throws {z.ZodError} If a variable has an invalid value
 */
export function parseEnvironment(env: NodeJS.ProcessEnv): Config {
  return buildConfig(envSchema.parse(env));
}

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * Application configuration singleton
 */
export const config: Config = buildConfig(parseResult.data);
