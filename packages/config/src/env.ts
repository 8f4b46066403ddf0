/**
 * @graphdex/config — Process environment
 *
 * Validates the environment once with zod. Every consumer reads the typed
 * `config` object rather than `process.env`.
 */

import { z } from 'zod';
import { ConfigError } from '@graphdex/support';

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(logLevels).optional(),
  /** Path to the YAML datastore settings file */
  DATASTORE_SETTINGS_PATH: z.string().min(1).optional(),
  /** Directory holding runtime_metadata.yaml and datastore_config.yaml */
  SCHEMA_ARTIFACTS_DIR: z.string().min(1).optional(),
  DATASTORE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate an environment.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment:\n${problems.join('\n')}`);
  }
  return result.data;
}

/** Validated process environment */
export const config: Env = loadEnv();
