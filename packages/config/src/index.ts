/**
 * @graphdex/config — Environment configuration and logging
 */

export { config, loadEnv, envSchema } from './env.js';
export type { Env } from './env.js';

export { createLogger } from './logger.js';
export type { AppLogger, Logger } from './logger.js';
