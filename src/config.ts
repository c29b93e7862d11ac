/**
 * Process-wide library configuration.
 *
 * Holds the library logger and the random source used by `random()`
 * constructors. Settings are validated with zod when they are applied.
 *
 * @module
 */

import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { ConfigurationInvalidError } from './types/errors.js';
import { createLogger, DEFAULT_LOG_PREFIX, silentLogger } from './utils/logger.js';
import type { Logger } from './utils/logger.js';

/** Fill-in source of random bytes. Must return exactly `size` bytes. */
export type RandomSource = (size: number) => Uint8Array;

export const LOG_LEVEL_ENV = 'BOUNDED_VALUES_LOG_LEVEL';

const configSchema = z
  .object({
    logLevel: z.enum(['debug', 'warn', 'silent']),
    logPrefix: z.string().min(1),
    randomSource: z.custom<RandomSource>((value) => typeof value === 'function', {
      message: 'randomSource must be a function',
    }),
  })
  .strict();

export type BoundedConfig = z.infer<typeof configSchema>;

const defaultRandomSource: RandomSource = (size) => randomBytes(size);

const DEFAULT_CONFIG: BoundedConfig = {
  logLevel: 'silent',
  logPrefix: DEFAULT_LOG_PREFIX,
  randomSource: defaultRandomSource,
};

let currentConfig: BoundedConfig = { ...DEFAULT_CONFIG };
let currentLogger: Logger = silentLogger;

/**
 * Apply configuration overrides. Unspecified keys keep their current value.
 *
 * @example
 * ```typescript
 * configure({ logLevel: 'debug' });
 * ```
 */
export function configure(overrides: Partial<BoundedConfig>): BoundedConfig {
  const parsed = configSchema.safeParse({ ...currentConfig, ...overrides });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationInvalidError(details);
  }
  currentConfig = parsed.data;
  currentLogger = createLogger(currentConfig.logLevel, currentConfig.logPrefix);
  return getConfig();
}

export function getConfig(): BoundedConfig {
  return { ...currentConfig };
}

/** Restore the defaults: silent logging and `node:crypto` randomness. */
export function resetConfig(): void {
  currentConfig = { ...DEFAULT_CONFIG };
  currentLogger = silentLogger;
}

/**
 * Read overrides from environment variables. Unset variables yield no
 * override; a set but unknown level is rejected by {@link configure}.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<BoundedConfig> {
  const level = env[LOG_LEVEL_ENV];
  if (level === undefined || level === '') {
    return {};
  }
  const parsed = configSchema.shape.logLevel.safeParse(level.toLowerCase());
  if (!parsed.success) {
    throw new ConfigurationInvalidError(`${LOG_LEVEL_ENV} must be one of debug, warn, silent`);
  }
  return { logLevel: parsed.data };
}

/** Apply {@link configFromEnv} overrides on top of the current configuration. */
export function configureFromEnv(env: NodeJS.ProcessEnv = process.env): BoundedConfig {
  return configure(configFromEnv(env));
}

export function getLogger(): Logger {
  return currentLogger;
}

export function getRandomSource(): RandomSource {
  return currentConfig.randomSource;
}
