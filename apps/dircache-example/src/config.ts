/**
 * Example Program Configuration Module
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { resolveLogLevel, type LogLevel, type NamespaceOptions } from 'dircache';

/**
 * Configuration for the example program.
 */
export interface ExampleConfig {
  /** Options handed to `configure` */
  readonly namespace: Omit<NamespaceOptions, 'logger'>;
  /** Threshold for the console logger */
  readonly logLevel: LogLevel;
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === undefined || value.length === 0 ? undefined : value));

const envSchema = z.object({
  DIRCACHE_APP_NAME: z
    .string({ required_error: 'must be set' })
    .trim()
    .min(1, 'must be set'),
  DIRCACHE_DIR: optionalText,
  DIRCACHE_DEFAULT_TTL_SECONDS: optionalText.pipe(
    z.coerce.number().finite().nonnegative().optional()
  ),
  DIRCACHE_LOG_LEVEL: optionalText,
});

/**
 * Creates the example configuration from environment variables.
 *
 * Required env vars:
 * - DIRCACHE_APP_NAME: Namespace (directory) name
 *
 * Optional env vars:
 * - DIRCACHE_DIR: Parent cache directory (default: $XDG_CACHE_HOME or ~/.cache)
 * - DIRCACHE_DEFAULT_TTL_SECONDS: Default entry lifetime; 0 or unset means never expire
 * - DIRCACHE_LOG_LEVEL: debug | info | warn | error (default: warn)
 *
 * @throws Error naming every invalid variable
 */
export function createExampleConfig(env: NodeJS.ProcessEnv = process.env): ExampleConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  const {
    DIRCACHE_APP_NAME: appName,
    DIRCACHE_DIR: cacheDir,
    DIRCACHE_DEFAULT_TTL_SECONDS: defaultTtlSeconds,
    DIRCACHE_LOG_LEVEL: logLevel,
  } = parsed.data;

  return {
    namespace: { appName, cacheDir, defaultTtlSeconds },
    logLevel: resolveLogLevel(logLevel),
  };
}
