/**
 * Namespace resolution: application name to cache directory.
 *
 * @packageDocumentation
 */

import { mkdir } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { err, ok, type Result } from 'neverthrow';
import { createInvalidConfigError, createStorageError } from '../errors.js';
import { createConsoleLogger } from '../logging/logger.js';
import type { CacheError, CacheNamespace } from '../types.js';
import { formatIssues, namespaceOptionsSchema } from './schema.js';
import type { NamespaceOptions } from './types.js';

/**
 * Default parent directory for cache namespaces.
 *
 * An absolute `XDG_CACHE_HOME` wins; otherwise `~/.cache`.
 */
export const defaultCacheRoot = (env: NodeJS.ProcessEnv = process.env): string => {
  const xdgCacheHome = env['XDG_CACHE_HOME'];
  if (xdgCacheHome !== undefined && path.isAbsolute(xdgCacheHome)) {
    return xdgCacheHome;
  }
  return path.join(os.homedir(), '.cache');
};

/**
 * Directory for `appName` under `cacheDir`. Same inputs, same path.
 */
export const namespaceDirectory = (appName: string, cacheDir: string = defaultCacheRoot()): string =>
  path.join(path.resolve(cacheDir), appName);

/**
 * Validates options and creates the namespace directory if it is missing.
 *
 * @param options - Namespace options
 * @returns Result with the resolved namespace, or `invalid_config` /
 *   `storage_unavailable`
 *
 * @example
 * ```typescript
 * const result = await resolveNamespace({ appName: 'weather-widget', defaultTtlSeconds: 300 });
 * if (result.isOk()) {
 *   await saveEntry(result.value, 'forecast', payload);
 * }
 * ```
 */
export const resolveNamespace = async (
  options: NamespaceOptions
): Promise<Result<CacheNamespace, CacheError>> => {
  const parsed = namespaceOptionsSchema.safeParse({
    appName: options.appName,
    defaultTtlSeconds: options.defaultTtlSeconds,
    cacheDir: options.cacheDir,
  });
  if (!parsed.success) {
    return err(
      createInvalidConfigError(`Invalid cache namespace options: ${formatIssues(parsed.error)}`, parsed.error)
    );
  }

  const { appName, defaultTtlSeconds, cacheDir } = parsed.data;
  const directory = namespaceDirectory(appName, cacheDir);

  try {
    await mkdir(directory, { recursive: true });
  } catch (error) {
    return err(createStorageError(`Failed to create cache directory for "${appName}"`, directory, error));
  }

  const logger = options.logger ?? createConsoleLogger();
  logger.debug('namespace resolved', { appName, directory });

  return ok({
    name: appName,
    directory,
    defaultTtlSeconds,
    logger,
  });
};
