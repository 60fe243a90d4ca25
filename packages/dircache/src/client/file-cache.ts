import { err, type Result } from 'neverthrow';
import { cleanAll, cleanExpired } from '../cleanup/cleanup.js';
import type { CleanExpiredOptions } from '../cleanup/types.js';
import { deleteEntry, loadEntry, saveEntry } from '../entry/entry-store.js';
import { createNotConfiguredError } from '../errors.js';
import { resolveNamespace } from '../namespace/resolver.js';
import type { NamespaceOptions } from '../namespace/types.js';
import type { CacheError, CacheNamespace } from '../types.js';
import type { FileCache, FileCacheOptions } from './types.js';

/**
 * Creates a file cache handle.
 *
 * @param options - Defaults for namespaces configured through this handle
 * @returns A FileCache instance with no active namespace
 *
 * @example
 * ```typescript
 * const cache = createFileCache();
 * await cache.configure({ appName: 'weather-widget', defaultTtlSeconds: 600 });
 *
 * await cache.save('forecast:berlin', Buffer.from(body));
 * const result = await cache.load('forecast:berlin');
 * if (result.isOk() && result.value !== undefined) {
 *   render(Buffer.from(result.value).toString('utf8'));
 * }
 * ```
 */
export const createFileCache = (options: FileCacheOptions = {}): FileCache => {
  let active: CacheNamespace | undefined;

  const withNamespace = <T>(
    operation: (namespace: CacheNamespace) => Promise<Result<T, CacheError>>
  ): Promise<Result<T, CacheError>> => {
    if (active === undefined) {
      return Promise.resolve(err(createNotConfiguredError()));
    }
    return operation(active);
  };

  const configure = async (namespaceOptions: NamespaceOptions): Promise<Result<CacheNamespace, CacheError>> => {
    const result = await resolveNamespace({
      ...namespaceOptions,
      logger: namespaceOptions.logger ?? options.logger,
    });
    if (result.isOk()) {
      active = result.value;
    }
    return result;
  };

  return {
    configure,
    namespace: () => active,
    save: (key: string, payload: Uint8Array, ttlSeconds?: number) =>
      withNamespace((namespace) => saveEntry(namespace, key, payload, ttlSeconds)),
    load: (key: string) => withNamespace((namespace) => loadEntry(namespace, key)),
    delete: (key: string) => withNamespace((namespace) => deleteEntry(namespace, key)),
    cleanAll: () => withNamespace((namespace) => cleanAll(namespace)),
    cleanExpired: (cleanOptions?: CleanExpiredOptions) =>
      withNamespace((namespace) => cleanExpired(namespace, cleanOptions)),
  };
};
