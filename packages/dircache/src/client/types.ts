import type { Result } from 'neverthrow';
import type { CleanExpiredOptions, CleanupReport } from '../cleanup/types.js';
import type { Logger } from '../logging/types.js';
import type { NamespaceOptions } from '../namespace/types.js';
import type { CacheError, CacheNamespace } from '../types.js';

/**
 * Defaults applied by a file cache handle when `configure` omits them.
 */
export interface FileCacheOptions {
  /** Logger used for namespaces configured without their own */
  readonly logger?: Logger | undefined;
}

/**
 * A configure-once handle over the entry and cleanup operations.
 *
 * Every operation acts on the namespace set by the last successful
 * `configure` call and fails with `not_configured` before the first one.
 * Handles are independent of each other.
 */
export interface FileCache {
  /**
   * Resolves a namespace and makes it active for this handle.
   * A failed call leaves the previously active namespace in place.
   */
  readonly configure: (options: NamespaceOptions) => Promise<Result<CacheNamespace, CacheError>>;

  /**
   * The active namespace, if any.
   */
  readonly namespace: () => CacheNamespace | undefined;

  /**
   * Stores a payload.
   * @param key - Cache key
   * @param payload - Bytes to store
   * @param ttlSeconds - Optional TTL overriding the namespace default; 0 means never expire
   */
  readonly save: (key: string, payload: Uint8Array, ttlSeconds?: number) => Promise<Result<void, CacheError>>;

  /**
   * Loads a payload.
   * @returns undefined when missing or expired
   */
  readonly load: (key: string) => Promise<Result<Uint8Array | undefined, CacheError>>;

  /**
   * Deletes an entry.
   * @returns true if an entry was removed
   */
  readonly delete: (key: string) => Promise<Result<boolean, CacheError>>;

  /**
   * Removes every entry.
   */
  readonly cleanAll: () => Promise<Result<CleanupReport, CacheError>>;

  /**
   * Removes expired entries.
   */
  readonly cleanExpired: (options?: CleanExpiredOptions) => Promise<Result<CleanupReport, CacheError>>;
}
