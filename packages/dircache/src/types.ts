import type { Logger } from './logging/types.js';

/**
 * A resolved cache namespace.
 *
 * Produced by `resolveNamespace` and passed explicitly into every entry
 * and cleanup operation. Two namespaces with the same `directory` address
 * the same entries.
 */
export interface CacheNamespace {
  /** Application name the namespace was derived from */
  readonly name: string;
  /** Absolute path of the namespace directory */
  readonly directory: string;
  /** TTL applied to saves that do not pass their own (absent = never expire) */
  readonly defaultTtlSeconds?: number | undefined;
  /** Logger used by every operation on this namespace */
  readonly logger: Logger;
}

/**
 * Expiration of a stored entry.
 */
export type Expiration =
  | { readonly kind: 'never' }
  | {
      readonly kind: 'at';
      /** Absolute expiry time (Unix epoch, milliseconds) */
      readonly at: number;
    };

/**
 * Error codes reported by cache operations.
 */
export type CacheErrorCode =
  | 'invalid_config'
  | 'invalid_key'
  | 'invalid_ttl'
  | 'payload_too_large'
  | 'not_configured'
  | 'storage_unavailable';

/**
 * Cache operation error.
 *
 * A missing or expired entry is never a `CacheError`; loads report it as
 * an `undefined` payload.
 */
export interface CacheError {
  /** Error code */
  readonly code: CacheErrorCode;
  /** Human-readable error message */
  readonly message: string;
  /** Filesystem path involved, when there is one */
  readonly path?: string | undefined;
  /** Underlying cause */
  readonly cause?: unknown;
}
