import type { CacheError } from './types.js';

/**
 * Reads the `code` property of a Node.js system error, if present.
 */
export const systemErrorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
};

/**
 * Whether the error reports a path that does not exist.
 */
export const isNotFoundError = (error: unknown): boolean => systemErrorCode(error) === 'ENOENT';

/**
 * Creates a CacheError for a failed filesystem operation.
 *
 * @param message - What was being attempted
 * @param path - The path the operation touched
 * @param cause - The original error
 */
export const createStorageError = (message: string, path: string, cause?: unknown): CacheError => {
  const code = systemErrorCode(cause);
  return {
    code: 'storage_unavailable',
    message: code !== undefined ? `${message} (${code})` : message,
    path,
    cause,
  };
};

export const createInvalidConfigError = (message: string, cause?: unknown): CacheError => ({
  code: 'invalid_config',
  message,
  cause,
});

export const createInvalidKeyError = (): CacheError => ({
  code: 'invalid_key',
  message: 'Cache key must be a non-empty string',
});

export const createInvalidTtlError = (ttlSeconds: number): CacheError => ({
  code: 'invalid_ttl',
  message: `TTL must be a finite number of seconds >= 0, received ${String(ttlSeconds)}`,
});

export const createPayloadTooLargeError = (length: number, maxLength: number): CacheError => ({
  code: 'payload_too_large',
  message: `Payload of ${String(length)} bytes exceeds the ${String(maxLength)} byte limit`,
});

export const createNotConfiguredError = (): CacheError => ({
  code: 'not_configured',
  message: 'No cache namespace configured. Call configure() first.',
});
