/**
 * Entry store: save, load and delete individual cache entries.
 *
 * @packageDocumentation
 */

import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { err, ok, type Result } from 'neverthrow';
import {
  createInvalidKeyError,
  createInvalidTtlError,
  createPayloadTooLargeError,
  createStorageError,
} from '../errors.js';
import type { CacheError, CacheNamespace } from '../types.js';
import { entryFileName } from './filename.js';
import {
  readEntryFile,
  removeFile,
  removeIfUnchanged,
  writeFileAtomically,
  type EntryFile,
} from './files.js';
import { computeExpiration, decodeEntry, encodeEntry, isExpired, MAX_PAYLOAD_LENGTH } from './header.js';

const isValidTtl = (ttlSeconds: number, now: number): boolean =>
  Number.isFinite(ttlSeconds) &&
  ttlSeconds >= 0 &&
  now + Math.round(ttlSeconds * 1000) <= Number.MAX_SAFE_INTEGER;

/**
 * Stores `payload` under `key`, replacing any previous entry.
 *
 * The entry expires `ttlSeconds` from now; without a TTL the namespace
 * default applies, and without either the entry never expires. A TTL of 0
 * also means no expiry, so it can switch off a namespace default for one
 * save. The write is atomic: a failed save leaves any previous entry for the
 * key intact.
 *
 * @param namespace - Namespace to write into
 * @param key - Non-empty cache key
 * @param payload - Bytes to store verbatim (may be empty)
 * @param ttlSeconds - Optional time-to-live overriding the namespace default
 * @returns Result with nothing on success
 *
 * @example
 * ```typescript
 * const result = await saveEntry(namespace, 'profile', Buffer.from(json), 60);
 * if (result.isErr()) {
 *   console.error(result.error.message);
 * }
 * ```
 */
export const saveEntry = async (
  namespace: CacheNamespace,
  key: string,
  payload: Uint8Array,
  ttlSeconds?: number
): Promise<Result<void, CacheError>> => {
  if (key.length === 0) {
    return err(createInvalidKeyError());
  }

  if (payload.length > MAX_PAYLOAD_LENGTH) {
    return err(createPayloadTooLargeError(payload.length, MAX_PAYLOAD_LENGTH));
  }

  const now = Date.now();
  const effectiveTtl = ttlSeconds ?? namespace.defaultTtlSeconds;
  if (effectiveTtl !== undefined && !isValidTtl(effectiveTtl, now)) {
    return err(createInvalidTtlError(effectiveTtl));
  }

  const expiration = computeExpiration(now, effectiveTtl);
  const fileName = entryFileName(key);

  try {
    // Recreated here in case the directory was removed after configuration
    await mkdir(namespace.directory, { recursive: true });
    await writeFileAtomically(
      namespace.directory,
      fileName,
      encodeEntry(payload, now, expiration),
      namespace.logger
    );
  } catch (error) {
    return err(
      createStorageError(
        `Failed to save cache entry "${key}"`,
        path.join(namespace.directory, fileName),
        error
      )
    );
  }

  namespace.logger.debug('entry saved', {
    key,
    file: fileName,
    bytes: payload.length,
    expiresAt: expiration.kind === 'at' ? new Date(expiration.at).toISOString() : null,
  });
  return ok(undefined);
};

/**
 * Loads the payload stored under `key`.
 *
 * Missing, expired and undecodable entries all load as `undefined`. An
 * expired entry is removed on the way out unless another writer has
 * replaced it in the meantime.
 *
 * @returns Result with the payload, or undefined when there is none
 *
 * @example
 * ```typescript
 * const result = await loadEntry(namespace, 'profile');
 * if (result.isOk() && result.value !== undefined) {
 *   const profile = JSON.parse(Buffer.from(result.value).toString('utf8'));
 * }
 * ```
 */
export const loadEntry = async (
  namespace: CacheNamespace,
  key: string
): Promise<Result<Uint8Array | undefined, CacheError>> => {
  if (key.length === 0) {
    return err(createInvalidKeyError());
  }

  const fileName = entryFileName(key);
  const filePath = path.join(namespace.directory, fileName);

  let file: EntryFile | undefined;
  try {
    file = await readEntryFile(filePath);
  } catch (error) {
    return err(createStorageError(`Failed to load cache entry "${key}"`, filePath, error));
  }

  if (file === undefined) {
    return ok(undefined);
  }

  const decoded = decodeEntry(file.bytes);
  if (decoded.isErr()) {
    namespace.logger.warn('skipping undecodable cache entry', {
      key,
      file: fileName,
      reason: decoded.error.code,
      detail: decoded.error.message,
    });
    return ok(undefined);
  }

  const { header, payload } = decoded.value;
  if (!isExpired(header.expiration, Date.now())) {
    return ok(payload);
  }

  try {
    const outcome = await removeIfUnchanged(filePath, file.ino);
    namespace.logger.debug('expired entry discarded on load', { key, file: fileName, outcome });
  } catch (error) {
    namespace.logger.warn('failed to remove expired cache entry', { key, file: fileName, error });
  }

  return ok(undefined);
};

/**
 * Removes the entry stored under `key`. Deleting a missing entry succeeds.
 *
 * @returns Result with true if this call removed an entry, false if there was none
 */
export const deleteEntry = async (
  namespace: CacheNamespace,
  key: string
): Promise<Result<boolean, CacheError>> => {
  if (key.length === 0) {
    return err(createInvalidKeyError());
  }

  const fileName = entryFileName(key);
  const filePath = path.join(namespace.directory, fileName);

  try {
    const removed = await removeFile(filePath);
    if (removed) {
      namespace.logger.debug('entry deleted', { key, file: fileName });
    }
    return ok(removed);
  } catch (error) {
    return err(createStorageError(`Failed to delete cache entry "${key}"`, filePath, error));
  }
};
