/**
 * Cleanup sweeps over a namespace directory.
 *
 * Sweeps run concurrently with saves, loads and deletes from this or other
 * processes. A file that disappears between enumeration and removal is
 * treated as already clean, and a failure on one entry is recorded in the
 * report while the sweep carries on with the rest.
 *
 * An entry counts as expired once the clock reaches its expiry time
 * (`now >= expiresAt`), the same test `loadEntry` applies.
 *
 * Both sweeps also remove temporary files left behind by interrupted saves,
 * once they are older than {@link STALE_TEMP_FILE_AGE_MS}. Younger ones may
 * belong to a save still in progress and are left alone.
 *
 * @packageDocumentation
 */

import { lstat, readdir } from 'node:fs/promises';
import path from 'node:path';
import { err, ok, type Result } from 'neverthrow';
import { createStorageError, isNotFoundError } from '../errors.js';
import { isExpired } from '../entry/header.js';
import { isEntryFileName, isTempFileName } from '../entry/filename.js';
import { readEntryHeader, removeFile, removeIfUnchanged } from '../entry/files.js';
import type { RemovalOutcome } from '../entry/types.js';
import type { CacheError, CacheNamespace } from '../types.js';
import type { CleanExpiredOptions, CleanupFailure, CleanupReport } from './types.js';

type SweepOutcome = RemovalOutcome | 'kept';

type SweepDecision = (filePath: string, fileName: string) => Promise<SweepOutcome>;

/** Age after which a temporary file is taken to be abandoned: 10 minutes. */
export const STALE_TEMP_FILE_AGE_MS = 10 * 60 * 1000;

interface DirectoryListing {
  readonly entries: readonly string[];
  readonly tempFiles: readonly string[];
}

/**
 * Lists entry and temporary file names in the namespace directory.
 * Directories, symlinks and foreign files are left out.
 */
const listCacheFiles = async (directory: string): Promise<DirectoryListing> => {
  try {
    const files = (await readdir(directory, { withFileTypes: true }))
      .filter((dirent) => dirent.isFile())
      .map((dirent) => dirent.name);
    return {
      entries: files.filter(isEntryFileName),
      tempFiles: files.filter(isTempFileName),
    };
  } catch (error) {
    if (isNotFoundError(error)) {
      return { entries: [], tempFiles: [] };
    }
    throw error;
  }
};

/**
 * Removes a temporary file if it was last written at least
 * {@link STALE_TEMP_FILE_AGE_MS} before `now`.
 */
const removeStaleTempFile = async (filePath: string, now: number): Promise<boolean> => {
  try {
    const stats = await lstat(filePath);
    if (now - stats.mtimeMs < STALE_TEMP_FILE_AGE_MS) {
      return false;
    }
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw error;
  }
  return removeFile(filePath);
};

const sweep = async (
  namespace: CacheNamespace,
  sweepName: string,
  decide: SweepDecision
): Promise<Result<CleanupReport, CacheError>> => {
  let listing: DirectoryListing;
  try {
    listing = await listCacheFiles(namespace.directory);
  } catch (error) {
    return err(
      createStorageError(`Failed to list cache directory for ${sweepName}`, namespace.directory, error)
    );
  }

  let removed = 0;
  const failures: CleanupFailure[] = [];
  const recordFailure = (fileName: string, filePath: string, error: unknown): void => {
    const failure = createStorageError(`Failed to process cache entry during ${sweepName}`, filePath, error);
    namespace.logger.warn('cleanup skipped entry', { sweep: sweepName, file: fileName, error: failure.message });
    failures.push({ fileName, error: failure });
  };

  for (const fileName of listing.entries) {
    const filePath = path.join(namespace.directory, fileName);
    try {
      const outcome = await decide(filePath, fileName);
      if (outcome === 'removed') {
        removed += 1;
      }
    } catch (error) {
      recordFailure(fileName, filePath, error);
    }
  }

  const now = Date.now();
  for (const fileName of listing.tempFiles) {
    const filePath = path.join(namespace.directory, fileName);
    try {
      if (await removeStaleTempFile(filePath, now)) {
        namespace.logger.debug('stale temporary file removed', { sweep: sweepName, file: fileName });
      }
    } catch (error) {
      recordFailure(fileName, filePath, error);
    }
  }

  namespace.logger.debug('cleanup finished', {
    sweep: sweepName,
    examined: listing.entries.length,
    removed,
    failed: failures.length,
  });

  return ok({ examined: listing.entries.length, removed, failures });
};

/**
 * Removes every entry in the namespace, expired or not.
 *
 * The namespace directory itself is kept.
 *
 * @returns Result with the sweep report; `err` only if the directory cannot be listed
 *
 * @example
 * ```typescript
 * const result = await cleanAll(namespace);
 * if (result.isOk()) {
 *   console.log(`removed ${result.value.removed} entries`);
 * }
 * ```
 */
export const cleanAll = (namespace: CacheNamespace): Promise<Result<CleanupReport, CacheError>> =>
  sweep(namespace, 'clean all', async (filePath) => ((await removeFile(filePath)) ? 'removed' : 'vanished'));

/**
 * Removes entries whose expiration has passed.
 *
 * Only each entry's header is read. Entries without an expiration are never
 * removed, and an entry replaced by a concurrent save after its header was
 * read is left alone.
 *
 * @param namespace - Namespace to sweep
 * @param options - Handling of undecodable entries
 * @returns Result with the sweep report; `err` only if the directory cannot be listed
 */
export const cleanExpired = (
  namespace: CacheNamespace,
  options: CleanExpiredOptions = {}
): Promise<Result<CleanupReport, CacheError>> => {
  const corruptEntries = options.corruptEntries ?? 'keep';
  const now = Date.now();

  return sweep(namespace, 'clean expired', async (filePath, fileName) => {
    const inspected = await readEntryHeader(filePath);
    if (inspected === undefined) {
      return 'vanished';
    }

    if (inspected.header.isErr()) {
      if (corruptEntries === 'remove') {
        return removeIfUnchanged(filePath, inspected.ino);
      }
      namespace.logger.warn('keeping undecodable cache entry', {
        file: fileName,
        reason: inspected.header.error.code,
      });
      return 'kept';
    }

    if (!isExpired(inspected.header.value.expiration, now)) {
      return 'kept';
    }
    return removeIfUnchanged(filePath, inspected.ino);
  });
};
