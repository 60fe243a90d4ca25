import type { PathLike } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CacheNamespace } from '../types.js';
import {
  createTempCacheRoot,
  createTestNamespace,
  expectErr,
  expectOk,
  FIXED_NOW_MS,
  ONE_SECOND_MS,
  removeTempCacheRoot,
  systemError,
  textPayload,
} from '../test/fixtures.js';
import { createMockLogger } from '../test/mocks.js';
import { deleteEntry, loadEntry, saveEntry } from './entry-store.js';
import { entryFileName } from './filename.js';

const faults = vi.hoisted(() => {
  const state: { rename: Error | null; unlink: Error | null } = { rename: null, unlink: null };
  return state;
});

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    rename: async (oldPath: PathLike, newPath: PathLike): Promise<void> => {
      if (faults.rename !== null) {
        throw faults.rename;
      }
      return actual.rename(oldPath, newPath);
    },
    unlink: async (filePath: PathLike): Promise<void> => {
      if (faults.unlink !== null) {
        throw faults.unlink;
      }
      return actual.unlink(filePath);
    },
  };
});

describe('entry store under storage faults', () => {
  let cacheRoot: string;
  let namespace: CacheNamespace;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(FIXED_NOW_MS);
    cacheRoot = await createTempCacheRoot();
    logger = createMockLogger();
    namespace = await createTestNamespace(cacheRoot, { logger });
  });

  afterEach(async () => {
    faults.rename = null;
    faults.unlink = null;
    vi.useRealTimers();
    await removeTempCacheRoot(cacheRoot);
  });

  describe('given the final rename fails', () => {
    it('reports storage_unavailable and keeps the previous entry', async () => {
      await saveEntry(namespace, 'key', textPayload('old'));
      faults.rename = systemError('ENOSPC');

      const result = await saveEntry(namespace, 'key', textPayload('new'));

      const error = expectErr(result);
      expect(error.code).toBe('storage_unavailable');
      expect(error.message).toBe('Failed to save cache entry "key" (ENOSPC)');

      faults.rename = null;
      expect(expectOk(await loadEntry(namespace, 'key'))).toEqual(textPayload('old'));
    });

    it('leaves no temporary file behind', async () => {
      faults.rename = systemError('EIO');

      await saveEntry(namespace, 'key', textPayload('value'));

      expect(await readdir(namespace.directory)).toEqual([]);
    });
  });

  describe('given an expired entry that cannot be removed', () => {
    it('still loads as not-found and logs a warning', async () => {
      await saveEntry(namespace, 'key', textPayload('value'), 1);
      vi.setSystemTime(FIXED_NOW_MS + 2 * ONE_SECOND_MS);
      faults.unlink = systemError('EACCES');

      const result = await loadEntry(namespace, 'key');

      expect(result.isOk()).toBe(true);
      expect(expectOk(result)).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith(
        'failed to remove expired cache entry',
        expect.objectContaining({ key: 'key', file: entryFileName('key') })
      );
    });
  });

  describe('given the entry file cannot be deleted', () => {
    it('reports storage_unavailable', async () => {
      await saveEntry(namespace, 'key', textPayload('value'));
      faults.unlink = systemError('EPERM');

      const result = await deleteEntry(namespace, 'key');

      const error = expectErr(result);
      expect(error.code).toBe('storage_unavailable');
      expect(error.message).toBe('Failed to delete cache entry "key" (EPERM)');
    });
  });
});
