/**
 * Shared test fixtures and constants.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { Result } from 'neverthrow';
import { entryFileName } from '../entry/filename.js';
import { silentLogger } from '../logging/logger.js';
import { resolveNamespace } from '../namespace/resolver.js';
import type { NamespaceOptions } from '../namespace/types.js';
import type { CacheNamespace } from '../types.js';

// ============================================================================
// Time Constants
// ============================================================================

/** Fixed wall-clock time for tests (2026-01-15T12:00:00Z) */
export const FIXED_NOW_MS = Date.UTC(2026, 0, 15, 12, 0, 0);

export const ONE_SECOND_MS = 1000;
export const ONE_MINUTE_SECONDS = 60;
export const ONE_DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Namespace Constants
// ============================================================================

export const TEST_APP_NAME = 'dircache-test-app';

// ============================================================================
// Payloads
// ============================================================================

export const textPayload = (text: string): Buffer => Buffer.from(text, 'utf8');

/** Bytes that would not survive a text round trip */
export const BINARY_PAYLOAD = Buffer.from([0x00, 0xff, 0x0a, 0x0d, 0x80, 0x7f, 0x00]);

// ============================================================================
// Filesystem Helpers
// ============================================================================

/**
 * Creates an empty directory to act as the cache root for one test.
 */
export const createTempCacheRoot = (): Promise<string> =>
  mkdtemp(path.join(os.tmpdir(), 'dircache-test-'));

export const removeTempCacheRoot = (cacheRoot: string): Promise<void> =>
  rm(cacheRoot, { recursive: true, force: true });

/**
 * Resolves a namespace under `cacheRoot`, failing the test if it cannot.
 */
export const createTestNamespace = async (
  cacheRoot: string,
  overrides: Partial<NamespaceOptions> = {}
): Promise<CacheNamespace> => {
  const result = await resolveNamespace({
    appName: TEST_APP_NAME,
    cacheDir: cacheRoot,
    logger: silentLogger,
    ...overrides,
  });
  if (result.isErr()) {
    throw new Error(`Test namespace could not be resolved: ${result.error.message}`);
  }
  return result.value;
};

/**
 * Path of the entry file for `key`.
 */
export const entryFilePath = (namespace: CacheNamespace, key: string): string =>
  path.join(namespace.directory, entryFileName(key));

/**
 * Writes raw bytes where the entry for `key` lives, bypassing the store.
 */
export const writeRawEntry = (namespace: CacheNamespace, key: string, bytes: Uint8Array): Promise<void> =>
  writeFile(entryFilePath(namespace, key), bytes);

/**
 * Builds an error shaped like a Node.js system error.
 */
export const systemError = (code: string, message = `${code}: simulated failure`): NodeJS.ErrnoException =>
  Object.assign(new Error(message), { code });

// ============================================================================
// Result Helpers
// ============================================================================

/**
 * Returns the value of an ok result, failing the test on err.
 */
export const expectOk = <T, E>(result: Result<T, E>): T => {
  if (result.isErr()) {
    throw new Error(`Expected ok, got err: ${JSON.stringify(result.error)}`);
  }
  return result.value;
};

/**
 * Returns the error of an err result, failing the test on ok.
 */
export const expectErr = <T, E>(result: Result<T, E>): E => {
  if (result.isOk()) {
    throw new Error(`Expected err, got ok: ${JSON.stringify(result.value)}`);
  }
  return result.error;
};
