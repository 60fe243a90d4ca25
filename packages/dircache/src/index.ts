/**
 * dircache - namespaced file-backed byte cache with per-entry expiration
 *
 * @packageDocumentation
 */

// Public types
export type * from './types.js';

// ============================================================================
// CORE: Configure-once handle
// ============================================================================

export { createFileCache } from './client/index.js';
export type { FileCache, FileCacheOptions } from './client/index.js';

// ============================================================================
// CORE: Namespace resolution
// ============================================================================

export { resolveNamespace, defaultCacheRoot, namespaceDirectory } from './namespace/index.js';
export type { NamespaceOptions } from './namespace/index.js';

// ============================================================================
// CORE: Entry operations
// ============================================================================

export { saveEntry, loadEntry, deleteEntry } from './entry/index.js';

// ============================================================================
// CORE: Cleanup sweeps
// ============================================================================

export { cleanAll, cleanExpired, STALE_TEMP_FILE_AGE_MS } from './cleanup/index.js';
export type {
  CorruptEntryPolicy,
  CleanExpiredOptions,
  CleanupFailure,
  CleanupReport,
} from './cleanup/index.js';

// ============================================================================
// ADVANCED: Logging
// ============================================================================

export { createConsoleLogger, resolveLogLevel, silentLogger, LOG_LEVEL_ENV } from './logging/index.js';
export type { ConsoleLoggerOptions, LogLevel, LogMeta, Logger } from './logging/index.js';

// ============================================================================
// ADVANCED: On-disk format
// ============================================================================

export {
  encodeEntry,
  decodeEntry,
  decodeHeader,
  entryFileName,
  isEntryFileName,
  ENTRY_FORMAT_VERSION,
  HEADER_SIZE,
  MAX_PAYLOAD_LENGTH,
} from './entry/index.js';
export type {
  EntryHeader,
  DecodedEntry,
  EntryDecodeErrorCode,
  EntryDecodeError,
} from './entry/index.js';
