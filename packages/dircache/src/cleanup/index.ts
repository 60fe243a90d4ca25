export { cleanAll, cleanExpired, STALE_TEMP_FILE_AGE_MS } from './cleanup.js';
export type {
  CorruptEntryPolicy,
  CleanExpiredOptions,
  CleanupFailure,
  CleanupReport,
} from './types.js';
