import type { CacheError } from '../types.js';

/**
 * How `cleanExpired` treats entries whose header cannot be decoded.
 *
 * - `keep`: leave them in place
 * - `remove`: treat them as garbage and delete them
 */
export type CorruptEntryPolicy = 'keep' | 'remove';

/**
 * Options for `cleanExpired`.
 */
export interface CleanExpiredOptions {
  /** Handling of undecodable entries (default: "keep") */
  readonly corruptEntries?: CorruptEntryPolicy | undefined;
}

/**
 * An entry a sweep failed to process.
 */
export interface CleanupFailure {
  /** Entry or temporary file name within the namespace directory */
  readonly fileName: string;
  readonly error: CacheError;
}

/**
 * Aggregate outcome of a cleanup sweep.
 *
 * Sweeps continue past per-entry failures, so a report can carry both
 * removals and failures.
 */
export interface CleanupReport {
  /** Entry files found when the directory was enumerated */
  readonly examined: number;
  /** Entry files this sweep removed */
  readonly removed: number;
  /** Entries that could not be processed */
  readonly failures: readonly CleanupFailure[];
}
