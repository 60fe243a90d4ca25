import type { Expiration } from '../types.js';

/**
 * Metadata stored at the start of every entry file.
 */
export interface EntryHeader {
  /** On-disk format version */
  readonly version: number;
  /** Write time (Unix epoch, milliseconds) */
  readonly createdAt: number;
  readonly expiration: Expiration;
  /** Payload size in bytes */
  readonly payloadLength: number;
}

/**
 * A fully parsed entry file.
 */
export interface DecodedEntry {
  readonly header: EntryHeader;
  readonly payload: Uint8Array;
}

/**
 * Reasons an entry file cannot be decoded.
 */
export type EntryDecodeErrorCode =
  | 'truncated_header'
  | 'unsupported_version'
  | 'invalid_flags'
  | 'length_mismatch';

/**
 * Entry decoding error.
 */
export interface EntryDecodeError {
  readonly code: EntryDecodeErrorCode;
  readonly message: string;
}

/**
 * What happened when removing a file that may be changing underneath us.
 *
 * - `removed`: this call unlinked it
 * - `vanished`: someone else removed it first
 * - `replaced`: the path now holds a different file, which was left alone
 */
export type RemovalOutcome = 'removed' | 'vanished' | 'replaced';
