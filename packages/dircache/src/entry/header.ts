/**
 * Binary entry format.
 *
 * Every entry file is a fixed big-endian header followed by the payload:
 *
 * ```text
 * [version u8][flags u8][created_at u64][expires_at u64][length u32][payload]
 * ```
 *
 * Timestamps are Unix epoch milliseconds. Flag bit 0 marks an entry that
 * expires; without it `expires_at` must be zero.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import type { Expiration } from '../types.js';
import type { DecodedEntry, EntryDecodeError, EntryHeader } from './types.js';

/** Current on-disk format version */
export const ENTRY_FORMAT_VERSION = 1;

/** Header size in bytes */
export const HEADER_SIZE = 22;

/** Largest payload the u32 length field can describe */
export const MAX_PAYLOAD_LENGTH = 0xffff_ffff;

const FLAG_EXPIRES = 0x01;

const OFFSET_VERSION = 0;
const OFFSET_FLAGS = 1;
const OFFSET_CREATED_AT = 2;
const OFFSET_EXPIRES_AT = 10;
const OFFSET_LENGTH = 18;

/**
 * Computes the expiration for an entry written at `now`.
 *
 * @param now - Write time (epoch ms)
 * @param ttlSeconds - Time-to-live; `undefined` or 0 means the entry never expires
 */
export const computeExpiration = (now: number, ttlSeconds: number | undefined): Expiration => {
  if (ttlSeconds === undefined || ttlSeconds === 0) {
    return { kind: 'never' };
  }
  return { kind: 'at', at: now + Math.round(ttlSeconds * 1000) };
};

/**
 * Whether an entry with this expiration is logically gone at `now`.
 */
export const isExpired = (expiration: Expiration, now: number): boolean =>
  expiration.kind === 'at' && now >= expiration.at;

/**
 * Serializes a payload and its metadata into the on-disk representation.
 *
 * @example
 * ```typescript
 * const bytes = encodeEntry(Buffer.from('hello'), Date.now(), { kind: 'never' });
 * bytes.length; // 27
 * ```
 */
export const encodeEntry = (payload: Uint8Array, createdAt: number, expiration: Expiration): Buffer => {
  const buffer = Buffer.alloc(HEADER_SIZE + payload.length);

  buffer.writeUInt8(ENTRY_FORMAT_VERSION, OFFSET_VERSION);
  buffer.writeUInt8(expiration.kind === 'at' ? FLAG_EXPIRES : 0, OFFSET_FLAGS);
  buffer.writeBigUInt64BE(BigInt(createdAt), OFFSET_CREATED_AT);
  buffer.writeBigUInt64BE(BigInt(expiration.kind === 'at' ? expiration.at : 0), OFFSET_EXPIRES_AT);
  buffer.writeUInt32BE(payload.length, OFFSET_LENGTH);
  buffer.set(payload, HEADER_SIZE);

  return buffer;
};

/**
 * Parses and checks an entry header.
 *
 * @param bytes - At least the first `HEADER_SIZE` bytes of the file
 * @param fileSize - Total size of the entry file, used to detect truncation
 */
export const decodeHeader = (
  bytes: Buffer,
  fileSize: number
): Result<EntryHeader, EntryDecodeError> => {
  if (bytes.length < HEADER_SIZE) {
    return err({
      code: 'truncated_header',
      message: `Entry is ${String(bytes.length)} bytes, shorter than the ${String(HEADER_SIZE)} byte header`,
    });
  }

  const version = bytes.readUInt8(OFFSET_VERSION);
  if (version !== ENTRY_FORMAT_VERSION) {
    return err({
      code: 'unsupported_version',
      message: `Entry format version ${String(version)} is not supported (expected ${String(ENTRY_FORMAT_VERSION)})`,
    });
  }

  const flags = bytes.readUInt8(OFFSET_FLAGS);
  const expiresAt = Number(bytes.readBigUInt64BE(OFFSET_EXPIRES_AT));
  if ((flags & ~FLAG_EXPIRES) !== 0 || ((flags & FLAG_EXPIRES) === 0 && expiresAt !== 0)) {
    return err({
      code: 'invalid_flags',
      message: `Entry header flags 0x${flags.toString(16)} are inconsistent`,
    });
  }

  const payloadLength = bytes.readUInt32BE(OFFSET_LENGTH);
  if (HEADER_SIZE + payloadLength !== fileSize) {
    return err({
      code: 'length_mismatch',
      message: `Entry declares ${String(payloadLength)} payload bytes but holds ${String(fileSize - HEADER_SIZE)}`,
    });
  }

  return ok({
    version,
    createdAt: Number(bytes.readBigUInt64BE(OFFSET_CREATED_AT)),
    expiration: (flags & FLAG_EXPIRES) !== 0 ? { kind: 'at', at: expiresAt } : { kind: 'never' },
    payloadLength,
  });
};

/**
 * Parses a complete entry file.
 */
export const decodeEntry = (bytes: Buffer): Result<DecodedEntry, EntryDecodeError> =>
  decodeHeader(bytes, bytes.length).map((header) => ({
    header,
    payload: bytes.subarray(HEADER_SIZE),
  }));
