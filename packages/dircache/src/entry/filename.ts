import { createHash, randomBytes } from 'node:crypto';

const ENTRY_SUFFIX = '.entry';
const ENTRY_NAME_PATTERN = /^[0-9a-f]{64}\.entry$/;
const TEMP_NAME_PATTERN = /^\.[0-9a-f]{64}\.entry\.[0-9a-f]{12}\.tmp$/;

/**
 * Maps a cache key to its file name.
 *
 * The name is the SHA-256 of the key's UTF-16 code units in lowercase hex,
 * so it never contains a path separator. Hashing code units rather than
 * UTF-8 keeps lone surrogates distinct: `'\uD800'` and `'\uDC00'` get
 * different files.
 *
 * @example
 * ```typescript
 * entryFileName('profile');
 * // => "<64 hex chars>.entry"
 * ```
 */
export const entryFileName = (key: string): string =>
  `${createHash('sha256').update(Buffer.from(key, 'utf16le')).digest('hex')}${ENTRY_SUFFIX}`;

/**
 * Whether a directory entry name is a cache entry (as opposed to a
 * temporary file or anything else sharing the directory).
 */
export const isEntryFileName = (name: string): boolean => ENTRY_NAME_PATTERN.test(name);

/**
 * Name of a fresh temporary file used while writing `entryName`.
 * Dot-prefixed and `.tmp`-suffixed so sweeps never mistake it for an entry.
 */
export const tempFileName = (entryName: string): string =>
  `.${entryName}.${randomBytes(6).toString('hex')}.tmp`;

/** Whether a directory entry name was produced by {@link tempFileName}. */
export const isTempFileName = (name: string): boolean => TEMP_NAME_PATTERN.test(name);
