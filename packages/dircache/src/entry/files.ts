/**
 * Filesystem primitives for entry files.
 *
 * These throw on genuine I/O errors and report a missing file through their
 * return value; callers translate thrown errors into `CacheError`s.
 *
 * @packageDocumentation
 */

import { lstat, open, rename, rm, unlink, type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import type { Result } from 'neverthrow';
import { isNotFoundError } from '../errors.js';
import type { Logger } from '../logging/types.js';
import { decodeHeader, HEADER_SIZE } from './header.js';
import { tempFileName } from './filename.js';
import type { EntryDecodeError, EntryHeader, RemovalOutcome } from './types.js';

/**
 * Raw contents of an entry file plus the identity of the file they came from.
 */
export interface EntryFile {
  readonly bytes: Buffer;
  /** Inode number of the file that was read */
  readonly ino: number;
}

/**
 * Header of an entry file, read without loading the payload.
 */
export interface EntryFileHeader {
  readonly header: Result<EntryHeader, EntryDecodeError>;
  readonly ino: number;
}

const openIfExists = async (filePath: string): Promise<FileHandle | undefined> => {
  try {
    return await open(filePath, 'r');
  } catch (error) {
    if (isNotFoundError(error)) {
      return undefined;
    }
    throw error;
  }
};

/**
 * Reads a whole entry file.
 *
 * @returns The file contents, or undefined if it does not exist
 */
export const readEntryFile = async (filePath: string): Promise<EntryFile | undefined> => {
  const handle = await openIfExists(filePath);
  if (handle === undefined) {
    return undefined;
  }

  try {
    const stats = await handle.stat();
    const bytes = await handle.readFile();
    return { bytes, ino: stats.ino };
  } finally {
    await handle.close();
  }
};

/**
 * Reads and decodes only the header of an entry file.
 *
 * @returns The decoded header, or undefined if the file does not exist
 */
export const readEntryHeader = async (filePath: string): Promise<EntryFileHeader | undefined> => {
  const handle = await openIfExists(filePath);
  if (handle === undefined) {
    return undefined;
  }

  try {
    const stats = await handle.stat();
    const buffer = Buffer.alloc(HEADER_SIZE);
    const { bytesRead } = await handle.read(buffer, 0, HEADER_SIZE, 0);
    return {
      header: decodeHeader(buffer.subarray(0, bytesRead), stats.size),
      ino: stats.ino,
    };
  } finally {
    await handle.close();
  }
};

/**
 * Removes a file.
 *
 * @returns true if this call removed it, false if it was already gone
 */
export const removeFile = async (filePath: string): Promise<boolean> => {
  try {
    await unlink(filePath);
    return true;
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw error;
  }
};

/**
 * Removes `filePath` only if it still refers to the file identified by `ino`.
 *
 * Used after deciding from a file's contents that it should go: if a
 * concurrent save has since replaced it, the new entry is kept.
 */
export const removeIfUnchanged = async (filePath: string, ino: number): Promise<RemovalOutcome> => {
  try {
    const current = await lstat(filePath);
    if (current.ino !== ino) {
      return 'replaced';
    }
  } catch (error) {
    if (isNotFoundError(error)) {
      return 'vanished';
    }
    throw error;
  }

  return (await removeFile(filePath)) ? 'removed' : 'vanished';
};

const discardTempFile = async (tempPath: string, logger: Logger): Promise<void> => {
  try {
    await rm(tempPath, { force: true });
  } catch (error) {
    logger.warn('failed to remove temporary file', { file: tempPath, error });
  }
};

/**
 * Writes `data` to `directory/fileName` so that readers see either the old
 * file or the complete new one.
 *
 * The data goes to an exclusive temporary file in the same directory, is
 * flushed to disk, then renamed over the target. On failure the temporary
 * file is removed and the target is untouched.
 */
export const writeFileAtomically = async (
  directory: string,
  fileName: string,
  data: Uint8Array,
  logger: Logger
): Promise<void> => {
  const tempPath = path.join(directory, tempFileName(fileName));

  try {
    const handle = await open(tempPath, 'wx');
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, path.join(directory, fileName));
  } catch (error) {
    await discardTempFile(tempPath, logger);
    throw error;
  }
};
