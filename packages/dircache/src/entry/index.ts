// Entry operations
export { saveEntry, loadEntry, deleteEntry } from './entry-store.js';

// On-disk format
export {
  encodeEntry,
  decodeEntry,
  decodeHeader,
  ENTRY_FORMAT_VERSION,
  HEADER_SIZE,
  MAX_PAYLOAD_LENGTH,
} from './header.js';
export { entryFileName, isEntryFileName } from './filename.js';

// Types
export type {
  EntryHeader,
  DecodedEntry,
  EntryDecodeErrorCode,
  EntryDecodeError,
} from './types.js';
