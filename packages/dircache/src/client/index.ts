export { createFileCache } from './file-cache.js';
export type { FileCache, FileCacheOptions } from './types.js';
