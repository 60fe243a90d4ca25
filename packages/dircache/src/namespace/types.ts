import type { Logger } from '../logging/types.js';

/**
 * Options for resolving a cache namespace.
 */
export interface NamespaceOptions {
  /** Application name; becomes the namespace directory name */
  readonly appName: string;
  /** TTL in seconds for saves that do not pass their own; 0 or unset means never expire */
  readonly defaultTtlSeconds?: number | undefined;
  /** Parent cache directory (default: `$XDG_CACHE_HOME` or `~/.cache`) */
  readonly cacheDir?: string | undefined;
  /** Logger for operations on this namespace (default: console logger) */
  readonly logger?: Logger | undefined;
}
