/**
 * Log severity, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured context attached to a log line.
 */
export type LogMeta = Readonly<Record<string, unknown>>;

/**
 * Logger used by cache operations.
 * Supply your own to route output into an application's logging.
 */
export interface Logger {
  readonly debug: (message: string, meta?: LogMeta) => void;
  readonly info: (message: string, meta?: LogMeta) => void;
  readonly warn: (message: string, meta?: LogMeta) => void;
  readonly error: (message: string, meta?: LogMeta) => void;
}

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
  /** Prefix written in brackets before each message (default: "dircache") */
  readonly scope?: string;
  /** Minimum level written (default: from DIRCACHE_LOG_LEVEL, else "warn") */
  readonly level?: LogLevel;
  /** Output sink (default: console.error) */
  readonly write?: (line: string) => void;
}
