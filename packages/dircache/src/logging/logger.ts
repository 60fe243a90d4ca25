import type { ConsoleLoggerOptions, LogLevel, LogMeta, Logger } from './types.js';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const DEFAULT_SCOPE = 'dircache';
const DEFAULT_LEVEL: LogLevel = 'warn';

/**
 * Environment variable consulted for the default log level.
 */
export const LOG_LEVEL_ENV = 'DIRCACHE_LOG_LEVEL';

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_PRIORITY, value);

/**
 * Parses a log level name, falling back to the default for anything unknown.
 */
export const resolveLogLevel = (raw: string | undefined): LogLevel => {
  if (raw === undefined) {
    return DEFAULT_LEVEL;
  }
  const candidate = raw.trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : DEFAULT_LEVEL;
};

const formatLine = (scope: string, level: LogLevel, message: string, meta?: LogMeta): string => {
  const prefix = `[${scope}] ${level.toUpperCase()} ${message}`;
  if (meta === undefined || Object.keys(meta).length === 0) {
    return prefix;
  }
  return `${prefix} ${JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  )}`;
};

/**
 * Creates a logger that writes single-line, level-filtered messages to stderr.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'debug' });
 * logger.debug('entry saved', { key: 'profile' });
 * // [dircache] DEBUG entry saved {"key":"profile"}
 * ```
 */
export const createConsoleLogger = (options: ConsoleLoggerOptions = {}): Logger => {
  const scope = options.scope ?? DEFAULT_SCOPE;
  const threshold = LEVEL_PRIORITY[options.level ?? resolveLogLevel(process.env[LOG_LEVEL_ENV])];
  const write =
    options.write ??
    ((line: string) => {
      console.error(line);
    });

  const log =
    (level: LogLevel) =>
    (message: string, meta?: LogMeta): void => {
      if (LEVEL_PRIORITY[level] < threshold) {
        return;
      }
      write(formatLine(scope, level, message, meta));
    };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
};

const noop = (): void => undefined;

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
