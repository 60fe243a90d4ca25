export { createConsoleLogger, resolveLogLevel, silentLogger, LOG_LEVEL_ENV } from './logger.js';
export type { ConsoleLoggerOptions, LogLevel, LogMeta, Logger } from './types.js';
