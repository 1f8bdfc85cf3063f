import { pino, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

const LOG_LEVEL_ENV = 'HTTP_CACHE_LOG_LEVEL';

/**
 * Create the structured logger used by HttpCache and the cache managers.
 * The level defaults to `HTTP_CACHE_LOG_LEVEL`, then `warn`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'http-cache-kit',
    level: process.env[LOG_LEVEL_ENV] ?? 'warn',
    ...options,
  });
}
