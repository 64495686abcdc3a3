import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

/** Root pino logger for the importer. Components derive children from it. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'product-importer',
    level: 'info',
    ...options,
  });
}
