import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

import type { Config } from './config/index.js';

export type LoggingConfig = Config['logging'];

/**
 * Pino logger for the CLI and for callers that want store logs.
 * `pretty` routes output through the pino-pretty transport (development only).
 */
export function createLogger(logging: LoggingConfig): Logger {
  const options: LoggerOptions = {
    level: logging.level,
    transport: logging.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
    redact: ['accountKey', 'secretAccessKey', '*.accountKey', '*.secretAccessKey'],
  };
  return pino(options);
}
