import { pino, type Logger } from 'pino';

import type { Config } from './config/index.js';

export type { Logger } from 'pino';

/**
 * Build the application logger from the logging config section.
 * `pretty` routes output through pino-pretty for local development.
 */
export function createLogger(config: Config['logging']): Logger {
  return pino({
    level: config.level,
    transport: config.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}

/** Logger used by tables that are not given one. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
