import { pino, type Logger } from 'pino';
import type { LogConfig } from '../../config/env.js';

export type { Logger };

const SERVICE_NAME = 'user-directory-service';

/**
 * Structured JSON logger. With `pretty` on, output goes through pino-pretty
 * for local development.
 */
export function createLogger(config: LogConfig): Logger {
  return pino({
    name: SERVICE_NAME,
    level: config.level,
    transport: config.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}
