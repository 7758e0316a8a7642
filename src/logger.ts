//root logger for the importer; services take a narrow slice of it so tests can pass their own
import pino, { type Logger } from 'pino';
import { config } from './config/env.js';

export type ImportLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export const logger: Logger = pino({
  name: 'bc3-import',
  level: config.NODE_ENV === 'test' ? 'silent' : config.LOG_LEVEL,
  transport:
    config.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export function childLogger(component: string): Logger {
  return logger.child({ component });
}
