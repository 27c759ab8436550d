import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  level: config.logLevel,
  transport:
    config.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  base: {
    service: 'passport-postprocessor',
  },
});

/** The subset of the logger the postprocessing core writes to. */
export type CoreLogger = Pick<pino.Logger, 'debug' | 'warn' | 'error'>;

export function createDocumentLogger(documentRef: string): pino.Logger {
  return logger.child({ documentRef });
}
