/**
 * Pino logger with structured fields.
 *
 * Child loggers carry the source folder and file being processed.
 */

import pino from 'pino';
import { LogLevelSchema } from '../config/app.config';

// An unknown LOG_LEVEL is rejected by loadAppConfig; until then log at info
const initialLevel = LogLevelSchema.safeParse(process.env.LOG_LEVEL);

export const logger = pino({
  level: initialLevel.success ? initialLevel.data : 'info',
  transport: process.env.NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
    },
  } : undefined,
  base: {
    service: 'budget-sorter',
  },
});

export function createSourceLogger(context: { source?: string; filePath?: string }): pino.Logger {
  return logger.child(context);
}
