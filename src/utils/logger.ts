/**
 * Application logger (pino)
 */

import pino from 'pino';
import type { Logger } from 'pino';

const LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

type LogLevel = (typeof LEVELS)[number];

/** Error objects logged under `error` keep their type, message and fields */
export const LOG_SERIALIZERS = {
  error: pino.stdSerializers.err,
};

function resolveLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') {
    return 'silent';
  }
  const requested = process.env.LOG_LEVEL;
  const match = LEVELS.find((level) => level === requested);
  return match ?? 'info';
}

function createLogger(): Logger {
  const isDevelopment = (process.env.NODE_ENV ?? 'development') === 'development';

  return pino({
    level: resolveLevel(),
    base: {
      service: 'sat-bulletin-monitor',
    },
    serializers: LOG_SERIALIZERS,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

export const logger = createLogger();

export type { Logger };
