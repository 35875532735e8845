/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import type { LoggerOptions } from 'pino';
import { config } from '../config.js';

const prettyOutput =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

/**
 * Shared options, also handed to Fastify so request logs look the same.
 */
export const loggerConfig: LoggerOptions = {
  level: config.LOG_LEVEL.toLowerCase(),
  transport: prettyOutput
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
};

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino(loggerConfig);

export type { Logger } from 'pino';
