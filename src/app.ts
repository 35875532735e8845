/**
 * Fastify application factory.
 */

import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { loggerConfig } from './utils/logger.js';
import { askRoutes } from './routes/ask.js';
import type { AskRoutesOptions } from './routes/ask.js';
import { utilityRoutes } from './routes/utility.js';
import type { UtilityRoutesOptions } from './routes/utility.js';
import {
  ConnectionError,
  ExecutionError,
  LLMError,
  TranslationError,
  UnsafeQueryError,
  ValidationError,
  describeError,
} from './types/errors.js';
import type { ErrorResponse } from './types/models.js';

export interface AppOptions extends AskRoutesOptions, UtilityRoutesOptions {
  /** Serve OpenAPI docs at /docs. */
  docs?: boolean;
  /** Fastify logging; defaults to the shared pino options. */
  logger?: boolean;
}

function hasStatusCode(error: unknown): error is { statusCode: number } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  );
}

/**
 * Map an error to its HTTP status and response body.
 */
export function toErrorResponse(error: unknown): { status: number; body: ErrorResponse } {
  if (error instanceof ValidationError) {
    return {
      status: 400,
      body: { error: 'ValidationError', message: error.message },
    };
  }
  if (error instanceof ConnectionError) {
    return {
      status: 503,
      body: {
        error: 'ConnectionError',
        message: error.message,
        suggestion: 'Check DB_HOST, DB_USER, DB_PASSWORD and DB_NAME',
      },
    };
  }
  if (error instanceof ExecutionError || error instanceof UnsafeQueryError) {
    return { status: 500, body: { error: error.name, message: error.message } };
  }
  if (error instanceof TranslationError || error instanceof LLMError) {
    return {
      status: 502,
      body: { error: error.name, message: 'Language model service unavailable' },
    };
  }
  if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
    return {
      status: error.statusCode,
      body: { error: 'BadRequest', message: describeError(error) },
    };
  }
  return {
    status: 500,
    body: {
      error: 'InternalServerError',
      message: describeError(error) || 'An unexpected error occurred',
    },
  };
}

/**
 * Create and configure the Fastify server.
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger === false ? false : loggerConfig,
  });

  await fastify.register(cors, {
    origin: '*',
  });

  if (options.docs ?? true) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'Store Assistant API',
          description: 'Ask questions about the t-shirt store inventory in plain English',
          version: '1.0.0',
        },
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  fastify.setErrorHandler((error, _request, reply) => {
    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
      fastify.log.error({ err: error }, 'request failed');
    }
    reply.status(status).send(body);
  });

  await fastify.register(askRoutes, { pipeline: options.pipeline });
  await fastify.register(utilityRoutes, {
    connect: options.connect,
    collectStats: options.collectStats,
  });

  return fastify;
}
