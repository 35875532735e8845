/**
 * Utility endpoints (health, stats, schema).
 */

import type { FastifyInstance } from 'fastify';
import type { ConnectionFactory } from '../services/database.js';
import { closeQuietly } from '../services/executor.js';
import { describeSchema, STORE_TABLES } from '../services/schema.js';
import type { StoreStats } from '../types/models.js';
import { describeError } from '../types/errors.js';

export interface UtilityRoutesOptions {
  connect: ConnectionFactory;
  collectStats: () => Promise<StoreStats>;
}

export async function utilityRoutes(fastify: FastifyInstance, options: UtilityRoutesOptions) {
  // GET /stats - Quick store statistics
  fastify.get('/stats', async () => {
    return options.collectStats();
  });

  // GET /schema - Schema description given to the model
  fastify.get('/schema', async () => {
    return {
      description: describeSchema(),
      tables: STORE_TABLES,
    };
  });

  // GET /health - Health check
  fastify.get('/health', async (_request, reply) => {
    try {
      const connection = await options.connect();
      await closeQuietly(connection);
      return { status: 'ok', database: 'ok' };
    } catch (error) {
      reply.status(503);
      return { status: 'degraded', database: 'unreachable', detail: describeError(error) };
    }
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: 'Store Assistant API',
      version: '1.0.0',
      description: 'Ask questions about the t-shirt store inventory',
      docs: '/docs',
    };
  });
}
