/**
 * HTTP server entry point.
 */

import { config } from './config.js';
import { createAssistant } from './assistant.js';
import { buildApp } from './app.js';
import { logger } from './utils/logger.js';

/**
 * Build the services once and serve them until SIGINT/SIGTERM.
 */
export async function startServer(port: number = config.PORT): Promise<void> {
  const assistant = createAssistant(config);
  const fastify = await buildApp(assistant);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down store assistant...`);
    fastify
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({ port, host: '0.0.0.0' });
  logger.info(`Server running at http://localhost:${port}`);
  logger.info(`API docs at http://localhost:${port}/docs`);
}
