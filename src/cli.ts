#!/usr/bin/env node
/**
 * store-assistant CLI
 */

import { cac } from 'cac';
import { config } from './config.js';
import { createAssistant } from './assistant.js';
import { startServer } from './server.js';
import { describeSchema } from './services/schema.js';
import { formatCell } from './services/formatter.js';
import { seedDatabase } from './cli/seed.js';
import { AskRequestSchema } from './types/models.js';
import type { Answer } from './types/models.js';
import { describeError } from './types/errors.js';
import * as logger from './cli/logger.js';

const cli = cac('store-assistant');

cli.version('1.0.0');
cli.help();

function printAnswer(answer: Answer, details: boolean): void {
  const failed =
    answer.outcome === 'translation_failed' || answer.outcome === 'execution_failed';
  logger.box(answer.text, failed ? 'Error' : 'Answer', failed ? 'red' : 'green');

  if (answer.outcome === 'degraded') {
    logger.warn('The language model was unavailable; showing a plain listing.');
  }

  if (!details) {
    return;
  }

  if (answer.sql) {
    logger.section('Generated SQL Query');
    logger.code(answer.sql, 'sql');
  }

  if (answer.rows.length > 0) {
    logger.section('Raw Query Results');
    const head = Object.keys(answer.rows[0]);
    logger.table(
      head,
      answer.rows.map((row) => head.map((column) => formatCell(row[column] ?? null)))
    );
  }
}

/**
 * store-assistant ask <question>
 */
cli
  .command('ask <question>', 'Answer a question about the inventory')
  .option('-d, --details', 'Show the generated SQL and raw rows')
  .action(async (question: string, options: { details?: boolean }) => {
    const parsed = AskRequestSchema.safeParse({ question });
    if (!parsed.success) {
      logger.warn(parsed.error.issues[0]?.message ?? 'Please enter a question!');
      process.exit(1);
    }

    const assistant = createAssistant(config);
    const spin = logger.spinner('Processing your question...');
    const answer = await assistant.pipeline.answer(parsed.data.question);
    spin.stop();

    printAnswer(answer, options.details ?? false);
    if (answer.outcome === 'translation_failed' || answer.outcome === 'execution_failed') {
      process.exitCode = 1;
    }
  });

/**
 * store-assistant serve
 */
cli
  .command('serve', 'Start the HTTP API')
  .option('-p, --port <port>', 'Server port', { default: config.PORT })
  .action(async (options: { port: number | string }) => {
    logger.printBanner();
    try {
      await startServer(Number(options.port));
    } catch (error) {
      logger.error('Failed to start server', describeError(error));
      process.exit(1);
    }
  });

/**
 * store-assistant stats
 */
cli
  .command('stats', 'Show quick store statistics')
  .action(async () => {
    const assistant = createAssistant(config);
    const spin = logger.spinner('Loading stats...');
    try {
      const stats = await assistant.collectStats();
      spin.stop();
      logger.section('Quick Stats');
      logger.row('Total Products', String(stats.totalProducts));
      logger.row('Brands Available', String(stats.brandsAvailable));
      logger.row(`Low Stock Items (< ${config.LOW_STOCK_THRESHOLD} units)`, String(stats.lowStockItems));
      logger.row('Active Discounts', String(stats.activeDiscounts));
      logger.row('Average Price', stats.averagePrice);
      logger.newline();
    } catch (error) {
      spin.fail('Could not load stats');
      logger.error(describeError(error), 'Check the DB_* settings in .env');
      process.exit(1);
    }
  });

/**
 * store-assistant schema
 */
cli
  .command('schema', 'Print the schema description given to the model')
  .action(() => {
    logger.code(describeSchema(), 'schema');
  });

/**
 * store-assistant seed
 */
cli
  .command('seed', 'Create the store tables and load sample data')
  .action(async () => {
    try {
      await seedDatabase(config.DB_CONNECTION);
      logger.success('Sample data loaded');
    } catch (error) {
      logger.error('Seeding failed', describeError(error));
      process.exit(1);
    }
  });

// Parse CLI arguments
cli.parse();
