/**
 * Wiring of the store assistant services from configuration.
 */

import type { Config } from './config.js';
import { createConnectionFactory } from './services/database.js';
import type { ConnectionFactory } from './services/database.js';
import { AiSdkModelClient } from './services/llm.js';
import type { LanguageModelClient } from './services/llm.js';
import { QueryTranslator } from './services/translator.js';
import { QueryExecutor } from './services/executor.js';
import { ResponseFormatter } from './services/formatter.js';
import { AnswerPipeline } from './services/pipeline.js';
import { collectStoreStats } from './services/stats.js';
import type { StoreStats } from './types/models.js';

export interface StoreAssistant {
  pipeline: AnswerPipeline;
  connect: ConnectionFactory;
  collectStats: () => Promise<StoreStats>;
}

export interface AssistantOverrides {
  model?: LanguageModelClient;
  connect?: ConnectionFactory;
}

/**
 * Build the long-lived services once, at process start.
 *
 * @example
 * ```typescript
 * const assistant = createAssistant(config);
 * const answer = await assistant.pipeline.answer('Do we have Nike shirts in size L?');
 * console.log(answer.text);
 * ```
 */
export function createAssistant(
  config: Config,
  overrides: AssistantOverrides = {}
): StoreAssistant {
  const model = overrides.model ?? new AiSdkModelClient(config.LLM_CONFIG);
  const connect = overrides.connect ?? createConnectionFactory(config.KNEX_CONFIG);

  const pipeline = new AnswerPipeline({
    translator: new QueryTranslator(model),
    executor: new QueryExecutor(connect),
    formatter: new ResponseFormatter(model, config.PREVIEW_ROWS),
    readOnlyGuard: config.SQL_READ_ONLY_GUARD,
  });

  return {
    pipeline,
    connect,
    collectStats: () => collectStoreStats(connect, config.LOW_STOCK_THRESHOLD),
  };
}
