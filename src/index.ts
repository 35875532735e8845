/**
 * Store Assistant - answer inventory questions in plain English
 */

export { createAssistant } from './assistant.js';
export type { StoreAssistant, AssistantOverrides } from './assistant.js';
export { buildApp } from './app.js';
export { AnswerPipeline } from './services/pipeline.js';
export type { PipelineOptions } from './services/pipeline.js';
export { QueryTranslator, buildTranslationPrompt, extractSql } from './services/translator.js';
export { QueryExecutor } from './services/executor.js';
export { createConnectionFactory } from './services/database.js';
export type { ConnectionFactory, DatabaseConnection } from './services/database.js';
export { ResponseFormatter, formatRowsPlain } from './services/formatter.js';
export { AiSdkModelClient } from './services/llm.js';
export type { LanguageModelClient } from './services/llm.js';
export { describeSchema, STORE_TABLES } from './services/schema.js';
export { checkReadOnly } from './services/guard.js';
export { collectStoreStats } from './services/stats.js';
export { cleanResponseText } from './utils/text-cleanup.js';
export type { Answer, AnswerOutcome, PipelineState, StoreStats } from './types/models.js';
export type { Row, ResultSet, CellValue, Result } from './types/utils.js';
export {
  TranslationError,
  ConnectionError,
  ExecutionError,
  UnsafeQueryError,
  LLMError,
  ValidationError,
} from './types/errors.js';
