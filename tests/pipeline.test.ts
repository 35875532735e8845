import { describe, expect, it } from 'vitest';
import pino from 'pino';
import { AnswerPipeline } from '../src/services/pipeline.js';
import type { PipelineOptions } from '../src/services/pipeline.js';
import { QueryTranslator } from '../src/services/translator.js';
import { QueryExecutor } from '../src/services/executor.js';
import { NO_MATCHES_MESSAGE, ResponseFormatter, formatRowsPlain } from '../src/services/formatter.js';
import type { ConnectionFactory } from '../src/services/database.js';
import { ConnectionError, LLMError } from '../src/types/errors.js';
import type { Row } from '../src/types/utils.js';
import { FakeConnection, ScriptedModel, nikeRow } from './helpers.js';

const NIKE_SQL = "SELECT * FROM inventory WHERE LOWER(brand) = 'nike' AND size = 'L'";
const QUESTION = 'Do we have Nike shirts in size L?';

const silent = pino({ level: 'silent' });

function buildPipeline(
  replies: Array<string | Error>,
  respond: (sql: string) => Row[] | Error,
  options: Partial<PipelineOptions> = {}
) {
  const model = new ScriptedModel(replies);
  const connection = new FakeConnection(respond);
  const connect: ConnectionFactory = async () => connection;

  const pipeline = new AnswerPipeline({
    translator: new QueryTranslator(model),
    executor: new QueryExecutor(connect),
    formatter: new ResponseFormatter(model),
    clock: () => new Date(2024, 4, 3),
    logger: silent,
    ...options,
  });

  return { pipeline, model, connection };
}

describe('AnswerPipeline', () => {
  it('answers a stock question end to end', async () => {
    const { pipeline, model, connection } = buildPipeline(
      [
        '```sql\n' + NIKE_SQL + '\n```',
        'Yes! We have 3 Black Nike Tees in size L at $19.50 each.',
      ],
      () => [nikeRow]
    );

    const answer = await pipeline.answer(QUESTION);

    expect(answer).toEqual({
      text: 'Yes! We have 3 Black Nike Tees in size L at $19.50 each.',
      sql: NIKE_SQL,
      rows: [nikeRow],
      outcome: 'answered',
      trace: [
        'idle',
        'translating',
        'translated',
        'executing',
        'executed',
        'formatting',
        'done',
      ],
    });
    expect(connection.statements).toEqual([NIKE_SQL]);
    expect(connection.closed).toBe(true);
    expect(model.prompts[0]).toContain('Current date for all queries is: 2024-05-03');
    expect(model.prompts[0]).toContain(`Question: ${QUESTION}\nSQL Query:`);
    expect(model.prompts[1]).toContain(`Original question: ${QUESTION}`);
  });

  it('returns the translation error as the answer text', async () => {
    const { pipeline, connection } = buildPipeline([new LLMError('quota exceeded')], () => [nikeRow]);

    const answer = await pipeline.answer(QUESTION);

    expect(answer).toEqual({
      text: 'Error generating SQL: quota exceeded',
      sql: '',
      rows: [],
      outcome: 'translation_failed',
      trace: ['idle', 'translating', 'translation_failed', 'done'],
    });
    expect(connection.statements).toHaveLength(0);
  });

  it('apologises when the database rejects the statement', async () => {
    const { pipeline, model } = buildPipeline(
      ['SELECT * FROM shirts'],
      () => new Error("Table 'tshirt_store.shirts' doesn't exist")
    );

    const answer = await pipeline.answer(QUESTION);

    expect(answer.text).toBe(
      "I apologize, but I encountered an error processing your question: Table 'tshirt_store.shirts' doesn't exist"
    );
    expect(answer.outcome).toBe('execution_failed');
    expect(answer.sql).toBe('SELECT * FROM shirts');
    expect(answer.trace).toEqual([
      'idle',
      'translating',
      'translated',
      'executing',
      'execution_failed',
      'formatting',
      'done',
    ]);
    expect(model.prompts).toHaveLength(1);
  });

  it('apologises when no connection can be opened', async () => {
    const model = new ScriptedModel(['SELECT 1']);
    const pipeline = new AnswerPipeline({
      translator: new QueryTranslator(model),
      executor: new QueryExecutor(async () => {
        throw new ConnectionError('ECONNREFUSED');
      }),
      formatter: new ResponseFormatter(model),
      logger: silent,
    });

    const answer = await pipeline.answer(QUESTION);

    expect(answer.text).toBe(
      'I apologize, but I encountered an error processing your question: Database connection failed: ECONNREFUSED'
    );
    expect(answer.outcome).toBe('execution_failed');
  });

  it('reports empty results without narration', async () => {
    const { pipeline, model } = buildPipeline(["SELECT * FROM inventory WHERE LOWER(brand) = 'gucci'"], () => []);

    const answer = await pipeline.answer('Any Gucci shirts?');

    expect(answer.text).toBe(NO_MATCHES_MESSAGE);
    expect(answer.outcome).toBe('no_results');
    expect(model.prompts).toHaveLength(1);
  });

  it('falls back to the plain listing when narration fails', async () => {
    const { pipeline } = buildPipeline([NIKE_SQL, new LLMError('rate limited')], () => [nikeRow]);

    const answer = await pipeline.answer(QUESTION);

    expect(answer.text).toBe(formatRowsPlain([nikeRow]));
    expect(answer.text).toContain('Nike - Tee');
    expect(answer.outcome).toBe('degraded');
    expect(answer.rows).toEqual([nikeRow]);
  });

  it('blocks write statements before they reach the database', async () => {
    const { pipeline, connection } = buildPipeline(['DELETE FROM inventory'], () => []);

    const answer = await pipeline.answer('Delete everything');

    expect(answer.text).toBe(
      'I apologize, but I encountered an error processing your question: Only read queries are allowed, but the generated SQL starts with "DELETE"'
    );
    expect(answer.outcome).toBe('execution_failed');
    expect(answer.trace).toContain('execution_failed');
    expect(connection.statements).toHaveLength(0);
  });

  it('runs reads whose quoted values contain write keywords', async () => {
    const sql =
      "SELECT * FROM inventory WHERE LOWER(product_name) LIKE '%drop shoulder%' AND color <> 'Tee; Black'";
    const { pipeline, connection } = buildPipeline(
      [sql, 'We have 3 drop shoulder tees.'],
      () => [nikeRow]
    );

    const answer = await pipeline.answer('Do we have Drop Shoulder tees?');

    expect(connection.statements).toEqual([sql]);
    expect(answer.outcome).toBe('answered');
    expect(answer.text).toBe('We have 3 drop shoulder tees.');
  });

  it('runs write statements when the guard is disabled', async () => {
    const { pipeline, connection } = buildPipeline(
      ['DELETE FROM inventory WHERE stock_quantity = 0'],
      () => [],
      { readOnlyGuard: false }
    );

    const answer = await pipeline.answer('Remove sold out items');

    expect(connection.statements).toEqual(['DELETE FROM inventory WHERE stock_quantity = 0']);
    expect(answer.outcome).toBe('no_results');
  });

  it('still answers when a stage throws', async () => {
    const { pipeline } = buildPipeline([], () => [], {
      translator: {
        translate: async () => {
          throw new TypeError('socket hang up');
        },
      },
    });

    const answer = await pipeline.answer(QUESTION);

    expect(answer).toEqual({
      text: 'I apologize, but I encountered an error processing your question: socket hang up',
      sql: '',
      rows: [],
      outcome: 'execution_failed',
      trace: ['idle', 'translating', 'done'],
    });
  });

  it('always produces non-empty text', async () => {
    const scenarios: Array<[Array<string | Error>, (sql: string) => Row[] | Error]> = [
      [[new Error('down')], () => []],
      [['   '], () => []],
      [['SELECT 1'], () => new Error('boom')],
      [['SELECT 1'], () => []],
      [['SELECT 1', ''], () => [{ total: 1 }]],
      [['SELECT 1', 'There is 1 item.'], () => [{ total: 1 }]],
    ];

    for (const [replies, respond] of scenarios) {
      const { pipeline } = buildPipeline(replies, respond);
      const answer = await pipeline.answer(QUESTION);
      expect(answer.text.length).toBeGreaterThan(0);
    }
  });
});
