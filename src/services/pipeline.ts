/**
 * Question → SQL → rows → answer orchestration.
 *
 * The pipeline holds no per-request state; one instance is built at startup
 * and shared by every request handler.
 */

import type { Translator } from './translator.js';
import type { Executor } from './executor.js';
import type { Formatter } from './formatter.js';
import { apologyMessage } from './formatter.js';
import { checkReadOnly } from './guard.js';
import { describeSchema } from './schema.js';
import { logger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { describeError } from '../types/errors.js';
import type { QueryFailure } from '../types/errors.js';
import type {
  Answer,
  AnswerOutcome,
  FormattedResponse,
  PipelineState,
} from '../types/models.js';
import type { Result, ResultSet } from '../types/utils.js';

export interface PipelineOptions {
  translator: Translator;
  executor: Executor;
  formatter: Formatter;
  /** Reject generated SQL that is not a single read statement. */
  readOnlyGuard?: boolean;
  describeSchema?: (now: Date) => string;
  clock?: () => Date;
  logger?: Logger;
}

const OUTCOME_BY_MODE: Record<FormattedResponse['mode'], AnswerOutcome> = {
  narrated: 'answered',
  degraded: 'degraded',
  empty: 'no_results',
  error: 'execution_failed',
};

/**
 * Tracks the states one request has passed through.
 */
class RequestTrace {
  readonly states: PipelineState[] = ['idle'];

  constructor(private readonly log: Logger) {}

  enter(state: PipelineState, details?: Record<string, unknown>): void {
    this.states.push(state);
    this.log.debug({ state, ...details }, 'pipeline state');
  }
}

export class AnswerPipeline {
  private readonly translator: Translator;
  private readonly executor: Executor;
  private readonly formatter: Formatter;
  private readonly readOnlyGuard: boolean;
  private readonly describe: (now: Date) => string;
  private readonly clock: () => Date;
  private readonly log: Logger;

  constructor(options: PipelineOptions) {
    this.translator = options.translator;
    this.executor = options.executor;
    this.formatter = options.formatter;
    this.readOnlyGuard = options.readOnlyGuard ?? true;
    this.describe = options.describeSchema ?? describeSchema;
    this.clock = options.clock ?? (() => new Date());
    this.log = options.logger ?? logger;
  }

  /**
   * Answer one question. Always resolves; failures become answer text.
   */
  async answer(question: string): Promise<Answer> {
    const startTime = Date.now();
    const trace = new RequestTrace(this.log);

    try {
      const answer = await this.run(question, trace);
      this.log.info(
        {
          outcome: answer.outcome,
          rows: answer.rows.length,
          durationMs: Date.now() - startTime,
        },
        'question answered'
      );
      return answer;
    } catch (error) {
      // A stage broke its own contract; still give the user an answer.
      this.log.error({ err: error, question }, 'pipeline failed unexpectedly');
      trace.enter('done');
      return {
        text: apologyMessage(new Error(describeError(error))),
        sql: '',
        rows: [],
        outcome: 'execution_failed',
        trace: trace.states,
      };
    }
  }

  private async run(question: string, trace: RequestTrace): Promise<Answer> {
    const schema = this.describe(this.clock());

    trace.enter('translating');
    const translation = await this.translator.translate(question, schema);

    if (!translation.ok) {
      trace.enter('translation_failed', { error: translation.error.message });
      trace.enter('done');
      return {
        text: translation.error.message,
        sql: '',
        rows: [],
        outcome: 'translation_failed',
        trace: trace.states,
      };
    }

    const sql = translation.value;
    trace.enter('translated', { sql });

    trace.enter('executing');
    const results = await this.executeChecked(sql);
    if (results.ok) {
      trace.enter('executed', { rows: results.value.length });
    } else {
      trace.enter('execution_failed', { error: results.error.message });
    }

    trace.enter('formatting');
    const formatted = await this.formatter.format(question, results);
    trace.enter('done', { mode: formatted.mode });

    return {
      text: formatted.text,
      sql,
      rows: results.ok ? results.value : [],
      outcome: OUTCOME_BY_MODE[formatted.mode],
      trace: trace.states,
    };
  }

  private async executeChecked(sql: string): Promise<Result<ResultSet, QueryFailure>> {
    if (this.readOnlyGuard) {
      const checked = checkReadOnly(sql);
      if (!checked.ok) {
        return checked;
      }
    }
    return this.executor.execute(sql);
  }
}
