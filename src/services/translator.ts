/**
 * Natural language to SQL translation.
 */

import type { LanguageModelClient } from './llm.js';
import { logger } from '../utils/logger.js';
import { TranslationError, describeError } from '../types/errors.js';
import { err, ok } from '../types/utils.js';
import type { Result } from '../types/utils.js';

/**
 * Prompt template for SQL generation.
 */
const SQL_GENERATION_PROMPT = `You are a SQL expert for a t-shirt store database. Your goal is to convert a natural language question into a single, accurate SQL query.

{schema}
---
**CRITICAL RULES:**
1. **Always JOIN for Discounts:** If the question mentions "discount," "sale," or "price," you **MUST** JOIN \`inventory\` (aliased as \`i\`) with \`discounts\` (aliased as \`d\`) on \`i.brand = d.brand\`.
2. **Handle Minimum Quantity Correctly:** A question about a single item (e.g., "a nike shirt") implies a quantity of 1. If a discount requires a \`min_quantity\` > 1, your query **MUST NOT** filter this discount out. The goal is to show that a discount *is available* but has conditions. Therefore, **DO NOT** add a \`WHERE\` clause that filters on \`min_quantity\` unless the question explicitly states a quantity (e.g., "discount for 3 shirts").
3. **Filter by Active Discounts:** Always include this condition in your \`WHERE\` clause for discount-related queries: \`d.is_active = TRUE AND CURDATE() BETWEEN d.start_date AND d.end_date\`.
4. **Use LOWER() for Case-Insensitive Matches:** Always wrap text columns like \`brand\` or \`color\` in \`LOWER()\` in the \`WHERE\` clause for comparisons.
5. **Return Only the SQL Query:** Your entire response must be only the SQL code, with no explanations or markdown.
---
Question: {question}
SQL Query:`;

/**
 * A code-fence marker, with its language tag and line break when present.
 * A `sql`/`mysql` tag may be followed by the query on the same line; any
 * other tag only counts when the line ends right after it.
 */
const FENCE_PATTERN =
  /```(?:(?:sql|mysql)\b[ \t]*(?:\r?\n)?|[A-Za-z0-9_+-]*[ \t]*\r?\n)?/gi;

/**
 * Build the translation prompt for one question.
 */
export function buildTranslationPrompt(question: string, schema: string): string {
  return SQL_GENERATION_PROMPT.replace('{schema}', () => schema).replace(
    '{question}',
    () => question
  );
}

/**
 * Isolate the SQL statement from raw model output.
 *
 * Removes fenced-code markers (language-tagged and bare) until none are
 * left, then trims surrounding whitespace.
 */
export function extractSql(raw: string): string {
  let sql = raw.trim();
  while (sql.includes('```')) {
    sql = sql.replace(FENCE_PATTERN, '');
  }
  return sql.trim();
}

export interface Translator {
  translate(question: string, schema: string): Promise<Result<string, TranslationError>>;
}

/**
 * Turns a question into one SQL statement with a single model call.
 */
export class QueryTranslator implements Translator {
  constructor(private readonly model: LanguageModelClient) {}

  async translate(
    question: string,
    schema: string
  ): Promise<Result<string, TranslationError>> {
    const prompt = buildTranslationPrompt(question, schema);

    let raw: string;
    try {
      raw = await this.model.generate(prompt);
    } catch (error) {
      logger.error(`LLM failed to generate SQL: ${describeError(error)}`);
      return err(new TranslationError(describeError(error), { cause: error }));
    }

    const sql = extractSql(raw);
    if (!sql) {
      logger.warn('LLM returned no SQL');
      return err(new TranslationError('the model returned an empty query'));
    }

    logger.info(`Generated SQL: ${sql}`);
    return ok(sql);
  }
}
