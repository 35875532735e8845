/**
 * Turns query results into a conversational answer.
 *
 * Two tiers: the model narrates the rows, and when it cannot, a deterministic
 * renderer lists them instead. Errors and empty results never reach the model.
 */

import type { LanguageModelClient } from './llm.js';
import { formatDate } from './schema.js';
import { cleanResponseText } from '../utils/text-cleanup.js';
import { logger } from '../utils/logger.js';
import { LLMError, describeError } from '../types/errors.js';
import type { QueryFailure } from '../types/errors.js';
import type { FormattedResponse } from '../types/models.js';
import { err, ok } from '../types/utils.js';
import type { CellValue, Result, ResultSet, Row } from '../types/utils.js';

export const NO_MATCHES_MESSAGE = "I couldn't find any matching results for your question.";
export const NO_RESULTS_MESSAGE = 'No results found.';
export const DEFAULT_PREVIEW_ROWS = 10;

const NARRATION_PROMPT = `Based on this database query result, provide a natural, conversational response to the original question.
Original question: {question}
Query results:
{results}

Make the response:
1. Conversational and helpful.
2. If the query result contains a 'min_quantity' greater than 1, explain that condition to the user (e.g., "This discount applies if you buy X or more items.").
3. Summarize the results clearly. Use bullet points for lists of items.
4. Ensure correct grammar, punctuation, and spacing between sentences.
5. Use proper currency formatting ($XX.XX).

Response:`;

export function apologyMessage(error: Error): string {
  return `I apologize, but I encountered an error processing your question: ${error.message}`;
}

/**
 * Text for one cell, as shown to the model and in the plain listing.
 */
export function formatCell(value: CellValue): string {
  if (value === null) {
    return 'NULL';
  }
  if (value instanceof Date) {
    const midnight =
      value.getHours() === 0 &&
      value.getMinutes() === 0 &&
      value.getSeconds() === 0 &&
      value.getMilliseconds() === 0;
    return midnight ? formatDate(value) : value.toISOString();
  }
  return String(value);
}

/**
 * Render rows as a right-aligned text table without an index column.
 */
export function renderPreviewTable(rows: ResultSet): string {
  const columns = Object.keys(rows[0] ?? {});
  if (columns.length === 0) {
    return '';
  }

  const cells = rows.map((row) => columns.map((column) => formatCell(row[column] ?? null)));
  const widths = columns.map((column, i) =>
    Math.max(column.length, ...cells.map((line) => line[i].length))
  );

  const render = (values: string[]) =>
    values.map((value, i) => value.padStart(widths[i])).join(' ');

  return [render(columns), ...cells.map(render)].join('\n');
}

export function buildNarrationPrompt(
  question: string,
  rows: ResultSet,
  previewRows: number = DEFAULT_PREVIEW_ROWS
): string {
  const preview = renderPreviewTable(rows.slice(0, previewRows));
  return NARRATION_PROMPT.replace('{question}', () => question).replace(
    '{results}',
    () => preview
  );
}

function formatPrice(value: CellValue): string {
  const amount = typeof value === 'number' ? value : Number(value);
  if (value === null || typeof value === 'boolean' || !Number.isFinite(amount)) {
    return formatCell(value);
  }
  return `$${amount.toFixed(2)}`;
}

function headerText(value: CellValue | undefined): string {
  return value === undefined || value === null ? 'N/A' : formatCell(value);
}

function describeRow(row: Row): string {
  if ('brand' in row && 'product_name' in row) {
    const details = [
      'size' in row ? `Size: ${formatCell(row.size)}` : null,
      'color' in row ? `Color: ${formatCell(row.color)}` : null,
      'price_per_item' in row ? `Price: ${formatPrice(row.price_per_item)}` : null,
      'stock_quantity' in row ? `Stock: ${formatCell(row.stock_quantity)} units` : null,
    ].filter((detail): detail is string => detail !== null);

    const header = `**${headerText(row.brand)} - ${headerText(row.product_name)}**`;
    return details.length > 0 ? `${header}\n${details.join(' • ')}` : header;
  }

  // Other row shapes (discount details, aggregates)
  return Object.entries(row)
    .map(([column, value]) => `${column}: ${formatCell(value)}`)
    .join(' | ');
}

/**
 * Deterministic listing of every row, used when the model path fails.
 */
export function formatRowsPlain(rows: ResultSet): string {
  if (rows.length === 0) {
    return NO_RESULTS_MESSAGE;
  }

  const noun = rows.length === 1 ? 'result' : 'results';
  return [`Found ${rows.length} ${noun}:`, ...rows.map(describeRow)].join('\n\n');
}

export interface Formatter {
  format(
    question: string,
    results: Result<ResultSet, QueryFailure>
  ): Promise<FormattedResponse>;
}

export class ResponseFormatter implements Formatter {
  /**
   * @param model Narrating model; null means only the plain listing is used.
   */
  constructor(
    private readonly model: LanguageModelClient | null,
    private readonly previewRows: number = DEFAULT_PREVIEW_ROWS
  ) {}

  async format(
    question: string,
    results: Result<ResultSet, QueryFailure>
  ): Promise<FormattedResponse> {
    if (!results.ok) {
      return { text: apologyMessage(results.error), mode: 'error' };
    }

    const rows = results.value;
    if (rows.length === 0) {
      return { text: NO_MATCHES_MESSAGE, mode: 'empty' };
    }

    const narration = await this.narrate(question, rows);
    if (narration.ok) {
      return { text: narration.value, mode: 'narrated' };
    }

    logger.warn(`Narration unavailable, using plain formatting: ${narration.error.message}`);
    return { text: formatRowsPlain(rows), mode: 'degraded' };
  }

  /**
   * Ask the model to describe the rows. Never throws.
   */
  async narrate(question: string, rows: ResultSet): Promise<Result<string, LLMError>> {
    if (!this.model) {
      return err(new LLMError('No language model configured'));
    }

    let raw: string;
    try {
      raw = await this.model.generate(buildNarrationPrompt(question, rows, this.previewRows));
    } catch (error) {
      if (error instanceof LLMError) {
        return err(error);
      }
      return err(new LLMError(describeError(error), { cause: error }));
    }

    const text = cleanResponseText(raw.trim());
    if (!text) {
      return err(new LLMError('LLM returned an empty response'));
    }
    return ok(text);
  }
}
