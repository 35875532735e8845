/**
 * Type definitions and Zod schemas for request/response data.
 */

import { z } from 'zod';
import type { ResultSet } from './utils.js';

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * States a single question moves through.
 */
export type PipelineState =
	| 'idle'
	| 'translating'
	| 'translated'
	| 'translation_failed'
	| 'executing'
	| 'executed'
	| 'execution_failed'
	| 'formatting'
	| 'done';

/**
 * How the answer text was produced.
 */
export type ResponseMode = 'narrated' | 'degraded' | 'empty' | 'error';

export interface FormattedResponse {
	readonly text: string;
	readonly mode: ResponseMode;
}

export type AnswerOutcome =
	| 'answered'
	| 'degraded'
	| 'no_results'
	| 'translation_failed'
	| 'execution_failed';

/**
 * Final answer for one question, plus diagnostics for display.
 */
export interface Answer {
	text: string;
	/** Generated SQL; empty when translation failed. */
	sql: string;
	rows: ResultSet;
	outcome: AnswerOutcome;
	trace: PipelineState[];
}

// ============================================================================
// HTTP
// ============================================================================

/**
 * Request model for natural language questions.
 */
export const AskRequestSchema = z.object({
	question: z
		.string()
		.trim()
		.min(1, 'Please enter a question!')
		.max(500)
		.describe('Natural language question about the inventory'),
});
export type AskRequest = z.infer<typeof AskRequestSchema>;

/**
 * Response model for errors.
 */
export const ErrorResponseSchema = z.object({
	error: z.string().describe('Error type'),
	message: z.string().describe('Error message'),
	suggestion: z.string().optional().describe('Suggestion for fixing the error'),
});
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// ============================================================================
// STATS
// ============================================================================

/**
 * Quick store statistics shown next to the assistant.
 */
export interface StoreStats {
	totalProducts: number;
	brandsAvailable: number;
	lowStockItems: number;
	activeDiscounts: number;
	/** Formatted as $XX.XX */
	averagePrice: string;
}
