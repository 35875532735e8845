/**
 * Custom error classes for the store assistant.
 *
 * Every pipeline failure is one of these; the orchestrator turns them into
 * answer text instead of letting them reach the caller.
 */

/**
 * Prefix carried by every translation failure message.
 */
export const TRANSLATION_ERROR_PREFIX = 'Error generating SQL:';

/**
 * Error thrown when LLM API calls fail (transport, quota, missing key).
 */
export class LLMError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LLMError';
    Object.setPrototypeOf(this, LLMError.prototype);
  }
}

/**
 * Error returned when the model could not produce SQL for a question.
 */
export class TranslationError extends Error {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`${TRANSLATION_ERROR_PREFIX} ${detail}`, options);
    this.name = 'TranslationError';
    Object.setPrototypeOf(this, TranslationError.prototype);
  }
}

/**
 * Error returned when a database connection cannot be acquired.
 */
export class ConnectionError extends Error {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Database connection failed: ${detail}`, options);
    this.name = 'ConnectionError';
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

/**
 * Error returned when the database rejects a statement.
 */
export class ExecutionError extends Error {
  public readonly sql?: string;

  constructor(message: string, sql?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExecutionError';
    this.sql = sql;
    Object.setPrototypeOf(this, ExecutionError.prototype);
  }
}

/**
 * Error returned when generated SQL fails the read-only guard.
 */
export class UnsafeQueryError extends Error {
  public readonly sql: string;

  constructor(message: string, sql: string) {
    super(message);
    this.name = 'UnsafeQueryError';
    this.sql = sql;
    Object.setPrototypeOf(this, UnsafeQueryError.prototype);
  }
}

/**
 * Error thrown when caller input is rejected before the pipeline runs.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Failures that end a request at the execution stage.
 */
export type QueryFailure = ConnectionError | ExecutionError | UnsafeQueryError;

/**
 * Readable message for anything caught from a driver or SDK.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
