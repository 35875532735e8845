/**
 * Read-only check for generated SQL.
 *
 * Pattern based, not a parser: it looks at the leading keyword, statement
 * separators and a list of write keywords.
 */

import { logger } from '../utils/logger.js';
import { UnsafeQueryError } from '../types/errors.js';
import { err, ok } from '../types/utils.js';
import type { Result } from '../types/utils.js';

const READ_KEYWORDS = ['SELECT', 'WITH', 'SHOW', 'DESCRIBE', 'DESC', 'EXPLAIN'];

const WRITE_KEYWORDS = [
  'UPDATE',
  'DELETE',
  'DROP',
  'ALTER',
  'INSERT',
  'CREATE',
  'TRUNCATE',
  'RENAME',
  'GRANT',
  'REVOKE',
];

/**
 * Drop leading `-- ...`, `# ...` and block comments.
 */
function stripLeadingComments(sql: string): string {
  let rest = sql.trimStart();
  for (;;) {
    if (rest.startsWith('--') || rest.startsWith('#')) {
      const newline = rest.indexOf('\n');
      rest = newline === -1 ? '' : rest.slice(newline + 1).trimStart();
    } else if (rest.startsWith('/*')) {
      const end = rest.indexOf('*/');
      rest = end === -1 ? '' : rest.slice(end + 2).trimStart();
    } else {
      return rest;
    }
  }
}

/**
 * Quoted strings, quoted identifiers and comments. Values are written inline
 * in generated SQL, so their text must not count as keywords or separators.
 */
const LITERAL_PATTERN =
  /'(?:[^'\\]|\\.|'')*'|"(?:[^"\\]|\\.|"")*"|`(?:[^`]|``)*`|--[^\n]*|#[^\n]*|\/\*[\s\S]*?\*\//g;

/**
 * Blank out literals and comments, keeping the statement structure.
 */
export function maskLiterals(sql: string): string {
  return sql.replace(LITERAL_PATTERN, ' ');
}

/**
 * Validate that SQL is a single read-only statement.
 */
export function checkReadOnly(sql: string): Result<string, UnsafeQueryError> {
  const body = stripLeadingComments(sql);
  const sqlUpper = maskLiterals(body).replace(/;\s*$/, '').toUpperCase();

  const firstKeyword = /^[A-Z]+/.exec(sqlUpper)?.[0] ?? '';
  if (!READ_KEYWORDS.includes(firstKeyword)) {
    logger.warn(`Blocked SQL starting with: ${firstKeyword || '(nothing)'}`);
    return err(
      new UnsafeQueryError(
        `Only read queries are allowed, but the generated SQL starts with "${firstKeyword || body.slice(0, 20)}"`,
        sql
      )
    );
  }

  if (sqlUpper.includes(';')) {
    logger.warn('Blocked SQL containing multiple statements');
    return err(new UnsafeQueryError('The generated SQL contains more than one statement', sql));
  }

  for (const keyword of WRITE_KEYWORDS) {
    // Check for keyword as whole word (not part of another word)
    const pattern = new RegExp(`\\b${keyword}\\b`);
    if (pattern.test(sqlUpper)) {
      logger.warn(`Blocked unsafe SQL containing: ${keyword}`);
      return err(new UnsafeQueryError(`The generated SQL contains a write operation (${keyword})`, sql));
    }
  }

  return ok(sql);
}
