/**
 * Database connections using Knex.js with the mysql2 client.
 *
 * A connection here is a single-connection Knex instance owned by one caller:
 * it is opened, used for a query or two, and destroyed.
 */

import knex from 'knex';
import type { Knex } from 'knex';
import { logger } from '../utils/logger.js';
import { ConnectionError, describeError } from '../types/errors.js';
import type { CellValue, Row } from '../types/utils.js';

/**
 * An open connection able to run one statement at a time.
 */
export interface DatabaseConnection {
  query(sql: string): Promise<Row[]>;
  close(): Promise<void>;
}

/**
 * Opens a fresh connection.
 *
 * @throws ConnectionError when the database is unreachable or rejects the credentials
 */
export type ConnectionFactory = () => Promise<DatabaseConnection>;

/**
 * Convert a driver value into a plain cell value.
 */
export function toCellValue(value: unknown): CellValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if (value === undefined) {
    return null;
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  return JSON.stringify(value);
}

/**
 * Copy a driver row into an ordered column → value mapping.
 */
export function toRow(record: unknown): Row {
  const row: Row = {};
  if (typeof record !== 'object' || record === null) {
    return row;
  }
  for (const [column, value] of Object.entries(record)) {
    row[column] = toCellValue(value);
  }
  return row;
}

/**
 * Pull the row array out of a Knex raw() result.
 */
export function extractRows(result: unknown): Row[] {
  // MySQL: returns [[rows], [fields]] - check for nested array
  if (Array.isArray(result) && result.length === 2 && Array.isArray(result[0])) {
    return result[0].map(toRow);
  }

  // Statements without a result set come back as a header object
  if (Array.isArray(result) && result.length === 2) {
    return [];
  }

  // Plain array of rows
  if (Array.isArray(result)) {
    return result.map(toRow);
  }

  return [];
}

class KnexConnection implements DatabaseConnection {
  constructor(private readonly db: Knex) {}

  async query(sql: string): Promise<Row[]> {
    const result: unknown = await this.db.raw(sql);
    return extractRows(result);
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}

/**
 * Build a factory that opens one Knex/mysql2 connection per call.
 */
export function createConnectionFactory(knexConfig: Knex.Config): ConnectionFactory {
  return async () => {
    const db = knex(knexConfig);

    // Test connection
    try {
      await db.raw('SELECT 1');
    } catch (error) {
      logger.error({ err: error }, 'Failed to connect to database');
      await db.destroy().catch((destroyError: unknown) => {
        logger.warn(`Could not release failed connection: ${describeError(destroyError)}`);
      });
      throw new ConnectionError(describeError(error), { cause: error });
    }

    return new KnexConnection(db);
  };
}
