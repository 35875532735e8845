/**
 * SQL execution against a scoped database connection.
 */

import type { ConnectionFactory, DatabaseConnection } from './database.js';
import { logger } from '../utils/logger.js';
import {
  ConnectionError,
  ExecutionError,
  describeError,
} from '../types/errors.js';
import { err, ok } from '../types/utils.js';
import type { Result, ResultSet } from '../types/utils.js';

export interface Executor {
  execute(sql: string): Promise<Result<ResultSet, ConnectionError | ExecutionError>>;
}

/**
 * Runs one statement per call on its own connection.
 *
 * The statement is executed as given; read-only checks belong to the caller.
 */
export class QueryExecutor implements Executor {
  constructor(private readonly connect: ConnectionFactory) {}

  async execute(sql: string): Promise<Result<ResultSet, ConnectionError | ExecutionError>> {
    let connection: DatabaseConnection;
    try {
      connection = await this.connect();
    } catch (error) {
      if (error instanceof ConnectionError) {
        return err(error);
      }
      return err(new ConnectionError(describeError(error), { cause: error }));
    }

    try {
      const rows = await connection.query(sql);
      logger.info(`Query returned ${rows.length} rows`);
      return ok(rows);
    } catch (error) {
      logger.error(`SQL execution failed: ${describeError(error)}`);
      return err(new ExecutionError(describeError(error), sql, { cause: error }));
    } finally {
      await closeQuietly(connection);
    }
  }
}

/**
 * Close a connection, logging instead of throwing on failure.
 */
export async function closeQuietly(connection: DatabaseConnection): Promise<void> {
  try {
    await connection.close();
  } catch (error) {
    logger.warn(`Failed to close database connection: ${describeError(error)}`);
  }
}
