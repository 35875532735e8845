/**
 * Quick store statistics for the dashboard and the `stats` command.
 */

import type { ConnectionFactory } from './database.js';
import { closeQuietly } from './executor.js';
import { ExecutionError, describeError } from '../types/errors.js';
import type { StoreStats } from '../types/models.js';
import type { CellValue } from '../types/utils.js';

export const DEFAULT_LOW_STOCK_THRESHOLD = 10;

function statsQueries(lowStockThreshold: number) {
  const threshold = Math.max(0, Math.trunc(lowStockThreshold));
  return {
    totalProducts: 'SELECT COUNT(*) AS total FROM inventory',
    brandsAvailable: 'SELECT COUNT(DISTINCT brand) AS total FROM inventory',
    lowStockItems: `SELECT COUNT(*) AS total FROM inventory WHERE stock_quantity < ${threshold}`,
    activeDiscounts:
      'SELECT COUNT(*) AS total FROM discounts WHERE is_active = TRUE AND CURDATE() BETWEEN start_date AND end_date',
    averagePrice: 'SELECT AVG(price_per_item) AS avg_price FROM inventory',
  } as const;
}

function toNumber(value: CellValue | undefined): number {
  const parsed = typeof value === 'number' ? value : Number(value ?? 0);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Format an average price; missing or zero averages read as $0.00.
 */
export function formatAveragePrice(value: CellValue | undefined): string {
  return `$${toNumber(value).toFixed(2)}`;
}

/**
 * Collect the five headline numbers over a single connection.
 *
 * @throws ConnectionError when no connection can be opened
 * @throws ExecutionError when one of the queries fails
 */
export async function collectStoreStats(
  connect: ConnectionFactory,
  lowStockThreshold: number = DEFAULT_LOW_STOCK_THRESHOLD
): Promise<StoreStats> {
  const queries = statsQueries(lowStockThreshold);
  const connection = await connect();

  const first = async (sql: string): Promise<Record<string, CellValue>> => {
    try {
      const rows = await connection.query(sql);
      return rows[0] ?? {};
    } catch (error) {
      throw new ExecutionError(`Error loading stats: ${describeError(error)}`, sql, {
        cause: error,
      });
    }
  };

  try {
    const totalProducts = await first(queries.totalProducts);
    const brandsAvailable = await first(queries.brandsAvailable);
    const lowStockItems = await first(queries.lowStockItems);
    const activeDiscounts = await first(queries.activeDiscounts);
    const averagePrice = await first(queries.averagePrice);

    return {
      totalProducts: toNumber(totalProducts.total),
      brandsAvailable: toNumber(brandsAvailable.total),
      lowStockItems: toNumber(lowStockItems.total),
      activeDiscounts: toNumber(activeDiscounts.total),
      averagePrice: formatAveragePrice(averagePrice.avg_price),
    };
  } finally {
    await closeQuietly(connection);
  }
}
