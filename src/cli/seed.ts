/**
 * Create and fill the store tables from the bundled SQL files.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import knex from 'knex';
import type { Knex } from 'knex';
import { extractRows } from '../services/database.js';
import * as logger from './logger.js';

const schemaFile = fileURLToPath(new URL('../../db/schema.sql', import.meta.url));
const seedFile = fileURLToPath(new URL('../../db/seed.sql', import.meta.url));

/**
 * Apply db/schema.sql and db/seed.sql. Existing store tables are replaced.
 */
export async function seedDatabase(connection: Knex.MySqlConnectionConfig): Promise<void> {
  const db = knex({
    client: 'mysql2',
    connection: { ...connection, multipleStatements: true },
    pool: { min: 0, max: 1 },
  });

  const spin = logger.spinner(`Seeding ${connection.database ?? 'database'}...`);
  try {
    await db.raw(readFileSync(schemaFile, 'utf-8'));
    await db.raw(readFileSync(seedFile, 'utf-8'));

    const [inventory] = extractRows(await db.raw('SELECT COUNT(*) AS total FROM inventory'));
    const [discounts] = extractRows(await db.raw('SELECT COUNT(*) AS total FROM discounts'));
    spin.succeed('Database seeded');
    logger.row('Inventory items', String(inventory?.total ?? 0));
    logger.row('Discounts', String(discounts?.total ?? 0));
  } catch (error) {
    spin.fail('Seeding failed');
    throw error;
  } finally {
    await db.destroy();
  }
}
