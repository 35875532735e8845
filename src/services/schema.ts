/**
 * Static description of the queryable store schema, for LLM prompts.
 *
 * The schema is fixed, not introspected: the prompt rules depend on these
 * exact table and column names.
 */

export interface ColumnDefinition {
  name: string;
  type: string;
}

export interface TableDefinition {
  name: string;
  columns: ColumnDefinition[];
}

export const STORE_TABLES: readonly TableDefinition[] = [
  {
    name: 'inventory',
    columns: [
      { name: 'id', type: 'INT, PRIMARY KEY' },
      { name: 'brand', type: 'VARCHAR' },
      { name: 'product_name', type: 'VARCHAR' },
      { name: 'size', type: "ENUM: 'XS', 'S', 'M', 'L', 'XL', 'XXL'" },
      { name: 'color', type: 'VARCHAR' },
      { name: 'stock_quantity', type: 'INT' },
      { name: 'price_per_item', type: 'DECIMAL' },
    ],
  },
  {
    name: 'discounts',
    columns: [
      { name: 'id', type: 'INT, PRIMARY KEY' },
      { name: 'brand', type: 'VARCHAR' },
      { name: 'product_name', type: 'VARCHAR' },
      { name: 'discount_type', type: "ENUM: 'percentage', 'fixed_amount'" },
      { name: 'discount_value', type: 'DECIMAL' },
      { name: 'start_date', type: 'DATE' },
      { name: 'end_date', type: 'DATE' },
      { name: 'min_quantity', type: 'INT' },
      { name: 'is_active', type: 'BOOLEAN' },
    ],
  },
];

/**
 * Local calendar date as YYYY-MM-DD.
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Get formatted schema description for LLM prompts.
 *
 * Rebuilt per request so the embedded date is always today's.
 */
export function describeSchema(now: Date = new Date()): string {
  const lines: string[] = ['Database Schema (MySQL):'];

  for (const table of STORE_TABLES) {
    lines.push('');
    lines.push(`Table: ${table.name}`);
    for (const column of table.columns) {
      lines.push(`- ${column.name} (${column.type})`);
    }
  }

  lines.push('');
  lines.push(`Current date for all queries is: ${formatDate(now)}`);

  return lines.join('\n');
}
