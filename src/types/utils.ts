/**
 * Core type utilities.
 * These types replace 'any' usage and provide strict type safety.
 */

/**
 * A single value read from a result column.
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * One result row: column name to value, in the column order of the SELECT.
 */
export type Row = Record<string, CellValue>;

/**
 * Ordered rows returned by a query. May be empty.
 */
export type ResultSet = Row[];

/**
 * Success or failure of a fallible step, without exceptions.
 */
export type Result<T, E extends Error = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}
