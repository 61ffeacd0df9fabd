/**
 * Type definitions for rows moved between MySQL databases
 * Rows are loosely typed: any column may hold any of the ColumnValue variants
 */

/**
 * A single cell value. The variants are told apart with typeof / instanceof:
 * null, number (int or float), bigint, string, boolean, Date and Buffer (binary).
 */
export type ColumnValue = null | boolean | number | bigint | string | Date | Buffer;

export type Row = Record<string, ColumnValue>;

/**
 * Row as it arrives from JSON files or callers, before normalization
 */
export type RowInput = Record<string, unknown>;

/**
 * Schema and data of one source table, held only while it is being cloned
 */
export interface TableSnapshot {
  tableName: string;
  columns: string[];
  createStatement: string;
  rows: Row[];
}

export interface CloneStats {
  startTime: Date;
  endTime?: Date;
  tablesCloned: number;
  rowsCopied: number;
  errors: string[];
  warnings: string[];
}

/**
 * Convert an arbitrary value into something mysql2 can bind as a single placeholder.
 *
 * NaN, Infinity and undefined become NULL so numeric placeholders are never
 * written literally. Plain objects and arrays in loader input become JSON text,
 * since mysql2 would otherwise expand them into `key = value` lists.
 */
export function normalizeColumnValue(value: unknown): ColumnValue {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint' ||
    value instanceof Date ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }

  if (typeof value === 'object') {
    return JSON.stringify(value);
  }

  return String(value);
}

/**
 * Normalize every value of a driver result row
 */
export function toRow(record: Record<string, unknown>): Row {
  const row: Row = {};
  for (const [column, value] of Object.entries(record)) {
    row[column] = normalizeColumnValue(value);
  }
  return row;
}

export function normalizeRow(row: RowInput, columns: string[]): ColumnValue[] {
  return columns.map(column => normalizeColumnValue(row[column]));
}

/**
 * Every column that appears in the row set, in first-seen order
 */
export function collectColumns(rows: RowInput[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }
  return Array.from(columns);
}
