/**
 * Column value normalization.
 *
 * Every driver hands back its own value shapes (Buffer, ArrayBuffer, bigint,
 * numeric strings for wide integers). They are folded into `SqlValue` here;
 * anything else is a scan failure for the whole call.
 */

import { SqlValue, ResultRow } from '../core/types.js';
import { RowScanError, StatementError } from '../core/errors.js';

export function normalizeValue(value: unknown, column: string): SqlValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return value;
  }

  if (value instanceof Date) return value;
  // Buffer is a Uint8Array subclass
  if (value instanceof Uint8Array) return value;
  if (value instanceof ArrayBuffer) return new Uint8Array(value);

  throw new RowScanError(`Unsupported value in column '${column}'`, {
    column,
    type: Object.prototype.toString.call(value)
  });
}

/** Zip positional row values with their column names */
export function toResultRow(columns: string[], values: SqlValue[], rowIndex: number): ResultRow {
  if (values.length !== columns.length) {
    throw new RowScanError(
      `Row ${rowIndex} has ${values.length} values for ${columns.length} columns`,
      { rowIndex, columns }
    );
  }

  const row: ResultRow = {};
  columns.forEach((column, i) => {
    if (Object.hasOwn(row, column)) {
      throw new RowScanError(`Column '${column}' appears more than once in the result`, { column, columns });
    }
    row[column] = values[i];
  });
  return row;
}

// ============================================================================
// TYPED READERS
// ============================================================================

/**
 * Read an integer column. Wide integers may arrive as bigint or as a decimal
 * string (mysql2 with supportBigNumbers); both are accepted while they fit in
 * a safe JavaScript integer.
 */
export function readInteger(row: ResultRow, column: string): number {
  const value = row[column];

  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return value;
  }
  if (typeof value === 'bigint'
    && value <= BigInt(Number.MAX_SAFE_INTEGER)
    && value >= BigInt(Number.MIN_SAFE_INTEGER)) {
    return Number(value);
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value)) {
    const parsed = Number(value);
    if (Number.isSafeInteger(parsed)) return parsed;
  }

  throw new RowScanError(`Column '${column}' is not an integer`, {
    column,
    value: value === null ? null : String(value)
  });
}

/** Read a text column; SQL NULL reads as the empty string */
export function readText(row: ResultRow, column: string): string {
  const value = row[column];
  return value === null || value === undefined ? '' : readRequiredText(row, column);
}

/** Read a NOT NULL text column */
export function readRequiredText(row: ResultRow, column: string): string {
  const value = row[column];

  if (value === null || value === undefined) {
    throw new RowScanError(`Column '${column}' is NULL`, { column });
  }
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString('utf8');

  throw new RowScanError(`Column '${column}' is not text`, { column });
}

/** Convert a driver's last-insert key to a plain number, if it has one */
export function toInsertId(value: number | bigint | undefined | null): number | null {
  if (value === undefined || value === null) return null;
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

// ============================================================================
// STATEMENT CLASSIFICATION
// ============================================================================

const READ_KEYWORDS = new Set(['SELECT', 'WITH', 'SHOW', 'DESCRIBE', 'DESC', 'EXPLAIN', 'PRAGMA', 'VALUES', 'TABLE']);
const WRITE_KEYWORDS = /\b(INSERT|UPDATE|DELETE|REPLACE)\b/i;
const LEADING_NOISE = /^(\s|\(|--[^\n]*(\n|$)|\/\*[\s\S]*?\*\/)+/;

/**
 * Whether a statement only reads, judged from its text. Drivers that cannot
 * ask the database before running a statement use this to refuse writes in
 * `query`, so nothing is committed by a call that then fails.
 */
export function isReadStatement(sql: string): boolean {
  const text = sql.replace(LEADING_NOISE, '');
  const keyword = /^[A-Za-z]+/.exec(text)?.[0].toUpperCase();
  if (keyword === undefined || !READ_KEYWORDS.has(keyword)) return false;

  // WITH can lead into a write; PRAGMA x = y changes a setting
  if (keyword === 'WITH') return !WRITE_KEYWORDS.test(text);
  if (keyword === 'PRAGMA') return !text.includes('=');
  return true;
}

export function assertReadStatement(sql: string): void {
  if (!isReadStatement(sql)) {
    throw new StatementError('Statement does not return a result set', { sql });
  }
}
