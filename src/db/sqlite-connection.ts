/**
 * killfeed SQLite Driver
 * Embedded backend over better-sqlite3, for local runs and tests
 */

import Database from 'better-sqlite3';
import { SqlParam } from '../core/types.js';
import { SqliteConfig } from '../core/config.js';
import { StatementError } from '../core/errors.js';
import { normalizeValue, toInsertId } from './values.js';
import type { ExecResult, QueryResult, RelationalConnection } from './connection.js';

type SqliteParam = string | number | bigint | Buffer | null;

export async function connectSqlite(config: SqliteConfig): Promise<RelationalConnection> {
  const db = new Database(config.path, { fileMustExist: config.path !== ':memory:' });
  if (config.path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  return new SqliteConnection(db);
}

// better-sqlite3 binds neither booleans nor dates
function toSqliteParam(param: SqlParam): SqliteParam {
  if (typeof param === 'boolean') return param ? 1 : 0;
  if (param instanceof Date) return param.toISOString();
  if (param instanceof Uint8Array) return Buffer.isBuffer(param) ? param : Buffer.from(param);
  return param;
}

export class SqliteConnection implements RelationalConnection {
  readonly driver = 'sqlite' as const;

  constructor(private readonly db: Database.Database) {}

  async query(sql: string, params: SqlParam[]): Promise<QueryResult> {
    const stmt = this.db.prepare<SqliteParam[], unknown[]>(sql);
    if (!stmt.reader) {
      throw new StatementError('Statement does not return a result set', { sql });
    }

    const columns = stmt.columns().map(c => c.name);
    const rows = stmt.raw(true).all(...params.map(toSqliteParam));
    return {
      columns,
      rows: rows.map(row => columns.map((column, i) => normalizeValue(row[i], column)))
    };
  }

  async execute(sql: string, params: SqlParam[]): Promise<ExecResult> {
    const info = this.db.prepare<SqliteParam[]>(sql).run(...params.map(toSqliteParam));
    return {
      affectedRows: info.changes,
      lastInsertId: info.changes > 0 ? toInsertId(info.lastInsertRowid) : null
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
