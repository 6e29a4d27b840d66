/**
 * Shared fixtures for store and CLI tests: an in-memory SQLite database with
 * the bot's tables and a handful of made-up reference rows.
 */

import fs from 'fs';
import Database from 'better-sqlite3';
import { SqlParam } from '../../core/types.js';
import { SqliteConnection } from '../sqlite-connection.js';
import type { ExecResult, QueryResult, RelationalConnection } from '../connection.js';

const SCHEMA_SQL = fs.readFileSync(new URL('./fixtures/schema.sql', import.meta.url), 'utf-8');
const STATIC_DATA_SQL = fs.readFileSync(new URL('./fixtures/static-data.sql', import.meta.url), 'utf-8');

export function createTestDatabase(): Database.Database {
  const db = new Database(':memory:');
  db.exec(SCHEMA_SQL);
  db.exec(STATIC_DATA_SQL);
  return db;
}

export function seedOrganization(
  db: Database.Database,
  org: { eveCorporationId: number; lastKillId?: number; lastLossId?: number; name?: string; killComment?: string; lossComment?: string },
  ignoredRegions: number[] = []
): number {
  const info = db.prepare(`
    INSERT INTO corporations (evecorporationid, lastkillid, lastlossid, name, killcomment, losscomment)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(
    org.eveCorporationId, org.lastKillId ?? 0, org.lastLossId ?? 0,
    org.name ?? null, org.killComment ?? null, org.lossComment ?? null
  );

  const id = Number(info.lastInsertRowid);
  const insertRegion = db.prepare('INSERT INTO ignoredregions (corporationID, regionid) VALUES (?, ?)');
  for (const regionId of ignoredRegions) {
    insertRegion.run(id, regionId);
  }
  return id;
}

/**
 * Wraps a connection so that closing it leaves the database open; lets
 * several stores in one test share a single in-memory database.
 */
export class SharedConnection implements RelationalConnection {
  readonly driver = 'sqlite' as const;
  private readonly inner: SqliteConnection;

  constructor(db: Database.Database) {
    this.inner = new SqliteConnection(db);
  }

  query(sql: string, params: SqlParam[]): Promise<QueryResult> {
    return this.inner.query(sql, params);
  }

  execute(sql: string, params: SqlParam[]): Promise<ExecResult> {
    return this.inner.execute(sql, params);
  }

  async close(): Promise<void> {}
}

/** Canned results for exercising the store without a database */
export class FakeConnection implements RelationalConnection {
  readonly driver = 'sqlite' as const;
  closed = false;

  constructor(
    private readonly queryResult: QueryResult,
    private readonly execResult: ExecResult | Error = { affectedRows: 0, lastInsertId: null }
  ) {}

  async query(): Promise<QueryResult> {
    return this.queryResult;
  }

  async execute(): Promise<ExecResult> {
    if (this.execResult instanceof Error) throw this.execResult;
    return this.execResult;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
