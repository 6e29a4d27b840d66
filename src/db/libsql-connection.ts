/**
 * killfeed libSQL Driver
 * Hosted SQLite (Turso) backend over @libsql/client
 */

import { createClient, Client } from '@libsql/client';
import { SqlParam } from '../core/types.js';
import { LibsqlConfig } from '../core/config.js';
import { assertReadStatement, normalizeValue, toInsertId } from './values.js';
import type { ExecResult, QueryResult, RelationalConnection } from './connection.js';

export async function connectLibsql(config: LibsqlConfig): Promise<RelationalConnection> {
  const client = createClient({
    url: config.url,
    authToken: config.authToken
  });

  // createClient is lazy; a round trip makes bad URLs and tokens fail here
  try {
    await client.execute('SELECT 1');
  } catch (error) {
    client.close();
    throw error;
  }

  return new LibsqlConnection(client);
}

export class LibsqlConnection implements RelationalConnection {
  readonly driver = 'libsql' as const;

  constructor(private readonly client: Client) {}

  async query(sql: string, params: SqlParam[]): Promise<QueryResult> {
    assertReadStatement(sql);
    const result = await this.client.execute({ sql, args: params });

    const columns = result.columns;
    return {
      columns,
      rows: result.rows.map(row => columns.map((column, i) => normalizeValue(row[i], column)))
    };
  }

  async execute(sql: string, params: SqlParam[]): Promise<ExecResult> {
    const result = await this.client.execute({ sql, args: params });
    return {
      affectedRows: result.rowsAffected,
      lastInsertId: result.rowsAffected > 0 ? toInsertId(result.lastInsertRowid) : null
    };
  }

  async close(): Promise<void> {
    this.client.close();
  }
}
