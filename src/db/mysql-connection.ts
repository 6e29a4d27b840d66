/**
 * killfeed MySQL Driver
 * Production backend over mysql2's promise API
 */

import mysql, { type Connection } from 'mysql2/promise';
import type { ConnectionOptions, ResultSetHeader, RowDataPacket } from 'mysql2';
import { SqlParam } from '../core/types.js';
import { MysqlConfig, splitHostPort } from '../core/config.js';
import { StatementError } from '../core/errors.js';
import { assertReadStatement, normalizeValue, toInsertId } from './values.js';
import type { ExecResult, QueryResult, RelationalConnection } from './connection.js';

/** utf8 charset, as the bot's tables were created with it */
export const MYSQL_CHARSET = 'UTF8_GENERAL_CI';

export function mysqlOptions(config: MysqlConfig): ConnectionOptions {
  const { host, port } = splitHostPort(config.host);
  return {
    host,
    port,
    user: config.user,
    password: config.password,
    database: config.schema,
    charset: MYSQL_CHARSET,
    // DATETIME/TIMESTAMP come back as Date
    dateStrings: false,
    // BIGINT ids beyond 2^53 come back as strings instead of losing precision
    supportBigNumbers: true,
    bigNumberStrings: false
  };
}

export async function connectMysql(config: MysqlConfig): Promise<RelationalConnection> {
  // createConnection handshakes immediately, so auth and network errors surface here
  const connection = await mysql.createConnection(mysqlOptions(config));
  return new MysqlConnection(connection);
}

type MysqlParam = string | number | boolean | Date | Buffer | null;

function toMysqlParam(param: SqlParam): MysqlParam {
  if (typeof param === 'bigint') return param.toString();
  if (param instanceof Uint8Array) return Buffer.isBuffer(param) ? param : Buffer.from(param);
  return param;
}

export class MysqlConnection implements RelationalConnection {
  readonly driver = 'mysql' as const;

  constructor(private readonly connection: Connection) {}

  async query(sql: string, params: SqlParam[]): Promise<QueryResult> {
    assertReadStatement(sql);
    const [rows, fields] = await this.connection.query<RowDataPacket[]>({
      sql,
      values: params.map(toMysqlParam),
      rowsAsArray: true
    });

    if (!Array.isArray(rows) || !fields) {
      throw new StatementError('Statement did not return a result set', { sql });
    }

    const columns = fields.map(f => f.name);
    return {
      columns,
      rows: rows.map(row => columns.map((column, i) => normalizeValue(row[i], column)))
    };
  }

  async execute(sql: string, params: SqlParam[]): Promise<ExecResult> {
    const [header] = await this.connection.execute<ResultSetHeader>(sql, params.map(toMysqlParam));
    return {
      affectedRows: header.affectedRows,
      lastInsertId: toInsertId(header.insertId)
    };
  }

  async close(): Promise<void> {
    await this.connection.end();
  }
}
