/**
 * killfeed Connection Layer
 * The relational capability the store is built on, and the driver factory
 */

import { SqlParam, SqlValue } from '../core/types.js';
import { DatabaseConfig, describeTarget } from '../core/config.js';
import { createLogger, type Logger } from '../platform/logger.js';
import { connectMysql } from './mysql-connection.js';
import { connectSqlite } from './sqlite-connection.js';
import { connectLibsql } from './libsql-connection.js';

// ============================================================================
// CAPABILITY
// ============================================================================

export interface QueryResult {
  /** Column names in select-list order, taken from the result metadata */
  columns: string[];
  /** Positional values, one array per row, aligned with `columns` */
  rows: SqlValue[][];
}

export interface ExecResult {
  affectedRows: number;
  /** Storage-assigned key of the last inserted row, when the statement made one */
  lastInsertId: number | null;
}

export interface RelationalConnection {
  readonly driver: DatabaseConfig['driver'];
  query(sql: string, params: SqlParam[]): Promise<QueryResult>;
  execute(sql: string, params: SqlParam[]): Promise<ExecResult>;
  close(): Promise<void>;
}

export type Connector = (config: DatabaseConfig) => Promise<RelationalConnection>;

// ============================================================================
// FACTORY
// ============================================================================

/**
 * Open a connection with the driver named in the configuration. Driver errors
 * (bad target, rejected credentials, unreachable host) propagate unchanged.
 */
export async function openConnection(
  config: DatabaseConfig,
  log: Logger = createLogger('db')
): Promise<RelationalConnection> {
  log.debug({ driver: config.driver, target: describeTarget(config) }, 'Connecting to database');

  const connection = await connectWith(config);

  log.debug({ driver: config.driver }, 'Database connection established');
  return connection;
}

function connectWith(config: DatabaseConfig): Promise<RelationalConnection> {
  switch (config.driver) {
    case 'mysql':
      return connectMysql(config);
    case 'sqlite':
      return connectSqlite(config);
    case 'libsql':
      return connectLibsql(config);
  }
}
