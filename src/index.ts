/**
 * killfeed
 * Data-access layer for the corporation kill/loss notification bot
 */

export { RelationalStore } from './db/relational-store.js';
export { openConnection } from './db/connection.js';
export type { Connector, ExecResult, QueryResult, RelationalConnection } from './db/connection.js';
export { MysqlConnection } from './db/mysql-connection.js';
export { SqliteConnection } from './db/sqlite-connection.js';
export { LibsqlConnection } from './db/libsql-connection.js';

export { INVALID_REGION_ID, isPersisted, newOrganization } from './core/types.js';
export type {
  Organization, PersistedOrganization, RegionId, ResultRow, SqlParam, SqlValue
} from './core/types.js';

export { describeTarget, loadConfig } from './core/config.js';
export type { AppConfig, DatabaseConfig, LibsqlConfig, MysqlConfig, SqliteConfig } from './core/config.js';

export {
  ConfigError, ErrorCodes, InvalidEntityError, NotConnectedError, NotFoundError,
  RowScanError, StatementError, StoreError, ValidationError
} from './core/errors.js';
export type { ErrorCode } from './core/errors.js';

export { createLogger, logger } from './platform/logger.js';
export type { Logger } from './platform/logger.js';
