/**
 * killfeed Configuration
 * Environment-driven settings, validated with Zod
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_MYSQL_PORT = 3306;

// ============================================================================
// SCHEMAS
// ============================================================================

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const MysqlConfigSchema = z.object({
  driver: z.literal('mysql'),
  host: z.string().min(1).default('localhost'),
  user: z.string({ required_error: 'KILLFEED_DB_USER is required' }).min(1),
  password: z.string().default(''),
  schema: z.string({ required_error: 'KILLFEED_DB_SCHEMA is required' }).min(1)
});

export const SqliteConfigSchema = z.object({
  driver: z.literal('sqlite'),
  path: z.string().min(1).default('killfeed.db')
});

export const LibsqlConfigSchema = z.object({
  driver: z.literal('libsql'),
  url: z.string({ required_error: 'TURSO_DATABASE_URL is required' }).min(1),
  authToken: z.string().optional()
});

export const DatabaseConfigSchema = z.discriminatedUnion('driver', [
  MysqlConfigSchema,
  SqliteConfigSchema,
  LibsqlConfigSchema
]);

export const AppConfigSchema = z.object({
  database: DatabaseConfigSchema
});

export type MysqlConfig = z.infer<typeof MysqlConfigSchema>;
export type SqliteConfig = z.infer<typeof SqliteConfigSchema>;
export type LibsqlConfig = z.infer<typeof LibsqlConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

// ============================================================================
// LOADING
// ============================================================================

// Empty variables count as unset
function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = AppConfigSchema.safeParse({
    database: {
      driver: read(env, 'KILLFEED_DB_DRIVER') ?? 'mysql',
      host: read(env, 'KILLFEED_DB_HOST'),
      user: read(env, 'KILLFEED_DB_USER'),
      password: read(env, 'KILLFEED_DB_PASSWORD'),
      schema: read(env, 'KILLFEED_DB_SCHEMA'),
      path: read(env, 'KILLFEED_DB_PATH'),
      url: read(env, 'TURSO_DATABASE_URL'),
      authToken: read(env, 'TURSO_AUTH_TOKEN')
    }
  });

  if (!result.success) {
    throw ConfigError.fromZod(result.error);
  }
  return result.data;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * LOG_LEVEL if it names a pino level, otherwise `info`. Only the logger reads
 * it, so a bad level never stops a command from running.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const result = LogLevelSchema.safeParse(read(env, 'LOG_LEVEL'));
  return result.success ? result.data : 'info';
}

/**
 * Split `host[:port]`. Bracketed IPv6 literals (`[::1]:3307`) are accepted;
 * a bare IPv6 literal is taken as a host without a port.
 */
export function splitHostPort(host: string): { host: string; port: number } {
  const bracketed = /^\[(.+)\](?::(\d+))?$/.exec(host);
  if (bracketed) {
    return {
      host: bracketed[1],
      port: bracketed[2] ? parseInt(bracketed[2], 10) : DEFAULT_MYSQL_PORT
    };
  }

  const plain = /^([^:]+):(\d+)$/.exec(host);
  if (plain) {
    return { host: plain[1], port: parseInt(plain[2], 10) };
  }

  return { host, port: DEFAULT_MYSQL_PORT };
}

/** Human-readable connection target with credentials masked */
export function describeTarget(config: DatabaseConfig): string {
  switch (config.driver) {
    case 'mysql':
      return `${config.user}:***@tcp(${config.host})/${config.schema}?charset=utf8&parseTime=true`;
    case 'sqlite':
      return `sqlite:${config.path}`;
    case 'libsql':
      return config.url;
  }
}
