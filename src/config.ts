/**
 * Clone configuration from the process environment
 *
 * Each side is read from `<PREFIX>_DATABASE_URL` when set, otherwise from
 * `<PREFIX>_DB_HOST`, `<PREFIX>_DB_USER`, `<PREFIX>_DB_PASSWORD`, `<PREFIX>_DB_PORT`,
 * `<PREFIX>_DB_DATABASE`, `<PREFIX>_DB_CHARSET` and `<PREFIX>_DB_COLLATION`.
 */

import { parseDatabaseUrl, type DatabaseConfig } from './db-connection.js';

export const DEFAULT_CHARSET = 'utf8mb4';
export const DEFAULT_COLLATION = 'utf8mb4_unicode_ci';

export class ConfigError extends Error {
  constructor(
    message: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface CloneConfig {
  source: DatabaseConfig;
  target: DatabaseConfig;
  batchSize?: number;
}

type Environment = Record<string, string | undefined>;

export function loadCloneConfig(env: Environment = process.env): CloneConfig {
  const batchSize = parseBatchSize(env.CLONE_BATCH_SIZE);

  return {
    source: loadDatabaseConfig('SOURCE', env),
    target: loadDatabaseConfig('TARGET', env),
    ...(batchSize !== undefined ? { batchSize } : {}),
  };
}

export function loadDatabaseConfig(prefix: string, env: Environment = process.env): DatabaseConfig {
  const url = env[`${prefix}_DATABASE_URL`];
  if (url) {
    const parsed = parseDatabaseUrl(url);
    if (!parsed.host || !parsed.database) {
      throw new ConfigError(`${prefix}_DATABASE_URL must include a host and a database name`);
    }
    return {
      ...parsed,
      charset: parsed.charset ?? DEFAULT_CHARSET,
      collation: parsed.collation ?? DEFAULT_COLLATION,
    };
  }

  const missing = ['HOST', 'USER', 'DATABASE'].filter(key => !env[`${prefix}_DB_${key}`]);
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing configuration: ${missing.map(key => `${prefix}_DB_${key}`).join(', ')}`
    );
  }

  return {
    host: env[`${prefix}_DB_HOST`] ?? '',
    user: env[`${prefix}_DB_USER`] ?? '',
    password: env[`${prefix}_DB_PASSWORD`] ?? '',
    port: parsePort(prefix, env[`${prefix}_DB_PORT`]),
    database: env[`${prefix}_DB_DATABASE`] ?? '',
    charset: env[`${prefix}_DB_CHARSET`] || DEFAULT_CHARSET,
    collation: env[`${prefix}_DB_COLLATION`] || DEFAULT_COLLATION,
  };
}

function parsePort(prefix: string, value: string | undefined): number {
  if (!value) {
    return 3306;
  }

  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`Invalid ${prefix}_DB_PORT: ${value}`);
  }
  return parseInt(value);
}

function parseBatchSize(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const batchSize = parseInt(value);
  if (!/^\d+$/.test(value) || batchSize < 1) {
    throw new ConfigError(`Invalid CLONE_BATCH_SIZE: ${value}`);
  }
  return batchSize;
}
