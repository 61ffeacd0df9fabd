/**
 * MySQL connection handle
 *
 * Wraps a single mysql2 session for one database: connect, health check and
 * disconnect. Public methods never throw; failures are logged and reported as
 * booleans.
 */

import mysql, { type Connection, type ConnectionOptions } from 'mysql2/promise';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  charset?: string;
  collation?: string;
}

export class DatabaseConnectionError extends Error {
  constructor(
    message: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'DatabaseConnectionError';
  }
}

type ColumnTypeCast = Exclude<NonNullable<ConnectionOptions['typeCast']>, boolean>;

/**
 * Geometry columns stay as raw bytes instead of mysql2's decoded `{ x, y }` objects
 */
export const castColumnValue: ColumnTypeCast = (field, next) =>
  field.type === 'GEOMETRY' ? field.buffer() : next();

export class DatabaseConnection {
  private config: DatabaseConfig;
  private session: Connection | null = null;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  get database(): string {
    return this.config.database;
  }

  /**
   * Human readable location, without credentials
   */
  get label(): string {
    return `${this.config.host}:${this.config.port}/${this.config.database}`;
  }

  /**
   * Open the session and verify it answers a ping
   */
  async connect(): Promise<boolean> {
    if (this.session) {
      if (await this.ping(this.session)) {
        return true;
      }
      await this.disconnect();
    }

    try {
      const session = await mysql.createConnection(this.buildConnectionOptions());

      if (!(await this.ping(session))) {
        console.error(`❌ Failed to connect to database ${this.label}`);
        this.session = null;
        await session.end().catch(error => {
          console.error(`⚠️ Error closing unhealthy session ${this.label}: ${describeError(error)}`);
        });
        return false;
      }

      this.session = session;
      console.log(`✅ Database connection successful: ${this.label}`);
      return true;
    } catch (error) {
      this.session = null;
      console.error(`❌ MySQL Error connecting to ${this.label}: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * True only when a session exists and is live
   */
  async isHealthy(): Promise<boolean> {
    if (!this.session || !(await this.ping(this.session))) {
      console.error(`❌ Database not connected: ${this.label}`);
      return false;
    }
    return true;
  }

  /**
   * Live session, for use inside an operation's own error boundary
   */
  requireSession(): Connection {
    if (!this.session) {
      throw new DatabaseConnectionError(`Database not connected: ${this.label}`);
    }
    return this.session;
  }

  async disconnect(): Promise<void> {
    if (!this.session) {
      return;
    }

    const session = this.session;
    this.session = null;

    try {
      await session.end();
      console.log(`✅ Database connection closed: ${this.label}`);
    } catch (error) {
      console.error(`⚠️ Error closing database connection ${this.label}: ${describeError(error)}`);
    }
  }

  private async ping(session: Connection): Promise<boolean> {
    try {
      await session.ping();
      return true;
    } catch {
      return false;
    }
  }

  private buildConnectionOptions(): ConnectionOptions {
    // mysql2 takes either a character set or a collation name through `charset`
    const charset = this.config.collation ?? this.config.charset;

    return {
      host: this.config.host,
      port: this.config.port,
      user: this.config.user,
      password: this.config.password,
      ...(charset ? { charset } : {}),
      // Read values in their wire form so they can be written back unchanged
      supportBigNumbers: true,
      bigNumberStrings: true,
      dateStrings: true,
      jsonStrings: true,
      typeCast: castColumnValue,
    };
  }
}

/**
 * Parse a mysql:// connection string into a DatabaseConfig
 */
export function parseDatabaseUrl(url: string): DatabaseConfig {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new DatabaseConnectionError(`Invalid database URL: ${url}`, toError(error));
  }

  const charset = parsed.searchParams.get('charset');
  const collation = parsed.searchParams.get('collation');

  return {
    host: parsed.hostname,
    port: parseInt(parsed.port) || 3306,
    database: decodeURIComponent(parsed.pathname.substring(1)),
    user: decodeURIComponent(parsed.username),
    password: decodeURIComponent(parsed.password),
    ...(charset ? { charset } : {}),
    ...(collation ? { collation } : {}),
  };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? ` (${error.code})` : '';
    return `${error.message}${code}`;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
