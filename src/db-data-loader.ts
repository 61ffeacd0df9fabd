/**
 * Database Data Loader
 * Inserts rows, imports JSON row files, restores SQL scripts and reads tables back
 * for a single MySQL database
 */

import { readFile } from 'fs/promises';
import type { ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { z } from 'zod';
import { DatabaseConnection, describeError, toError } from './db-connection.js';
import { DbSqlGenerator } from './db-sql-generator.js';
import {
  collectColumns,
  normalizeRow,
  toRow,
  type Row,
  type RowInput,
} from './db-row-types.js';

export class DataLoadError extends Error {
  constructor(
    message: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'DataLoadError';
  }
}

/**
 * Shape of a JSON row file: { "table": "<name>", "rows": [ { "<col>": <value> } ] }
 */
export const jsonTableFileSchema = z.object({
  table: z.string(),
  rows: z.array(z.record(z.unknown())),
});

export type JsonTableFile = z.infer<typeof jsonTableFileSchema>;

export class DbDataLoader {
  private connection: DatabaseConnection;

  constructor(connection: DatabaseConnection) {
    this.connection = connection;
  }

  /**
   * Insert rows as one multi-row statement. Columns default to every key in the row set.
   */
  async insertRows(rows: RowInput[], tableName: string, columns?: string[]): Promise<boolean> {
    if (!(await this.connection.isHealthy())) {
      return false;
    }

    if (rows.length === 0) {
      console.log(`ℹ️ No rows to insert into ${tableName}`);
      return true;
    }

    const insertColumns = columns ?? collectColumns(rows);
    if (insertColumns.length === 0) {
      console.error(`❌ Error inserting data into ${tableName}: rows have no columns`);
      return false;
    }

    const session = this.connection.requireSession();
    const values = rows.map(row => normalizeRow(row, insertColumns));

    try {
      await session.query(DbSqlGenerator.useDatabase(this.connection.database));
    } catch (error) {
      console.error(`❌ Error selecting database ${this.connection.database}: ${describeError(error)}`);
      return false;
    }

    try {
      await session.beginTransaction();
      const [result] = await session.query<ResultSetHeader>(
        DbSqlGenerator.bulkInsert(tableName, insertColumns),
        [values]
      );
      await session.commit();

      console.log(`✅ Successfully inserted ${result.affectedRows} records into ${tableName}`);
      return true;
    } catch (error) {
      console.error(`❌ Error inserting data into ${tableName}: ${describeError(error)}`);
      await this.rollbackAfterFailure(`insert into ${tableName}`);
      return false;
    }
  }

  /**
   * Create the handle's database if needed, select it and run a CREATE TABLE statement
   */
  async createTable(createStatement: string): Promise<boolean> {
    if (!(await this.connection.isHealthy())) {
      return false;
    }

    try {
      const session = this.connection.requireSession();
      await this.ensureDatabase();
      await session.query(createStatement);
      await session.commit();

      console.log(`✅ Table statement executed in ${this.connection.database}`);
      return true;
    } catch (error) {
      console.error(`❌ Error creating table in ${this.connection.database}: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Import a `{ table, rows }` JSON file into `tableName`
   */
  async importJsonFile(jsonFilePath: string, tableName: string): Promise<boolean> {
    let tableFile: JsonTableFile;
    try {
      tableFile = await this.readJsonTableFile(jsonFilePath);
    } catch (error) {
      const cause = error instanceof DataLoadError && error.cause ? `: ${describeError(error.cause)}` : '';
      console.error(`❌ Error importing JSON: ${describeError(error)}${cause}`);
      return false;
    }

    if (tableFile.table !== tableName) {
      console.warn(
        `⚠️ JSON table name '${tableFile.table}' differs from specified table name '${tableName}'`
      );
    }

    if (tableFile.rows.length === 0) {
      console.log('ℹ️ No data to import.');
      return false;
    }

    return this.insertRows(tableFile.rows, tableName, collectColumns(tableFile.rows));
  }

  /**
   * Run every `;`-separated statement of a SQL script and commit once at the end.
   * A `;` inside a string literal splits that statement.
   */
  async restoreFromSqlFile(sqlFilePath: string): Promise<boolean> {
    if (!(await this.connection.isHealthy())) {
      return false;
    }

    let script: string;
    try {
      script = await readFile(sqlFilePath, 'utf-8');
    } catch (error) {
      console.error(`❌ Error reading SQL file ${sqlFilePath}: ${describeError(error)}`);
      return false;
    }

    const statements = DbSqlGenerator.splitStatements(script);

    try {
      const session = this.connection.requireSession();
      await this.ensureDatabase();
      await session.beginTransaction();

      for (const statement of statements) {
        await session.query(statement);
      }

      await session.commit();
      console.log(`✅ Successfully restored database from ${sqlFilePath} (${statements.length} statements)`);
      return true;
    } catch (error) {
      console.error(`❌ Error restoring database: ${describeError(error)}`);
      await this.rollbackAfterFailure(`restore from ${sqlFilePath}`);
      return false;
    }
  }

  /**
   * Read a whole table, or the result of `query`. Returns [] when nothing could be read.
   */
  async getTable(tableName: string, query?: string): Promise<Row[]> {
    if (!(await this.connection.isHealthy())) {
      return [];
    }

    try {
      const session = this.connection.requireSession();
      await session.query(DbSqlGenerator.useDatabase(this.connection.database));

      const [rows] = await session.query<RowDataPacket[]>(query ?? DbSqlGenerator.selectAll(tableName));

      if (rows.length === 0) {
        console.log(`ℹ️ No data found in table ${tableName}`);
        return [];
      }

      console.log(`✅ Successfully retrieved ${rows.length} rows from ${tableName}`);
      return rows.map(row => toRow(row));
    } catch (error) {
      console.error(`❌ Error retrieving data from ${tableName}: ${describeError(error)}`);
      return [];
    }
  }

  private async readJsonTableFile(jsonFilePath: string): Promise<JsonTableFile> {
    let content: string;
    try {
      content = await readFile(jsonFilePath, 'utf-8');
    } catch (error) {
      throw new DataLoadError(`Failed to read JSON file: ${jsonFilePath}`, toError(error));
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new DataLoadError(`Error decoding JSON: ${jsonFilePath}`, toError(error));
    }

    const parsed = jsonTableFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new DataLoadError(
        "Invalid JSON structure. Expected 'table' and 'rows' fields.",
        parsed.error
      );
    }

    return parsed.data;
  }

  private async ensureDatabase(): Promise<void> {
    const session = this.connection.requireSession();
    await session.query(DbSqlGenerator.createDatabaseIfNotExists(this.connection.database));
    await session.query(DbSqlGenerator.useDatabase(this.connection.database));
  }

  private async rollbackAfterFailure(operation: string): Promise<void> {
    try {
      await this.connection.requireSession().rollback();
    } catch (error) {
      console.error(`⚠️ Rollback after failed ${operation} did not complete: ${describeError(error)}`);
    }
  }
}
