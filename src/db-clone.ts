/**
 * Database Clone Pipeline
 *
 * Copies every table (schema and rows) from a source MySQL database into a
 * target database. The clone is not transactional across tables: each table
 * is committed on its own and a failure leaves earlier tables in place.
 */

import type { Connection, FieldPacket, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { DatabaseConnection, describeError, toError } from './db-connection.js';
import { DbSqlGenerator } from './db-sql-generator.js';
import { toRow, type CloneStats, type TableSnapshot } from './db-row-types.js';

export class CloneError extends Error {
  constructor(
    message: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'CloneError';
  }
}

export interface CloneOptions {
  /** Rows per multi-row INSERT statement */
  batchSize?: number;
}

const DEFAULT_BATCH_SIZE = 1000;

export class DatabaseCloner {
  private source: DatabaseConnection;
  private target: DatabaseConnection;
  private batchSize: number;
  private stats: CloneStats;
  private logBuffer: string[] = [];

  constructor(source: DatabaseConnection, target: DatabaseConnection, options: CloneOptions = {}) {
    this.source = source;
    this.target = target;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.stats = this.freshStats();
  }

  getStats(): CloneStats {
    return { ...this.stats, errors: [...this.stats.errors], warnings: [...this.stats.warnings] };
  }

  getLogs(): string[] {
    return [...this.logBuffer];
  }

  /**
   * Clone every table of the source database into the target database
   */
  async cloneDatabase(): Promise<boolean> {
    this.stats = this.freshStats();

    if (!this.hasValidBatchSize()) {
      return false;
    }

    if (!(await this.target.isHealthy()) || !(await this.source.isHealthy())) {
      return false;
    }

    const sourceSession = this.source.requireSession();
    const targetSession = this.target.requireSession();

    try {
      this.log(`🚀 Cloning ${this.source.label} into ${this.target.label}`);

      await this.prepareTarget(targetSession);
      await sourceSession.query(DbSqlGenerator.useDatabase(this.source.database));

      const tables = await this.listTables(sourceSession);
      this.log(`📋 Found ${tables.length} tables to clone`);

      for (const tableName of tables) {
        await this.cloneTable(sourceSession, targetSession, tableName);
      }

      await targetSession.query(DbSqlGenerator.setForeignKeyChecks(true));

      this.log(
        `✅ Database ${this.source.database} successfully cloned to ${this.target.database} ` +
          `(${this.stats.tablesCloned} tables, ${this.stats.rowsCopied} rows)`
      );
      return true;
    } catch (error) {
      this.logError('Error cloning database', error);
      return false;
    } finally {
      this.stats.endTime = new Date();
      await this.restoreForeignKeyChecks(targetSession);
    }
  }

  /**
   * Clone one table. Nothing is sent to the target when the table is missing from the source.
   */
  async cloneSingleTable(tableName: string): Promise<boolean> {
    this.stats = this.freshStats();

    if (!this.hasValidBatchSize()) {
      return false;
    }

    if (!(await this.target.isHealthy()) || !(await this.source.isHealthy())) {
      return false;
    }

    const sourceSession = this.source.requireSession();
    const targetSession = this.target.requireSession();
    let targetTouched = false;

    try {
      if (!(await this.tableExists(sourceSession, tableName))) {
        this.logError(
          `Table ${tableName} does not exist in ${this.source.database}`,
          new CloneError('Table not found')
        );
        return false;
      }

      targetTouched = true;
      await this.prepareTarget(targetSession);
      await sourceSession.query(DbSqlGenerator.useDatabase(this.source.database));

      await this.cloneTable(sourceSession, targetSession, tableName);

      await targetSession.query(DbSqlGenerator.setForeignKeyChecks(true));

      this.log(
        `✅ Table ${tableName} successfully cloned from ${this.source.database} to ${this.target.database}`
      );
      return true;
    } catch (error) {
      this.logError('Error cloning table', error);
      return false;
    } finally {
      this.stats.endTime = new Date();
      if (targetTouched) {
        await this.restoreForeignKeyChecks(targetSession);
      }
    }
  }

  private async prepareTarget(targetSession: Connection): Promise<void> {
    await targetSession.query(DbSqlGenerator.createDatabaseIfNotExists(this.target.database));
    await targetSession.query(DbSqlGenerator.useDatabase(this.target.database));

    this.log('🔓 Disabling foreign key checks on target...');
    await targetSession.query(DbSqlGenerator.setForeignKeyChecks(false));
  }

  private async listTables(sourceSession: Connection): Promise<string[]> {
    const [rows] = await sourceSession.query<RowDataPacket[]>('SHOW FULL TABLES');
    const tables: string[] = [];

    for (const row of rows) {
      // First column is `Tables_in_<database>`, second is `Table_type`
      const [name, tableType] = Object.values(row);
      if (typeof name !== 'string') {
        throw new CloneError(`Unexpected SHOW FULL TABLES row: ${JSON.stringify(row)}`);
      }

      if (tableType !== undefined && tableType !== 'BASE TABLE') {
        this.warn(`Skipping ${name}: ${String(tableType)} has no CREATE TABLE statement`);
        continue;
      }

      tables.push(name);
    }

    return tables;
  }

  private hasValidBatchSize(): boolean {
    if (Number.isInteger(this.batchSize) && this.batchSize >= 1) {
      return true;
    }
    this.logError('Invalid clone options', new CloneError(`Invalid batch size: ${this.batchSize}`));
    return false;
  }

  private async tableExists(sourceSession: Connection, tableName: string): Promise<boolean> {
    const [rows] = await sourceSession.query<RowDataPacket[]>(
      "SELECT TABLE_NAME FROM information_schema.TABLES WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ? AND TABLE_TYPE = 'BASE TABLE'",
      [this.source.database, tableName]
    );
    return rows.length > 0;
  }

  private async cloneTable(
    sourceSession: Connection,
    targetSession: Connection,
    tableName: string
  ): Promise<void> {
    this.log(`📦 Cloning table: ${tableName}`);

    const createStatement = await this.readCreateStatement(sourceSession, tableName);

    await targetSession.query(DbSqlGenerator.dropTableIfExists(tableName));
    await targetSession.query(createStatement);

    const snapshot = await this.readSnapshot(sourceSession, tableName, createStatement);
    await this.insertSnapshotRows(targetSession, snapshot);

    this.stats.tablesCloned++;
  }

  /**
   * CREATE TABLE statement of a source table, pointed at the target database
   */
  private async readCreateStatement(sourceSession: Connection, tableName: string): Promise<string> {
    const [createRows] = await sourceSession.query<RowDataPacket[]>(
      DbSqlGenerator.showCreateTable(tableName)
    );

    const createStatement: unknown = createRows[0]?.['Create Table'];
    if (typeof createStatement !== 'string') {
      throw new CloneError(`No CREATE TABLE statement returned for ${tableName}`);
    }

    return DbSqlGenerator.rewriteSchemaQualifier(
      createStatement,
      this.source.database,
      this.target.database
    );
  }

  private async readSnapshot(
    sourceSession: Connection,
    tableName: string,
    createStatement: string
  ): Promise<TableSnapshot> {
    const [rows, fields] = await sourceSession.query<RowDataPacket[]>(
      DbSqlGenerator.selectAll(tableName)
    );

    return {
      tableName,
      columns: columnNames(fields),
      createStatement,
      rows: rows.map(row => toRow(row)),
    };
  }

  /**
   * Insert all rows of a snapshot in batches, committed together
   */
  private async insertSnapshotRows(targetSession: Connection, snapshot: TableSnapshot): Promise<void> {
    if (snapshot.rows.length === 0) {
      this.log(`ℹ️ ${snapshot.tableName} is empty, nothing to insert`);
      return;
    }

    const insertQuery = DbSqlGenerator.bulkInsert(snapshot.tableName, snapshot.columns);

    await targetSession.beginTransaction();
    try {
      for (let offset = 0; offset < snapshot.rows.length; offset += this.batchSize) {
        const values = snapshot.rows
          .slice(offset, offset + this.batchSize)
          .map(row => snapshot.columns.map(column => row[column] ?? null));
        await targetSession.query<ResultSetHeader>(insertQuery, [values]);
      }
      await targetSession.commit();
    } catch (error) {
      try {
        await targetSession.rollback();
      } catch (rollbackError) {
        this.logError(`Rollback of ${snapshot.tableName} failed`, rollbackError);
      }
      throw new CloneError(
        `Failed to insert rows into ${this.target.database}.${snapshot.tableName}`,
        toError(error)
      );
    }

    this.stats.rowsCopied += snapshot.rows.length;
    this.log(`✅ Inserted ${snapshot.rows.length} rows into ${this.target.database}.${snapshot.tableName}`);
  }

  private async restoreForeignKeyChecks(targetSession: Connection): Promise<void> {
    try {
      await targetSession.query(DbSqlGenerator.setForeignKeyChecks(true));
      this.log('🔒 Foreign key checks re-enabled on target');
    } catch (error) {
      this.logError('Warning: Could not re-enable foreign key checks', error);
    }
  }

  private freshStats(): CloneStats {
    return {
      startTime: new Date(),
      tablesCloned: 0,
      rowsCopied: 0,
      errors: [],
      warnings: [],
    };
  }

  private log(message: string): void {
    const timestamp = new Date().toISOString();
    const logMessage = `[${timestamp}] ${message}`;
    console.log(logMessage);
    this.logBuffer.push(logMessage);
  }

  private warn(message: string): void {
    const timestamp = new Date().toISOString();
    const warnMessage = `[${timestamp}] ⚠️  ${message}`;
    console.warn(warnMessage);
    this.stats.warnings.push(message);
    this.logBuffer.push(warnMessage);
  }

  private logError(message: string, error: unknown): void {
    const timestamp = new Date().toISOString();
    const cause = error instanceof CloneError && error.cause ? ` <- ${describeError(error.cause)}` : '';
    const errorMessage = `[${timestamp}] ❌ ${message}: ${describeError(error)}${cause}`;
    console.error(errorMessage);
    this.stats.errors.push(errorMessage);
    this.logBuffer.push(errorMessage);
  }
}

/**
 * Clone every table from `source` into `target`
 */
export async function cloneDatabase(
  source: DatabaseConnection,
  target: DatabaseConnection,
  options: CloneOptions = {}
): Promise<boolean> {
  return new DatabaseCloner(source, target, options).cloneDatabase();
}

export async function cloneSingleTable(
  source: DatabaseConnection,
  target: DatabaseConnection,
  tableName: string,
  options: CloneOptions = {}
): Promise<boolean> {
  return new DatabaseCloner(source, target, options).cloneSingleTable(tableName);
}

function columnNames(fields: FieldPacket[]): string[] {
  return fields.map(field => field.name);
}
