/**
 * DB SQL Generator
 * Builds the MySQL statements used by the clone pipeline and the data loader
 */

export class DbSqlGenerator {
  /**
   * Quote a MySQL identifier with backticks, doubling embedded backticks
   */
  static quoteIdentifier(name: string): string {
    return `\`${name.replaceAll('`', '``')}\``;
  }

  static createDatabaseIfNotExists(databaseName: string): string {
    return `CREATE DATABASE IF NOT EXISTS ${this.quoteIdentifier(databaseName)}`;
  }

  static useDatabase(databaseName: string): string {
    return `USE ${this.quoteIdentifier(databaseName)}`;
  }

  static setForeignKeyChecks(enabled: boolean): string {
    return `SET FOREIGN_KEY_CHECKS = ${enabled ? 1 : 0}`;
  }

  static showCreateTable(tableName: string): string {
    return `SHOW CREATE TABLE ${this.quoteIdentifier(tableName)}`;
  }

  static dropTableIfExists(tableName: string): string {
    return `DROP TABLE IF EXISTS ${this.quoteIdentifier(tableName)}`;
  }

  static selectAll(tableName: string): string {
    return `SELECT * FROM ${this.quoteIdentifier(tableName)}`;
  }

  /**
   * Multi-row insert; mysql2 expands the single `?` from a nested array of values
   */
  static bulkInsert(tableName: string, columns: string[]): string {
    const columnList = columns.map(column => this.quoteIdentifier(column)).join(', ');
    return `INSERT INTO ${this.quoteIdentifier(tableName)} (${columnList}) VALUES ?`;
  }

  /**
   * Point schema-qualified references in a CREATE TABLE statement at another database.
   *
   * Literal text substitution of the backtick-quoted name: an occurrence inside a
   * comment or a default value is rewritten as well.
   */
  static rewriteSchemaQualifier(
    createStatement: string,
    sourceDatabase: string,
    targetDatabase: string
  ): string {
    if (sourceDatabase === targetDatabase) {
      return createStatement;
    }
    return createStatement.replaceAll(
      this.quoteIdentifier(sourceDatabase),
      this.quoteIdentifier(targetDatabase)
    );
  }

  /**
   * Split a SQL script on every `;`. A semicolon inside a string literal
   * splits the statement too.
   */
  static splitStatements(script: string): string[] {
    return script
      .split(';')
      .map(statement => statement.trim())
      .filter(statement => statement.length > 0);
  }
}
