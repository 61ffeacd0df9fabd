export {
  DatabaseConnection,
  DatabaseConnectionError,
  parseDatabaseUrl,
  type DatabaseConfig,
} from './db-connection.js';
export {
  DatabaseCloner,
  CloneError,
  cloneDatabase,
  cloneSingleTable,
  type CloneOptions,
} from './db-clone.js';
export { DbDataLoader, DataLoadError, jsonTableFileSchema, type JsonTableFile } from './db-data-loader.js';
export { DbSqlGenerator } from './db-sql-generator.js';
export {
  normalizeColumnValue,
  type ColumnValue,
  type Row,
  type RowInput,
  type TableSnapshot,
  type CloneStats,
} from './db-row-types.js';
export { loadCloneConfig, loadDatabaseConfig, ConfigError, type CloneConfig } from './config.js';
