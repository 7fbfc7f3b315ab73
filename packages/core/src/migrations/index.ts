export { MIGRATIONS, LATEST_SCHEMA_VERSION } from './registry.js';
export type { Migration } from './registry.js';
export { Migrator, planMigration, validateMigrations } from './migrator.js';
export type { MigrationStep, MigrationResult } from './migrator.js';
export { describeSchema, getTableColumns, getTableIndexes } from './schema-info.js';
export type { TableInfo, ColumnInfo } from './schema-info.js';
