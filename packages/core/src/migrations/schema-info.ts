/**
 * Introspection of the live SQLite schema, used by `db status` and by the
 * migration tests to compare schemas before and after a round trip.
 */

import type Database from 'better-sqlite3';

export interface ColumnInfo {
  readonly name: string;
  readonly type: string;
  readonly notNull: boolean;
  readonly defaultValue: string | null;
  readonly primaryKey: boolean;
}

export interface TableInfo {
  readonly name: string;
  readonly columns: readonly ColumnInfo[];
  readonly indexes: readonly string[];
}

interface PragmaColumn {
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function getTableColumns(raw: Database.Database, table: string): ColumnInfo[] {
  const rows = raw.prepare<[], PragmaColumn>(`PRAGMA table_info(${quoteIdent(table)})`).all();
  return rows.map(r => ({
    name: r.name,
    type: r.type,
    notNull: r.notnull === 1,
    defaultValue: r.dflt_value,
    primaryKey: r.pk > 0,
  }));
}

/** Named indexes on a table; automatic ones backing PRIMARY KEY/UNIQUE are left out */
export function getTableIndexes(raw: Database.Database, table: string): string[] {
  return raw
    .prepare<[string], { name: string }>(
      `SELECT name FROM sqlite_master
       WHERE type = 'index' AND tbl_name = ? AND name NOT LIKE 'sqlite_%'
       ORDER BY name`,
    )
    .all(table)
    .map(r => r.name);
}

/** Every user table with its columns and indexes, ordered by name */
export function describeSchema(raw: Database.Database): TableInfo[] {
  const tables = raw
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master
       WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
       ORDER BY name`,
    )
    .all();

  return tables.map(({ name }) => ({
    name,
    columns: getTableColumns(raw, name),
    indexes: getTableIndexes(raw, name),
  }));
}
