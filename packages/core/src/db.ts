import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';

export type TaskletDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

export const MEMORY_PATH = ':memory:';

/**
 * Open a SQLite connection with the pragmas every connection needs and wrap
 * it in Drizzle. The schema is not touched here; see `Migrator`.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path: string): TaskletDb {
  if (path !== MEMORY_PATH) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);

  // Set pragmas; must happen on every connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  // fold(x): String#toLowerCase for title search; LIKE and NOCASE fold ASCII only
  sqlite.function('fold', { deterministic: true }, (value: unknown) =>
    typeof value === 'string' ? value.toLowerCase() : value,
  );

  return drizzle(sqlite, { schema });
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Used for migrations, transactions and anything Drizzle does not cover.
 */
export function getRawDb(db: TaskletDb): Database.Database {
  return db.$client;
}

/** Run `fn` inside one immediate transaction; rolled back if it throws */
export function inTransaction<T>(db: TaskletDb, fn: () => T): T {
  const run = getRawDb(db).transaction(fn);
  return run.immediate();
}
