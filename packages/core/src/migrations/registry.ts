/**
 * Schema migrations for the SQLite store, oldest first.
 *
 * Each migration is static SQL. `down` must restore exactly the schema that
 * existed before `up` ran. Versions are positive and strictly increasing.
 */

export interface Migration {
  /** Migration version number */
  readonly version: number;
  /** Human-readable description */
  readonly description: string;
  /** SQL to apply the migration */
  readonly up: string;
  /** SQL to roll it back */
  readonly down: string;
}

const migration001: Migration = {
  version: 1,
  description: 'Base tables: categories, tasks, config',
  up: `
CREATE TABLE categories (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    created_at TEXT NOT NULL
);

CREATE TABLE tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    completed INTEGER NOT NULL DEFAULT 0,
    priority TEXT NOT NULL DEFAULT 'medium' CHECK (priority IN ('high', 'medium', 'low')),
    category_id INTEGER,
    deleted INTEGER NOT NULL DEFAULT 0,
    deleted_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);

CREATE TABLE config (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);
`,
  down: `
DROP TABLE config;
DROP TABLE tasks;
DROP TABLE categories;
`,
};

const migration002: Migration = {
  version: 2,
  description: 'Category ID allocation: high-water counter and free pool',
  up: `
CREATE TABLE id_counters (
    name TEXT PRIMARY KEY,
    value INTEGER NOT NULL
);

INSERT INTO id_counters (name, value)
SELECT 'category', IFNULL(MAX(id), 0) FROM categories;

CREATE TABLE category_id_pool (
    id INTEGER PRIMARY KEY
);

WITH RECURSIVE seq(n) AS (
    SELECT 1
    UNION ALL
    SELECT n + 1 FROM seq WHERE n < (SELECT value FROM id_counters WHERE name = 'category')
)
INSERT INTO category_id_pool (id)
SELECT n FROM seq
WHERE n <= (SELECT value FROM id_counters WHERE name = 'category')
  AND n NOT IN (SELECT id FROM categories);
`,
  down: `
DROP TABLE category_id_pool;
DROP TABLE id_counters;
`,
};

const migration003: Migration = {
  version: 3,
  description: 'Indexes: category listing, purge sweep, unique live titles and category names',
  up: `
CREATE INDEX idx_tasks_category ON tasks(category_id, id);
CREATE INDEX idx_tasks_deleted ON tasks(deleted, deleted_at);
CREATE UNIQUE INDEX idx_tasks_live_title ON tasks(title, IFNULL(category_id, -1)) WHERE deleted = 0;
CREATE UNIQUE INDEX idx_categories_name ON categories(name COLLATE NOCASE);
`,
  down: `
DROP INDEX idx_categories_name;
DROP INDEX idx_tasks_live_title;
DROP INDEX idx_tasks_deleted;
DROP INDEX idx_tasks_category;
`,
};

const migration004: Migration = {
  version: 4,
  description: 'Task descriptions',
  up: `
ALTER TABLE tasks ADD COLUMN description TEXT;
`,
  down: `
ALTER TABLE tasks DROP COLUMN description;
`,
};

/**
 * All migrations in order
 */
export const MIGRATIONS: readonly Migration[] = [migration001, migration002, migration003, migration004];

export const LATEST_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1]?.version ?? 0;
