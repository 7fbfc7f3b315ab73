/**
 * SQLite backend: better-sqlite3 connection, Drizzle for the statements,
 * one transaction per mutation. The schema is brought up to date by the
 * migration engine every time the store is opened.
 */

import { eq, and, asc, isNull, min, sql, type SQL } from 'drizzle-orm';
import { createDb, getRawDb, inTransaction, type TaskletDb } from '../db.js';
import { tasks, categories, config, categoryIdPool, idCounters, CATEGORY_COUNTER } from '../schema/index.js';
import type { StorageBackend, StorageOptions, CategoryDeletion, ConfigChanges } from './backend.js';
import type { Task, TaskId, NewTask, TaskPatch, TaskFilter } from '../types/task.js';
import type { Category, CategoryId, CategoryRef, CategoryAllocation } from '../types/category.js';
import { DELETED_CATEGORY_ID } from '../types/category.js';
import { StorageType } from '../types/storage-type.js';
import { NotFoundError, ValidationError } from '../errors.js';
import {
  newTaskFields, applyPatch, softDeleted, hasTitleClash, titleClashError,
  hasNameClash, nameClashError, normalizeCategoryName,
} from '../models/task-helpers.js';
import { Migrator } from '../migrations/migrator.js';
import type { MigrationResult } from '../migrations/migrator.js';
import { MIGRATIONS, type Migration } from '../migrations/registry.js';
import { mapSqliteError } from './sqlite-errors.js';

export interface SqliteBackendOptions extends StorageOptions {
  /** Migration registry to run on open; the built-in one when omitted */
  migrations?: readonly Migration[];
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

type TaskRow = typeof tasks.$inferSelect;

function toTask(row: TaskRow): Task {
  return { ...row };
}

/** Column values for a task, without its ID */
function taskValues(task: Omit<Task, 'id'>): Omit<TaskRow, 'id'> {
  return {
    title: task.title,
    description: task.description,
    completed: task.completed,
    priority: task.priority,
    categoryId: task.categoryId,
    deleted: task.deleted,
    deletedAt: task.deletedAt,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
  };
}

/** `category_id IS ?`, with NULL meaning uncategorized */
function inCategory(ref: CategoryRef): SQL {
  return ref === null ? isNull(tasks.categoryId) : eq(tasks.categoryId, ref);
}

function openSchema(db: TaskletDb, migrations: readonly Migration[]): { migrator: Migrator; result: MigrationResult } {
  try {
    const migrator = new Migrator(getRawDb(db), migrations);
    return { migrator, result: migrator.migrateToLatest() };
  } catch (err: unknown) {
    getRawDb(db).close();
    throw err;
  }
}

export class SqliteBackend implements StorageBackend {
  readonly type = StorageType.Sqlite;
  readonly path: string;
  readonly migrator: Migrator;
  /** What the automatic upgrade on open did */
  readonly startupMigration: MigrationResult;
  private readonly db: TaskletDb;
  private readonly now: () => Date;

  constructor(path: string, options: SqliteBackendOptions = {}) {
    this.path = path;
    this.now = options.now ?? (() => new Date());
    this.db = createDb(path);
    const { migrator, result } = openSchema(this.db, options.migrations ?? MIGRATIONS);
    this.migrator = migrator;
    this.startupMigration = result;
  }

  schemaVersion(): number {
    return this.migrator.currentVersion();
  }

  // --------------------------------------------------------------------------
  // Tasks
  // --------------------------------------------------------------------------

  createTask(input: NewTask): Task {
    return this.write(() => {
      this.assertTarget(input.categoryId);
      const fields = newTaskFields(input, this.now());
      if (this.titleTaken(fields.title, fields.categoryId)) {
        throw titleClashError(fields.title, fields.categoryId);
      }
      const result = this.db.insert(tasks).values(taskValues(fields)).run();
      return { id: Number(result.lastInsertRowid), ...fields };
    });
  }

  getTask(id: TaskId): Task | null {
    const row = this.db.select().from(tasks).where(eq(tasks.id, id)).get();
    return row ? toTask(row) : null;
  }

  updateTask(id: TaskId, patch: TaskPatch): Task {
    return this.write(() => {
      const current = this.requireTask(id);
      if (patch.categoryId !== undefined) this.assertTarget(patch.categoryId);

      const next = applyPatch(current, patch, this.now());
      if (!next.deleted && this.titleTaken(next.title, next.categoryId, id)) {
        throw titleClashError(next.title, next.categoryId);
      }
      this.db.update(tasks).set(taskValues(next)).where(eq(tasks.id, id)).run();
      return next;
    });
  }

  listTasks(filter: TaskFilter = {}): Task[] {
    const conditions: SQL[] = [];

    if (filter.categoryId === undefined) {
      conditions.push(eq(tasks.deleted, false));
    } else {
      conditions.push(inCategory(filter.categoryId));
    }
    if (filter.completed !== undefined) {
      conditions.push(eq(tasks.completed, filter.completed));
    }
    if (filter.priority !== undefined) {
      conditions.push(eq(tasks.priority, filter.priority));
    }
    if (filter.search) {
      // Same folding as matchesFilter, so both backends agree on non-ASCII titles
      conditions.push(sql`instr(fold(${tasks.title}), fold(${filter.search})) > 0`);
    }

    const rows = this.db
      .select()
      .from(tasks)
      .where(and(...conditions))
      .orderBy(sql`IFNULL(${tasks.categoryId}, -1)`, asc(tasks.id))
      .all();
    return rows.map(toTask);
  }

  softDeleteTask(id: TaskId): Task {
    return this.write(() => {
      const current = this.requireTask(id);
      if (current.deleted) return current;
      const next = softDeleted(current, this.now());
      this.db.update(tasks).set(taskValues(next)).where(eq(tasks.id, id)).run();
      return next;
    });
  }

  purgeDeletedBefore(cutoff: Date): number {
    return this.write(() => {
      const result = this.db
        .delete(tasks)
        .where(and(eq(tasks.deleted, true), sql`${tasks.deletedAt} <= ${cutoff.toISOString()}`))
        .run();
      return result.changes;
    });
  }

  // --------------------------------------------------------------------------
  // Categories
  // --------------------------------------------------------------------------

  createCategory(name: string): Category {
    const normalized = normalizeCategoryName(name);
    return this.write(() => {
      if (hasNameClash(this.listCategories(), normalized)) throw nameClashError(normalized);

      const id = this.allocateCategoryId();
      const category: Category = { id, name: normalized, createdAt: this.now().toISOString() };
      this.db.insert(categories).values(category).run();
      return category;
    });
  }

  getCategory(id: CategoryId): Category | null {
    return this.db.select().from(categories).where(eq(categories.id, id)).get() ?? null;
  }

  renameCategory(id: CategoryId, name: string, changes: ConfigChanges = {}): Category {
    if (id === DELETED_CATEGORY_ID) {
      throw new ValidationError('The Deleted category cannot be renamed', { field: 'categoryId', value: id });
    }
    const normalized = normalizeCategoryName(name);
    return this.write(() => {
      const current = this.requireCategory(id);
      if (hasNameClash(this.listCategories(), normalized, id)) throw nameClashError(normalized);
      this.db.update(categories).set({ name: normalized }).where(eq(categories.id, id)).run();
      this.putConfig(changes);
      return { ...current, name: normalized };
    });
  }

  deleteCategory(id: CategoryId, reassignTo: CategoryId | null = null, changes: ConfigChanges = {}): CategoryDeletion {
    if (id === DELETED_CATEGORY_ID) {
      throw new ValidationError('The Deleted category cannot be deleted', { field: 'categoryId', value: id });
    }
    if (reassignTo === id) {
      throw new ValidationError('Tasks cannot be reassigned to the category being deleted', { field: 'reassignTo' });
    }

    return this.write(() => {
      const category = this.requireCategory(id);
      this.assertTarget(reassignTo);

      const moving = this.listTasks({ categoryId: id });
      const staying = this.listTasks({ categoryId: reassignTo });
      for (const task of moving) {
        if (hasTitleClash(staying, task.title, reassignTo)) throw titleClashError(task.title, reassignTo);
      }

      this.db
        .update(tasks)
        .set({ categoryId: reassignTo, updatedAt: this.now().toISOString() })
        .where(and(eq(tasks.categoryId, id), eq(tasks.deleted, false)))
        .run();
      this.db.delete(categories).where(eq(categories.id, id)).run();
      this.db.insert(categoryIdPool).values({ id }).onConflictDoNothing().run();
      this.putConfig(changes);

      return { category, reassigned: moving.length, reassignedTo: reassignTo };
    });
  }

  listCategories(): Category[] {
    return this.db.select().from(categories).orderBy(asc(categories.id)).all();
  }

  getCategoryAllocation(): CategoryAllocation {
    const free = this.db
      .select({ id: categoryIdPool.id })
      .from(categoryIdPool)
      .orderBy(asc(categoryIdPool.id))
      .all()
      .map(r => r.id);
    return { highWater: this.categoryHighWater(), free };
  }

  // --------------------------------------------------------------------------
  // Config
  // --------------------------------------------------------------------------

  getConfig(key: string): string | null {
    const row = this.db.select({ value: config.value }).from(config).where(eq(config.key, key)).get();
    return row?.value ?? null;
  }

  setConfig(key: string, value: string | null): void {
    this.write(() => this.putConfig({ [key]: value }));
  }

  listConfig(): Record<string, string> {
    const entries: Record<string, string> = {};
    for (const row of this.db.select().from(config).orderBy(asc(config.key)).all()) {
      entries[row.key] = row.value;
    }
    return entries;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  reset(): void {
    this.write(() => {
      this.db.delete(tasks).run();
      this.db.delete(categories).run();
      this.db.delete(config).run();
      this.db.delete(categoryIdPool).run();
      this.setCategoryHighWater(0);
      this.db.run(sql`DELETE FROM sqlite_sequence WHERE name = 'tasks'`);
    });
  }

  close(): void {
    const raw = getRawDb(this.db);
    if (raw.open) raw.close();
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  /** Run a mutation in one transaction, reporting constraint failures as ValidationError */
  private write<T>(fn: () => T): T {
    try {
      return inTransaction(this.db, fn);
    } catch (err: unknown) {
      throw mapSqliteError(err);
    }
  }

  /** Config writes; callers hold the transaction */
  private putConfig(changes: ConfigChanges): void {
    for (const [key, value] of Object.entries(changes)) {
      if (value === null) {
        this.db.delete(config).where(eq(config.key, key)).run();
      } else {
        this.db.insert(config).values({ key, value }).onConflictDoUpdate({ target: config.key, set: { value } }).run();
      }
    }
  }

  private requireTask(id: TaskId): Task {
    const task = this.getTask(id);
    if (!task) throw new NotFoundError(`Task ${id} not found`, { field: 'taskId', value: id });
    return task;
  }

  private requireCategory(id: CategoryId): Category {
    const category = this.getCategory(id);
    if (!category) throw new NotFoundError(`Category ${id} not found`, { field: 'categoryId', value: id });
    return category;
  }

  /** A task may live in an existing category or at the top level, never directly in the bin */
  private assertTarget(ref: CategoryRef): void {
    if (ref === null) return;
    if (ref === DELETED_CATEGORY_ID) {
      throw new ValidationError('The Deleted category is not a valid target', { field: 'categoryId', value: ref });
    }
    this.requireCategory(ref);
  }

  private titleTaken(title: string, categoryId: CategoryRef, exceptId?: TaskId): boolean {
    const live = this.db
      .select()
      .from(tasks)
      .where(and(eq(tasks.deleted, false), eq(tasks.title, title), inCategory(categoryId)))
      .all()
      .map(toTask);
    return hasTitleClash(live, title, categoryId, exceptId);
  }

  /** Take the smallest pooled ID, or raise the high-water mark */
  private allocateCategoryId(): CategoryId {
    const pooled = this.db.select({ id: min(categoryIdPool.id) }).from(categoryIdPool).get();
    if (pooled?.id != null) {
      this.db.delete(categoryIdPool).where(eq(categoryIdPool.id, pooled.id)).run();
      return pooled.id;
    }
    const id = this.categoryHighWater() + 1;
    this.setCategoryHighWater(id);
    return id;
  }

  private categoryHighWater(): number {
    const row = this.db
      .select({ value: idCounters.value })
      .from(idCounters)
      .where(eq(idCounters.name, CATEGORY_COUNTER))
      .get();
    return row?.value ?? 0;
  }

  private setCategoryHighWater(value: number): void {
    this.db
      .insert(idCounters)
      .values({ name: CATEGORY_COUNTER, value })
      .onConflictDoUpdate({ target: idCounters.name, set: { value } })
      .run();
  }
}
