/**
 * Storage Backend Interface
 *
 * The uniform contract both the JSON file store and the SQLite store
 * implement. Callers never learn which one is active. Every mutation either
 * fully applies or throws with no visible partial effect.
 */

import type { Task, TaskId, NewTask, TaskPatch, TaskFilter } from '../types/task.js';
import type { Category, CategoryId, CategoryRef, CategoryAllocation } from '../types/category.js';
import type { StorageType } from '../types/storage-type.js';

export interface CategoryDeletion {
  readonly category: Category;
  /** Live tasks moved out of the deleted category */
  readonly reassigned: number;
  readonly reassignedTo: CategoryRef;
}

/**
 * Config writes applied in the same transaction as a category change; a null
 * value removes the key.
 */
export type ConfigChanges = Readonly<Record<string, string | null>>;

export interface StorageBackend {
  readonly type: StorageType;
  /** Location of the backing file */
  readonly path: string;

  // --------------------------------------------------------------------------
  // Tasks
  // --------------------------------------------------------------------------

  /**
   * Insert a task with the next task ID.
   * @throws ValidationError on a blank title or a live (title, category) clash
   * @throws NotFoundError when the category does not exist
   */
  createTask(input: NewTask): Task;

  /** Look up any task by ID, including soft-deleted ones */
  getTask(id: TaskId): Task | null;

  /**
   * Change a task. A `categoryId` outside the Deleted bin restores a deleted
   * task; `categoryId: 0` is rejected.
   */
  updateTask(id: TaskId, patch: TaskPatch): Task;

  /** Ordered snapshot: category ID ascending (uncategorized first), then task ID */
  listTasks(filter?: TaskFilter): Task[];

  /** Move a task to the Deleted bin and stamp the deletion time */
  softDeleteTask(id: TaskId): Task;

  /** Permanently remove Deleted tasks stamped at or before `cutoff`. Returns the count. */
  purgeDeletedBefore(cutoff: Date): number;

  // --------------------------------------------------------------------------
  // Categories
  // --------------------------------------------------------------------------

  /** Create a category, reusing the smallest freed ID first */
  createCategory(name: string): Category;

  getCategory(id: CategoryId): Category | null;

  /** Rename a category; `config` is written only if the rename succeeds */
  renameCategory(id: CategoryId, name: string, config?: ConfigChanges): Category;

  /**
   * Delete a category. Its live tasks move to `reassignTo`, or to the
   * uncategorized scope when it is omitted; the ID then returns to the pool.
   * `config` is written only if the deletion succeeds.
   */
  deleteCategory(id: CategoryId, reassignTo?: CategoryId | null, config?: ConfigChanges): CategoryDeletion;

  /** User categories ordered by ID; the Deleted bin is not included */
  listCategories(): Category[];

  getCategoryAllocation(): CategoryAllocation;

  // --------------------------------------------------------------------------
  // Config
  // --------------------------------------------------------------------------

  getConfig(key: string): string | null;

  /** Store a value, or remove the key (back to default) when `value` is null */
  setConfig(key: string, value: string | null): void;

  listConfig(): Record<string, string>;

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /** Remove every task, category, config entry and allocated ID */
  reset(): void;

  close(): void;
}

export interface StorageOptions {
  /** Clock used for timestamps; defaults to `new Date()` */
  now?: () => Date;
}
