/**
 * Task and category lifecycle on top of a storage backend: config-driven
 * defaults, soft delete, restore and purge, category deletion with ID
 * recycling, and the category context set by `category use`.
 */

import type { StorageBackend } from '../storage/backend.js';
import type { Task, TaskId } from '../types/task.js';
import type { Category, CategoryId, CategoryRef } from '../types/category.js';
import { DELETED_CATEGORY_ID, DELETED_CATEGORY_NAME } from '../types/category.js';
import type { Priority } from '../types/priority.js';
import { NotFoundError, ValidationError } from '../errors.js';
import type { CategoryDeletion } from '../storage/backend.js';
import { normalizeCategoryName, parseId } from '../models/task-helpers.js';
import { ConfigKey, CURRENT_CATEGORY_KEY } from '../config/config-keys.js';
import {
  getDefaultCategoryName, getDefaultPriority, getDeletedTaskLifespan, setStoreConfig,
} from '../config/store-settings.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Seeded into a store that has never had a category */
export const DEFAULT_CATEGORY_NAMES: readonly string[] = ['Home', 'Work'];

export interface LifecycleOptions {
  /** Clock used for purge cutoffs; defaults to `new Date()` */
  now?: () => Date;
}

export interface AddTaskOptions {
  priority?: Priority;
  /** Target category; `null` forces uncategorized. Omit to apply the defaults. */
  categoryId?: CategoryRef;
  description?: string | null;
}

function guardBin(id: CategoryId, action: string): void {
  if (id === DELETED_CATEGORY_ID) {
    throw new ValidationError(`The ${DELETED_CATEGORY_NAME} category cannot be ${action}`, {
      field: 'categoryId', value: id,
    });
  }
}

export class LifecycleManager {
  readonly store: StorageBackend;
  private readonly now: () => Date;

  constructor(store: StorageBackend, options: LifecycleOptions = {}) {
    this.store = store;
    this.now = options.now ?? (() => new Date());
  }

  // --------------------------------------------------------------------------
  // Tasks
  // --------------------------------------------------------------------------

  addTask(title: string, options: AddTaskOptions = {}): Task {
    return this.store.createTask({
      title,
      priority: options.priority ?? getDefaultPriority(this.store),
      categoryId: options.categoryId !== undefined ? options.categoryId : this.defaultCategoryId(),
      description: options.description,
    });
  }

  /**
   * Category a new task lands in when none is given: the category context,
   * then the `default-category` key, then uncategorized.
   */
  defaultCategoryId(): CategoryRef {
    const context = this.currentCategory();
    if (context) return context.id;

    const name = getDefaultCategoryName(this.store);
    if (name === null) return null;
    const category = this.findCategoryByName(name);
    if (!category) {
      throw new NotFoundError(`${ConfigKey.DefaultCategory} '${name}' does not exist`, {
        field: ConfigKey.DefaultCategory, value: name,
      });
    }
    return category.id;
  }

  setCompleted(id: TaskId, completed: boolean): Task {
    return this.store.updateTask(id, { completed });
  }

  deleteTask(id: TaskId): Task {
    return this.store.softDeleteTask(id);
  }

  /** Move a task; moving into the Deleted category is a soft delete */
  moveTask(id: TaskId, target: CategoryRef): Task {
    if (target === DELETED_CATEGORY_ID) return this.store.softDeleteTask(id);
    return this.store.updateTask(id, { categoryId: target });
  }

  /** Bring a deleted task back, uncategorized unless a target is given */
  restoreTask(id: TaskId, target: CategoryRef = null): Task {
    const task = this.store.getTask(id);
    if (!task) throw new NotFoundError(`Task ${id} not found`, { field: 'taskId', value: id });
    if (!task.deleted) {
      throw new ValidationError(`Task ${id} is not deleted`, { field: 'taskId', value: id });
    }
    return this.store.updateTask(id, { categoryId: target });
  }

  /**
   * Purge deleted tasks older than `deleted-task-lifespan` days. A lifespan
   * of 0 keeps them forever. Returns the number removed.
   */
  purgeExpired(): number {
    const lifespan = getDeletedTaskLifespan(this.store);
    if (lifespan === 0) return 0;
    const cutoff = new Date(this.now().getTime() - lifespan * DAY_MS);
    return this.store.purgeDeletedBefore(cutoff);
  }

  /** Purge every deleted task regardless of age */
  flush(): number {
    return this.store.purgeDeletedBefore(this.now());
  }

  // --------------------------------------------------------------------------
  // Categories
  // --------------------------------------------------------------------------

  createCategory(name: string): Category {
    return this.store.createCategory(name);
  }

  renameCategory(id: CategoryId, name: string): Category {
    guardBin(id, 'renamed');
    const before = this.store.getCategory(id);

    // Keep default-category pointing at the same category
    const changes: Record<string, string | null> = {};
    if (before && this.isDefaultCategory(before.name)) {
      changes[ConfigKey.DefaultCategory] = normalizeCategoryName(name);
    }
    return this.store.renameCategory(id, name, changes);
  }

  /**
   * Delete a category. Live tasks go to `reassignTo` (uncategorized when
   * omitted) and the ID is recycled. A context or default pointing at the
   * category is cleared.
   */
  deleteCategory(id: CategoryId, reassignTo: CategoryId | null = null): CategoryDeletion {
    guardBin(id, 'deleted');
    const category = this.store.getCategory(id);

    const changes: Record<string, string | null> = {};
    if (this.contextCategoryId() === id) changes[CURRENT_CATEGORY_KEY] = null;
    if (category && this.isDefaultCategory(category.name)) changes[ConfigKey.DefaultCategory] = null;
    return this.store.deleteCategory(id, reassignTo, changes);
  }

  /** Create Home and Work in a store that has never allocated a category */
  ensureDefaultCategories(): Category[] {
    const allocation = this.store.getCategoryAllocation();
    if (allocation.highWater > 0 || this.store.listCategories().length > 0) return [];
    return DEFAULT_CATEGORY_NAMES.map(name => this.store.createCategory(name));
  }

  /** Wipe the store, then seed the default categories again */
  reset(): Category[] {
    this.store.reset();
    return this.ensureDefaultCategories();
  }

  // --------------------------------------------------------------------------
  // Config
  // --------------------------------------------------------------------------

  /**
   * Set a store-scoped key. `default-category` must name an existing
   * category and is stored under that category's exact name.
   */
  setConfig(key: ConfigKey, raw: string): string {
    if (key === ConfigKey.DefaultCategory && raw.trim().length > 0) {
      const category = this.findCategoryByName(raw.trim());
      if (!category) {
        throw new NotFoundError(`No category named '${raw.trim()}'`, { field: key, value: raw });
      }
      return setStoreConfig(this.store, key, category.name);
    }
    return setStoreConfig(this.store, key, raw);
  }

  // --------------------------------------------------------------------------
  // Category context
  // --------------------------------------------------------------------------

  useCategory(id: CategoryId): Category {
    guardBin(id, 'used as the context');
    const category = this.store.getCategory(id);
    if (!category) throw new NotFoundError(`Category ${id} not found`, { field: 'categoryId', value: id });
    this.store.setConfig(CURRENT_CATEGORY_KEY, String(id));
    return category;
  }

  clearCategoryContext(): void {
    this.store.setConfig(CURRENT_CATEGORY_KEY, null);
  }

  /** The context category, or null when unset or no longer existing */
  currentCategory(): Category | null {
    const id = this.contextCategoryId();
    return id === null ? null : this.store.getCategory(id);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private contextCategoryId(): CategoryId | null {
    const stored = this.store.getConfig(CURRENT_CATEGORY_KEY);
    return stored === null ? null : parseId(stored);
  }

  private findCategoryByName(name: string): Category | undefined {
    const lower = name.toLowerCase();
    return this.store.listCategories().find(c => c.name.toLowerCase() === lower);
  }

  private isDefaultCategory(name: string): boolean {
    return getDefaultCategoryName(this.store)?.toLowerCase() === name.toLowerCase();
  }
}
