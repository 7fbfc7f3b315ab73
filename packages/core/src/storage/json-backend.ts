/**
 * JSON file backend: the whole store is one document, rewritten on every
 * mutation under an exclusive lock and swapped in with an atomic rename.
 */

import {
  closeSync, fsyncSync, mkdirSync, openSync, readFileSync, renameSync, rmSync, writeSync,
} from 'node:fs';
import { dirname } from 'node:path';
import type { StorageBackend, StorageOptions, CategoryDeletion, ConfigChanges } from './backend.js';
import type { Task, TaskId, NewTask, TaskPatch, TaskFilter } from '../types/task.js';
import type { Category, CategoryId, CategoryRef, CategoryAllocation } from '../types/category.js';
import { DELETED_CATEGORY_ID } from '../types/category.js';
import { StorageType } from '../types/storage-type.js';
import { NotFoundError, ValidationError } from '../errors.js';
import {
  createTaskRecord, applyPatch, softDeleted, sortTasks, matchesFilter,
  hasTitleClash, titleClashError, hasNameClash, nameClashError, normalizeCategoryName,
} from '../models/task-helpers.js';
import { allocateCategoryId, releaseCategoryId } from '../models/category-ids.js';
import { FileLock, isErrnoException } from './file-lock.js';
import {
  emptySnapshot, parseSnapshot, serializeSnapshot, snapshotAllocation, type StoreSnapshot,
} from './store-snapshot.js';

export interface JsonBackendOptions extends StorageOptions {
  /** Bound the wait for the file lock; blocks indefinitely when omitted */
  lockTimeoutMs?: number;
}

function hasOwn(record: Record<string, string>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

function putConfig(draft: StoreSnapshot, changes: ConfigChanges): void {
  for (const [key, value] of Object.entries(changes)) {
    if (value === null) {
      delete draft.config[key];
    } else {
      draft.config[key] = value;
    }
  }
}

export class JsonBackend implements StorageBackend {
  readonly type = StorageType.Json;
  readonly path: string;
  private readonly lock: FileLock;
  private readonly now: () => Date;
  private snapshot: StoreSnapshot;
  private closed = false;

  constructor(path: string, options: JsonBackendOptions = {}) {
    this.path = path;
    this.now = options.now ?? (() => new Date());
    this.lock = new FileLock(`${path}.lock`, { timeoutMs: options.lockTimeoutMs });
    mkdirSync(dirname(path), { recursive: true });
    this.snapshot = this.readFile();
  }

  // --------------------------------------------------------------------------
  // Tasks
  // --------------------------------------------------------------------------

  createTask(input: NewTask): Task {
    return this.mutate(draft => {
      this.assertTarget(draft, input.categoryId);
      const task = createTaskRecord(draft.nextTaskId, input, this.now());
      if (hasTitleClash(draft.tasks, task.title, task.categoryId)) {
        throw titleClashError(task.title, task.categoryId);
      }
      draft.tasks.push(task);
      draft.nextTaskId += 1;
      return task;
    });
  }

  getTask(id: TaskId): Task | null {
    return this.current().tasks.find(t => t.id === id) ?? null;
  }

  updateTask(id: TaskId, patch: TaskPatch): Task {
    return this.mutate(draft => {
      const index = this.taskIndex(draft, id);
      if (patch.categoryId !== undefined) this.assertTarget(draft, patch.categoryId);

      const next = applyPatch(draft.tasks[index]!, patch, this.now());
      if (!next.deleted && hasTitleClash(draft.tasks, next.title, next.categoryId, id)) {
        throw titleClashError(next.title, next.categoryId);
      }
      draft.tasks[index] = next;
      return next;
    });
  }

  listTasks(filter: TaskFilter = {}): Task[] {
    return sortTasks(this.current().tasks.filter(t => matchesFilter(t, filter)));
  }

  softDeleteTask(id: TaskId): Task {
    return this.mutate(draft => {
      const index = this.taskIndex(draft, id);
      const task = draft.tasks[index]!;
      if (task.deleted) return task;
      const next = softDeleted(task, this.now());
      draft.tasks[index] = next;
      return next;
    });
  }

  purgeDeletedBefore(cutoff: Date): number {
    const limit = cutoff.getTime();
    return this.mutate(draft => {
      const before = draft.tasks.length;
      draft.tasks = draft.tasks.filter(t =>
        !(t.deleted && t.deletedAt !== null && Date.parse(t.deletedAt) <= limit),
      );
      return before - draft.tasks.length;
    }, removed => removed > 0);
  }

  // --------------------------------------------------------------------------
  // Categories
  // --------------------------------------------------------------------------

  createCategory(name: string): Category {
    const normalized = normalizeCategoryName(name);
    return this.mutate(draft => {
      if (hasNameClash(draft.categories, normalized)) throw nameClashError(normalized);

      const { id, allocation } = allocateCategoryId(snapshotAllocation(draft));
      const category: Category = { id, name: normalized, createdAt: this.now().toISOString() };
      draft.categories.push(category);
      this.storeAllocation(draft, allocation);
      return category;
    });
  }

  getCategory(id: CategoryId): Category | null {
    return this.current().categories.find(c => c.id === id) ?? null;
  }

  renameCategory(id: CategoryId, name: string, changes: ConfigChanges = {}): Category {
    if (id === DELETED_CATEGORY_ID) {
      throw new ValidationError('The Deleted category cannot be renamed', { field: 'categoryId', value: id });
    }
    const normalized = normalizeCategoryName(name);
    return this.mutate(draft => {
      const index = this.categoryIndex(draft, id);
      if (hasNameClash(draft.categories, normalized, id)) throw nameClashError(normalized);
      const next: Category = { ...draft.categories[index]!, name: normalized };
      draft.categories[index] = next;
      putConfig(draft, changes);
      return next;
    });
  }

  deleteCategory(id: CategoryId, reassignTo: CategoryId | null = null, changes: ConfigChanges = {}): CategoryDeletion {
    if (id === DELETED_CATEGORY_ID) {
      throw new ValidationError('The Deleted category cannot be deleted', { field: 'categoryId', value: id });
    }
    if (reassignTo === id) {
      throw new ValidationError('Tasks cannot be reassigned to the category being deleted', { field: 'reassignTo' });
    }

    return this.mutate(draft => {
      const index = this.categoryIndex(draft, id);
      this.assertTarget(draft, reassignTo);
      const category = draft.categories[index]!;

      const moving = draft.tasks.filter(t => !t.deleted && t.categoryId === id);
      for (const task of moving) {
        if (hasTitleClash(draft.tasks, task.title, reassignTo)) throw titleClashError(task.title, reassignTo);
      }

      const stamp = this.now().toISOString();
      draft.tasks = draft.tasks.map(t =>
        !t.deleted && t.categoryId === id ? { ...t, categoryId: reassignTo, updatedAt: stamp } : t,
      );
      draft.categories.splice(index, 1);
      this.storeAllocation(draft, releaseCategoryId(snapshotAllocation(draft), id));
      putConfig(draft, changes);

      return { category, reassigned: moving.length, reassignedTo: reassignTo };
    });
  }

  listCategories(): Category[] {
    return [...this.current().categories].sort((a, b) => a.id - b.id);
  }

  getCategoryAllocation(): CategoryAllocation {
    const allocation = snapshotAllocation(this.current());
    return { highWater: allocation.highWater, free: [...allocation.free] };
  }

  // --------------------------------------------------------------------------
  // Config
  // --------------------------------------------------------------------------

  getConfig(key: string): string | null {
    const config = this.current().config;
    return hasOwn(config, key) ? config[key] ?? null : null;
  }

  setConfig(key: string, value: string | null): void {
    this.mutate(draft => putConfig(draft, { [key]: value }));
  }

  listConfig(): Record<string, string> {
    return { ...this.current().config };
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  reset(): void {
    this.mutate(draft => {
      Object.assign(draft, emptySnapshot());
    });
  }

  close(): void {
    this.lock.release();
    this.closed = true;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private current(): StoreSnapshot {
    if (this.closed) throw new Error(`Store ${this.path} is closed`);
    return this.snapshot;
  }

  /**
   * Lock, re-read the file, apply `fn` to the fresh copy, write it back, unlock.
   * If `fn` throws, nothing is written and the in-memory store is unchanged.
   * The write is skipped when `changed` says the result left the draft as read.
   */
  private mutate<T>(fn: (draft: StoreSnapshot) => T, changed: (result: T) => boolean = () => true): T {
    this.current();
    return this.lock.withLock(() => {
      const draft = this.readFile();
      const result = fn(draft);
      if (changed(result)) this.writeFile(draft);
      this.snapshot = draft;
      return result;
    });
  }

  private readFile(): StoreSnapshot {
    let text: string;
    try {
      text = readFileSync(this.path, 'utf8');
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === 'ENOENT') return emptySnapshot();
      throw err;
    }
    return parseSnapshot(text, this.path);
  }

  private writeFile(snapshot: StoreSnapshot): void {
    const tmpPath = `${this.path}.${process.pid}.tmp`;
    try {
      const fd = openSync(tmpPath, 'w');
      try {
        writeSync(fd, serializeSnapshot(snapshot));
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(tmpPath, this.path);
    } catch (err: unknown) {
      rmSync(tmpPath, { force: true });
      throw err;
    }
  }

  private taskIndex(draft: StoreSnapshot, id: TaskId): number {
    const index = draft.tasks.findIndex(t => t.id === id);
    if (index < 0) throw new NotFoundError(`Task ${id} not found`, { field: 'taskId', value: id });
    return index;
  }

  private categoryIndex(draft: StoreSnapshot, id: CategoryId): number {
    const index = draft.categories.findIndex(c => c.id === id);
    if (index < 0) throw new NotFoundError(`Category ${id} not found`, { field: 'categoryId', value: id });
    return index;
  }

  /** A task may live in an existing category or at the top level, never directly in the bin */
  private assertTarget(draft: StoreSnapshot, ref: CategoryRef): void {
    if (ref === null) return;
    if (ref === DELETED_CATEGORY_ID) {
      throw new ValidationError('The Deleted category is not a valid target', { field: 'categoryId', value: ref });
    }
    this.categoryIndex(draft, ref);
  }

  private storeAllocation(draft: StoreSnapshot, allocation: CategoryAllocation): void {
    draft.nextCategoryId = allocation.highWater + 1;
    draft.freeCategoryIds = [...allocation.free];
  }
}
