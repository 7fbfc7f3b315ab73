/**
 * The JSON backend's on-disk layout and its validating reader.
 */

import type { Task } from '../types/task.js';
import type { Category, CategoryAllocation, CategoryRef } from '../types/category.js';
import { DELETED_CATEGORY_ID } from '../types/category.js';
import type { Priority } from '../types/priority.js';
import { isPriority } from '../types/priority.js';
import { StorageCorruptionError } from '../errors.js';
import { checkAllocation } from '../models/category-ids.js';

export const SNAPSHOT_VERSION = 1;

export interface StoreSnapshot {
  version: number;
  tasks: Task[];
  categories: Category[];
  config: Record<string, string>;
  nextTaskId: number;
  nextCategoryId: number;
  freeCategoryIds: number[];
}

export function emptySnapshot(): StoreSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    tasks: [],
    categories: [],
    config: {},
    nextTaskId: 1,
    nextCategoryId: 1,
    freeCategoryIds: [],
  };
}

export function snapshotAllocation(snapshot: StoreSnapshot): CategoryAllocation {
  return { highWater: snapshot.nextCategoryId - 1, free: snapshot.freeCategoryIds };
}

export function serializeSnapshot(snapshot: StoreSnapshot): string {
  return JSON.stringify(snapshot, null, 2) + '\n';
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class SnapshotReader {
  constructor(private readonly path: string) {}

  fail(reason: string): never {
    throw new StorageCorruptionError(this.path, reason);
  }

  record(value: unknown, where: string): Json {
    return isRecord(value) ? value : this.fail(`${where} is not an object`);
  }

  array(value: unknown, where: string): unknown[] {
    return Array.isArray(value) ? value : this.fail(`${where} is not an array`);
  }

  string(value: unknown, where: string): string {
    return typeof value === 'string' ? value : this.fail(`${where} is not a string`);
  }

  nullableString(value: unknown, where: string): string | null {
    return value == null ? null : this.string(value, where);
  }

  boolean(value: unknown, where: string): boolean {
    return typeof value === 'boolean' ? value : this.fail(`${where} is not a boolean`);
  }

  integer(value: unknown, where: string, min: number): number {
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < min) {
      return this.fail(`${where} is not an integer >= ${min}`);
    }
    return value;
  }

  priority(value: unknown, where: string): Priority {
    const priority = this.string(value, where);
    return isPriority(priority) ? priority : this.fail(`${where} '${priority}' is not a known priority`);
  }

  categoryRef(value: unknown, where: string): CategoryRef {
    return value === null ? null : this.integer(value, where, 0);
  }

  task(value: unknown, index: number): Task {
    const where = `tasks[${index}]`;
    const raw = this.record(value, where);
    const title = this.string(raw['title'], `${where}.title`);
    if (title.trim().length === 0) this.fail(`${where}.title is empty`);

    return {
      id: this.integer(raw['id'], `${where}.id`, 1),
      title,
      description: this.nullableString(raw['description'], `${where}.description`),
      completed: this.boolean(raw['completed'], `${where}.completed`),
      priority: this.priority(raw['priority'], `${where}.priority`),
      categoryId: this.categoryRef(raw['categoryId'], `${where}.categoryId`),
      deleted: this.boolean(raw['deleted'], `${where}.deleted`),
      deletedAt: this.nullableString(raw['deletedAt'], `${where}.deletedAt`),
      createdAt: this.string(raw['createdAt'], `${where}.createdAt`),
      updatedAt: this.string(raw['updatedAt'], `${where}.updatedAt`),
    };
  }

  category(value: unknown, index: number): Category {
    const where = `categories[${index}]`;
    const raw = this.record(value, where);
    return {
      id: this.integer(raw['id'], `${where}.id`, 1),
      name: this.string(raw['name'], `${where}.name`),
      createdAt: this.string(raw['createdAt'], `${where}.createdAt`),
    };
  }

  config(value: unknown): Record<string, string> {
    const raw = this.record(value ?? {}, 'config');
    const config: Record<string, string> = {};
    for (const [key, entry] of Object.entries(raw)) {
      config[key] = this.string(entry, `config.${key}`);
    }
    return config;
  }
}

function checkInvariants(snapshot: StoreSnapshot, reader: SnapshotReader): void {
  const categoryIds = new Set(snapshot.categories.map(c => c.id));
  const taskIds = new Set<number>();

  for (const task of snapshot.tasks) {
    if (taskIds.has(task.id)) reader.fail(`task ID ${task.id} is duplicated`);
    taskIds.add(task.id);
    if (task.id >= snapshot.nextTaskId) reader.fail(`task ID ${task.id} is not below nextTaskId`);

    const inBin = task.categoryId === DELETED_CATEGORY_ID;
    if (task.categoryId !== null && !inBin && !categoryIds.has(task.categoryId)) {
      reader.fail(`task ${task.id} references missing category ${task.categoryId}`);
    }
    if (inBin !== task.deleted || inBin !== (task.deletedAt !== null)) {
      reader.fail(`task ${task.id} has an inconsistent deleted state`);
    }
  }

  const problem = checkAllocation(snapshotAllocation(snapshot), snapshot.categories.map(c => c.id));
  if (problem) reader.fail(problem);
}

/**
 * Parse the file contents. A blank file is an empty store; anything else that
 * is not a well-formed snapshot raises StorageCorruptionError.
 */
export function parseSnapshot(text: string, path: string): StoreSnapshot {
  if (text.trim().length === 0) return emptySnapshot();

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err: unknown) {
    throw new StorageCorruptionError(path, 'file is not valid JSON', err);
  }

  const reader = new SnapshotReader(path);
  const root = reader.record(data, 'root');
  const version = reader.integer(root['version'], 'version', 1);
  if (version > SNAPSHOT_VERSION) {
    reader.fail(`format version ${version} is newer than supported version ${SNAPSHOT_VERSION}`);
  }

  const snapshot: StoreSnapshot = {
    version,
    tasks: reader.array(root['tasks'], 'tasks').map((t, i) => reader.task(t, i)),
    categories: reader.array(root['categories'], 'categories').map((c, i) => reader.category(c, i)),
    config: reader.config(root['config']),
    nextTaskId: reader.integer(root['nextTaskId'], 'nextTaskId', 1),
    nextCategoryId: reader.integer(root['nextCategoryId'], 'nextCategoryId', 1),
    freeCategoryIds: reader
      .array(root['freeCategoryIds'] ?? [], 'freeCategoryIds')
      .map((id, i) => reader.integer(id, `freeCategoryIds[${i}]`, 1)),
  };

  checkInvariants(snapshot, reader);
  return snapshot;
}
