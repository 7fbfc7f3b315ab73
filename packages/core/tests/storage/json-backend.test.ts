import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, readdirSync, statSync, unlinkSync, utimesSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { JsonBackend } from '../../src/storage/json-backend.js';
import { LockContentionError, StorageCorruptionError, ValidationError } from '../../src/errors.js';
import { Priority } from '../../src/types/priority.js';
import { makeTempDir, removeTempDir, testClock } from '../helpers.js';

let dir: string;
let path: string;

beforeEach(() => {
  dir = makeTempDir();
  path = join(dir, 'tasks.json');
});

afterEach(() => {
  removeTempDir(dir);
});

function writeStore(content: unknown): void {
  writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
}

function validStore(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    version: 1,
    tasks: [],
    categories: [],
    config: {},
    nextTaskId: 1,
    nextCategoryId: 1,
    freeCategoryIds: [],
    ...overrides,
  };
}

describe('JsonBackend file format', () => {
  it('writes the whole store as one document', () => {
    const clock = testClock();
    const store = new JsonBackend(path, { now: clock.now });
    const home = store.createCategory('Home');
    store.createTask({ title: 'Buy milk', priority: Priority.High, categoryId: home.id });
    store.setConfig('default-priority', 'low');
    store.close();

    const data: unknown = JSON.parse(readFileSync(path, 'utf8'));
    expect(data).toEqual({
      version: 1,
      tasks: [{
        id: 1,
        title: 'Buy milk',
        description: null,
        completed: false,
        priority: 'high',
        categoryId: 1,
        deleted: false,
        deletedAt: null,
        createdAt: '2024-03-01T12:00:00.000Z',
        updatedAt: '2024-03-01T12:00:00.000Z',
      }],
      categories: [{ id: 1, name: 'Home', createdAt: '2024-03-01T12:00:00.000Z' }],
      config: { 'default-priority': 'low' },
      nextTaskId: 2,
      nextCategoryId: 2,
      freeCategoryIds: [],
    });
  });

  it('round-trips a written store through a fresh handle', () => {
    const first = new JsonBackend(path);
    const work = first.createCategory('Work');
    const a = first.createTask({ title: 'a', priority: Priority.Low, categoryId: work.id });
    first.softDeleteTask(a.id);
    first.createTask({ title: 'b', priority: Priority.Medium, categoryId: null, description: 'notes' });
    first.deleteCategory(work.id);
    const binned = first.listTasks({ categoryId: 0 });
    const live = first.listTasks();
    first.close();

    const second = new JsonBackend(path);
    expect(second.listTasks({ categoryId: 0 })).toEqual(binned);
    expect(second.listTasks()).toEqual(live);
    expect(second.getCategoryAllocation()).toEqual({ highWater: 1, free: [1] });
    second.close();
  });

  it('treats a missing or blank file as an empty store', () => {
    const missing = new JsonBackend(path);
    expect(missing.listTasks()).toEqual([]);
    expect(existsSync(path)).toBe(false);
    missing.close();

    writeStore('  \n');
    const blank = new JsonBackend(path);
    expect(blank.listCategories()).toEqual([]);
    blank.close();
  });

  it('picks up writes from another handle before mutating', () => {
    const a = new JsonBackend(path);
    const b = new JsonBackend(path);
    a.createTask({ title: 'from a', priority: Priority.Medium, categoryId: null });
    const fromB = b.createTask({ title: 'from b', priority: Priority.Medium, categoryId: null });

    expect(fromB.id).toBe(2);
    expect(b.listTasks().map(t => t.title)).toEqual(['from a', 'from b']);
    a.close();
    b.close();
  });

  it('leaves the file untouched when a mutation fails', () => {
    const store = new JsonBackend(path);
    store.createTask({ title: 'a', priority: Priority.Medium, categoryId: null });
    const before = readFileSync(path, 'utf8');

    expect(() => store.createTask({ title: 'a', priority: Priority.Medium, categoryId: null })).toThrow(ValidationError);
    expect(readFileSync(path, 'utf8')).toBe(before);
    expect(readdirSync(dir)).toEqual(['tasks.json']);
    store.close();
  });
});

describe('JsonBackend corruption', () => {
  it('rejects invalid JSON', () => {
    writeStore('{ "version": 1, ');
    expect(() => new JsonBackend(path)).toThrow(StorageCorruptionError);
  });

  it('rejects records of the wrong shape', () => {
    writeStore(validStore({ nextTaskId: 2, tasks: [{ id: 1, title: 'x' }] }));
    expect(() => new JsonBackend(path)).toThrow(StorageCorruptionError);
  });

  it('rejects an unknown priority', () => {
    writeStore(validStore({
      nextTaskId: 2,
      tasks: [{
        id: 1, title: 'x', description: null, completed: false, priority: 'urgent', categoryId: null,
        deleted: false, deletedAt: null, createdAt: 'now', updatedAt: 'now',
      }],
    }));
    expect(() => new JsonBackend(path)).toThrow(/not a known priority/);
  });

  it('rejects tasks pointing at a missing category', () => {
    writeStore(validStore({
      nextTaskId: 2,
      tasks: [{
        id: 1, title: 'x', description: null, completed: false, priority: 'low', categoryId: 5,
        deleted: false, deletedAt: null, createdAt: 'now', updatedAt: 'now',
      }],
    }));
    expect(() => new JsonBackend(path)).toThrow(/missing category 5/);
  });

  it('rejects an allocation that does not cover the used IDs', () => {
    writeStore(validStore({
      categories: [{ id: 1, name: 'Home', createdAt: 'now' }],
      nextCategoryId: 3,
      freeCategoryIds: [],
    }));
    expect(() => new JsonBackend(path)).toThrow(/category ID 2 is neither free nor in use/);
  });

  it('rejects a newer format version', () => {
    writeStore(validStore({ version: 2 }));
    expect(() => new JsonBackend(path)).toThrow(/newer than supported/);
  });

  it('reports the path of the corrupted file', () => {
    writeStore('[]');
    let caught: unknown;
    try {
      new JsonBackend(path);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(StorageCorruptionError);
    expect(caught).toMatchObject({ path, code: 'STORAGE_CORRUPTED' });
  });
});

describe('JsonBackend purge', () => {
  it('leaves the file untouched when nothing is purged', () => {
    const clock = testClock();
    const store = new JsonBackend(path, { now: clock.now });
    store.createTask({ title: 'a', priority: Priority.Low, categoryId: null });
    const old = new Date('2020-01-01T00:00:00.000Z');
    utimesSync(path, old, old);

    expect(store.purgeDeletedBefore(clock.now())).toBe(0);
    expect(statSync(path).mtimeMs).toBe(old.getTime());

    store.softDeleteTask(1);
    utimesSync(path, old, old);
    expect(store.purgeDeletedBefore(clock.now())).toBe(1);
    expect(statSync(path).mtimeMs).not.toBe(old.getTime());
    store.close();
  });
});

describe('JsonBackend locking', () => {
  it('removes its lock file after each mutation', () => {
    const store = new JsonBackend(path);
    store.createCategory('Home');
    expect(existsSync(`${path}.lock`)).toBe(false);
    store.close();
  });

  it('gives up with LockContentionError when a live process holds the lock', () => {
    writeFileSync(`${path}.lock`, String(process.pid));
    const store = new JsonBackend(path, { lockTimeoutMs: 50 });

    expect(() => store.createCategory('Home')).toThrow(LockContentionError);
    expect(existsSync(path)).toBe(false);

    unlinkSync(`${path}.lock`);
    expect(store.createCategory('Home').id).toBe(1);
    store.close();
  });

  it('breaks a lock left behind by a dead process', () => {
    writeFileSync(`${path}.lock`, '999999999');
    const store = new JsonBackend(path, { lockTimeoutMs: 1000 });

    expect(store.createCategory('Home').id).toBe(1);
    expect(existsSync(`${path}.lock`)).toBe(false);
    store.close();
  });
});
