import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteBackend } from '../../src/storage/sqlite-backend.js';
import { MEMORY_PATH } from '../../src/db.js';
import { resolveTask, resolveCategory, resolveCategoryScope } from '../../src/resolver/identifier-resolver.js';
import { AmbiguousError, NotFoundError, ValidationError } from '../../src/errors.js';
import { Priority } from '../../src/types/priority.js';

let store: SqliteBackend;

beforeEach(() => {
  store = new SqliteBackend(MEMORY_PATH);
  const home = store.createCategory('Home');
  const work = store.createCategory('Work');
  store.createTask({ title: 'Buy milk', priority: Priority.Medium, categoryId: home.id });
  store.createTask({ title: 'Buy milk', priority: Priority.High, categoryId: work.id });
  store.createTask({ title: 'Call mom', priority: Priority.Low, categoryId: null });
  const old = store.createTask({ title: 'Old', priority: Priority.Low, categoryId: null });
  store.softDeleteTask(old.id);
});

afterEach(() => {
  store.close();
});

describe('resolveTask', () => {
  it('resolves an integer as an ID', () => {
    expect(resolveTask(store, '3').title).toBe('Call mom');
    expect(resolveTask(store, ' 2 ').categoryId).toBe(2);
  });

  it('resolves a unique title', () => {
    expect(resolveTask(store, '  Call mom ').id).toBe(3);
  });

  it('reports every candidate for a shared title', () => {
    let caught: unknown;
    try {
      resolveTask(store, 'Buy milk');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(AmbiguousError);
    expect(caught).toMatchObject({
      message: "'Buy milk' matches 2 tasks; specify an ID or a category",
      input: 'Buy milk',
      candidates: [
        { id: 1, title: 'Buy milk', categoryId: 1, categoryName: 'Home' },
        { id: 2, title: 'Buy milk', categoryId: 2, categoryName: 'Work' },
      ],
    });
  });

  it('narrows a name to the given category', () => {
    expect(resolveTask(store, 'Buy milk', 2).id).toBe(2);
    expect(resolveTask(store, 'Buy milk', 1).id).toBe(1);
    expect(() => resolveTask(store, 'Buy milk', null)).toThrow(NotFoundError);
  });

  it('matches titles case-sensitively', () => {
    expect(() => resolveTask(store, 'call mom')).toThrow(NotFoundError);
  });

  it('reaches deleted tasks by ID only', () => {
    expect(() => resolveTask(store, 'Old')).toThrow(NotFoundError);
    expect(() => resolveTask(store, 'Old', 0)).toThrow(NotFoundError);
    expect(resolveTask(store, '4').deleted).toBe(true);
    expect(resolveTask(store, '4', 0).id).toBe(4);
  });

  it('checks an ID against the scope', () => {
    expect(() => resolveTask(store, '1', 2)).toThrow('Task 1 not found in Work');
    expect(() => resolveTask(store, '4', null)).toThrow('Task 4 not found in uncategorized');
    expect(() => resolveTask(store, '99')).toThrow('Task 99 not found');
  });

  it('rejects blank input', () => {
    expect(() => resolveTask(store, '  ')).toThrow(ValidationError);
  });
});

describe('resolveCategory', () => {
  it('resolves names regardless of case, and IDs', () => {
    expect(resolveCategory(store, 'work').id).toBe(2);
    expect(resolveCategory(store, '1').name).toBe('Home');
  });

  it('rejects the Deleted category and unknown references', () => {
    expect(() => resolveCategory(store, '0')).toThrow(ValidationError);
    expect(() => resolveCategory(store, '9')).toThrow(NotFoundError);
    expect(() => resolveCategory(store, 'Gym')).toThrow("No category named 'Gym'");
  });
});

describe('resolveCategoryScope', () => {
  it('maps the special scopes', () => {
    expect(resolveCategoryScope(store, 'uncategorized')).toBeNull();
    expect(resolveCategoryScope(store, 'Deleted')).toBe(0);
    expect(resolveCategoryScope(store, '0')).toBe(0);
  });

  it('falls back to category lookup', () => {
    expect(resolveCategoryScope(store, 'Home')).toBe(1);
    expect(resolveCategoryScope(store, '2')).toBe(2);
    expect(() => resolveCategoryScope(store, 'Gym')).toThrow(NotFoundError);
  });
});
