/**
 * Turns what the user typed (an ID or a name) into a task or category.
 *
 * An integer is always an ID and never ambiguous. Anything else is an exact
 * title/name match; several matching tasks raise AmbiguousError with the
 * candidates so the caller can ask for an ID or a category. Nothing here
 * prompts.
 */

import type { StorageBackend } from '../storage/backend.js';
import type { Task } from '../types/task.js';
import type { Category, CategoryRef } from '../types/category.js';
import { DELETED_CATEGORY_ID, DELETED_CATEGORY_NAME, UNCATEGORIZED_LABEL } from '../types/category.js';
import { AmbiguousError, NotFoundError, ValidationError, type AmbiguousCandidate } from '../errors.js';
import { categoryLabel, parseId } from '../models/task-helpers.js';

export type ResolverStore = Pick<StorageBackend, 'getTask' | 'listTasks' | 'getCategory' | 'listCategories'>;

/** Where a name lookup is confined: a category, uncategorized (null) or Deleted (0) */
export type CategoryScope = CategoryRef;

function requireInput(input: string, field: string): string {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`Empty ${field} reference`, { field, value: input });
  }
  return trimmed;
}

function scopeLabel(store: ResolverStore, scope: CategoryScope): string {
  return categoryLabel(scope, store.listCategories());
}

export function resolveTask(store: ResolverStore, input: string, scope?: CategoryScope): Task {
  const query = requireInput(input, 'task');
  const id = parseId(query);

  if (id !== null) {
    const task = store.getTask(id);
    if (!task || (scope !== undefined && task.categoryId !== scope)) {
      const where = scope === undefined ? '' : ` in ${scopeLabel(store, scope)}`;
      throw new NotFoundError(`Task ${id} not found${where}`, { field: 'taskId', value: id });
    }
    return task;
  }

  if (scope === DELETED_CATEGORY_ID) {
    throw new NotFoundError(`Deleted tasks are addressed by ID, not by '${query}'`, { field: 'task', value: query });
  }

  const matches = store
    .listTasks(scope === undefined ? {} : { categoryId: scope })
    .filter(t => t.title === query);

  const [only, ...rest] = matches;
  if (!only) {
    const where = scope === undefined ? '' : ` in ${scopeLabel(store, scope)}`;
    throw new NotFoundError(`No task named '${query}'${where}`, { field: 'task', value: query });
  }
  if (rest.length === 0) return only;

  const allCategories = store.listCategories();
  const candidates: AmbiguousCandidate[] = matches.map(t => ({
    id: t.id,
    title: t.title,
    categoryId: t.categoryId,
    categoryName: categoryLabel(t.categoryId, allCategories),
  }));
  throw new AmbiguousError(query, candidates);
}

/**
 * Resolve a user category by ID or name. Names are unique regardless of
 * case, so a name matches at most one category.
 */
export function resolveCategory(store: ResolverStore, input: string): Category {
  const query = requireInput(input, 'category');
  const id = parseId(query);

  if (id !== null) {
    if (id === DELETED_CATEGORY_ID) {
      throw new ValidationError(`The ${DELETED_CATEGORY_NAME} category cannot be used here`, {
        field: 'category', value: id,
      });
    }
    const category = store.getCategory(id);
    if (!category) throw new NotFoundError(`Category ${id} not found`, { field: 'categoryId', value: id });
    return category;
  }

  const lower = query.toLowerCase();
  const category = store.listCategories().find(c => c.name.toLowerCase() === lower);
  if (!category) throw new NotFoundError(`No category named '${query}'`, { field: 'category', value: query });
  return category;
}

/** Like `resolveCategory`, but also accepts "uncategorized" and "Deleted" */
export function resolveCategoryScope(store: ResolverStore, input: string): CategoryScope {
  const query = requireInput(input, 'category');
  const lower = query.toLowerCase();

  if (lower === UNCATEGORIZED_LABEL) return null;
  if (lower === DELETED_CATEGORY_NAME.toLowerCase() || parseId(query) === DELETED_CATEGORY_ID) {
    return DELETED_CATEGORY_ID;
  }
  return resolveCategory(store, query).id;
}
