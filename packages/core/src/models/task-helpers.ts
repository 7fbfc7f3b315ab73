import type { Task, TaskId, NewTask, TaskPatch, TaskFilter } from '../types/task.js';
import type { Category, CategoryRef } from '../types/category.js';
import { DELETED_CATEGORY_ID, DELETED_CATEGORY_NAME, UNCATEGORIZED_LABEL } from '../types/category.js';
import { isPriority } from '../types/priority.js';
import { ValidationError } from '../errors.js';

const NUMERIC_RE = /^\d+$/;

/** Names that already denote the bin and the top level */
const RESERVED_NAMES = [DELETED_CATEGORY_NAME.toLowerCase(), UNCATEGORIZED_LABEL];

/** Trim a task title, rejecting blank ones */
export function normalizeTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Task title cannot be empty', { field: 'title', value: title });
  }
  return trimmed;
}

/**
 * Trim a category name. Blank and all-digit names (they would read as IDs)
 * are rejected, as are "Deleted" and "uncategorized".
 */
export function normalizeCategoryName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Category name cannot be empty', { field: 'name', value: name });
  }
  if (NUMERIC_RE.test(trimmed)) {
    throw new ValidationError(`Category name '${trimmed}' cannot be a number`, { field: 'name', value: name });
  }
  if (RESERVED_NAMES.includes(trimmed.toLowerCase())) {
    throw new ValidationError(`'${trimmed}' is a reserved category name`, { field: 'name', value: name });
  }
  return trimmed;
}

/** Trim a description; blank descriptions are stored as null */
export function normalizeDescription(description: string | null | undefined): string | null {
  if (description == null) return null;
  const trimmed = description.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Parse a user-supplied integer ID, or null when the input is not one */
export function parseId(input: string): number | null {
  const trimmed = input.trim();
  if (!NUMERIC_RE.test(trimmed)) return null;
  const id = Number(trimmed);
  return Number.isSafeInteger(id) ? id : null;
}

/** Validate input and build every field of a new task except its ID */
export function newTaskFields(input: NewTask, now: Date): Omit<Task, 'id'> {
  if (!isPriority(input.priority)) {
    throw new ValidationError(`Invalid priority '${String(input.priority)}'`, { field: 'priority' });
  }
  if (input.categoryId === DELETED_CATEGORY_ID) {
    throw new ValidationError('New tasks cannot be created in the Deleted category', { field: 'categoryId' });
  }
  const stamp = now.toISOString();
  return {
    title: normalizeTitle(input.title),
    description: normalizeDescription(input.description),
    completed: false,
    priority: input.priority,
    categoryId: input.categoryId,
    deleted: false,
    deletedAt: null,
    createdAt: stamp,
    updatedAt: stamp,
  };
}

export function createTaskRecord(id: TaskId, input: NewTask, now: Date): Task {
  return { id, ...newTaskFields(input, now) };
}

/**
 * Apply a patch to a task. Moving a task out of the Deleted bin restores it;
 * moving into the bin is only done through soft delete.
 */
export function applyPatch(task: Task, patch: TaskPatch, now: Date): Task {
  if (patch.priority !== undefined && !isPriority(patch.priority)) {
    throw new ValidationError(`Invalid priority '${String(patch.priority)}'`, { field: 'priority' });
  }
  if (patch.categoryId === DELETED_CATEGORY_ID) {
    throw new ValidationError('Use soft delete to move a task to the Deleted category', { field: 'categoryId' });
  }

  const next: Task = {
    ...task,
    title: patch.title !== undefined ? normalizeTitle(patch.title) : task.title,
    description: patch.description !== undefined ? normalizeDescription(patch.description) : task.description,
    completed: patch.completed ?? task.completed,
    priority: patch.priority ?? task.priority,
    updatedAt: now.toISOString(),
  };

  if (patch.categoryId !== undefined) {
    return { ...next, categoryId: patch.categoryId, deleted: false, deletedAt: null };
  }
  return next;
}

/** Return a copy of the task moved to the Deleted bin */
export function softDeleted(task: Task, now: Date): Task {
  const stamp = now.toISOString();
  return { ...task, categoryId: DELETED_CATEGORY_ID, deleted: true, deletedAt: stamp, updatedAt: stamp };
}

/** Listing order key: uncategorized first, then Deleted (0), then user categories */
function categoryOrder(categoryId: CategoryRef): number {
  return categoryId ?? -1;
}

/** Order by category ID ascending, then task ID ascending */
export function compareTasks(a: Task, b: Task): number {
  const c = categoryOrder(a.categoryId) - categoryOrder(b.categoryId);
  if (c !== 0) return c;
  return a.id - b.id;
}

export function sortTasks(tasks: readonly Task[]): Task[] {
  return [...tasks].sort(compareTasks);
}

/** Whether a task passes a `listTasks` filter */
export function matchesFilter(task: Task, filter: TaskFilter = {}): boolean {
  if (filter.categoryId === undefined) {
    if (task.deleted) return false;
  } else if (task.categoryId !== filter.categoryId) {
    return false;
  }
  if (filter.completed !== undefined && task.completed !== filter.completed) return false;
  if (filter.priority !== undefined && task.priority !== filter.priority) return false;
  if (filter.search) {
    if (!task.title.toLowerCase().includes(filter.search.toLowerCase())) return false;
  }
  return true;
}

/** True when a live task other than `exceptId` already uses this title in the category */
export function hasTitleClash(
  tasks: readonly Task[],
  title: string,
  categoryId: CategoryRef,
  exceptId?: TaskId,
): boolean {
  return tasks.some(t =>
    !t.deleted && t.id !== exceptId && t.title === title && t.categoryId === categoryId,
  );
}

export function titleClashError(title: string, categoryId: CategoryRef): ValidationError {
  const where = categoryId == null ? UNCATEGORIZED_LABEL : `category ${categoryId}`;
  return new ValidationError(`A task titled '${title}' already exists in ${where}`, {
    field: 'title',
    value: title,
    categoryId,
  });
}

/** Case-insensitive duplicate check for category names */
export function hasNameClash(categories: readonly Category[], name: string, exceptId?: number): boolean {
  const lower = name.toLowerCase();
  return categories.some(c => c.id !== exceptId && c.name.toLowerCase() === lower);
}

export function nameClashError(name: string): ValidationError {
  return new ValidationError(`Category '${name}' already exists`, { field: 'name', value: name });
}

/** Display label for a task's location */
export function categoryLabel(categoryId: CategoryRef, categories: readonly Category[]): string {
  if (categoryId == null) return UNCATEGORIZED_LABEL;
  if (categoryId === DELETED_CATEGORY_ID) return DELETED_CATEGORY_NAME;
  return categories.find(c => c.id === categoryId)?.name ?? `#${categoryId}`;
}
