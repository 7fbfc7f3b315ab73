import type { Priority } from './priority.js';
import type { CategoryRef } from './category.js';

export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly completed: boolean;
  readonly priority: Priority;
  readonly categoryId: CategoryRef;
  readonly deleted: boolean;
  readonly deletedAt: string | null; // ISO string
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
}

export interface NewTask {
  readonly title: string;
  readonly priority: Priority;
  readonly categoryId: CategoryRef;
  readonly description?: string | null;
}

/** Fields `updateTask` may change; omitted fields are left as they are */
export interface TaskPatch {
  readonly title?: string;
  readonly description?: string | null;
  readonly completed?: boolean;
  readonly priority?: Priority;
  readonly categoryId?: CategoryRef;
}

/**
 * Filter for `listTasks`. `categoryId` undefined means every live task,
 * `null` the uncategorized scope and `0` the Deleted bin.
 */
export interface TaskFilter {
  readonly search?: string;
  readonly completed?: boolean;
  readonly priority?: Priority;
  readonly categoryId?: CategoryRef;
}
