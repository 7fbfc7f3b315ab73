export { Priority, PriorityName, PRIORITIES, isPriority, parsePriority } from './priority.js';
export { StorageType, STORAGE_TYPES, isStorageType, parseStorageType } from './storage-type.js';
export { DELETED_CATEGORY_ID, DELETED_CATEGORY_NAME, UNCATEGORIZED_LABEL } from './category.js';
export type { Category, CategoryId, CategoryRef, CategoryAllocation } from './category.js';
export type { Task, TaskId, NewTask, TaskPatch, TaskFilter } from './task.js';
export type { TaskResult, BatchResult } from './results.js';
export { isError, anyFailed } from './results.js';
