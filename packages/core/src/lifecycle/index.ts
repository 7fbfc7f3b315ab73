export { LifecycleManager, DEFAULT_CATEGORY_NAMES } from './lifecycle-manager.js';
export type { LifecycleOptions, AddTaskOptions } from './lifecycle-manager.js';
