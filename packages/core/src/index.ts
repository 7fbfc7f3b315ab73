// Types
export {
  Priority, PriorityName, PRIORITIES, isPriority, parsePriority,
  StorageType, STORAGE_TYPES, isStorageType, parseStorageType,
  DELETED_CATEGORY_ID, DELETED_CATEGORY_NAME, UNCATEGORIZED_LABEL,
  isError, anyFailed,
} from './types/index.js';
export type {
  Category, CategoryId, CategoryRef, CategoryAllocation,
  Task, TaskId, NewTask, TaskPatch, TaskFilter,
  TaskResult, BatchResult,
} from './types/index.js';

// Errors
export {
  ErrorCode, TaskletError, ValidationError, NotFoundError, AmbiguousError,
  StorageCorruptionError, MigrationError, LockContentionError,
  isTaskletError, isEntityError, errorMessage,
} from './errors.js';
export type { ErrorDetails, AmbiguousCandidate, MigrationDirection } from './errors.js';

// Models
export {
  normalizeTitle, normalizeCategoryName, parseId, compareTasks, sortTasks, categoryLabel,
} from './models/task-helpers.js';
export { allocateCategoryId, releaseCategoryId, checkAllocation, emptyAllocation } from './models/category-ids.js';

// Config
export {
  ConfigKey, CONFIG_KEYS, CONFIG_KEY_NAMES, CURRENT_CATEGORY_KEY,
  isConfigKey, parseConfigKey, normalizeConfigValue, parseAssignment, configDefault, keysInScope,
} from './config/config-keys.js';
export type { ConfigScope, ConfigKeySpec } from './config/config-keys.js';
export {
  getConfigOrDefault, getDeletedTaskLifespan, getDefaultPriority, getDefaultCategoryName,
  readStoreSettings, listStoreConfig, setStoreConfig, resetStoreConfig,
} from './config/store-settings.js';
export type { ConfigReader, ConfigWriter, ConfigEntry, StoreSettings } from './config/store-settings.js';

// Database
export { createDb, getRawDb, MEMORY_PATH } from './db.js';
export type { TaskletDb } from './db.js';

// Storage
export type { StorageBackend, StorageOptions, CategoryDeletion, ConfigChanges } from './storage/backend.js';
export { JsonBackend } from './storage/json-backend.js';
export type { JsonBackendOptions } from './storage/json-backend.js';
export { SqliteBackend } from './storage/sqlite-backend.js';
export type { SqliteBackendOptions } from './storage/sqlite-backend.js';
export { createBackend } from './storage/create-backend.js';
export type { BackendConfig } from './storage/create-backend.js';
export { getDataDir, getDefaultStorePath, expandHome } from './storage/paths.js';
export { FileLock } from './storage/file-lock.js';

// Migrations
export * from './migrations/index.js';

// Resolver
export * from './resolver/index.js';

// Lifecycle
export * from './lifecycle/index.js';
