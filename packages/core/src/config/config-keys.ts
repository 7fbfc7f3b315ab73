/**
 * Registry of configuration keys, their types and hard-coded defaults.
 *
 * Store-scoped keys live in the store's config table/map. Bootstrap keys pick
 * the backend itself, so they live in a small file read before the store is
 * opened.
 */

import { ValidationError } from '../errors.js';
import { PRIORITIES, Priority } from '../types/priority.js';
import { STORAGE_TYPES } from '../types/storage-type.js';

export const ConfigKey = {
  DeletedTaskLifespan: 'deleted-task-lifespan',
  DefaultPriority: 'default-priority',
  DefaultCategory: 'default-category',
  StorageType: 'storage.type',
  StoragePath: 'storage.path',
} as const;

export type ConfigKey = (typeof ConfigKey)[keyof typeof ConfigKey];

/** Internal store key holding the `category use` context; not user-settable */
export const CURRENT_CATEGORY_KEY = 'current-category';

export type ConfigScope = 'store' | 'bootstrap';

export type ConfigKeySpec =
  | { readonly type: 'int'; readonly scope: ConfigScope; readonly defaultValue: string; readonly description: string }
  | { readonly type: 'string'; readonly scope: ConfigScope; readonly defaultValue: string; readonly description: string }
  | {
      readonly type: 'enum';
      readonly scope: ConfigScope;
      readonly defaultValue: string;
      readonly values: readonly string[];
      readonly description: string;
    };

export const CONFIG_KEYS: Record<ConfigKey, ConfigKeySpec> = {
  [ConfigKey.DeletedTaskLifespan]: {
    type: 'int',
    scope: 'store',
    defaultValue: '0',
    description: 'Days a deleted task is kept before purging (0 = forever)',
  },
  [ConfigKey.DefaultPriority]: {
    type: 'enum',
    scope: 'store',
    defaultValue: Priority.Medium,
    values: PRIORITIES,
    description: 'Priority given to new tasks',
  },
  [ConfigKey.DefaultCategory]: {
    type: 'string',
    scope: 'store',
    defaultValue: '',
    description: 'Category for new tasks (empty = uncategorized)',
  },
  [ConfigKey.StorageType]: {
    type: 'enum',
    scope: 'bootstrap',
    defaultValue: 'json',
    values: STORAGE_TYPES,
    description: 'Storage backend',
  },
  [ConfigKey.StoragePath]: {
    type: 'string',
    scope: 'bootstrap',
    defaultValue: '',
    description: 'Storage file location (empty = platform default)',
  },
};

export const CONFIG_KEY_NAMES: readonly ConfigKey[] = Object.values(ConfigKey);

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(CONFIG_KEYS, key);
}

export function parseConfigKey(key: string): ConfigKey {
  const trimmed = key.trim();
  if (isConfigKey(trimmed)) return trimmed;
  throw new ValidationError(`Unknown config key '${key}'. Valid keys: ${CONFIG_KEY_NAMES.join(', ')}`, {
    field: 'key',
    value: key,
  });
}

/** Validate a raw value for a key and return its canonical string form */
export function normalizeConfigValue(key: ConfigKey, raw: string): string {
  const spec = CONFIG_KEYS[key];
  const value = raw.trim();

  switch (spec.type) {
    case 'int': {
      if (!/^\d+$/.test(value) || !Number.isSafeInteger(Number(value))) {
        throw new ValidationError(`${key} must be a non-negative integer`, { field: key, value: raw });
      }
      return String(Number(value));
    }
    case 'enum': {
      const lower = value.toLowerCase();
      if (!spec.values.includes(lower)) {
        throw new ValidationError(`${key} must be one of: ${spec.values.join(', ')}`, { field: key, value: raw });
      }
      return lower;
    }
    case 'string': {
      if (value.includes('\0')) {
        throw new ValidationError(`${key} contains invalid characters`, { field: key, value: raw });
      }
      return value;
    }
  }
}

/** Split a `key=value` argument */
export function parseAssignment(input: string): { key: ConfigKey; value: string } {
  const eq = input.indexOf('=');
  if (eq <= 0) {
    throw new ValidationError(`Invalid assignment '${input}'. Use key=value`, { value: input });
  }
  const key = parseConfigKey(input.slice(0, eq));
  return { key, value: normalizeConfigValue(key, input.slice(eq + 1)) };
}

export function configDefault(key: ConfigKey): string {
  return CONFIG_KEYS[key].defaultValue;
}

export function keysInScope(scope: ConfigScope): ConfigKey[] {
  return CONFIG_KEY_NAMES.filter(k => CONFIG_KEYS[k].scope === scope);
}
