/**
 * Typed view over the store-scoped config keys.
 */

import type { Priority } from '../types/priority.js';
import { parsePriority } from '../types/priority.js';
import { ValidationError } from '../errors.js';
import { CONFIG_KEYS, ConfigKey, configDefault, keysInScope, normalizeConfigValue } from './config-keys.js';

export interface ConfigReader {
  getConfig(key: string): string | null;
}

export interface StoreSettings {
  /** Days a soft-deleted task survives; 0 disables the purge sweep */
  readonly deletedTaskLifespan: number;
  readonly defaultPriority: Priority;
  /** Category name for new tasks, or null for uncategorized */
  readonly defaultCategory: string | null;
}

/** Get a config value, falling back to the key's default */
export function getConfigOrDefault(store: ConfigReader, key: ConfigKey): string {
  const stored = store.getConfig(key);
  return stored == null ? configDefault(key) : normalizeConfigValue(key, stored);
}

export function getDeletedTaskLifespan(store: ConfigReader): number {
  return Number(getConfigOrDefault(store, ConfigKey.DeletedTaskLifespan));
}

export function getDefaultPriority(store: ConfigReader): Priority {
  return parsePriority(getConfigOrDefault(store, ConfigKey.DefaultPriority));
}

export function getDefaultCategoryName(store: ConfigReader): string | null {
  const name = getConfigOrDefault(store, ConfigKey.DefaultCategory);
  return name.length > 0 ? name : null;
}

export function readStoreSettings(store: ConfigReader): StoreSettings {
  return {
    deletedTaskLifespan: getDeletedTaskLifespan(store),
    defaultPriority: getDefaultPriority(store),
    defaultCategory: getDefaultCategoryName(store),
  };
}

export interface ConfigWriter extends ConfigReader {
  setConfig(key: string, value: string | null): void;
}

export interface ConfigEntry {
  readonly key: ConfigKey;
  readonly value: string;
  /** True when the key is unset and `value` is its default */
  readonly isDefault: boolean;
}

/** Every store-scoped key with its effective value */
export function listStoreConfig(store: ConfigReader): ConfigEntry[] {
  return keysInScope('store').map(key => {
    const stored = store.getConfig(key);
    return stored == null
      ? { key, value: configDefault(key), isDefault: true }
      : { key, value: normalizeConfigValue(key, stored), isDefault: false };
  });
}

function requireStoreKey(key: ConfigKey): void {
  if (CONFIG_KEYS[key].scope !== 'store') {
    throw new ValidationError(`${key} is a bootstrap setting and is not kept in the store`, { field: 'key', value: key });
  }
}

/** Validate and persist a store-scoped key. Returns the stored value. */
export function setStoreConfig(store: ConfigWriter, key: ConfigKey, raw: string): string {
  requireStoreKey(key);
  const value = normalizeConfigValue(key, raw);
  store.setConfig(key, value);
  return value;
}

/** Drop a stored value so the key falls back to its default */
export function resetStoreConfig(store: ConfigWriter, key: ConfigKey): void {
  requireStoreKey(key);
  store.setConfig(key, null);
}
