import { describe, it, expect } from 'vitest';
import {
  ConfigKey, keysInScope, normalizeConfigValue, parseAssignment, parseConfigKey,
} from '../../src/config/config-keys.js';
import {
  getDeletedTaskLifespan, listStoreConfig, readStoreSettings, resetStoreConfig, setStoreConfig,
  type ConfigWriter,
} from '../../src/config/store-settings.js';
import { ValidationError } from '../../src/errors.js';

function memoryConfig(initial: Record<string, string> = {}): ConfigWriter & { values: Map<string, string> } {
  const values = new Map(Object.entries(initial));
  return {
    values,
    getConfig: key => values.get(key) ?? null,
    setConfig: (key, value) => {
      if (value === null) values.delete(key);
      else values.set(key, value);
    },
  };
}

describe('parseConfigKey', () => {
  it('accepts known keys with surrounding whitespace', () => {
    expect(parseConfigKey(' default-priority ')).toBe(ConfigKey.DefaultPriority);
  });

  it('lists the valid keys when rejecting one', () => {
    expect(() => parseConfigKey('colour')).toThrow(
      "Unknown config key 'colour'. Valid keys: deleted-task-lifespan, default-priority, default-category, storage.type, storage.path",
    );
  });
});

describe('normalizeConfigValue', () => {
  it('canonicalizes integers', () => {
    expect(normalizeConfigValue(ConfigKey.DeletedTaskLifespan, ' 007 ')).toBe('7');
    expect(() => normalizeConfigValue(ConfigKey.DeletedTaskLifespan, '-1')).toThrow(ValidationError);
    expect(() => normalizeConfigValue(ConfigKey.DeletedTaskLifespan, '1.5')).toThrow(ValidationError);
  });

  it('lower-cases enum values', () => {
    expect(normalizeConfigValue(ConfigKey.DefaultPriority, 'Low')).toBe('low');
    expect(normalizeConfigValue(ConfigKey.StorageType, 'SQLITE')).toBe('sqlite');
    expect(() => normalizeConfigValue(ConfigKey.DefaultPriority, 'urgent')).toThrow(
      'default-priority must be one of: high, medium, low',
    );
  });

  it('trims strings', () => {
    expect(normalizeConfigValue(ConfigKey.DefaultCategory, '  Work ')).toBe('Work');
  });
});

describe('parseAssignment', () => {
  it('splits on the first equals sign', () => {
    expect(parseAssignment('storage.path=/tmp/a=b.json')).toEqual({ key: ConfigKey.StoragePath, value: '/tmp/a=b.json' });
    expect(parseAssignment('default-priority=HIGH')).toEqual({ key: ConfigKey.DefaultPriority, value: 'high' });
  });

  it('rejects input without a key', () => {
    expect(() => parseAssignment('=high')).toThrow(ValidationError);
    expect(() => parseAssignment('default-priority')).toThrow("Invalid assignment 'default-priority'. Use key=value");
  });
});

describe('store settings', () => {
  it('splits keys by scope', () => {
    expect(keysInScope('store')).toEqual(['deleted-task-lifespan', 'default-priority', 'default-category']);
    expect(keysInScope('bootstrap')).toEqual(['storage.type', 'storage.path']);
  });

  it('reads defaults for unset keys', () => {
    expect(readStoreSettings(memoryConfig())).toEqual({
      deletedTaskLifespan: 0,
      defaultPriority: 'medium',
      defaultCategory: null,
    });
  });

  it('marks which entries are defaults', () => {
    const store = memoryConfig({ 'default-priority': 'high' });
    expect(listStoreConfig(store)).toEqual([
      { key: 'deleted-task-lifespan', value: '0', isDefault: true },
      { key: 'default-priority', value: 'high', isDefault: false },
      { key: 'default-category', value: '', isDefault: true },
    ]);
  });

  it('stores normalized values and resets them', () => {
    const store = memoryConfig();
    expect(setStoreConfig(store, ConfigKey.DeletedTaskLifespan, ' 30 ')).toBe('30');
    expect(getDeletedTaskLifespan(store)).toBe(30);

    resetStoreConfig(store, ConfigKey.DeletedTaskLifespan);
    expect(store.values.has('deleted-task-lifespan')).toBe(false);
    expect(getDeletedTaskLifespan(store)).toBe(0);
  });

  it('keeps bootstrap keys out of the store', () => {
    const store = memoryConfig();
    expect(() => setStoreConfig(store, ConfigKey.StorageType, 'sqlite')).toThrow(ValidationError);
    expect(() => resetStoreConfig(store, ConfigKey.StoragePath)).toThrow(ValidationError);
    expect(store.values.size).toBe(0);
  });

  it('rejects a corrupt stored value on read', () => {
    expect(() => getDeletedTaskLifespan(memoryConfig({ 'deleted-task-lifespan': 'soon' }))).toThrow(ValidationError);
  });
});
