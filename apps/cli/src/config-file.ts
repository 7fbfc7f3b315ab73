/**
 * Bootstrap configuration: the settings needed before a store can be opened
 * (`storage.type`, `storage.path`). Kept in a small JSON file outside the
 * store, keyed by config key name.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import type { ConfigEntry, StorageType } from '@tasklet/core';
import {
  ConfigKey, ValidationError, configDefault, keysInScope, normalizeConfigValue, parseStorageType,
} from '@tasklet/core';

export const CONFIG_ENV_VAR = 'TASKLET_CONFIG';

export type BootstrapValues = Partial<Record<ConfigKey, string>>;

export interface BootstrapConfig {
  readonly storageType: StorageType;
  /** null means the platform default for the storage type */
  readonly storagePath: string | null;
}

export function getConfigFilePath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) return fromEnv;
  return join(homedir(), '.config', 'tasklet', 'config.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read the stored bootstrap values. A missing file holds none. */
export function readBootstrapValues(path: string): BootstrapValues {
  if (!existsSync(path)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err: unknown) {
    throw new ValidationError(`Config file ${path} is not valid JSON`, { path }, err);
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(`Config file ${path} must hold a JSON object`, { path });
  }

  const values: BootstrapValues = {};
  for (const key of keysInScope('bootstrap')) {
    const raw = parsed[key];
    if (raw === undefined) continue;
    if (typeof raw !== 'string') {
      throw new ValidationError(`${key} in ${path} must be a string`, { field: key, path });
    }
    values[key] = normalizeConfigValue(key, raw);
  }
  return values;
}

export function writeBootstrapValues(path: string, values: BootstrapValues): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  writeFileSync(tmp, JSON.stringify(values, null, 2) + '\n');
  renameSync(tmp, path);
}

export function toBootstrapConfig(values: BootstrapValues): BootstrapConfig {
  const path = values[ConfigKey.StoragePath];
  return {
    storageType: parseStorageType(values[ConfigKey.StorageType] ?? configDefault(ConfigKey.StorageType)),
    storagePath: path ? path : null,
  };
}

export function readBootstrapConfig(path: string): BootstrapConfig {
  return toBootstrapConfig(readBootstrapValues(path));
}

/** Bootstrap keys with their effective values, for `config list` */
export function bootstrapEntries(values: BootstrapValues): ConfigEntry[] {
  return keysInScope('bootstrap').map(key => {
    const stored = values[key];
    return stored === undefined
      ? { key, value: configDefault(key), isDefault: true }
      : { key, value: stored, isDefault: false };
  });
}

export function setBootstrapValue(path: string, key: ConfigKey, raw: string): string {
  const values = readBootstrapValues(path);
  const value = normalizeConfigValue(key, raw);
  writeBootstrapValues(path, { ...values, [key]: value });
  return value;
}

export function unsetBootstrapValue(path: string, key: ConfigKey): void {
  const values = readBootstrapValues(path);
  if (values[key] === undefined) return;
  const rest = { ...values };
  delete rest[key];
  writeBootstrapValues(path, rest);
}
