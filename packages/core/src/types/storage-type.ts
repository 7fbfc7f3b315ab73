import { ValidationError } from '../errors.js';

export const StorageType = {
  Json: 'json',
  Sqlite: 'sqlite',
} as const;

export type StorageType = (typeof StorageType)[keyof typeof StorageType];

export const STORAGE_TYPES: readonly StorageType[] = [StorageType.Json, StorageType.Sqlite];

export function isStorageType(value: string): value is StorageType {
  return (STORAGE_TYPES as readonly string[]).includes(value);
}

export function parseStorageType(value: string): StorageType {
  const normalized = value.trim().toLowerCase();
  if (isStorageType(normalized)) return normalized;
  throw new ValidationError(
    `Invalid storage type '${value}'. Expected one of: ${STORAGE_TYPES.join(', ')}`,
    { field: 'storage.type', value },
  );
}
