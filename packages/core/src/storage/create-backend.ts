import type { StorageBackend, StorageOptions } from './backend.js';
import { StorageType } from '../types/storage-type.js';
import { JsonBackend } from './json-backend.js';
import { SqliteBackend } from './sqlite-backend.js';
import { getDefaultStorePath, expandHome } from './paths.js';

export interface BackendConfig extends StorageOptions {
  readonly type: StorageType;
  /** Store location; the platform default for the type when omitted or empty */
  readonly path?: string;
  /** JSON backend only: bound on the lock wait */
  readonly lockTimeoutMs?: number;
}

/** Open the configured backend. Chosen once, at startup. */
export function createBackend(config: BackendConfig): StorageBackend {
  const path = config.path ? expandHome(config.path) : getDefaultStorePath(config.type);

  switch (config.type) {
    case StorageType.Json:
      return new JsonBackend(path, { now: config.now, lockTimeoutMs: config.lockTimeoutMs });
    case StorageType.Sqlite:
      return new SqliteBackend(path, { now: config.now });
  }
}
