import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { StorageBackend } from '../src/storage/backend.js';
import { JsonBackend } from '../src/storage/json-backend.js';
import { SqliteBackend } from '../src/storage/sqlite-backend.js';
import { StorageType } from '../src/types/storage-type.js';

export interface TestClock {
  now: () => Date;
  advance(ms: number): void;
  set(iso: string): void;
}

/** Manually driven clock starting at `start` */
export function testClock(start = '2024-03-01T12:00:00.000Z'): TestClock {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
    set(iso: string) {
      current = new Date(iso).getTime();
    },
  };
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'tasklet-test-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Open a fresh store of the given type inside `dir` */
export function openStore(type: StorageType, dir: string, now?: () => Date): StorageBackend {
  return type === StorageType.Json
    ? new JsonBackend(join(dir, 'tasks.json'), { now })
    : new SqliteBackend(join(dir, 'tasks.db'), { now });
}

export const BACKEND_TYPES = [StorageType.Json, StorageType.Sqlite] as const;
