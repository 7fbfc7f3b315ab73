import { describe, it, expect, afterEach } from 'vitest';
import type { StorageBackend } from '../../src/storage/backend.js';
import { LifecycleManager } from '../../src/lifecycle/lifecycle-manager.js';
import { checkAllocation } from '../../src/models/category-ids.js';
import { isEntityError } from '../../src/errors.js';
import { Priority } from '../../src/types/priority.js';
import type { CategoryRef } from '../../src/types/category.js';
import { BACKEND_TYPES, makeTempDir, openStore, removeTempDir, testClock } from '../helpers.js';

/** mulberry32: small deterministic PRNG so failures replay */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(random: () => number, items: readonly T[]): T | undefined {
  return items[Math.floor(random() * items.length)];
}

function checkStore(store: StorageBackend): void {
  const categories = store.listCategories();
  const categoryIds = new Set(categories.map(c => c.id));
  const tasks = [...store.listTasks(), ...store.listTasks({ categoryId: 0 })];

  expect(checkAllocation(store.getCategoryAllocation(), categories.map(c => c.id))).toBeNull();

  const liveKeys = new Set<string>();
  for (const task of tasks) {
    const ref = task.categoryId;
    expect(ref === null || ref === 0 || categoryIds.has(ref)).toBe(true);
    expect(task.deleted).toBe(ref === 0);
    expect(task.deletedAt !== null).toBe(ref === 0);

    if (!task.deleted) {
      const key = `${ref ?? 'none'}:${task.title}`;
      expect(liveKeys.has(key)).toBe(false);
      liveKeys.add(key);
    }
  }
}

const TITLES = ['alpha', 'beta', 'gamma', 'delta'];
const STEPS = 150;

describe.each(BACKEND_TYPES)('store invariants over %s', (type) => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) removeTempDir(dir);
  });

  it.each([1, 7, 42])('hold through a random operation sequence (seed %i)', (seed) => {
    dir = makeTempDir();
    const clock = testClock();
    const store = openStore(type, dir, clock.now);
    const manager = new LifecycleManager(store, { now: clock.now });
    const random = seededRandom(seed);
    let nameCounter = 0;

    const targets = (): CategoryRef[] => [null, ...store.listCategories().map(c => c.id)];

    try {
      for (let step = 0; step < STEPS; step++) {
        clock.advance(60_000);
        const live = store.listTasks();
        const binned = store.listTasks({ categoryId: 0 });
        const categories = store.listCategories();

        try {
          switch (Math.floor(random() * 7)) {
            case 0:
              manager.createCategory(`c${nameCounter++}`);
              break;
            case 1: {
              const victim = pick(random, categories);
              if (!victim) break;
              const others = categories.filter(c => c.id !== victim.id).map(c => c.id);
              manager.deleteCategory(victim.id, random() < 0.5 ? null : pick(random, others) ?? null);
              break;
            }
            case 2:
            case 3:
              manager.addTask(pick(random, TITLES) ?? 'alpha', {
                categoryId: pick(random, targets()) ?? null,
                priority: Priority.Medium,
              });
              break;
            case 4: {
              const task = pick(random, live);
              if (task) manager.deleteTask(task.id);
              break;
            }
            case 5: {
              const task = pick(random, [...live, ...binned]);
              if (task) manager.moveTask(task.id, pick(random, [0, ...targets()]) ?? null);
              break;
            }
            case 6:
              manager.purgeExpired();
              if (random() < 0.2) manager.flush();
              break;
          }
        } catch (err) {
          // Rejected operations are expected; they must leave the store consistent
          if (!isEntityError(err)) throw err;
        }

        checkStore(store);
      }
    } finally {
      store.close();
    }
  });
});
