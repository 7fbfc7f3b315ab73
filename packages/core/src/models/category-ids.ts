/**
 * Category IDs form a recyclable arena: `1..highWater` are allocated, and
 * the released ones wait in `free` until the next allocation.
 */

import type { CategoryAllocation, CategoryId } from '../types/category.js';

export interface Allocated {
  readonly id: CategoryId;
  readonly allocation: CategoryAllocation;
}

export function emptyAllocation(): CategoryAllocation {
  return { highWater: 0, free: [] };
}

/** Take the smallest free ID, or raise the high-water mark */
export function allocateCategoryId(allocation: CategoryAllocation): Allocated {
  const [first, ...rest] = allocation.free;
  if (first !== undefined) {
    return { id: first, allocation: { highWater: allocation.highWater, free: rest } };
  }
  const id = allocation.highWater + 1;
  return { id, allocation: { highWater: id, free: [] } };
}

/** Return an ID to the pool, keeping `free` sorted and unique */
export function releaseCategoryId(allocation: CategoryAllocation, id: CategoryId): CategoryAllocation {
  if (id < 1 || id > allocation.highWater || allocation.free.includes(id)) return allocation;
  const free = [...allocation.free, id].sort((a, b) => a - b);
  return { highWater: allocation.highWater, free };
}

/**
 * Check that in-use IDs and the free pool are disjoint and together cover
 * `1..highWater`. Returns a reason string when they do not.
 */
export function checkAllocation(allocation: CategoryAllocation, inUse: readonly CategoryId[]): string | null {
  const used = new Set(inUse);
  const free = new Set(allocation.free);
  if (free.size !== allocation.free.length) return 'free category IDs contain duplicates';
  if (used.size !== inUse.length) return 'category IDs are not unique';

  for (const id of free) {
    if (used.has(id)) return `category ID ${id} is both free and in use`;
  }
  for (let id = 1; id <= allocation.highWater; id++) {
    if (!used.has(id) && !free.has(id)) return `category ID ${id} is neither free nor in use`;
  }
  for (const id of [...used, ...free]) {
    if (!Number.isInteger(id) || id < 1 || id > allocation.highWater) {
      return `category ID ${id} is outside 1..${allocation.highWater}`;
    }
  }
  return null;
}
