/** Category 0 is the magic "Deleted" bin. It is never stored as a record. */
export const DELETED_CATEGORY_ID = 0;
export const DELETED_CATEGORY_NAME = 'Deleted';

/** Label of the top-level scope (`categoryId: null`) */
export const UNCATEGORIZED_LABEL = 'uncategorized';

export type CategoryId = number;

export interface Category {
  readonly id: CategoryId;
  readonly name: string;
  readonly createdAt: string; // ISO string
}

/** Snapshot of the category ID arena: in-use IDs plus `free` cover 1..highWater */
export interface CategoryAllocation {
  readonly highWater: number;
  readonly free: readonly CategoryId[];
}

/**
 * Where a task lives: a user category, the uncategorized top level (`null`),
 * or the Deleted bin (`0`).
 */
export type CategoryRef = CategoryId | null;
