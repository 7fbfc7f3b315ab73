import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

/** Released category IDs waiting to be handed out again */
export const categoryIdPool = sqliteTable('category_id_pool', {
  id: integer('id').primaryKey(),
});

/** High-water marks; the `category` row is the highest category ID ever allocated */
export const idCounters = sqliteTable('id_counters', {
  name: text('name').primaryKey(),
  value: integer('value').notNull(),
});

export const CATEGORY_COUNTER = 'category';
