import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import type { Priority } from '../types/priority.js';

/**
 * Shape of `tasks` at the latest schema version. The table itself is
 * created and altered by the migrations, never from this definition.
 */
export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  description: text('description'),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  priority: text('priority').$type<Priority>().notNull(),
  /** NULL = uncategorized, 0 = Deleted */
  categoryId: integer('category_id'),
  deleted: integer('deleted', { mode: 'boolean' }).notNull().default(false),
  deletedAt: text('deleted_at'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});
