import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { Priority } from '@taskdock/core/types';
import { categories } from './categories.js';

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  content: text('content').notNull(),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  priority: text('priority').$type<Priority>().notNull().default('medium'),
  /** yyyy-MM-dd */
  startDate: text('start_date'),
  dueDate: text('due_date'),
  categoryId: integer('category_id').references(() => categories.id, { onDelete: 'set null' }),
  /** Ascending display position; new tasks go after the current maximum */
  order: integer('sort_order').notNull().default(0),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => [
  index('idx_tasks_sort').on(table.order, table.createdAt),
  index('idx_tasks_category').on(table.categoryId),
]);
