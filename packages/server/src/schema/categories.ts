import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';
import { DEFAULT_CATEGORY_COLOR } from '@taskdock/core/types';

export const categories = sqliteTable('categories', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  color: text('color').notNull().default(DEFAULT_CATEGORY_COLOR),
  createdAt: text('created_at').notNull(),
});
