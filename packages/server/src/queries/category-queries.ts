/**
 * Category CRUD. Deleting a category detaches its tasks rather than
 * deleting them.
 */

import { asc, eq } from 'drizzle-orm';
import type { CategoryId } from '@taskdock/core/types';
import { DEFAULT_CATEGORY_COLOR, MAX_CATEGORY_NAME_LENGTH } from '@taskdock/core/types';
import type { WireCategory } from '@taskdock/core/wire';
import type { TaskdockDb } from '../db.js';
import { categories } from '../schema/categories.js';
import { tasks } from '../schema/tasks.js';
import type { QueryResult } from './results.js';
import { ok, invalid, notFound } from './results.js';

export type CategoryRow = typeof categories.$inferSelect;

export function toWireCategory(row: CategoryRow): WireCategory {
  return {
    id: row.id,
    name: row.name,
    color: row.color,
    created_at: row.createdAt,
  };
}

export function listCategories(db: TaskdockDb): WireCategory[] {
  return db.select().from(categories).orderBy(asc(categories.id)).all().map(toWireCategory);
}

export function getCategoryRow(db: TaskdockDb, id: CategoryId): CategoryRow | null {
  return db.select().from(categories).where(eq(categories.id, id)).get() ?? null;
}

export function createCategory(
  db: TaskdockDb,
  input: { name: string; color?: string | undefined },
): QueryResult<WireCategory> {
  const name = input.name.trim();
  if (!name) return invalid('Category name is required');
  if (name.length > MAX_CATEGORY_NAME_LENGTH) {
    return invalid(`Category name cannot exceed ${MAX_CATEGORY_NAME_LENGTH} characters`);
  }

  const existing = db.select({ id: categories.id }).from(categories).where(eq(categories.name, name)).get();
  if (existing) return invalid('Category name already exists');

  const row = db.insert(categories).values({
    name,
    color: input.color ?? DEFAULT_CATEGORY_COLOR,
    createdAt: new Date().toISOString(),
  }).returning().get();

  return ok(toWireCategory(row));
}

/** Removes the category and clears the reference on every task that used it */
export function deleteCategory(db: TaskdockDb, id: CategoryId): QueryResult<CategoryId> {
  if (!getCategoryRow(db, id)) return notFound(`Category ${id} not found`);

  db.transaction((tx) => {
    tx.update(tasks).set({ categoryId: null }).where(eq(tasks.categoryId, id)).run();
    tx.delete(categories).where(eq(categories.id, id)).run();
  });
  return ok(id);
}
