/**
 * Task CRUD, batch and reorder operations using Drizzle ORM.
 *
 * Batch and reorder writes are all-or-nothing: when any id is unknown the
 * whole request is rejected with the missing ids and nothing is written.
 */

import { and, asc, desc, eq, inArray, isNull, max } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { z } from 'zod';
import { ORDER_STEP, validateDraft, validatePatch } from '@taskdock/core';
import type { FilterSpec, TaskId, CategoryId, OrderEntry, TaskPatch } from '@taskdock/core/types';
import type {
  WireTask, CreateTaskBodySchema, UpdateTaskBodySchema, BatchUpdateBodySchema,
} from '@taskdock/core/wire';
import type { TaskdockDb, TaskdockExecutor } from '../db.js';
import { tasks } from '../schema/tasks.js';
import { categories } from '../schema/categories.js';
import type { CategoryRow } from './category-queries.js';
import { toWireCategory, getCategoryRow } from './category-queries.js';
import type { QueryResult } from './results.js';
import { ok, invalid, notFound } from './results.js';

export type TaskRow = typeof tasks.$inferSelect;

export type CreateTaskInput = z.output<typeof CreateTaskBodySchema>;
export type UpdateTaskInput = z.output<typeof UpdateTaskBodySchema>;
export type BatchUpdateInput = Omit<z.output<typeof BatchUpdateBodySchema>, 'task_ids'>;

// ---------------------------------------------------------------------------
// Row mapper
// ---------------------------------------------------------------------------

export function toWireTask(row: TaskRow, category: CategoryRow | null): WireTask {
  return {
    id: row.id,
    content: row.content,
    completed: row.completed,
    priority: row.priority,
    start_date: row.startDate,
    due_date: row.dueDate,
    category_id: row.categoryId,
    category: category ? toWireCategory(category) : null,
    order: row.order,
    created_at: row.createdAt,
    updated_at: row.updatedAt,
  };
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/**
 * Tasks matching every active key of `filter`, ordered by position and then
 * newest first. The search is a case-insensitive substring match on content.
 */
export function listTasks(db: TaskdockDb, filter: FilterSpec = {}): WireTask[] {
  const conditions: SQL[] = [];
  if (filter.completed !== undefined) conditions.push(eq(tasks.completed, filter.completed));
  if (filter.priority !== undefined) conditions.push(eq(tasks.priority, filter.priority));
  if (filter.categoryId === 'none') conditions.push(isNull(tasks.categoryId));
  else if (filter.categoryId !== undefined) conditions.push(eq(tasks.categoryId, filter.categoryId));

  const rows = db.select()
    .from(tasks)
    .leftJoin(categories, eq(tasks.categoryId, categories.id))
    .where(and(...conditions))
    .orderBy(asc(tasks.order), desc(tasks.createdAt), desc(tasks.id))
    .all();

  // SQLite's LIKE only folds ASCII, so the text match happens here
  const needle = filter.search?.trim().toLocaleLowerCase();
  return rows
    .filter((r) => !needle || r.tasks.content.toLocaleLowerCase().includes(needle))
    .map((r) => toWireTask(r.tasks, r.categories));
}

export function getTask(db: TaskdockDb, id: TaskId): WireTask | null {
  const row = db.select()
    .from(tasks)
    .leftJoin(categories, eq(tasks.categoryId, categories.id))
    .where(eq(tasks.id, id))
    .get();
  return row ? toWireTask(row.tasks, row.categories) : null;
}

/** Ids from `ids` (deduplicated, in request order) that have no row */
export function findMissingIds(db: TaskdockExecutor, ids: readonly TaskId[]): TaskId[] {
  const unique = [...new Set(ids)];
  if (unique.length === 0) return [];
  const found = new Set(
    db.select({ id: tasks.id }).from(tasks).where(inArray(tasks.id, unique)).all().map((r) => r.id),
  );
  return unique.filter((id) => !found.has(id));
}

function checkCategory(db: TaskdockDb, id: CategoryId | null | undefined): string | null {
  if (id === null || id === undefined) return null;
  return getCategoryRow(db, id) ? null : `Category ${id} does not exist`;
}

function missingMessage(missing: readonly TaskId[]): string {
  return `Tasks not found: ${missing.join(', ')}`;
}

// ---------------------------------------------------------------------------
// Single-task writes
// ---------------------------------------------------------------------------

/** Inserts a task after every existing one */
export function createTask(db: TaskdockDb, input: CreateTaskInput): QueryResult<WireTask> {
  const error = validateDraft({
    content: input.content,
    priority: input.priority ?? undefined,
    startDate: input.start_date,
    dueDate: input.due_date,
  });
  if (error) return invalid(error.message);

  const badCategory = checkCategory(db, input.category_id);
  if (badCategory) return invalid(badCategory);

  const now = new Date().toISOString();
  const row = db.transaction((tx) => {
    const top = tx.select({ value: max(tasks.order) }).from(tasks).get();
    return tx.insert(tasks).values({
      content: input.content.trim(),
      completed: false,
      priority: input.priority ?? 'medium',
      startDate: input.start_date ?? null,
      dueDate: input.due_date ?? null,
      categoryId: input.category_id ?? null,
      order: (top?.value ?? 0) + ORDER_STEP,
      createdAt: now,
      updatedAt: now,
    }).returning().get();
  });

  return ok(toWireTask(row, row.categoryId === null ? null : getCategoryRow(db, row.categoryId)));
}

/** Applies the fields present in `input`; the date range is checked against the merged result */
export function updateTask(db: TaskdockDb, id: TaskId, input: UpdateTaskInput): QueryResult<WireTask> {
  const current = db.select().from(tasks).where(eq(tasks.id, id)).get();
  if (!current) return notFound(`Task ${id} not found`, [id]);

  const patch: TaskPatch = {
    content: input.content,
    completed: input.completed,
    priority: input.priority,
    startDate: input.start_date,
    dueDate: input.due_date,
    categoryId: input.category_id,
    order: input.order,
  };
  const error = validatePatch(patch, current);
  if (error) return invalid(error.message);

  const badCategory = checkCategory(db, input.category_id);
  if (badCategory) return invalid(badCategory);

  const changes: Partial<typeof tasks.$inferInsert> = { updatedAt: new Date().toISOString() };
  if (patch.content !== undefined) changes.content = patch.content.trim();
  if (patch.completed !== undefined) changes.completed = patch.completed;
  if (patch.priority !== undefined) changes.priority = patch.priority;
  if (patch.startDate !== undefined) changes.startDate = patch.startDate;
  if (patch.dueDate !== undefined) changes.dueDate = patch.dueDate;
  if (patch.categoryId !== undefined) changes.categoryId = patch.categoryId;
  if (patch.order !== undefined) changes.order = patch.order;

  db.update(tasks).set(changes).where(eq(tasks.id, id)).run();

  const updated = getTask(db, id);
  return updated ? ok(updated) : notFound(`Task ${id} not found`, [id]);
}

export function deleteTask(db: TaskdockDb, id: TaskId): QueryResult<TaskId> {
  const result = db.delete(tasks).where(eq(tasks.id, id)).run();
  if (result.changes === 0) return notFound(`Task ${id} not found`, [id]);
  return ok(id);
}

// ---------------------------------------------------------------------------
// Batch writes
// ---------------------------------------------------------------------------

/** Sets the same fields on every task in `ids`; returns the number of tasks touched */
export function batchUpdateTasks(
  db: TaskdockDb,
  ids: readonly TaskId[],
  input: BatchUpdateInput,
): QueryResult<number> {
  const changes: Partial<typeof tasks.$inferInsert> = {};
  if (input.completed !== undefined) changes.completed = input.completed;
  if (input.priority !== undefined) changes.priority = input.priority;
  if (input.category_id !== undefined) changes.categoryId = input.category_id;
  if (Object.keys(changes).length === 0) return invalid('No fields to update');

  const badCategory = checkCategory(db, input.category_id);
  if (badCategory) return invalid(badCategory);

  const unique = [...new Set(ids)];
  return db.transaction((tx): QueryResult<number> => {
    const missing = findMissingIds(tx, unique);
    if (missing.length > 0) return notFound(missingMessage(missing), missing);

    tx.update(tasks)
      .set({ ...changes, updatedAt: new Date().toISOString() })
      .where(inArray(tasks.id, unique))
      .run();
    return ok(unique.length);
  });
}

export function batchDeleteTasks(db: TaskdockDb, ids: readonly TaskId[]): QueryResult<number> {
  const unique = [...new Set(ids)];
  return db.transaction((tx): QueryResult<number> => {
    const missing = findMissingIds(tx, unique);
    if (missing.length > 0) return notFound(missingMessage(missing), missing);

    tx.delete(tasks).where(inArray(tasks.id, unique)).run();
    return ok(unique.length);
  });
}

/** Writes explicit order values, e.g. after a client-side rebalance */
export function reorderTasks(db: TaskdockDb, entries: readonly OrderEntry[]): QueryResult<number> {
  return db.transaction((tx): QueryResult<number> => {
    const missing = findMissingIds(tx, entries.map((e) => e.id));
    if (missing.length > 0) return notFound(missingMessage(missing), missing);

    const now = new Date().toISOString();
    for (const { id, order } of entries) {
      tx.update(tasks).set({ order, updatedAt: now }).where(eq(tasks.id, id)).run();
    }
    return ok(entries.length);
  });
}
