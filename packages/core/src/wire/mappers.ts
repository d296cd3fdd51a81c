/**
 * Conversions between wire records and domain objects.
 */

import type {
  Task, Category, TaskDraft, TaskPatch, BatchPatch, TaskId, OrderEntry,
} from '../types/task.js';
import type { TaskStats } from '../types/stats.js';
import { DEFAULT_PRIORITY } from '../types/priority.js';
import type {
  WireTask, WireCategory, WireStats,
  CreateTaskBody, UpdateTaskBody, BatchUpdateBody, BatchDeleteBody, ReorderBody,
} from './schemas.js';

export function toTask(wire: WireTask): Task {
  return {
    id: wire.id,
    content: wire.content,
    completed: wire.completed,
    priority: wire.priority,
    startDate: wire.start_date,
    dueDate: wire.due_date,
    categoryId: wire.category_id,
    order: wire.order,
    createdAt: wire.created_at,
    updatedAt: wire.updated_at,
  };
}

export function toCategory(wire: WireCategory): Category {
  return {
    id: wire.id,
    name: wire.name,
    color: wire.color,
    createdAt: wire.created_at,
  };
}

export function toStats(wire: WireStats): TaskStats {
  return {
    total: wire.total_tasks,
    completed: wire.completed_tasks,
    pending: wire.pending_tasks,
    completionRate: wire.completion_rate,
    byPriority: { ...wire.priority_stats },
    byCategory: wire.category_stats.map(({ category, count }) => ({
      category: category.id === null
        ? null
        : { id: category.id, name: category.name, color: category.color },
      count,
    })),
  };
}

/** Every optional field is sent, as null when unset */
export function toCreateBody(draft: TaskDraft): CreateTaskBody {
  return {
    content: draft.content.trim(),
    priority: draft.priority ?? DEFAULT_PRIORITY,
    start_date: draft.startDate ?? null,
    due_date: draft.dueDate ?? null,
    category_id: draft.categoryId ?? null,
  };
}

/** Only the keys present in the patch are sent */
export function toUpdateBody(patch: TaskPatch): UpdateTaskBody {
  const body: UpdateTaskBody = {};
  if (patch.content !== undefined) body.content = patch.content.trim();
  if (patch.completed !== undefined) body.completed = patch.completed;
  if (patch.priority !== undefined) body.priority = patch.priority;
  if (patch.startDate !== undefined) body.start_date = patch.startDate;
  if (patch.dueDate !== undefined) body.due_date = patch.dueDate;
  if (patch.categoryId !== undefined) body.category_id = patch.categoryId;
  if (patch.order !== undefined) body.order = patch.order;
  return body;
}

export function toBatchUpdateBody(ids: readonly TaskId[], patch: BatchPatch): BatchUpdateBody {
  const [first, ...rest] = ids;
  if (first === undefined) throw new RangeError('A batch needs at least one task id');
  const body: BatchUpdateBody = { task_ids: [first, ...rest] };
  if (patch.completed !== undefined) body.completed = patch.completed;
  if (patch.priority !== undefined) body.priority = patch.priority;
  if (patch.categoryId !== undefined) body.category_id = patch.categoryId;
  return body;
}

export function toBatchDeleteBody(ids: readonly TaskId[]): BatchDeleteBody {
  const [first, ...rest] = ids;
  if (first === undefined) throw new RangeError('A batch needs at least one task id');
  return { task_ids: [first, ...rest] };
}

export function toReorderBody(entries: readonly OrderEntry[]): ReorderBody {
  const [first, ...rest] = entries;
  if (first === undefined) throw new RangeError('Nothing to reorder');
  const pick = ({ id, order }: OrderEntry) => ({ id, order });
  return { task_orders: [pick(first), ...rest.map(pick)] };
}
