import type { TaskDraft, TaskPatch, BatchPatch, Category } from '../types/task.js';
import { MAX_CONTENT_LENGTH, MAX_CATEGORY_NAME_LENGTH } from '../types/task.js';
import { isPriority } from '../types/priority.js';
import { isIsoDate } from '../parsers/date-parser.js';
import { ValidationError } from '../errors.js';

function checkContent(content: string): ValidationError | null {
  const trimmed = content.trim();
  if (!trimmed) return new ValidationError('Task content cannot be empty', 'content');
  if (trimmed.length > MAX_CONTENT_LENGTH) {
    return new ValidationError(`Task content cannot exceed ${MAX_CONTENT_LENGTH} characters`, 'content');
  }
  return null;
}

function checkDates(startDate: string | null | undefined, dueDate: string | null | undefined): ValidationError | null {
  if (startDate && !isIsoDate(startDate)) {
    return new ValidationError(`Invalid start date '${startDate}'`, 'startDate');
  }
  if (dueDate && !isIsoDate(dueDate)) {
    return new ValidationError(`Invalid due date '${dueDate}'`, 'dueDate');
  }
  if (startDate && dueDate && startDate > dueDate) {
    return new ValidationError('Start date cannot be later than the due date', 'dueDate');
  }
  return null;
}

/** Rejects a doomed create before it reaches the network */
export function validateDraft(draft: TaskDraft): ValidationError | null {
  if (draft.priority !== undefined && !isPriority(draft.priority)) {
    return new ValidationError(`Unknown priority '${String(draft.priority)}'`, 'priority');
  }
  return checkContent(draft.content) ?? checkDates(draft.startDate, draft.dueDate);
}

/**
 * Validates the fields present in a patch. When only one date changes, the
 * other is taken from `current` so the range is still checked.
 */
export function validatePatch(
  patch: TaskPatch,
  current?: { startDate: string | null; dueDate: string | null },
): ValidationError | null {
  if (Object.values(patch).every((v) => v === undefined)) {
    return new ValidationError('Nothing to update');
  }
  if (patch.content !== undefined) {
    const err = checkContent(patch.content);
    if (err) return err;
  }
  if (patch.priority !== undefined && !isPriority(patch.priority)) {
    return new ValidationError(`Unknown priority '${String(patch.priority)}'`, 'priority');
  }
  if (patch.order !== undefined && !Number.isInteger(patch.order)) {
    return new ValidationError('Order must be an integer', 'order');
  }
  const start = patch.startDate !== undefined ? patch.startDate : current?.startDate;
  const due = patch.dueDate !== undefined ? patch.dueDate : current?.dueDate;
  return checkDates(start, due);
}

export function validateBatch(ids: readonly number[], patch?: BatchPatch): ValidationError | null {
  if (ids.length === 0) return new ValidationError('No tasks selected', 'taskIds');
  if (patch && Object.values(patch).every((v) => v === undefined)) {
    return new ValidationError('Nothing to update');
  }
  return null;
}

export function validateCategoryName(name: string, existing: readonly Category[] = []): ValidationError | null {
  const trimmed = name.trim();
  if (!trimmed) return new ValidationError('Category name cannot be empty', 'name');
  if (trimmed.length > MAX_CATEGORY_NAME_LENGTH) {
    return new ValidationError(`Category name cannot exceed ${MAX_CATEGORY_NAME_LENGTH} characters`, 'name');
  }
  if (existing.some((c) => c.name === trimmed)) {
    return new ValidationError(`Category '${trimmed}' already exists`, 'name');
  }
  return null;
}
