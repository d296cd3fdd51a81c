import type { Task, Category } from '../types/task.js';
import { Priority, PriorityName } from '../types/priority.js';
import { formatDate, daysBetween } from '../parsers/date-parser.js';
import { NO_CATEGORY_LABEL } from '../board/statistics.js';

export type CategoryLink = 'assigned' | 'dangling' | 'none';

/** Which of the three category states a task is in */
export function categoryLink(task: Task, categories: readonly Category[]): CategoryLink {
  if (task.categoryId === null) return 'none';
  return categories.some((c) => c.id === task.categoryId) ? 'assigned' : 'dangling';
}

/**
 * Display label for a task's category. A missing or deleted category (or one
 * with a blank name) reads as "No category".
 */
export function categoryName(task: Task, categories: readonly Category[]): string {
  if (task.categoryId === null) return NO_CATEGORY_LABEL;
  const name = categories.find((c) => c.id === task.categoryId)?.name.trim();
  return name || NO_CATEGORY_LABEL;
}

export function getPriorityLabel(priority: Priority): string {
  return PriorityName[priority];
}

export function getPriorityIndicator(priority: Priority): string {
  switch (priority) {
    case Priority.High:
      return '>>>';
    case Priority.Medium:
      return '>>';
    case Priority.Low:
      return '>';
  }
}

export type DueState = 'overdue' | 'today' | 'upcoming' | 'done' | 'none';

export function getDueState(task: Task, today: Date = new Date()): DueState {
  if (!task.dueDate) return 'none';
  if (task.completed) return 'done';
  const diff = daysBetween(formatDate(today), task.dueDate);
  if (diff < 0) return 'overdue';
  if (diff === 0) return 'today';
  return 'upcoming';
}

/** Relative due label: "3d overdue", "today", "tomorrow", "in 5d", or the date itself */
export function formatDueDate(dueDate: string | null, today: Date = new Date()): string | null {
  if (!dueDate) return null;
  const diff = daysBetween(formatDate(today), dueDate);

  if (diff < 0) return `${Math.abs(diff)}d overdue`;
  if (diff === 0) return 'today';
  if (diff === 1) return 'tomorrow';
  if (diff <= 7) return `in ${diff}d`;
  return dueDate;
}

/** "2024-01-01 → 2024-01-10", or whichever end is set */
export function formatDateRange(task: Task): string | null {
  if (task.startDate && task.dueDate) return `${task.startDate} → ${task.dueDate}`;
  if (task.startDate) return `from ${task.startDate}`;
  if (task.dueDate) return `until ${task.dueDate}`;
  return null;
}

/** Label for a batch button: "Complete (3)" or plain "Complete" with nothing selected */
export function batchLabel(action: string, selectedCount: number): string {
  return selectedCount > 0 ? `${action} (${selectedCount})` : action;
}
