import type { FilterUiState, FilterSpec } from '../types/filter.js';
import { isPriority } from '../types/priority.js';

/**
 * Derive the active constraints from the filter controls. Controls left at
 * their '' sentinel are omitted, as is a category id that isn't a positive
 * integer or 'none'.
 */
export function buildFilterSpec(ui: FilterUiState): FilterSpec {
  const search = ui.search.trim();
  const categoryRaw = ui.categoryId.trim();
  const categoryId = categoryRaw === 'none'
    ? 'none'
    : /^\d+$/.test(categoryRaw) && Number(categoryRaw) > 0 ? Number(categoryRaw) : undefined;

  return {
    ...(search ? { search } : {}),
    ...(ui.completed === '' ? {} : { completed: ui.completed === 'true' }),
    ...(categoryId === undefined ? {} : { categoryId }),
    ...(isPriority(ui.priority) ? { priority: ui.priority } : {}),
  };
}

/** Query parameters for GET /api/tasks */
export function toSearchParams(spec: FilterSpec): URLSearchParams {
  const params = new URLSearchParams();
  if (spec.search !== undefined) params.set('search', spec.search);
  if (spec.completed !== undefined) params.set('completed', String(spec.completed));
  if (spec.categoryId !== undefined) params.set('category_id', String(spec.categoryId));
  if (spec.priority !== undefined) params.set('priority', spec.priority);
  return params;
}

/** True when no dimension is constrained */
export function isEmptyFilter(spec: FilterSpec): boolean {
  return Object.keys(spec).length === 0;
}
