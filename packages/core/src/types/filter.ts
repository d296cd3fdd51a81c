import type { CategoryId } from './task.js';
import type { Priority } from './priority.js';

/** Raw values of the filter controls; '' is every control's "no filter" sentinel */
export interface FilterUiState {
  readonly search: string;
  readonly completed: '' | 'true' | 'false';
  /** Category id as entered, or 'none' for tasks without a category */
  readonly categoryId: string;
  readonly priority: '' | Priority;
}

/** Active constraints only. An absent key matches everything on that dimension. */
export interface FilterSpec {
  readonly search?: string;
  readonly completed?: boolean;
  readonly categoryId?: CategoryId | 'none';
  readonly priority?: Priority;
}

export const EMPTY_FILTER_UI: FilterUiState = {
  search: '',
  completed: '',
  categoryId: '',
  priority: '',
};
