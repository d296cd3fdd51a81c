import type { Category } from './task.js';
import type { Priority } from './priority.js';

export interface CategoryCount {
  /** null for the "no category" bucket */
  readonly category: Pick<Category, 'id' | 'name' | 'color'> | null;
  readonly count: number;
}

export interface TaskStats {
  readonly total: number;
  readonly completed: number;
  readonly pending: number;
  /** Percentage, one decimal place; 0 when there are no tasks */
  readonly completionRate: number;
  readonly byPriority: Readonly<Record<Priority, number>>;
  readonly byCategory: readonly CategoryCount[];
}
