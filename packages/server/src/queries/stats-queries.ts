import { computeStats, NO_CATEGORY_LABEL, NO_CATEGORY_COLOR } from '@taskdock/core';
import type { TaskStats } from '@taskdock/core/types';
import type { WireStats } from '@taskdock/core/wire';
import { toCategory, toTask } from '@taskdock/core/wire';
import type { TaskdockDb } from '../db.js';
import { listTasks } from './task-queries.js';
import { listCategories } from './category-queries.js';

/** Counts over every task, shaped for GET /api/stats */
export function getStats(db: TaskdockDb): WireStats {
  const stats = computeStats(listTasks(db).map(toTask), listCategories(db).map(toCategory));
  return toWireStats(stats);
}

export function toWireStats(stats: TaskStats): WireStats {
  return {
    total_tasks: stats.total,
    completed_tasks: stats.completed,
    pending_tasks: stats.pending,
    completion_rate: stats.completionRate,
    priority_stats: { ...stats.byPriority },
    category_stats: stats.byCategory.map(({ category, count }) => ({
      category: category ?? { id: null, name: NO_CATEGORY_LABEL, color: NO_CATEGORY_COLOR },
      count,
    })),
  };
}
