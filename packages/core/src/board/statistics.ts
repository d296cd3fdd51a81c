import type { Task, Category } from '../types/task.js';
import type { TaskStats, CategoryCount } from '../types/stats.js';
import type { SyncResult } from '../types/results.js';
import { success } from '../types/results.js';
import { Priority } from '../types/priority.js';
import { WireStatsSchema } from '../wire/schemas.js';
import { toStats } from '../wire/mappers.js';
import { NetworkError, ServerError, errorMessage } from '../errors.js';
import type { Logger } from '../logging/log-buffer.js';
import { createLogger } from '../logging/log-buffer.js';
import type { HttpTransport } from './http.js';
import type { EntityCache } from './entity-cache.js';

export const NO_CATEGORY_LABEL = 'No category';
export const NO_CATEGORY_COLOR = '#6c757d';

/** completed / total as a percentage with one decimal; 0 for an empty list */
export function completionRate(completed: number, total: number): number {
  if (total <= 0) return 0;
  return Math.round((completed / total) * 1000) / 10;
}

/**
 * Local recomputation over a task list. Tasks whose category no longer exists
 * are counted in the "no category" bucket.
 */
export function computeStats(tasks: readonly Task[], categories: readonly Category[] = []): TaskStats {
  const completed = tasks.filter((t) => t.completed).length;
  const byPriority = { [Priority.High]: 0, [Priority.Medium]: 0, [Priority.Low]: 0 };
  const perCategory = new Map<number, number>();
  const known = new Set(categories.map((c) => c.id));
  let uncategorized = 0;

  for (const t of tasks) {
    byPriority[t.priority]++;
    if (t.categoryId !== null && known.has(t.categoryId)) {
      perCategory.set(t.categoryId, (perCategory.get(t.categoryId) ?? 0) + 1);
    } else {
      uncategorized++;
    }
  }

  const byCategory: CategoryCount[] = categories.map((c) => ({
    category: { id: c.id, name: c.name, color: c.color },
    count: perCategory.get(c.id) ?? 0,
  }));
  if (uncategorized > 0) byCategory.push({ category: null, count: uncategorized });

  return {
    total: tasks.length,
    completed,
    pending: tasks.length - completed,
    completionRate: completionRate(completed, tasks.length),
    byPriority,
    byCategory,
  };
}

export type StatsSource = 'remote' | 'local';

export interface StatsSnapshot {
  readonly stats: TaskStats;
  readonly source: StatsSource;
}

/**
 * Aggregate counts for the stats panel. `refresh()` asks the server; if that
 * fails the counts are recomputed from the cached (rendered) tasks and the
 * failure is returned alongside so the caller can report it.
 */
export class StatisticsView {
  private snapshot: StatsSnapshot;
  private readonly log: Logger;

  constructor(
    private readonly transport: HttpTransport,
    private readonly cache: EntityCache,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('stats');
    this.snapshot = { stats: computeStats([]), source: 'local' };
  }

  current(): StatsSnapshot {
    return this.snapshot;
  }

  recompute(): StatsSnapshot {
    this.snapshot = {
      stats: computeStats(this.cache.currentTasks(), this.cache.currentCategories()),
      source: 'local',
    };
    return this.snapshot;
  }

  async refresh(): Promise<SyncResult<StatsSnapshot>> {
    try {
      const wire = await this.transport.request('GET', '/api/stats', WireStatsSchema);
      this.snapshot = { stats: toStats(wire), source: 'remote' };
      return success(this.snapshot);
    } catch (err) {
      const error = err instanceof NetworkError || err instanceof ServerError
        ? err
        : new NetworkError(errorMessage(err), { cause: err });
      this.log.warn(`Stats endpoint failed, recomputing locally: ${error.message}`);
      this.recompute();
      return { type: 'failed', error };
    }
  }
}
