import type { Task, TaskId, OrderEntry } from '../types/task.js';
import type { SyncResult } from '../types/results.js';
import { success } from '../types/results.js';
import { ValidationError } from '../errors.js';
import type { EntityCache } from './entity-cache.js';
import type { SyncClient } from './sync-client.js';

/** Spacing between consecutive order values, matching the server's spacing for new tasks */
export const ORDER_STEP = 1024;

export interface DropOutcome {
  readonly taskId: TaskId;
  /** Order values persisted by this drop: one entry, or the whole list after a rebalance */
  readonly persisted: readonly OrderEntry[];
  readonly rebalanced: boolean;
}

/** Move the element at `from` to `to`, returning a new array */
export function moveItem<T>(items: readonly T[], from: number, to: number): T[] {
  const next = [...items];
  const [moved] = next.splice(from, 1);
  if (moved === undefined) return next;
  next.splice(to, 0, moved);
  return next;
}

/**
 * Order value that places a task between `prev` and `next`, or null when
 * their orders leave no integer gap.
 */
export function orderBetween(prev: Task | undefined, next: Task | undefined, fallback: number): number | null {
  if (!prev && !next) return fallback;
  if (!prev && next) return next.order - ORDER_STEP;
  if (prev && !next) return prev.order + ORDER_STEP;
  if (prev && next) {
    const gap = next.order - prev.order;
    return gap > 1 ? prev.order + Math.floor(gap / 2) : null;
  }
  return null;
}

/** Evenly spaced orders for the list as it should now appear */
export function rebalancedOrders(tasks: readonly Task[]): OrderEntry[] {
  return tasks.map((t, i) => ({ id: t.id, order: (i + 1) * ORDER_STEP }));
}

/**
 * The full server list with `dragged` moved next to the neighbours it was
 * dropped between in a (possibly filtered) rendering. Hidden tasks keep their
 * places relative to each other and to the rendered ones.
 */
export function placeInServerOrder(
  all: readonly Task[],
  dragged: Task,
  prev: Task | undefined,
  next: Task | undefined,
): Task[] {
  const rest = all.filter((t) => t.id !== dragged.id);
  const afterPrev = prev ? rest.findIndex((t) => t.id === prev.id) : -1;
  const atNext = next ? rest.findIndex((t) => t.id === next.id) : -1;
  let at = rest.length;
  if (afterPrev >= 0) at = afterPrev + 1;
  else if (atNext >= 0) at = atNext;
  else if (!prev) at = 0;
  return [...rest.slice(0, at), dragged, ...rest.slice(at)];
}

/**
 * Turns the end of a drag gesture into a persisted order value.
 *
 * Only the dragged task is written. Other tasks keep their order values, so
 * their relative order can't change. When the neighbours leave no room the
 * whole server list, hidden tasks included, is renumbered in one bulk request.
 *
 * A failed write is never kept optimistically: the list is re-fetched so the
 * row snaps back to where the server has it. If a fetch was issued while the
 * write was in flight its result wins, and the moved list is not loaded over it.
 */
export class ReorderCoordinator {
  constructor(
    private readonly cache: EntityCache,
    private readonly sync: SyncClient,
  ) {}

  async onDrop(taskId: TaskId, newVisualIndex: number): Promise<SyncResult<DropOutcome>> {
    const tasks = this.cache.currentTasks();
    const from = tasks.findIndex((t) => t.id === taskId);
    const dragged = tasks[from];
    if (!dragged) {
      return { type: 'invalid', error: new ValidationError(`Task ${taskId} is not in the current list`, 'taskId') };
    }

    const to = Math.max(0, Math.min(Math.trunc(newVisualIndex), tasks.length - 1));
    if (to === from) {
      return success({ taskId, persisted: [], rebalanced: false });
    }

    const moved = moveItem(tasks, from, to);
    const prev = moved[to - 1];
    const next = moved[to + 1];
    const order = orderBetween(prev, next, dragged.order);
    const sequence = this.sync.fetchSequence;

    if (order !== null) {
      const result = await this.sync.setTaskOrder(taskId, order);
      if (result.type !== 'success') return this.snapBack(result);
      await this.settle(sequence, moved.map((t) => (t.id === taskId ? { ...t, order } : t)));
      return success({ taskId, persisted: [{ id: taskId, order }], rebalanced: false });
    }

    const server = await this.sync.fetchServerOrder();
    if (server.type !== 'success') return this.snapBack(server);
    const entries = rebalancedOrders(placeInServerOrder(server.data, dragged, prev, next));
    const result = await this.sync.rebalanceOrder(entries);
    if (result.type !== 'success') return this.snapBack(result);
    const orderById = new Map(entries.map((e) => [e.id, e.order]));
    await this.settle(sequence, moved.map((t) => ({ ...t, order: orderById.get(t.id) ?? t.order })));
    return success({ taskId, persisted: entries, rebalanced: true });
  }

  /** Show the moved list, unless a newer fetch has replaced what it was built from */
  private async settle(sequence: number, moved: readonly Task[]): Promise<void> {
    if (this.sync.fetchSequence === sequence) {
      this.cache.load(moved);
    } else {
      await this.sync.fetchTasks();
    }
  }

  private async snapBack(result: Exclude<SyncResult<unknown>, { type: 'success' }>): Promise<SyncResult<never>> {
    await this.sync.fetchTasks();
    return result;
  }
}
