/**
 * Remote operations against the task API, reconciled into the entity cache.
 *
 * Consistency model: after every successful write the client re-fetches the
 * task list with the last filter instead of patching the cache locally. The
 * server stays the only source of truth for ordering and defaults.
 *
 * Nothing here throws past the public methods: each resolves to a
 * SyncResult, and every failure that isn't a stale response is also
 * published to `onError` listeners.
 */

import type {
  Task, Category, TaskId, CategoryId, TaskDraft, TaskPatch, BatchPatch, OrderEntry,
} from '../types/task.js';
import type { FilterSpec } from '../types/filter.js';
import type { SyncResult, BatchOutcome } from '../types/results.js';
import { success } from '../types/results.js';
import {
  ValidationError, NetworkError, ServerError, StaleResponseError, errorMessage,
} from '../errors.js';
import type { Logger } from '../logging/log-buffer.js';
import { createLogger } from '../logging/log-buffer.js';
import {
  WireTaskSchema, WireTaskListSchema, WireCategorySchema, WireCategoryListSchema,
  AckSchema, BatchResponseSchema,
} from '../wire/schemas.js';
import {
  toTask, toCategory, toCreateBody, toUpdateBody,
  toBatchUpdateBody, toBatchDeleteBody, toReorderBody,
} from '../wire/mappers.js';
import type { HttpTransport } from './http.js';
import type { EntityCache } from './entity-cache.js';
import type { SelectionTracker } from './selection-tracker.js';
import { toSearchParams } from './query-builder.js';
import {
  validateDraft, validatePatch, validateBatch, validateCategoryName,
} from './validation.js';

export type MutationKind =
  | 'task-created'
  | 'task-updated'
  | 'task-deleted'
  | 'batch-updated'
  | 'batch-deleted'
  | 'order-changed'
  | 'category-created'
  | 'category-deleted';

export interface MutationEvent {
  readonly kind: MutationKind;
  readonly taskIds: readonly TaskId[];
  /** False when the write can't change any count the statistics show */
  readonly statsAffected: boolean;
}

export type ReportedError = ValidationError | NetworkError | ServerError;

export interface SyncClientOptions {
  transport: HttpTransport;
  cache: EntityCache;
  selection: SelectionTracker;
  logger?: Logger;
}

const STATS_FIELDS: ReadonlyArray<keyof TaskPatch> = ['completed', 'priority', 'categoryId'];

export class SyncClient {
  private readonly transport: HttpTransport;
  private readonly cache: EntityCache;
  private readonly selection: SelectionTracker;
  private readonly log: Logger;

  /** Sequence number of the most recently issued task fetch */
  private latestFetch = 0;
  private lastFilter: FilterSpec = {};

  private readonly errorListeners: Array<(error: ReportedError) => void> = [];
  private readonly mutationListeners: Array<(event: MutationEvent) => void> = [];

  constructor(opts: SyncClientOptions) {
    this.transport = opts.transport;
    this.cache = opts.cache;
    this.selection = opts.selection;
    this.log = opts.logger ?? createLogger('sync');
  }

  /** The filter the next refresh will use */
  get filter(): FilterSpec {
    return this.lastFilter;
  }

  /** Sequence number of the latest task fetch issued; grows with every fetch */
  get fetchSequence(): number {
    return this.latestFetch;
  }

  onError(listener: (error: ReportedError) => void): () => void {
    return subscribe(this.errorListeners, listener);
  }

  onMutation(listener: (event: MutationEvent) => void): () => void {
    return subscribe(this.mutationListeners, listener);
  }

  // ---------------------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------------------

  /**
   * Replace the cached task list with the server's view under `spec`.
   * A response that lands after a newer fetch was issued is discarded.
   */
  async fetchTasks(spec: FilterSpec = this.lastFilter): Promise<SyncResult<readonly Task[]>> {
    const seq = ++this.latestFetch;
    this.lastFilter = spec;

    try {
      const wire = await this.transport.request('GET', '/api/tasks', WireTaskListSchema, {
        query: toSearchParams(spec),
      });
      if (seq !== this.latestFetch) return this.stale(seq);

      const tasks = wire.map(toTask);
      this.cache.load(tasks);
      this.log.debug(`fetch #${seq}: ${tasks.length} task(s)`);
      return success(tasks);
    } catch (err) {
      if (seq !== this.latestFetch) return this.stale(seq);
      return this.failed('Fetching tasks', err);
    }
  }

  async createTask(draft: TaskDraft): Promise<SyncResult<Task>> {
    const invalid = validateDraft(draft);
    if (invalid) return this.invalid(invalid);

    return this.write('Creating task', async () => {
      const created = toTask(await this.transport.request('POST', '/api/tasks', WireTaskSchema, {
        body: toCreateBody(draft),
      }));
      await this.fetchTasks();
      this.emit({ kind: 'task-created', taskIds: [created.id], statsAffected: true });
      return created;
    });
  }

  /** Sends only the fields present in `patch`, then re-fetches */
  async updateTask(id: TaskId, patch: TaskPatch): Promise<SyncResult<Task>> {
    const invalid = validatePatch(patch, this.cache.findTask(id));
    if (invalid) return this.invalid(invalid);

    return this.write(`Updating task ${id}`, async () => {
      const updated = toTask(await this.transport.request('PUT', `/api/tasks/${id}`, WireTaskSchema, {
        body: toUpdateBody(patch),
      }));
      await this.fetchTasks();
      this.emit({
        kind: 'task-updated',
        taskIds: [id],
        statsAffected: STATS_FIELDS.some((f) => patch[f] !== undefined),
      });
      return updated;
    });
  }

  async deleteTask(id: TaskId): Promise<SyncResult<TaskId>> {
    return this.write(`Deleting task ${id}`, async () => {
      await this.transport.request('DELETE', `/api/tasks/${id}`, AckSchema);
      this.selection.drop(id);
      await this.fetchTasks();
      this.emit({ kind: 'task-deleted', taskIds: [id], statsAffected: true });
      return id;
    });
  }

  /**
   * All-or-nothing from the caller's view: the server rejects the whole batch
   * when any id is missing, and the failure carries the missing ids.
   */
  async batchUpdate(ids: readonly TaskId[], patch: BatchPatch): Promise<SyncResult<BatchOutcome>> {
    const invalid = validateBatch(ids, patch);
    if (invalid) return this.invalid(invalid);

    return this.write(`Updating ${ids.length} task(s)`, async () => {
      const outcome = await this.transport.request('PUT', '/api/tasks/batch', BatchResponseSchema, {
        body: toBatchUpdateBody(ids, patch),
      });
      this.selection.clear();
      await this.fetchTasks();
      this.emit({ kind: 'batch-updated', taskIds: [...ids], statsAffected: true });
      return outcome;
    });
  }

  async batchDelete(ids: readonly TaskId[]): Promise<SyncResult<BatchOutcome>> {
    const invalid = validateBatch(ids);
    if (invalid) return this.invalid(invalid);

    return this.write(`Deleting ${ids.length} task(s)`, async () => {
      const outcome = await this.transport.request('DELETE', '/api/tasks/batch', BatchResponseSchema, {
        body: toBatchDeleteBody(ids),
      });
      this.selection.clear();
      await this.fetchTasks();
      this.emit({ kind: 'batch-deleted', taskIds: [...ids], statsAffected: true });
      return outcome;
    });
  }

  /** Persist one task's order value. No re-fetch: the caller owns the visual state. */
  async setTaskOrder(id: TaskId, order: number): Promise<SyncResult<Task>> {
    const invalid = validatePatch({ order });
    if (invalid) return this.invalid(invalid);

    return this.write(`Moving task ${id}`, async () => {
      const updated = toTask(await this.transport.request('PUT', `/api/tasks/${id}`, WireTaskSchema, {
        body: { order },
      }));
      this.emit({ kind: 'order-changed', taskIds: [id], statsAffected: false });
      return updated;
    });
  }

  /**
   * Every task in server order, ignoring the active filter. Leaves the cache
   * and the fetch sequence alone.
   */
  async fetchServerOrder(): Promise<SyncResult<readonly Task[]>> {
    try {
      const wire = await this.transport.request('GET', '/api/tasks', WireTaskListSchema);
      return success(wire.map(toTask));
    } catch (err) {
      return this.failed('Fetching task order', err);
    }
  }

  /** Bulk order rewrite, used when there is no room between two neighbours */
  async rebalanceOrder(entries: readonly OrderEntry[]): Promise<SyncResult<readonly OrderEntry[]>> {
    if (entries.length === 0) return this.invalid(new ValidationError('Nothing to reorder'));

    return this.write(`Reordering ${entries.length} task(s)`, async () => {
      await this.transport.request('PUT', '/api/tasks/reorder', AckSchema, {
        body: toReorderBody(entries),
      });
      this.emit({ kind: 'order-changed', taskIds: entries.map((e) => e.id), statsAffected: false });
      return entries;
    });
  }

  // ---------------------------------------------------------------------------
  // Categories
  // ---------------------------------------------------------------------------

  async fetchCategories(): Promise<SyncResult<readonly Category[]>> {
    try {
      const wire = await this.transport.request('GET', '/api/categories', WireCategoryListSchema);
      const categories = wire.map(toCategory);
      this.cache.loadCategories(categories);
      return success(categories);
    } catch (err) {
      return this.failed('Fetching categories', err);
    }
  }

  async createCategory(name: string, color?: string): Promise<SyncResult<Category>> {
    const invalid = validateCategoryName(name, this.cache.currentCategories());
    if (invalid) return this.invalid(invalid);

    return this.write('Creating category', async () => {
      const created = toCategory(await this.transport.request('POST', '/api/categories', WireCategorySchema, {
        body: color === undefined ? { name: name.trim() } : { name: name.trim(), color },
      }));
      await this.fetchCategories();
      this.emit({ kind: 'category-created', taskIds: [], statsAffected: true });
      return created;
    });
  }

  /** Tasks in the category lose their reference server-side, so both lists are re-fetched */
  async deleteCategory(id: CategoryId): Promise<SyncResult<CategoryId>> {
    return this.write(`Deleting category ${id}`, async () => {
      await this.transport.request('DELETE', `/api/categories/${id}`, AckSchema);
      await this.fetchCategories();
      await this.fetchTasks();
      this.emit({ kind: 'category-deleted', taskIds: [], statsAffected: true });
      return id;
    });
  }

  // ---------------------------------------------------------------------------
  // Outcome helpers
  // ---------------------------------------------------------------------------

  private async write<T>(label: string, run: () => Promise<T>): Promise<SyncResult<T>> {
    try {
      return success(await run());
    } catch (err) {
      return this.failed(label, err);
    }
  }

  private invalid(error: ValidationError): SyncResult<never> {
    this.log.warn(error.message);
    this.report(error);
    return { type: 'invalid', error };
  }

  private failed(label: string, err: unknown): SyncResult<never> {
    const error = err instanceof NetworkError || err instanceof ServerError
      ? err
      : new NetworkError(errorMessage(err), { cause: err });
    this.log.error(`${label} failed:`, error.message);
    this.report(error);
    return { type: 'failed', error };
  }

  private stale(seq: number): SyncResult<never> {
    this.log.debug(`fetch #${seq} discarded, #${this.latestFetch} is newer`);
    return { type: 'stale', error: new StaleResponseError(seq, this.latestFetch) };
  }

  private report(error: ReportedError): void {
    for (const cb of [...this.errorListeners]) cb(error);
  }

  private emit(event: MutationEvent): void {
    for (const cb of [...this.mutationListeners]) cb(event);
  }
}

function subscribe<T>(list: Array<(value: T) => void>, listener: (value: T) => void): () => void {
  list.push(listener);
  return () => {
    const idx = list.indexOf(listener);
    if (idx >= 0) list.splice(idx, 1);
  };
}
