/**
 * Session store for one task-list screen.
 *
 * Constructed when the screen opens and disposed when it goes away. It owns
 * the cache, selection, sync client, reorder coordinator and statistics view,
 * and is the only thing that mutates them. Front ends call the intent methods
 * and re-render from `getSnapshot()` whenever a subscriber fires.
 */

import type { Task, Category, TaskId, CategoryId, TaskDraft } from '../types/task.js';
import type { FilterUiState } from '../types/filter.js';
import { EMPTY_FILTER_UI } from '../types/filter.js';
import type { SyncResult, BatchOutcome } from '../types/results.js';
import type { Logger, LogBuffer } from '../logging/log-buffer.js';
import { defaultLogBuffer } from '../logging/log-buffer.js';
import { ValidationError } from '../errors.js';
import {
  categoryName, categoryLink, getDueState, batchLabel,
} from '../display/task-display.js';
import type { CategoryLink, DueState } from '../display/task-display.js';
import { HttpTransport } from './http.js';
import type { FetchLike } from './http.js';
import { EntityCache } from './entity-cache.js';
import { SelectionTracker } from './selection-tracker.js';
import type { TriState } from './selection-tracker.js';
import { SyncClient } from './sync-client.js';
import { ReorderCoordinator } from './reorder-coordinator.js';
import type { DropOutcome } from './reorder-coordinator.js';
import { StatisticsView } from './statistics.js';
import type { StatsSnapshot } from './statistics.js';
import { buildFilterSpec } from './query-builder.js';

export interface TaskRow {
  readonly task: Task;
  readonly categoryName: string;
  readonly categoryLink: CategoryLink;
  readonly dueState: DueState;
  readonly selected: boolean;
}

export interface SelectionView {
  readonly count: number;
  readonly triState: TriState;
  readonly batchEnabled: boolean;
  readonly completeLabel: string;
  readonly deleteLabel: string;
}

export interface BoardSnapshot {
  readonly rows: readonly TaskRow[];
  readonly categories: readonly Category[];
  readonly filter: FilterUiState;
  readonly selection: SelectionView;
  readonly stats: StatsSnapshot;
  readonly statusMessage: string;
  readonly loading: boolean;
}

export interface TaskBoardOptions {
  baseUrl: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  logBuffer?: LogBuffer;
  /** How long a status message stays up; 0 keeps it until replaced */
  statusTimeoutMs?: number;
  /** Clock for due-date states */
  now?: () => Date;
}

export class TaskBoard {
  readonly cache = new EntityCache();
  readonly selection = new SelectionTracker();
  readonly sync: SyncClient;
  readonly reorder: ReorderCoordinator;
  readonly stats: StatisticsView;

  private readonly log: Logger;
  private readonly statusTimeoutMs: number;
  private readonly now: () => Date;
  private readonly listeners: Array<(snapshot: BoardSnapshot) => void> = [];
  private readonly teardown: Array<() => void> = [];

  private filterUi: FilterUiState = EMPTY_FILTER_UI;
  private statusMessage = '';
  private statusTimer: ReturnType<typeof setTimeout> | undefined;
  private loading = true;
  private statsStale = false;
  private disposed = false;
  private snapshot: BoardSnapshot;

  constructor(opts: TaskBoardOptions) {
    const buffer = opts.logBuffer ?? defaultLogBuffer;
    this.log = buffer.createLogger('board');
    this.statusTimeoutMs = opts.statusTimeoutMs ?? 3000;
    this.now = opts.now ?? (() => new Date());

    const transport = new HttpTransport({
      baseUrl: opts.baseUrl,
      fetch: opts.fetch,
      timeoutMs: opts.timeoutMs,
    });
    this.sync = new SyncClient({
      transport,
      cache: this.cache,
      selection: this.selection,
      logger: buffer.createLogger('sync'),
    });
    this.reorder = new ReorderCoordinator(this.cache, this.sync);
    this.stats = new StatisticsView(transport, this.cache, buffer.createLogger('stats'));

    this.teardown.push(
      this.cache.subscribe((change) => {
        // Selection only means something against the rendered list
        if (change === 'tasks') this.selection.retain(this.cache.taskIds());
        this.notify();
      }),
      this.sync.onError((error) => this.showStatus(`Error: ${error.message}`)),
      this.sync.onMutation((event) => {
        if (event.statsAffected) this.statsStale = true;
      }),
    );
    this.snapshot = this.buildSnapshot();
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Initial load; resolves the first failed fetch, or the task list */
  async start(): Promise<SyncResult<readonly Task[]>> {
    this.loading = true;
    this.notify();
    const categories = await this.sync.fetchCategories();
    const tasks = await this.sync.fetchTasks(buildFilterSpec(this.filterUi));
    await this.refreshStats();
    this.loading = false;
    this.log.debug(`session started with ${this.cache.currentTasks().length} task(s)`);
    this.notify();
    return categories.type === 'success' ? tasks : categories;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.log.debug('session disposed');
    for (const off of this.teardown.splice(0)) off();
    this.listeners.length = 0;
    if (this.statusTimer) clearTimeout(this.statusTimer);
    this.selection.clear();
  }

  subscribe(listener: (snapshot: BoardSnapshot) => void): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  getSnapshot(): BoardSnapshot {
    return this.snapshot;
  }

  // ---------------------------------------------------------------------------
  // Filtering
  // ---------------------------------------------------------------------------

  async setFilter(patch: Partial<FilterUiState>): Promise<SyncResult<readonly Task[]>> {
    this.filterUi = { ...this.filterUi, ...patch };
    this.notify();
    return this.sync.fetchTasks(buildFilterSpec(this.filterUi));
  }

  async refresh(): Promise<void> {
    await this.sync.fetchTasks(buildFilterSpec(this.filterUi));
    await this.refreshStats();
  }

  // ---------------------------------------------------------------------------
  // Task intents
  // ---------------------------------------------------------------------------

  async addTask(draft: TaskDraft): Promise<SyncResult<Task>> {
    const result = await this.sync.createTask(draft);
    if (result.type === 'success') this.showStatus(`Added task ${result.data.id}`);
    await this.settleStats();
    return result;
  }

  async toggleCompleted(id: TaskId): Promise<SyncResult<Task>> {
    const task = this.cache.findTask(id);
    if (!task) {
      const error = new ValidationError(`Task ${id} is not in the current list`, 'taskId');
      this.showStatus(`Error: ${error.message}`);
      return { type: 'invalid', error };
    }
    const result = await this.sync.updateTask(id, { completed: !task.completed });
    await this.settleStats();
    return result;
  }

  async editContent(id: TaskId, content: string): Promise<SyncResult<Task>> {
    const result = await this.sync.updateTask(id, { content });
    if (result.type === 'success') this.showStatus('Updated');
    await this.settleStats();
    return result;
  }

  async removeTask(id: TaskId): Promise<SyncResult<TaskId>> {
    const result = await this.sync.deleteTask(id);
    if (result.type === 'success') this.showStatus('Deleted');
    await this.settleStats();
    return result;
  }

  /** Called with the drag library's final index for the dropped row */
  async drop(taskId: TaskId, newIndex: number): Promise<SyncResult<DropOutcome>> {
    return this.reorder.onDrop(taskId, newIndex);
  }

  // ---------------------------------------------------------------------------
  // Selection intents
  // ---------------------------------------------------------------------------

  toggleSelection(id: TaskId): void {
    if (!this.cache.findTask(id)) return;
    this.selection.toggle(id);
    this.notify();
  }

  /** Mirrors the select-all checkbox: checked selects every rendered row */
  toggleSelectAll(checked: boolean): void {
    if (checked) this.selection.selectAll(this.cache.taskIds());
    else this.selection.clear();
    this.notify();
  }

  async completeSelected(): Promise<SyncResult<BatchOutcome>> {
    const result = await this.sync.batchUpdate(this.selection.ids(), { completed: true });
    if (result.type === 'success') this.showStatus(result.data.message);
    await this.settleStats();
    this.notify();
    return result;
  }

  async deleteSelected(): Promise<SyncResult<BatchOutcome>> {
    const result = await this.sync.batchDelete(this.selection.ids());
    if (result.type === 'success') this.showStatus(result.data.message);
    await this.settleStats();
    this.notify();
    return result;
  }

  // ---------------------------------------------------------------------------
  // Category intents
  // ---------------------------------------------------------------------------

  async addCategory(name: string, color?: string): Promise<SyncResult<Category>> {
    const result = await this.sync.createCategory(name, color);
    if (result.type === 'success') this.showStatus(`Created category "${result.data.name}"`);
    await this.settleStats();
    return result;
  }

  async removeCategory(id: CategoryId): Promise<SyncResult<CategoryId>> {
    const result = await this.sync.deleteCategory(id);
    if (result.type === 'success') this.showStatus('Category deleted');
    await this.settleStats();
    return result;
  }

  // ---------------------------------------------------------------------------
  // Statistics & status
  // ---------------------------------------------------------------------------

  async refreshStats(): Promise<StatsSnapshot> {
    this.statsStale = false;
    const result = await this.stats.refresh();
    if (result.type !== 'success') this.showStatus(`Error: ${result.error.message}`);
    this.notify();
    return this.stats.current();
  }

  showStatus(message: string): void {
    this.statusMessage = message;
    if (this.statusTimer) clearTimeout(this.statusTimer);
    this.statusTimer = undefined;
    if (message && this.statusTimeoutMs > 0) {
      const timer = setTimeout(() => {
        this.statusMessage = '';
        this.statusTimer = undefined;
        this.notify();
      }, this.statusTimeoutMs);
      // Node timers keep the process alive; browser hosts hand back a number
      if (typeof timer === 'object') timer.unref();
      this.statusTimer = timer;
    }
    this.notify();
  }

  private async settleStats(): Promise<void> {
    if (this.statsStale) await this.refreshStats();
  }

  private notify(): void {
    if (this.disposed) return;
    this.snapshot = this.buildSnapshot();
    for (const cb of [...this.listeners]) cb(this.snapshot);
  }

  private buildSnapshot(): BoardSnapshot {
    const tasks = this.cache.currentTasks();
    const categories = this.cache.currentCategories();
    const today = this.now();
    const count = this.selection.count();

    return {
      rows: tasks.map((task) => ({
        task,
        categoryName: categoryName(task, categories),
        categoryLink: categoryLink(task, categories),
        dueState: getDueState(task, today),
        selected: this.selection.has(task.id),
      })),
      categories,
      filter: this.filterUi,
      selection: {
        count,
        triState: this.selection.triState(tasks.length),
        batchEnabled: count > 0,
        completeLabel: batchLabel('Complete', count),
        deleteLabel: batchLabel('Delete', count),
      },
      stats: this.stats.current(),
      statusMessage: this.statusMessage,
      loading: this.loading,
    };
  }
}
