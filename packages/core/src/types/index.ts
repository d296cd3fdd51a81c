export { Priority, PriorityName, PriorityRank, PRIORITIES, DEFAULT_PRIORITY, isPriority } from './priority.js';
export type {
  TaskId, CategoryId, IsoDate, Task, Category, TaskDraft, TaskPatch, BatchPatch, OrderEntry,
} from './task.js';
export { MAX_CONTENT_LENGTH, MAX_CATEGORY_NAME_LENGTH, DEFAULT_CATEGORY_COLOR } from './task.js';
export type { FilterUiState, FilterSpec } from './filter.js';
export { EMPTY_FILTER_UI } from './filter.js';
export type { TaskStats, CategoryCount } from './stats.js';
export type { SyncResult, SyncFailure, BatchOutcome } from './results.js';
export { isSuccess, isReportable, success } from './results.js';
