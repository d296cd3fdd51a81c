export { EntityCache } from './entity-cache.js';
export type { CacheChange } from './entity-cache.js';
export { SelectionTracker } from './selection-tracker.js';
export type { TriState } from './selection-tracker.js';
export { buildFilterSpec, toSearchParams, isEmptyFilter } from './query-builder.js';
export { HttpTransport } from './http.js';
export type { FetchLike, HttpMethod, HttpTransportOptions } from './http.js';
export { SyncClient } from './sync-client.js';
export type { MutationKind, MutationEvent, ReportedError, SyncClientOptions } from './sync-client.js';
export {
  ReorderCoordinator, ORDER_STEP, moveItem, orderBetween, rebalancedOrders, placeInServerOrder,
} from './reorder-coordinator.js';
export type { DropOutcome } from './reorder-coordinator.js';
export {
  StatisticsView, computeStats, completionRate, NO_CATEGORY_LABEL, NO_CATEGORY_COLOR,
} from './statistics.js';
export type { StatsSnapshot, StatsSource } from './statistics.js';
export {
  validateDraft, validatePatch, validateBatch, validateCategoryName,
} from './validation.js';
export { TaskBoard } from './task-board.js';
export type { TaskBoardOptions, BoardSnapshot, TaskRow, SelectionView } from './task-board.js';
