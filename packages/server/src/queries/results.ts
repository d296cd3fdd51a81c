import type { TaskId } from '@taskdock/core/types';

/** Outcome of a write query; routes map each failure variant to a status code */
export type QueryResult<T> =
  | { type: 'success'; data: T }
  | { type: 'invalid'; message: string }
  | { type: 'not-found'; message: string; missingIds: TaskId[] };

export type QueryFailure = Exclude<QueryResult<never>, { type: 'success' }>;

export function ok<T>(data: T): QueryResult<T> {
  return { type: 'success', data };
}

export function invalid(message: string): QueryFailure {
  return { type: 'invalid', message };
}

export function notFound(message: string, missingIds: TaskId[] = []): QueryFailure {
  return { type: 'not-found', message, missingIds };
}
