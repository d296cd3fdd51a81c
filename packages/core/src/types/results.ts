import type { ValidationError, NetworkError, ServerError, StaleResponseError } from '../errors.js';

/** Outcome of every remote operation. Operations never throw. */
export type SyncResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'invalid'; readonly error: ValidationError }
  | { readonly type: 'failed'; readonly error: NetworkError | ServerError }
  | { readonly type: 'stale'; readonly error: StaleResponseError };

export type SyncFailure = Exclude<SyncResult<never>, { type: 'success' }>;

export interface BatchOutcome {
  readonly message: string;
  readonly affected: number;
}

// Helper functions
export function isSuccess<T>(r: SyncResult<T>): r is { readonly type: 'success'; readonly data: T } {
  return r.type === 'success';
}

/** Failures the user should hear about; stale responses are dropped silently */
export function isReportable<T>(r: SyncResult<T>): r is Extract<SyncResult<T>, { type: 'invalid' | 'failed' }> {
  return r.type === 'invalid' || r.type === 'failed';
}

export function success<T>(data: T): SyncResult<T> {
  return { type: 'success', data };
}
