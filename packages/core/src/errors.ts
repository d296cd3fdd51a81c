/**
 * Error taxonomy for the session store.
 *
 * Validation errors are raised before any request is sent. Network and server
 * errors leave local state exactly as it was. Stale responses are discarded
 * without being shown to the user.
 */

export type ErrorKind = 'validation' | 'network' | 'server' | 'stale';

export abstract class TaskdockError extends Error {
  abstract readonly kind: ErrorKind;
}

export class ValidationError extends TaskdockError {
  readonly kind = 'validation';

  constructor(message: string, readonly field?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Transport failure, including timeouts */
export class NetworkError extends TaskdockError {
  readonly kind = 'network';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/** Non-2xx response, or a 2xx body that does not match the expected shape */
export class ServerError extends TaskdockError {
  readonly kind = 'server';

  constructor(
    message: string,
    readonly status: number,
    /** Ids the server reported as missing when it rejected a batch */
    readonly missingIds: readonly number[] = [],
  ) {
    super(message);
    this.name = 'ServerError';
  }
}

export class StaleResponseError extends TaskdockError {
  readonly kind = 'stale';

  constructor(readonly sequence: number, readonly latest: number) {
    super(`Response #${sequence} superseded by request #${latest}`);
    this.name = 'StaleResponseError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
