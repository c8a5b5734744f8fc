/**
 * Error taxonomy for the record cache.
 *
 * NotFound, AlreadyExists, Incomplete and decode failures are ordinary
 * results (undefined, 'already-exists', an `incomplete` or `decode-error`
 * assembly) rather than thrown errors.
 */

export type ErrorKind =
  | 'NetworkFailure'
  | 'StorageQuotaExceeded'
  | 'StorageError'
  | 'Cancelled';

export abstract class RadarCacheError extends Error {
  abstract readonly kind: ErrorKind;
}

export class NetworkFailureError extends RadarCacheError {
  readonly kind = 'NetworkFailure';
  /** HTTP status, when the server answered */
  status?: number;
  retryable: boolean;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'NetworkFailureError';
    this.status = status;
    this.retryable = status === undefined || status >= 500 || status === 429;
  }
}

export class StorageQuotaExceededError extends RadarCacheError {
  readonly kind = 'StorageQuotaExceeded';
  requiredBytes: number;
  budgetBytes: number;

  constructor(requiredBytes: number, budgetBytes: number) {
    super(`Storage quota exceeded: need ${requiredBytes} bytes, budget ${budgetBytes}`);
    this.name = 'StorageQuotaExceededError';
    this.requiredBytes = requiredBytes;
    this.budgetBytes = budgetBytes;
  }
}

export class StorageError extends RadarCacheError {
  readonly kind = 'StorageError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class CancelledError extends RadarCacheError {
  readonly kind = 'Cancelled';

  constructor(message = 'Cancelled') {
    super(message);
    // Same name fetch() uses on abort
    this.name = 'AbortError';
  }
}

export function isAbortError(err: unknown): boolean {
  if (err instanceof CancelledError) return true;
  return err instanceof Error && (err.name === 'AbortError' || err.message === 'Cancelled');
}

/**
 * Classify an arbitrary thrown value for task bookkeeping.
 */
export function errorKindOf(err: unknown): ErrorKind {
  if (err instanceof RadarCacheError) return err.kind;
  if (isAbortError(err)) return 'Cancelled';
  // fetch() rejects with TypeError on connection failures
  if (err instanceof TypeError) return 'NetworkFailure';
  return 'StorageError';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError();
}
