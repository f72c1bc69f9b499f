export type InsightsErrorKind =
  | 'InvalidArgument'
  | 'AcquisitionTimeout'
  | 'AcquisitionFailed'
  | 'NotFound'
  | 'TransientFailure'
  | 'StorageFailure';

/**
 * Base class for every failure the insights core raises on purpose.
 * The global exception filter renders `kind` and `message`, never the stack.
 */
export abstract class InsightsError extends Error {
  abstract readonly kind: InsightsErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends InsightsError {
  readonly kind = 'InvalidArgument';
}

/** Raised inside the orchestrator only; it triggers the synthetic path. */
export class AcquisitionTimeoutError extends InsightsError {
  readonly kind = 'AcquisitionTimeout';

  constructor(
    readonly identifier: string,
    readonly timeoutMs: number,
  ) {
    super(`Live acquisition for '${identifier}' timed out after ${timeoutMs}ms`);
  }
}

export class AcquisitionFailedError extends InsightsError {
  readonly kind = 'AcquisitionFailed';
}

export class NotFoundError extends InsightsError {
  readonly kind = 'NotFound';
}

export class PageNotFoundError extends NotFoundError {
  constructor(readonly identifier: string) {
    super(`Page '${identifier}' has not been acquired`);
  }
}

/** Retryable: the same request may succeed later. */
export class TransientFailureError extends InsightsError {
  readonly kind = 'TransientFailure';
}

export class StorageFailureError extends InsightsError {
  readonly kind = 'StorageFailure';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
