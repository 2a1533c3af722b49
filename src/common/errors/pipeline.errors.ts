/**
 * Failure taxonomy for the registration and reconciliation pipeline.
 *
 * `scope` says how far a failure reaches: an `item` failure is recorded on the
 * product and the batch moves on, a `batch` failure stops the remaining queue.
 */
export type ErrorScope = 'item' | 'batch';

export abstract class PipelineError extends Error {
  abstract readonly code: string;
  abstract readonly scope: ErrorScope;
  abstract readonly retryable: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type ValidationCode =
  | 'MISSING_PRICE'
  | 'MISSING_CATEGORY'
  | 'MISSING_BRAND'
  | 'MISSING_IMAGES'
  | 'MISSING_VARIANTS'
  | 'UNKNOWN_VARIANT_OPTION';

export class ValidationError extends PipelineError {
  readonly scope = 'item';
  readonly retryable = false;

  constructor(
    readonly code: ValidationCode,
    message: string,
  ) {
    super(message);
  }
}

export class TransportError extends PipelineError {
  readonly code = 'TRANSPORT_ERROR';
  readonly scope = 'item';
  readonly retryable = true;
}

export class QuotaExhaustedError extends PipelineError {
  readonly code = 'QUOTA_EXHAUSTED';
  readonly scope = 'batch';
  readonly retryable = false;

  constructor(
    message: string,
    readonly window: string | null = null,
  ) {
    super(message);
  }
}

export class UnauthorizedMarketplaceError extends PipelineError {
  readonly code = 'MARKETPLACE_UNAUTHORIZED';
  readonly scope = 'batch';
  readonly retryable = false;
}

export interface FieldError {
  field: string;
  messages: string[];
}

export class RemoteRejectionError extends PipelineError {
  readonly code = 'REMOTE_REJECTION';
  readonly scope = 'item';
  readonly retryable = false;

  constructor(
    message: string,
    readonly fieldErrors: FieldError[],
  ) {
    super(message);
  }
}

export class AmbiguousWebhookError extends PipelineError {
  readonly code = 'AMBIGUOUS_WEBHOOK';
  readonly scope = 'item';
  readonly retryable = false;

  constructor(
    message: string,
    readonly eventType: string | null,
    readonly rawBody: unknown,
  ) {
    super(message);
  }
}

export class ConcurrentUpdateConflictError extends PipelineError {
  readonly code = 'CONCURRENT_UPDATE_CONFLICT';
  readonly scope = 'item';
  readonly retryable = true;

  constructor(
    readonly referenceNumber: string,
    readonly attempts: number,
  ) {
    super(`Product ${referenceNumber} changed underneath ${attempts} write attempt(s)`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
