import type { DraftStatus } from '@postroom/shared';
import type { DraftEvent } from './state-machine.js';

export type LifecycleErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'GENERATION_FAILED';

interface LifecycleErrorOptions {
  cause?: unknown;
}

export class LifecycleError extends Error {
  readonly code: LifecycleErrorCode;

  constructor(message: string, code: LifecycleErrorCode, options: LifecycleErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends LifecycleError {
  readonly draftId: string;

  constructor(draftId: string) {
    super(`Draft ${draftId} not found`, 'NOT_FOUND');
    this.draftId = draftId;
  }
}

export class InvalidTransitionError extends LifecycleError {
  readonly draftId: string;
  readonly from: DraftStatus;
  readonly event: DraftEvent;

  constructor(draftId: string, from: DraftStatus, event: DraftEvent) {
    super(`Draft ${draftId} cannot ${event} while ${from}`, 'INVALID_TRANSITION');
    this.draftId = draftId;
    this.from = from;
    this.event = event;
  }
}

export type GenerationKind = 'text' | 'image';

interface GenerationErrorOptions extends LifecycleErrorOptions {
  attempts: number;
  draftId?: string;
}

/** External generation exhausted its retries or failed permanently. */
export class GenerationError extends LifecycleError {
  readonly kind: GenerationKind;
  readonly attempts: number;
  readonly draftId?: string;

  constructor(kind: GenerationKind, message: string, options: GenerationErrorOptions) {
    super(message, 'GENERATION_FAILED', options);
    this.kind = kind;
    this.attempts = options.attempts;
    if (options.draftId !== undefined) {
      this.draftId = options.draftId;
    }
  }

  /** Same failure, tagged with the draft it happened for. */
  forDraft(draftId: string): GenerationError {
    return new GenerationError(this.kind, this.message, {
      attempts: this.attempts,
      draftId,
      cause: this.cause,
    });
  }
}

interface ProviderErrorOptions extends LifecycleErrorOptions {
  status?: number;
  retryable: boolean;
}

/**
 * Failure reported by a text or image provider adapter.
 * `retryable` is false for rejections that will fail again (invalid input, auth).
 */
export class ProviderError extends Error {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, options: ProviderErrorOptions) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ProviderError';
    this.retryable = options.retryable;
    if (options.status !== undefined) {
      this.status = options.status;
    }
  }
}

/** A single attempt ran past its deadline. */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

function readStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object' || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' ? status : undefined;
}

/** Map an HTTP status to retryability: 408, 429 and 5xx are transient. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Classify an arbitrary thrown value as transient (worth retrying) or permanent.
 * Unknown errors without a status are treated as network failures and retried.
 */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof ProviderError) return error.retryable;
  if (error instanceof TimeoutError) return true;
  if (error instanceof LifecycleError) return false;
  const status = readStatus(error);
  if (status !== undefined) return isRetryableStatus(status);
  return true;
}
