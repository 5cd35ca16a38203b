// State machine
export type { DraftEvent, StatusEvent } from './state-machine.js';
export { transition, textEventFor } from './state-machine.js';

// Errors
export type { LifecycleErrorCode, GenerationKind } from './errors.js';
export {
  LifecycleError,
  NotFoundError,
  InvalidTransitionError,
  GenerationError,
  ProviderError,
  TimeoutError,
  isRetryableStatus,
  isTransientFailure,
} from './errors.js';

// Concurrency
export { KeyedMutex } from './keyed-mutex.js';

// Retry
export type { RetryPolicy, RetryOptions, RetryOutcome, AttemptContext } from './retry.js';
export { DEFAULT_RETRY_POLICY, runWithRetry, withTimeout, backoffDelay } from './retry.js';
