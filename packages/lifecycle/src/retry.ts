import { TimeoutError, isTransientFailure } from './errors.js';

/** Retry behaviour for one kind of external call. */
export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before attempt n+1 is `backoffMs[n-1]`; the last entry repeats. */
  backoffMs: readonly number[];
  isRetryable: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: [1000, 3000, 9000],
  isRetryable: isTransientFailure,
};

export interface AttemptContext {
  attempt: number;
  signal: AbortSignal;
}

export interface RetryOptions {
  /** Per-attempt deadline. Exceeding it counts as a transient failure. */
  timeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  if (policy.backoffMs.length === 0) return 0;
  const index = Math.min(attempt - 1, policy.backoffMs.length - 1);
  return policy.backoffMs[index] ?? 0;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `task` with a deadline. The signal passed to the task is aborted when the
 * deadline passes so adapters can cancel their request.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run `task` under `policy`. Never throws: the outcome says whether a value was
 * produced and how many attempts it took, leaving error shaping to the caller.
 */
export async function runWithRetry<T>(
  policy: RetryPolicy,
  task: (ctx: AttemptContext) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown = new Error('No attempts were made');
  let attempt = 0;

  while (attempt < policy.maxAttempts) {
    attempt++;
    try {
      const value = await withTimeout(options.timeoutMs, (signal) => task({ attempt, signal }));
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = error;
      if (!policy.isRetryable(error) || attempt >= policy.maxAttempts) {
        break;
      }
      const delayMs = backoffDelay(policy, attempt);
      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
    }
  }

  return { ok: false, error: lastError, attempts: attempt };
}
