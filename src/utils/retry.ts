/**
* retry.ts
*
* Fixed-delay, bounded-attempt retry combinator shared by every remote call in
* the pipeline. The caller decides which failures are worth another attempt
* through `isRetryable`; anything else escalates on the spot without
* consuming the remaining budget.
*/

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  /** Total number of attempts, including the first one. */
  attempts: number;
  /** Fixed pause between two attempts, in milliseconds. */
  delayMs: number;
}

export interface RetryAttemptInfo {
  /** 1-based number of the attempt that just failed. */
  attempt: number;
  error: unknown;
  delayMs: number;
}

export interface RetryOptions extends RetryPolicy {
  isRetryable: (err: unknown) => boolean;
  /** Called after a retryable failure, before sleeping. */
  onRetry?: (info: RetryAttemptInfo) => void;
  /** Injectable for tests; defaults to a `setTimeout` based sleep. */
  sleep?: (ms: number) => Promise<void>;
}

/**
* Raised once the combinator gives up. Carries the last underlying failure and
* the number of attempts made; `exhausted` is false when the failure was
* classified non-retryable.
*/
export class RetryError extends Error {
  constructor(
    readonly lastError: unknown,
    readonly attempts: number,
    readonly exhausted: boolean,
  ) {
    super(
      exhausted
        ? `Operation failed after ${attempts} attempt(s)`
        : `Operation failed with a non-retryable error on attempt ${attempts}`,
    );
    this.name = 'RetryError';
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** First call plus three retries, five seconds apart. */
export const DEFAULT_RETRY_POLICY: RetryPolicy = { attempts: 4, delayMs: 5_000 };

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(operation: () => Promise<T>, opts: RetryOptions): Promise<T> {
  if (!Number.isInteger(opts.attempts)) {
    throw new RangeError(`attempts must be an integer, got ${opts.attempts}`);
  }
  if (!Number.isFinite(opts.delayMs)) {
    throw new RangeError(`delayMs must be a finite number, got ${opts.delayMs}`);
  }

  const maxAttempts = Math.max(opts.attempts, 1);
  const delayMs = Math.max(opts.delayMs, 0);
  const pause = opts.sleep ?? sleep;

  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    attempt += 1;
    try {
      return await operation();
    } catch (err) {
      if (!opts.isRetryable(err)) {
        throw new RetryError(err, attempt, false);
      }
      if (attempt >= maxAttempts) {
        throw new RetryError(err, attempt, true);
      }

      opts.onRetry?.({ attempt, error: err, delayMs });
      await pause(delayMs);
    }
  }
}
