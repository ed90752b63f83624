/**
 * @lumberline/core - Retry Policy
 *
 * Bounded exponential backoff for sink writes.
 *
 * @module infrastructure/exporter/RetryPolicy
 */

/**
 * Retry policy configuration options.
 *
 * @example
 * ```typescript
 * const policy = new RetryPolicy({
 *   maxRetries: 3,
 *   delay: 50,
 *   maxDelay: 2000,
 *   onRetry: (error, retry) => logger.warn(`retry ${retry}`, error),
 * });
 * ```
 */
export interface RetryPolicyOptions {
  /**
   * Retries after the initial attempt.
   * @defaultValue 3
   */
  maxRetries?: number;

  /**
   * Delay before the first retry in milliseconds.
   * @defaultValue 50
   */
  delay?: number;

  /**
   * Maximum delay between retries in milliseconds.
   * @defaultValue 2000
   */
  maxDelay?: number;

  /**
   * Multiplier for exponential backoff.
   * @defaultValue 2
   */
  backoffMultiplier?: number;

  /**
   * Callback invoked before each retry.
   */
  onRetry?: (error: unknown, retryNumber: number, delay: number) => void;

  /**
   * Abort signal; an aborted policy stops retrying and rethrows.
   */
  signal?: AbortSignal;
}

/**
 * Result of a policy execution.
 */
export type RetryOutcome<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: number }
  | { readonly ok: false; readonly error: unknown; readonly attempts: number };

/**
 * RetryPolicy - runs an operation, retrying failures with backoff.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  private readonly delay: number;
  private readonly maxDelay: number;
  private readonly multiplier: number;
  private readonly onRetry?: RetryPolicyOptions['onRetry'];
  private readonly signal?: AbortSignal;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxRetries = Math.max(0, options.maxRetries ?? 3);
    this.delay = Math.max(0, options.delay ?? 50);
    this.maxDelay = Math.max(this.delay, options.maxDelay ?? 2000);
    this.multiplier = Math.max(1, options.backoffMultiplier ?? 2);
    this.onRetry = options.onRetry;
    this.signal = options.signal;
  }

  /**
   * Delay before retry number `retry` (1-indexed), capped at `maxDelay`.
   */
  delayFor(retry: number): number {
    return Math.min(
      this.maxDelay,
      this.delay * Math.pow(this.multiplier, retry - 1),
    );
  }

  /**
   * Execute `operation`, retrying up to `maxRetries` times.
   *
   * Never throws: the outcome reports success or the last error.
   */
  async execute<T>(operation: () => Promise<T>): Promise<RetryOutcome<T>> {
    let attempts = 0;
    let lastError: unknown;

    while (attempts <= this.maxRetries) {
      attempts++;
      try {
        const value = await operation();
        return { ok: true, value, attempts };
      } catch (error) {
        lastError = error;

        if (attempts > this.maxRetries || this.signal?.aborted) {
          break;
        }

        const wait = this.delayFor(attempts);
        this.onRetry?.(error, attempts, wait);
        await sleep(wait, this.signal);
      }
    }

    return { ok: false, error: lastError, attempts };
  }
}

/**
 * Wait `ms` milliseconds; resolves early when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Wait for `promise` at most `ms` milliseconds.
 *
 * @returns False if the time ran out first
 */
export async function settlesWithin(
  promise: Promise<unknown>,
  ms: number,
): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}
