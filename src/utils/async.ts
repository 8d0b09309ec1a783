/**
 * Async Utility Functions
 *
 * Provides the async patterns shared by the fetch and publish paths:
 * sleeping, bounded retries, cooperative cancellation and bounded
 * concurrency.
 *
 * @module
 */

// =============================================================================
// Sleep
// =============================================================================

/**
 * Returns a promise that resolves after the specified duration.
 *
 * @param ms - Duration in milliseconds
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry
// =============================================================================

/**
 * Bounded exponential backoff policy
 */
export interface RetryPolicy {
  /** Maximum number of attempts (including initial attempt) */
  maxAttempts: number;
  /** Initial delay between retries in milliseconds */
  initialDelayMs: number;
  /** Maximum delay between retries in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffFactor: number;
}

/**
 * Options for a single retried call
 */
export interface RetryOptions {
  /** Predicate deciding whether an error is worth another attempt */
  retryIf?: (error: unknown) => boolean;
  /** Called before each wait, with the attempt that just failed */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffFactor: 2,
};

/**
 * Thrown by {@link retry} once an operation gives up.
 * Carries the last cause and how many attempts were made.
 */
export class RetryExhaustedError extends Error {
  constructor(
    readonly lastError: unknown,
    readonly attempts: number
  ) {
    super(
      lastError instanceof Error
        ? lastError.message
        : `Operation failed after ${attempts} attempt(s)`
    );
    this.name = "RetryExhaustedError";
  }
}

/**
 * Delay before the attempt following `attempt` (1-based).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.initialDelayMs * Math.pow(policy.backoffFactor, attempt - 1);
  return Math.min(raw, policy.maxDelayMs);
}

/**
 * Retries a function with exponential backoff.
 *
 * Non-retryable errors and exhausted attempts both reject with a
 * {@link RetryExhaustedError} so callers always learn the attempt count.
 *
 * @param fn - The async function to retry, given the 1-based attempt number
 * @param policy - Backoff schedule
 * @param options - Retry predicate and notification hook
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (options.retryIf && !options.retryIf(error)) {
        throw new RetryExhaustedError(error, attempt);
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(error, attempt);
      }

      const delay = backoffDelay(policy, attempt);
      options.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * Raised by {@link CancellationToken.throwIfCancelled}.
 */
export class CancelledError extends Error {
  constructor(reason?: string) {
    super(reason ?? "Operation cancelled");
    this.name = "CancelledError";
  }
}

/**
 * A token that can be used to cancel async operations.
 * Follows the cancellation token pattern for cooperative cancellation.
 */
export class CancellationToken {
  private _cancelled = false;
  private _reason?: string;
  private listeners: Array<() => void> = [];

  /** A token that is never cancelled */
  static readonly none: CancellationToken = new CancellationToken();

  /** Whether the token has been cancelled */
  get cancelled(): boolean {
    return this._cancelled;
  }

  /** The reason for cancellation (if any) */
  get reason(): string | undefined {
    return this._reason;
  }

  /**
   * Cancels the token, notifying all listeners.
   */
  cancel(reason?: string): void {
    if (this === CancellationToken.none) return;
    if (!this._cancelled) {
      this._cancelled = true;
      this._reason = reason;
      this.listeners.forEach((fn) => fn());
      this.listeners = [];
    }
  }

  /**
   * Registers a callback to be called when the token is cancelled.
   * If already cancelled, the callback is invoked immediately.
   *
   * @returns Unsubscribe function
   */
  onCancel(fn: () => void): () => void {
    if (this._cancelled) {
      fn();
      return () => {};
    }
    this.listeners.push(fn);
    return () => {
      const idx = this.listeners.indexOf(fn);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  /**
   * Throws if the token has been cancelled.
   * Use this for cooperative cancellation checks.
   */
  throwIfCancelled(): void {
    if (this._cancelled) {
      throw new CancelledError(this._reason);
    }
  }
}

/**
 * A CancellationToken source that owns and can cancel a token.
 */
export class CancellationTokenSource {
  readonly token: CancellationToken;

  constructor() {
    this.token = new CancellationToken();
  }

  cancel(reason?: string): void {
    this.token.cancel(reason);
  }
}

// =============================================================================
// Concurrency
// =============================================================================

/**
 * Runs an async function over items with a concurrency limit.
 * Results keep the order of `items`.
 *
 * @param items - Items to process
 * @param fn - Async function to apply to each item
 * @param concurrency - Maximum concurrent operations
 */
export async function mapConcurrent<T, U>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<U>,
  concurrency: number
): Promise<U[]> {
  const results: U[] = new Array<U>(items.length);
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      results[index] = await fn(items[index]!, index);
    }
  }

  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    () => worker()
  );

  await Promise.all(workers);
  return results;
}
