/**
 * Exponential backoff retry utilities.
 *
 * Used by the controller loop when applying traffic and replica targets:
 * within a tick via retryWithBackoff(), and across ticks via
 * computeBackoffDelay() on the persisted failure counter.
 */

export interface BackoffPolicy {
  /**
   * Delay used for the first retry attempt (in milliseconds).
   */
  initialDelayMs: number;
  /**
   * Maximum delay between attempts (in milliseconds).
   */
  maxDelayMs: number;
  /**
   * Exponential backoff multiplier applied after each attempt.
   */
  backoffMultiplier: number;
  /**
   * Optional jitter factor (0-1). Defaults to 0 (disabled).
   */
  jitter?: number;
}

export interface RetryConfig extends BackoffPolicy {
  /**
   * Maximum number of attempts (initial call + retries).
   */
  maxAttempts: number;
  /**
   * Optional abort signal to short circuit retry scheduling.
   */
  signal?: AbortSignal;
  /**
   * Decides whether an error is worth another attempt. Defaults to always.
   */
  shouldRetry?: (error: unknown) => boolean;
  /**
   * Optional callback invoked before each retry attempt.
   */
  onRetry?: (context: RetryAttemptContext) => void;
}

export interface RetryAttemptContext {
  attempt: number;
  delayMs: number;
  error: unknown;
}

/**
 * Error thrown when a retry loop is aborted via AbortSignal.
 */
export class RetryAbortedError extends Error {
  constructor(message = 'Retry aborted') {
    super(message);
    this.name = 'RetryAbortedError';
  }
}

/**
 * Delay before retry number `attempt` (1-based), capped at maxDelayMs.
 *
 * @example
 * ```typescript
 * computeBackoffDelay(1, { initialDelayMs: 100, maxDelayMs: 1000, backoffMultiplier: 2 }) // => 100
 * computeBackoffDelay(3, { initialDelayMs: 100, maxDelayMs: 1000, backoffMultiplier: 2 }) // => 400
 * computeBackoffDelay(9, { initialDelayMs: 100, maxDelayMs: 1000, backoffMultiplier: 2 }) // => 1000
 * ```
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, attempt - 1);
  const base = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, exponent);
  const capped = Number.isFinite(base) ? Math.min(policy.maxDelayMs, base) : policy.maxDelayMs;

  const jitter = Math.min(Math.max(policy.jitter ?? 0, 0), 1);
  if (jitter === 0) {
    return Math.round(capped);
  }

  // Randomize within ±jitter of the base delay
  return Math.floor(capped * (1 - jitter + 2 * jitter * Math.random()));
}

/**
 * Sleep helper aware of AbortSignal.
 */
async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return;
  }

  if (!signal) {
    await new Promise((resolve) => setTimeout(resolve, ms));
    return;
  }

  if (signal.aborted) {
    throw new RetryAbortedError();
  }

  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    const onAbort = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
      reject(new RetryAbortedError());
    };

    signal.addEventListener('abort', onAbort);
  });
}

/**
 * Execute an async function with retries and exponential backoff.
 *
 * @param fn - Async function to execute
 * @param config - Retry configuration
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  config: RetryConfig
): Promise<T> {
  if (config.maxAttempts < 1) {
    throw new Error('maxAttempts must be >= 1');
  }
  if (config.initialDelayMs < 0) {
    throw new Error('initialDelayMs must be >= 0');
  }
  if (config.maxDelayMs < config.initialDelayMs) {
    throw new Error('maxDelayMs must be >= initialDelayMs');
  }
  if (config.backoffMultiplier < 1) {
    throw new Error('backoffMultiplier must be >= 1');
  }

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    if (config.signal?.aborted) {
      throw new RetryAbortedError();
    }

    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) {
        break;
      }

      if (config.shouldRetry && !config.shouldRetry(error)) {
        break;
      }

      const delayMs = computeBackoffDelay(attempt, config);
      config.onRetry?.({ attempt, delayMs, error });

      await delay(delayMs, config.signal);
    }
  }

  throw lastError ?? new Error('Retry attempts exhausted with unknown error');
}
