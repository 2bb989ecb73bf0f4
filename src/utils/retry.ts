/**
 * Retry utilities.
 *
 * Fixed or exponential backoff around an async operation, retrying only the
 * error codes the caller lists. Used for the liveness gate at instance start,
 * where the service refuses connections until its HTTP server is up.
 */

export interface RetryConfig {
  /**
   * Maximum number of attempts (initial call + retries).
   */
  maxAttempts: number;
  /**
   * Delay used for the first retry attempt (in milliseconds).
   */
  initialDelayMs: number;
  /**
   * Maximum delay between attempts (in milliseconds).
   */
  maxDelayMs: number;
  /**
   * Backoff multiplier applied after each attempt. 1 keeps the interval fixed.
   */
  backoffMultiplier: number;
  /**
   * List of retryable error identifiers (case insensitive): error codes,
   * error names, or `TIMEOUT` for timed-out requests.
   */
  retryableErrors: string[];
  /**
   * Optional abort signal to short circuit retry scheduling.
   */
  signal?: AbortSignal;
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

function retryTokens(error: unknown): string[] {
  const tokens: string[] = [];
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string' || typeof code === 'number') {
      tokens.push(String(code));
    }
  }
  if (error instanceof Error) {
    tokens.push(error.name);
    if (/(?:timeout|timed\s+out)/i.test(error.message)) {
      tokens.push('TIMEOUT');
    }
  }
  return tokens;
}

/**
 * Determine whether an error should be retried.
 *
 * @param error - The error thrown from the previous attempt
 * @param retryableSet - An upper-cased set of retryable identifiers
 */
export function isRetryableError(error: unknown, retryableSet: ReadonlySet<string>): boolean {
  if (!retryableSet.size || error instanceof RetryAbortedError) {
    return false;
  }

  return retryTokens(error).some((token) => retryableSet.has(token.toUpperCase()));
}

/**
 * Sleep helper aware of AbortSignal.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
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

function nextDelay(current: number, multiplier: number, max: number): number {
  if (!Number.isFinite(current) || current < 0) {
    return max;
  }
  return Math.min(max, Math.max(current, Math.round(current * multiplier)));
}

/**
 * Execute an async function with retries.
 *
 * @param fn - Async function to execute; receives the 1-based attempt number
 * @param config - Retry configuration
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
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

  const retryableSet = new Set(config.retryableErrors.map((token) => token.toUpperCase()));

  let attempt = 0;
  let delayMs = config.initialDelayMs;
  let lastError: unknown;

  while (attempt < config.maxAttempts) {
    attempt += 1;

    if (config.signal?.aborted) {
      throw new RetryAbortedError();
    }

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts || !isRetryableError(error, retryableSet)) {
        break;
      }

      config.onRetry?.({ attempt, delayMs, error });

      await sleep(delayMs, config.signal);

      delayMs = nextDelay(delayMs, config.backoffMultiplier, config.maxDelayMs);
    }
  }

  throw lastError ?? new Error('Retry attempts exhausted with unknown error');
}
