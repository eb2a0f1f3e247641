import { sleep } from './utils.js';

export type RetryOptions = {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Delay before the first retry, doubled on each further retry (default: 100) */
  baseDelayMs?: number;
  /** Upper bound for a single delay (default: 5000) */
  maxDelayMs?: number;
  /** Jitter factor 0-1 (default: 0.1) */
  jitter?: number;
  /** Fails a single attempt that has not settled in time; unset means no limit */
  attemptTimeoutMs?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
};

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} attempt(s): ${lastError instanceof Error ? lastError.message : String(lastError)}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
  }
}

export class AttemptTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Attempt did not settle within ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

const withinTimeout = <T>(fn: () => Promise<T>, timeoutMs: number | undefined): Promise<T> => {
  if (timeoutMs === undefined) return fn();

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new AttemptTimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([fn(), timeout]).finally(() => clearTimeout(timer));
};

export const backoffDelay = (retry: number, baseDelayMs: number, maxDelayMs: number, jitter: number): number => {
  const delay = Math.min(baseDelayMs * 2 ** retry, maxDelayMs);
  if (jitter <= 0) return delay;
  return Math.max(0, delay + delay * jitter * (Math.random() * 2 - 1));
};

/**
 * Runs `fn` until it resolves, retrying with exponential backoff.
 * @throws RetryExhaustedError once the budget is spent, or the thrown error when it is not retryable
 */
export const withRetry = async <T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> => {
  const {
    maxRetries = 3,
    baseDelayMs = 100,
    maxDelayMs = 5000,
    jitter = 0.1,
    attemptTimeoutMs,
    isRetryable = () => true,
    onRetry,
  } = options;

  let attempt = 0;
  for (;;) {
    try {
      return await withinTimeout(fn, attemptTimeoutMs);
    } catch (error) {
      attempt++;
      if (!isRetryable(error)) throw error;
      if (attempt > maxRetries) throw new RetryExhaustedError(attempt, error);

      const delay = backoffDelay(attempt - 1, baseDelayMs, maxDelayMs, jitter);
      onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
};
