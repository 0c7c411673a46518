import { setTimeout as delay } from 'node:timers/promises';

export interface RetryOptions {
  /** Extra attempts after the first one. */
  retries: number;
  backoffMs: number;
  timeoutMs: number;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(`Gave up after ${attempts} attempt${attempts === 1 ? '' : 's'}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class AttemptTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

async function attemptWithTimeout<T>(fn: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AttemptTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs `fn` with a per-attempt timeout. Failed attempts are retried with
 * exponential backoff (`backoffMs`, then doubled) unless `shouldRetry` says no.
 */
export async function withRetry<T>(fn: (signal: AbortSignal) => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const maxAttempts = Math.max(1, Math.floor(options.retries) + 1);

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await attemptWithTimeout(fn, options.timeoutMs);
    } catch (error) {
      lastError = error;
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable) throw new RetryExhaustedError(attempt, error);
      if (attempt < maxAttempts) await sleep(options.backoffMs * 2 ** (attempt - 1));
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}
