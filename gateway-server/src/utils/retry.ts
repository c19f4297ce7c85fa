import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface FixedDelayRetryOptions {
  attempts: number;
  delayMs: number;
  sleep?: Sleep;
  // Return false to stop retrying and rethrow immediately
  shouldRetry?: (error: unknown) => boolean;
  onAttemptFailed?: (attempt: number, attempts: number, error: unknown) => void;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Gave up after ${attempts} attempts`, { cause });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

/**
 * Run `operation` until it succeeds or the attempt budget is spent, waiting a
 * fixed delay between attempts (never after the last one).
 */
export async function retryWithFixedDelay<T>(
  operation: (attempt: number) => Promise<T>,
  options: FixedDelayRetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (options.shouldRetry && !options.shouldRetry(error)) {
        throw error;
      }

      options.onAttemptFailed?.(attempt, options.attempts, error);

      if (attempt < options.attempts) {
        await wait(options.delayMs);
      }
    }
  }

  throw new RetryExhaustedError(options.attempts, lastError);
}
