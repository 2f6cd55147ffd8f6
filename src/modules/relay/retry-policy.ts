import { delay, toError } from '../../utils/common';

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number };

export type Sleep = (ms: number) => Promise<void>;

/**
 * Fixed backoff, bounded number of attempts. `prepareRetry` runs before every
 * attempt after the first; if it throws, that attempt counts as failed.
 */
export class BoundedRetryPolicy {
  constructor(
    readonly maxAttempts = 2,
    readonly backoffMs = 500,
    private readonly wait: Sleep = delay,
  ) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
  }

  async run<T>(
    attempt: (attemptNumber: number) => Promise<T>,
    prepareRetry?: (attemptNumber: number, lastError: Error) => Promise<void>,
  ): Promise<RetryOutcome<T>> {
    let lastError = new Error('No attempt made');

    for (let attemptNumber = 1; attemptNumber <= this.maxAttempts; attemptNumber++) {
      try {
        if (attemptNumber > 1) {
          await this.wait(this.backoffMs);
          if (prepareRetry) {
            await prepareRetry(attemptNumber, lastError);
          }
        }
        const value = await attempt(attemptNumber);
        return { ok: true, value, attempts: attemptNumber };
      } catch (error) {
        lastError = toError(error);
      }
    }

    return { ok: false, error: lastError, attempts: this.maxAttempts };
  }
}
