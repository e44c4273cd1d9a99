/**
 * Backoff and timeouts
 */

import { TaskTimeoutError } from "../types/errors.js";

export interface IBackoffOptions {
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

/**
 * Delay before the next attempt: `base × 2^(attempt − 1)`, capped.
 * `attempt` is the 1-based number of the attempt that just failed.
 */
export function backoffDelay(attempt: number, options: IBackoffOptions): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(options.baseDelayMs * Math.pow(2, exponent), options.maxDelayMs);
}

/**
 * Race a promise against a timer. The timer is cleared when the promise settles.
 * `onTimeout` runs before the rejection so callers can abort the underlying work.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  subject: string,
  onTimeout?: () => void,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout?.();
      reject(new TaskTimeoutError(subject, timeoutMs));
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
