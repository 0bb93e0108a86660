/**
 * Async Utilities
 *
 * Timeout racing, delays and a serial task queue shared by the session
 * manager, the API client and the loader.
 */

/**
 * Race a promise against a timer. The timer is always cleared.
 *
 * @param promise - Work to bound
 * @param timeoutMs - Timeout in milliseconds
 * @param onTimeout - Builds the rejection reason when the timer fires
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => reject(onTimeout()), timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Resolve after the given number of milliseconds.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs submitted tasks one at a time, in submission order.
 *
 * A failed task does not poison the queue: the next task still runs.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  /**
   * Number of tasks submitted but not yet settled
   */
  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result.finally(() => {
      this.pending--;
    });
  }
}
