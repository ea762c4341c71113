/**
 * Write/read deadlines for socket operations.
 *
 * A deadline is the only timeout mechanism on a connection: when one fires the
 * operation is abandoned and the connection is torn down by its owner.
 */

export class DeadlineExceededError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} did not complete within ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race `fn` against a timer. The timer is always cleared, whichever side wins.
 *
 * @throws DeadlineExceededError if the timer fires first
 */
export async function withDeadline<T>(
  operation: string,
  fn: () => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new DeadlineExceededError(operation, timeoutMs));
      }, timeoutMs);
    });

    return await Promise.race([fn(), deadline]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}

/**
 * Sleep that ends early when the signal aborts.
 * Resolves true if the full delay elapsed, false if it was cut short.
 */
export function delay(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
