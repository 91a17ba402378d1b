/**
 * Deadlines for calls that may stall: shared cache round-trips and
 * credential resolution.
 */

export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/** Milliseconds */
export const TIMEOUTS = {
  CACHE: 50,
  AUTH: 5_000,
} as const;

/**
 * Settle with `work`, or reject with TimeoutError once `timeoutMs` passes.
 * The timer is cleared either way.
 */
export function withTimeout<T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
