/**
 * Timers the strategy loop waits on. Every wait can be cut short by an AbortSignal,
 * so a stop request or an expired run deadline is observed without waiting out
 * a full refresh interval.
 */

/**
 * Sleep for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep until `ms` elapses or `signal` aborts, whichever comes first.
 * Resolves `true` when the full delay elapsed, `false` when aborted.
 */
export function cancellableSleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Clock and wait primitives, injectable so loops can run on virtual time in tests
 */
export interface Scheduler {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<boolean>;
}

export const systemScheduler: Scheduler = {
  now: () => Date.now(),
  sleep: cancellableSleep,
};

/**
 * Wait `intervalMs`, but never past `deadline`. Returns false when the wait was
 * aborted or the deadline has been reached.
 */
export async function sleepUntilNext(
  scheduler: Scheduler,
  intervalMs: number,
  deadline: number,
  signal?: AbortSignal
): Promise<boolean> {
  const remaining = deadline - scheduler.now();
  if (remaining <= 0) {
    return false;
  }
  const completed = await scheduler.sleep(Math.min(intervalMs, remaining), signal);
  return completed && scheduler.now() < deadline;
}
