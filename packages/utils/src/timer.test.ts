import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { sleep, cancellableSleep, sleepUntilNext, type Scheduler } from './timer';

describe('timer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('sleep', () => {
    it('resolves after the delay', async () => {
      const callback = vi.fn();
      const promise = sleep(100).then(callback);

      await vi.advanceTimersByTimeAsync(50);
      expect(callback).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(50);
      await promise;
      expect(callback).toHaveBeenCalled();
    });
  });

  describe('cancellableSleep', () => {
    it('resolves true when the full delay elapses', async () => {
      const promise = cancellableSleep(1000);
      await vi.advanceTimersByTimeAsync(1000);
      await expect(promise).resolves.toBe(true);
    });

    it('resolves false as soon as the signal aborts', async () => {
      const controller = new AbortController();
      const promise = cancellableSleep(30_000, controller.signal);

      await vi.advanceTimersByTimeAsync(10);
      controller.abort();

      await expect(promise).resolves.toBe(false);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('resolves false immediately for an already aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(cancellableSleep(30_000, controller.signal)).resolves.toBe(false);
    });
  });

  describe('sleepUntilNext', () => {
    function virtualScheduler(start: number): Scheduler & { slept: number[] } {
      let time = start;
      const slept: number[] = [];
      return {
        slept,
        now: () => time,
        sleep: async (ms) => {
          slept.push(ms);
          time += ms;
          return true;
        },
      };
    }

    it('waits the full interval when the deadline is far away', async () => {
      const scheduler = virtualScheduler(0);
      await expect(sleepUntilNext(scheduler, 30_000, 100_000)).resolves.toBe(true);
      expect(scheduler.slept).toEqual([30_000]);
    });

    it('never waits past the deadline', async () => {
      const scheduler = virtualScheduler(90_000);
      await expect(sleepUntilNext(scheduler, 30_000, 100_000)).resolves.toBe(false);
      expect(scheduler.slept).toEqual([10_000]);
    });

    it('does not wait once the deadline has passed', async () => {
      const scheduler = virtualScheduler(100_000);
      await expect(sleepUntilNext(scheduler, 30_000, 100_000)).resolves.toBe(false);
      expect(scheduler.slept).toEqual([]);
    });
  });
});
