import type {
  CycleErrorEvent,
  CycleReport,
  Instrument,
  PnLSnapshot,
  RunSummary,
  StateChangeEvent,
} from '@rebatemaker/types';
import {
  RETRY_PROFILES,
  createLogger,
  instrumentKey,
  redactSecrets,
  retryWithBackoff,
  toErrorMessage,
} from '@rebatemaker/utils';
import type { Logger } from '@rebatemaker/utils';
import type { StrategyLoop } from '../strategy-loop';
import * as redisService from './redis';

/**
 * Pushes run events to Redis pub/sub for external dashboards.
 * Publishing is fire-and-forget from the loop's point of view: failures are
 * logged and never reach the run.
 */
export class RunPublisher {
  private pending = new Set<Promise<void>>();
  private logger: Logger;

  constructor(logger: Logger = createLogger({ service: 'publisher' })) {
    this.logger = logger;
  }

  /**
   * Publish a loop's events until the returned function is called
   */
  attach(loop: StrategyLoop): () => void {
    const onStateChange = (event: StateChangeEvent) => {
      this.track(redisService.CHANNELS.RUNS, { type: 'stateChange', ...event });
    };
    const onCycle = (report: CycleReport) => {
      this.track(redisService.CHANNELS.QUOTES(instrumentKey(report.instrument)), { type: 'cycle', ...report });
    };
    const onCycleError = (event: CycleErrorEvent) => {
      this.track(redisService.CHANNELS.RUNS, { type: 'cycleError', ...event });
    };
    const onDone = (summary: RunSummary) => {
      this.track(redisService.CHANNELS.RUNS, { type: 'done', ...summary });
    };

    loop.on('stateChange', onStateChange);
    loop.on('cycle', onCycle);
    loop.on('cycleError', onCycleError);
    loop.on('done', onDone);

    return () => {
      loop.off('stateChange', onStateChange);
      loop.off('cycle', onCycle);
      loop.off('cycleError', onCycleError);
      loop.off('done', onDone);
    };
  }

  /**
   * Publish a PnL snapshot and keep it as the instrument's latest
   */
  async publishSnapshot(runId: string, instrument: Instrument, snapshot: PnLSnapshot): Promise<void> {
    const key = instrumentKey(instrument);
    const message = { type: 'pnl', runId, instrument: key, ...snapshot };

    await Promise.all([
      this.send(redisService.CHANNELS.PNL(key), message),
      this.attemptRedis('cacheLatestPnl', () => redisService.cacheLatestPnl(key, message)),
    ]);
  }

  /**
   * Wait for every publish started so far
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private track(channel: string, message: Record<string, unknown>): void {
    const task: Promise<void> = this.send(channel, message).finally(() => {
      this.pending.delete(task);
    });
    this.pending.add(task);
  }

  private async send(channel: string, message: Record<string, unknown>): Promise<void> {
    await this.attemptRedis(channel, () => redisService.publish(channel, message));
  }

  private async attemptRedis(target: string, fn: () => Promise<unknown>): Promise<void> {
    const result = await retryWithBackoff(fn, RETRY_PROFILES.REDIS);
    if (!result.success) {
      this.logger.warn(
        { target, attempts: result.attempts, error: redactSecrets(toErrorMessage(result.error)) },
        'Failed to publish run event'
      );
    }
  }
}
