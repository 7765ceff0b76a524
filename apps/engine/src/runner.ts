import type { Instrument, RunSummary } from '@rebatemaker/types';
import { createChildLogger, formatPnl, instrumentKey } from '@rebatemaker/utils';
import type { Logger, RunParamsInput, Scheduler } from '@rebatemaker/utils';
import type { ExchangeClient, RewardsSource } from './exchange/types';
import type { OrderManager } from './order-manager';
import { PnLTracker } from './pnl-tracker';
import type { QuotePricer } from './quote-pricer';
import type { RunPublisher } from './services/publisher';
import { StrategyLoop } from './strategy-loop';
import type { StrategyLoopConfig } from './strategy-loop';

export interface RunnerContext {
  exchange: ExchangeClient;
  rewards: RewardsSource;
  pricer: QuotePricer;
  orders: OrderManager;
  publisher: RunPublisher | null;
  logger: Logger;
  scheduler?: Scheduler;
  loop: Partial<StrategyLoopConfig>;
  run: RunParamsInput;
}

/**
 * A started instrument run: its loop (for stop requests) and its outcome
 */
export interface InstrumentRun {
  instrument: Instrument;
  loop: StrategyLoop;
  tracker: PnLTracker;
  done: Promise<RunSummary>;
}

/**
 * Start one strategy run, snapshotting PnL after every cycle and once more
 * after wind-down
 */
export function startInstrumentRun(instrument: Instrument, context: RunnerContext): InstrumentRun {
  const logger = createChildLogger(context.logger, { instrument: instrumentKey(instrument) });
  const loop = new StrategyLoop(
    {
      pricer: context.pricer,
      orders: context.orders,
      scheduler: context.scheduler,
      logger,
    },
    context.loop
  );
  const tracker = new PnLTracker(context.exchange, context.rewards, {
    market: instrument.marketId,
    assetId: instrument.tokenId,
    logger,
  });

  const recordPnl = async (): Promise<void> => {
    const snapshot = await tracker.snapshot();
    const run = loop.getRun();
    if (!snapshot || !run) return;

    logger.info(
      { realized: formatPnl(snapshot.realizedPnl), total: formatPnl(snapshot.totalPnl) },
      'PnL updated'
    );
    await context.publisher?.publishSnapshot(run.runId, instrument, snapshot);
  };

  // snapshots run one after another, in cycle order
  let snapshots: Promise<void> = Promise.resolve();
  loop.on('cycle', () => {
    snapshots = snapshots.then(recordPnl);
  });

  const detach = context.publisher?.attach(loop);

  const done = (async () => {
    try {
      const { riskAmount, maxSpread, durationMs } = context.run;
      const summary = await loop.run(instrument, riskAmount, maxSpread, durationMs);
      await snapshots;
      await recordPnl();
      return summary;
    } finally {
      detach?.();
    }
  })();

  return { instrument, loop, tracker, done };
}
