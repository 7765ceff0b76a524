import { describe, it, expect } from 'vitest';
import type { CycleReport } from '@rebatemaker/types';
import { startInstrumentRun } from '../runner';
import { OrderManager } from '../order-manager';
import { QuotePricer } from '../quote-pricer';
import { StaticRewardsSource } from '../exchange/rewards';
import { VirtualScheduler } from './helpers/virtual-scheduler';
import { INSTRUMENT, OTHER_INSTRUMENT, seededExchange, silentLogger } from './helpers/fixtures';

function context() {
  const exchange = seededExchange();
  exchange.seedBook(OTHER_INSTRUMENT.tokenId, [
    { side: 'BUY', price: 0.6, size: 50 },
    { side: 'SELL', price: 0.7, size: 50 },
  ]);
  const logger = silentLogger();
  return {
    exchange,
    rewards: new StaticRewardsSource(),
    pricer: new QuotePricer(exchange, logger),
    orders: new OrderManager(exchange, logger),
    publisher: null,
    logger,
    scheduler: new VirtualScheduler(0),
    loop: { refreshIntervalMs: 30_000, recoveryIntervalMs: 5_000 },
    run: { riskAmount: 20, maxSpread: 0.03, durationMs: 60_000 },
  };
}

describe('startInstrumentRun', () => {
  it('should snapshot pnl after every cycle and after wind-down', async () => {
    const ctx = context();
    const run = startInstrumentRun(INSTRUMENT, ctx);
    run.loop.on('cycle', (report: CycleReport) => {
      if (report.cycle === 1 && report.buy.order) {
        ctx.exchange.fill(report.buy.order.id);
      }
    });

    const summary = await run.done;

    expect(summary.cycles).toBe(2);
    expect(run.tracker.getHistory().map((entry) => entry.realizedPnl)).toEqual([-4.2, -4.2, -4.2]);
    expect(ctx.orders.getLiveOrders(INSTRUMENT)).toEqual([]);
  });

  it('should run instruments side by side over one manager', async () => {
    const ctx = context();

    const runs = [startInstrumentRun(INSTRUMENT, ctx), startInstrumentRun(OTHER_INSTRUMENT, ctx)];
    const summaries = await Promise.all(runs.map((run) => run.done));

    expect(summaries.map((summary) => summary.instrument)).toEqual([INSTRUMENT, OTHER_INSTRUMENT]);
    expect(summaries.every((summary) => summary.errors === 0)).toBe(true);
    expect(ctx.orders.getLiveOrders(INSTRUMENT)).toEqual([]);
    expect(ctx.orders.getLiveOrders(OTHER_INSTRUMENT)).toEqual([]);
    expect(ctx.exchange.getRestingOrders()).toEqual([]);
  });

  it('should stop a run on request', async () => {
    const ctx = context();
    const run = startInstrumentRun(INSTRUMENT, { ...ctx, run: { ...ctx.run, durationMs: 3_600_000 } });
    run.loop.on('cycle', () => run.loop.stop());

    const summary = await run.done;

    expect(summary.cycles).toBe(1);
    expect(run.loop.getState()).toBe('DONE');
  });
});
