import { EventEmitter } from 'events';
import type {
  CycleErrorEvent,
  CycleReport,
  Instrument,
  OrderSide,
  QuotePlacement,
  RunSummary,
  StateChangeEvent,
  StrategyState,
} from '@rebatemaker/types';
import {
  DEFAULT_DURATION_MINUTES,
  DEFAULT_FEE_RATE_BPS,
  DEFAULT_MAX_SPREAD,
  MAX_PRICE,
  MIN_PRICE,
  PRICE_DECIMALS,
  RECOVERY_INTERVAL_MS,
  REFRESH_INTERVAL_MS,
  RunParamsSchema,
  createChildLogger,
  createLogger,
  formatDuration,
  formatPrice,
  instrumentKey,
  redactSecrets,
  round,
  sleepUntilNext,
  systemScheduler,
  toErrorMessage,
} from '@rebatemaker/utils';
import type { Logger, Scheduler } from '@rebatemaker/utils';
import type { OrderManager } from './order-manager';
import type { QuotePricer } from './quote-pricer';
import { createRunState, summarizeRun } from './run-state';
import type { RunState } from './run-state';

export interface StrategyLoopConfig {
  refreshIntervalMs: number;
  recoveryIntervalMs: number;
  feeRateBps: number;
}

const DEFAULT_CONFIG: StrategyLoopConfig = {
  refreshIntervalMs: REFRESH_INTERVAL_MS,
  recoveryIntervalMs: RECOVERY_INTERVAL_MS,
  feeRateBps: DEFAULT_FEE_RATE_BPS,
};

export interface StrategyLoopDeps {
  pricer: QuotePricer;
  orders: OrderManager;
  scheduler?: Scheduler;
  logger?: Logger;
  /** Fixed run id, generated when omitted */
  runId?: string;
}

const SIDES: readonly OrderSide[] = ['BUY', 'SELL'];

/**
 * Quote prices around a mid: `maxSpread` either side, rounded to cents and
 * kept inside the exchange's price range
 */
export function quotePrices(midPrice: number, maxSpread: number): { buyPrice: number; sellPrice: number } {
  return {
    buyPrice: Math.max(MIN_PRICE, round(midPrice - maxSpread, PRICE_DECIMALS)),
    sellPrice: Math.min(MAX_PRICE, round(midPrice + maxSpread, PRICE_DECIMALS)),
  };
}

/**
 * Keeps one buy and one sell quote resting around the mid-price of a single
 * instrument for a fixed duration, then withdraws them.
 *
 * IDLE -> RUNNING -> WINDING_DOWN -> DONE. An instance runs once.
 *
 * Events:
 * - `stateChange` (StateChangeEvent)
 * - `cycle` (CycleReport) after quotes were refreshed
 * - `cycleError` (CycleErrorEvent) when a cycle could not complete
 * - `done` (RunSummary)
 */
export class StrategyLoop extends EventEmitter {
  private config: StrategyLoopConfig;
  private pricer: QuotePricer;
  private orders: OrderManager;
  private scheduler: Scheduler;
  private logger: Logger;
  private fixedRunId?: string;

  private state: StrategyState = 'IDLE';
  private runState: RunState | null = null;
  private abort = new AbortController();

  constructor(deps: StrategyLoopDeps, config: Partial<StrategyLoopConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.pricer = deps.pricer;
    this.orders = deps.orders;
    this.scheduler = deps.scheduler ?? systemScheduler;
    this.logger = deps.logger ?? createLogger({ service: 'strategy' });
    this.fixedRunId = deps.runId;
  }

  getState(): StrategyState {
    return this.state;
  }

  /**
   * Run id and instrument of the current run, once started
   */
  getRun(): Pick<RunState, 'runId' | 'instrument'> | null {
    return this.runState ? { runId: this.runState.runId, instrument: this.runState.instrument } : null;
  }

  /**
   * Request a graceful stop. Any pending wait ends immediately; an exchange call
   * in flight completes first. Quotes are still withdrawn.
   */
  stop(): void {
    if (!this.abort.signal.aborted) {
      this.logger.info({ state: this.state }, 'Stop requested');
      this.abort.abort();
    }
  }

  /**
   * Quote the instrument until the duration elapses or `stop()` is called
   */
  async run(
    instrument: Instrument,
    riskAmount: number,
    maxSpread: number = DEFAULT_MAX_SPREAD,
    durationMs: number = DEFAULT_DURATION_MINUTES * 60_000
  ): Promise<RunSummary> {
    if (this.state !== 'IDLE') {
      throw new Error(`StrategyLoop already ${this.state}; create a new instance per run`);
    }
    const params = RunParamsSchema.parse({ riskAmount, maxSpread, durationMs });

    const run = createRunState(instrument, params, this.scheduler.now(), this.fixedRunId);
    this.runState = run;
    const log = createChildLogger(this.logger, { runId: run.runId, instrument: instrumentKey(instrument) });

    this.transition(run, 'RUNNING');
    log.info(
      { size: run.size, maxSpread, duration: formatDuration(durationMs) },
      'Strategy run started'
    );

    while (!this.abort.signal.aborted && this.scheduler.now() < run.deadline) {
      const waitMs = await this.runCycle(run, log);
      const resumed = await sleepUntilNext(this.scheduler, waitMs, run.deadline, this.abort.signal);
      if (!resumed) break;
    }

    this.transition(run, 'WINDING_DOWN');
    await this.windDown(run, log);
    this.transition(run, 'DONE');

    const summary = summarizeRun(run, this.scheduler.now());
    log.info(
      {
        cycles: summary.cycles,
        errors: summary.errors,
        ordersPlaced: summary.ordersPlaced,
        ordersCanceled: summary.ordersCanceled,
      },
      'Strategy run completed'
    );
    this.emit('done', summary);
    return summary;
  }

  /**
   * One refresh. Returns how long to wait before the next one.
   */
  private async runCycle(run: RunState, log: Logger): Promise<number> {
    run.cycles += 1;
    const cycle = run.cycles;

    try {
      const quote = await this.pricer.fetchMidPrice(run.instrument);
      if (!quote.success) {
        // existing quotes stay as they are until a price is available
        this.reportError(run, log, cycle, 'price', quote.error);
        return this.config.recoveryIntervalMs;
      }

      const blocked = await this.retireQuotes(run, log);
      const { buyPrice, sellPrice } = quotePrices(quote.data.midPrice, run.maxSpread);

      const buy = blocked.BUY
        ? { side: 'BUY' as const, price: buyPrice, blocked: true }
        : await this.placeQuote(run, 'BUY', buyPrice);
      const sell = blocked.SELL
        ? { side: 'SELL' as const, price: sellPrice, blocked: true }
        : await this.placeQuote(run, 'SELL', sellPrice);

      const report: CycleReport = {
        runId: run.runId,
        cycle,
        instrument: { ...run.instrument },
        quote: quote.data,
        buy,
        sell,
        timestamp: new Date(this.scheduler.now()),
      };
      log.debug(
        {
          cycle,
          mid: quote.data.midPrice,
          source: quote.data.source,
          buy: describePlacement(buy),
          sell: describePlacement(sell),
        },
        'Quotes refreshed'
      );
      this.emit('cycle', report);
      return this.config.refreshIntervalMs;
    } catch (error) {
      this.reportError(run, log, cycle, 'cycle', toErrorMessage(error));
      return this.config.recoveryIntervalMs;
    }
  }

  /**
   * Cancel the active quotes. Sides whose cancel was not confirmed are
   * reconciled; a side that is still resting (or could not be reconciled) is
   * returned as blocked and keeps its quote.
   */
  private async retireQuotes(run: RunState, log: Logger): Promise<Record<OrderSide, boolean>> {
    const blocked: Record<OrderSide, boolean> = { BUY: false, SELL: false };
    const unconfirmed: OrderSide[] = [];

    for (const side of SIDES) {
      const orderId = run.activeQuotes[side];
      if (orderId === null) continue;

      const result = await this.orders.cancel(orderId);
      if (result.success && result.data.confirmed) {
        run.activeQuotes[side] = null;
        run.ordersCanceled += 1;
      } else {
        unconfirmed.push(side);
      }
    }

    if (unconfirmed.length === 0) {
      return blocked;
    }

    const reconciled = await this.orders.reconcile(run.instrument);
    for (const side of unconfirmed) {
      const orderId = run.activeQuotes[side];
      const order = orderId === null ? undefined : this.orders.getOrder(orderId);

      if (reconciled.success && order?.status === 'CANCELED') {
        run.activeQuotes[side] = null;
        run.ordersCanceled += 1;
      } else {
        blocked[side] = true;
        log.warn(
          { side, orderId, status: order?.status, reconciled: reconciled.success },
          'Previous quote may still be resting; not replacing it this cycle'
        );
      }
    }
    return blocked;
  }

  private async placeQuote(run: RunState, side: OrderSide, price: number): Promise<QuotePlacement> {
    const result = await this.orders.place(run.instrument, side, run.size, price, this.config.feeRateBps);
    if (!result.success) {
      return { side, price, error: redactSecrets(result.error) };
    }
    run.activeQuotes[side] = result.data.id;
    run.ordersPlaced += 1;
    return { side, price, order: result.data };
  }

  /**
   * Withdraw every active quote; anything still resting after reconciliation
   * gets one more cancel
   */
  private async windDown(run: RunState, log: Logger): Promise<void> {
    const first = await this.retireQuotes(run, log);
    if (!first.BUY && !first.SELL) return;

    const second = await this.retireQuotes(run, log);
    if (second.BUY || second.SELL) {
      log.error({ activeQuotes: run.activeQuotes }, 'Quotes may be left resting after wind-down');
    }
  }

  private reportError(
    run: RunState,
    log: Logger,
    cycle: number,
    stage: CycleErrorEvent['stage'],
    message: string
  ): void {
    run.errors += 1;
    const error = redactSecrets(message);
    log.warn({ cycle, stage, error }, 'Cycle failed; retrying after recovery interval');

    const event: CycleErrorEvent = {
      runId: run.runId,
      cycle,
      stage,
      error,
      timestamp: new Date(this.scheduler.now()),
    };
    this.emit('cycleError', event);
  }

  private transition(run: RunState, to: StrategyState): void {
    const from = this.state;
    this.state = to;
    const event: StateChangeEvent = {
      runId: run.runId,
      from,
      to,
      timestamp: new Date(this.scheduler.now()),
    };
    this.emit('stateChange', event);
  }
}

function describePlacement(placement: QuotePlacement): string {
  if (placement.order) return `${formatPrice(placement.price, 2)} x ${placement.order.size}`;
  if (placement.blocked) return 'blocked';
  return `failed: ${placement.error ?? 'unknown'}`;
}
