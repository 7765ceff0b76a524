import type { PnLSnapshot, Trade } from '@rebatemaker/types';
import {
  AMOUNT_DECIMALS,
  attempt,
  createLogger,
  redactSecrets,
  round,
} from '@rebatemaker/utils';
import type { Logger } from '@rebatemaker/utils';
import type { ExchangeClient, RewardsSource } from './exchange/types';

export interface PnLTrackerOptions {
  /** Restrict to one market / outcome token; all of the account's trades otherwise */
  market?: string;
  assetId?: string;
  logger?: Logger;
  clock?: () => number;
}

/**
 * Realized PnL of confirmed fills under binary settlement: a buy costs
 * `size * price`, a sell earns `size * (1 - price)`.
 */
export function realizedPnl(trades: readonly Trade[]): number {
  let cost = 0;
  let revenue = 0;

  for (const trade of trades) {
    if (trade.status !== 'CONFIRMED') continue;
    if (trade.side === 'BUY') {
      cost += trade.size * trade.price;
    } else {
      revenue += trade.size * (1 - trade.price);
    }
  }

  return round(revenue - cost, AMOUNT_DECIMALS);
}

/**
 * Append-only PnL history for the account's fills plus reward earnings
 */
export class PnLTracker {
  private history: PnLSnapshot[] = [];
  private market?: string;
  private assetId?: string;
  private logger: Logger;
  private clock: () => number;

  constructor(
    private readonly exchange: ExchangeClient,
    private readonly rewards: RewardsSource,
    options: PnLTrackerOptions = {}
  ) {
    this.market = options.market;
    this.assetId = options.assetId;
    this.logger = options.logger ?? createLogger({ service: 'pnl' });
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Recompute PnL from the exchange and append it. Returns null, leaving the
   * history untouched, when trades or rewards could not be read.
   */
  async snapshot(): Promise<PnLSnapshot | null> {
    const inputs = await attempt(async () => {
      const makerAddress = await this.exchange.getAccountAddress();
      const trades = await this.exchange.listTrades({
        makerAddress,
        market: this.market,
        assetId: this.assetId,
      });
      const rewards = await this.rewards.getRewardsTotal();
      return { trades, rewards };
    });

    if (!inputs.success) {
      this.logger.warn({ error: redactSecrets(inputs.error) }, 'PnL snapshot skipped');
      return null;
    }

    const realized = realizedPnl(inputs.data.trades);
    const rewards = round(inputs.data.rewards, AMOUNT_DECIMALS);
    const snapshot: PnLSnapshot = {
      timestamp: this.nextTimestamp(),
      realizedPnl: realized,
      rewards,
      totalPnl: round(realized + rewards, AMOUNT_DECIMALS),
    };
    this.history.push(snapshot);

    this.logger.debug(
      { realizedPnl: snapshot.realizedPnl, rewards: snapshot.rewards, totalPnl: snapshot.totalPnl },
      'PnL snapshot'
    );
    return { ...snapshot, timestamp: new Date(snapshot.timestamp.getTime()) };
  }

  getHistory(): readonly PnLSnapshot[] {
    return this.history.map((entry) => ({ ...entry, timestamp: new Date(entry.timestamp.getTime()) }));
  }

  getLatest(): PnLSnapshot | null {
    const latest = this.history[this.history.length - 1];
    return latest ? { ...latest, timestamp: new Date(latest.timestamp.getTime()) } : null;
  }

  // Strictly increasing, even when the clock has not moved since the last entry
  private nextTimestamp(): Date {
    const now = this.clock();
    const latest = this.history[this.history.length - 1];
    const last = latest ? latest.timestamp.getTime() : Number.NEGATIVE_INFINITY;
    return new Date(now > last ? now : last + 1);
  }
}
