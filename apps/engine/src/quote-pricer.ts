import type { BookOrder, Instrument, MidPriceQuote, Result } from '@rebatemaker/types';
import {
  EMPTY_ASK_PRICE,
  EMPTY_BID_PRICE,
  NEUTRAL_MID_PRICE,
  attempt,
  createLogger,
  fail,
  instrumentKey,
  ok,
  redactSecrets,
} from '@rebatemaker/utils';
import type { Logger } from '@rebatemaker/utils';
import type { ExchangeClient } from './exchange/types';

/**
 * Fair price from resting liquidity: the mean of the best bid and best ask.
 *
 * A missing side is treated as the bound of the price range (bid 0, ask 1);
 * an empty book is priced at the neutral 0.5.
 */
export function computeMidPrice(orders: readonly BookOrder[]): MidPriceQuote {
  let bestBid: number | null = null;
  let bestAsk: number | null = null;

  for (const order of orders) {
    if (order.side === 'BUY') {
      bestBid = bestBid === null ? order.price : Math.max(bestBid, order.price);
    } else {
      bestAsk = bestAsk === null ? order.price : Math.min(bestAsk, order.price);
    }
  }

  if (bestBid === null && bestAsk === null) {
    return {
      midPrice: NEUTRAL_MID_PRICE,
      bestBid: EMPTY_BID_PRICE,
      bestAsk: EMPTY_ASK_PRICE,
      source: 'empty',
    };
  }

  const bid = bestBid ?? EMPTY_BID_PRICE;
  const ask = bestAsk ?? EMPTY_ASK_PRICE;
  return {
    midPrice: (bid + ask) / 2,
    bestBid: bid,
    bestAsk: ask,
    source: bestBid !== null && bestAsk !== null ? 'book' : 'one-sided',
  };
}

/**
 * Reads the book for an instrument and prices it
 */
export class QuotePricer {
  private logger: Logger;

  constructor(
    private readonly exchange: ExchangeClient,
    logger: Logger = createLogger({ service: 'pricer' })
  ) {
    this.logger = logger;
  }

  /**
   * Mid-price, or a failure when the book could not be read
   */
  async fetchMidPrice(instrument: Instrument): Promise<Result<MidPriceQuote>> {
    const orders = await attempt(() =>
      this.exchange.listBookOrders(instrument.marketId, instrument.tokenId)
    );
    if (!orders.success) {
      return fail(`Failed to read book for ${instrumentKey(instrument)}: ${orders.error}`);
    }
    return ok(computeMidPrice(orders.data));
  }

  /**
   * Mid-price that never fails: a read failure yields the neutral 0.5
   */
  async midPrice(instrument: Instrument): Promise<number> {
    const quote = await this.fetchMidPrice(instrument);
    if (!quote.success) {
      this.logger.warn({ error: redactSecrets(quote.error) }, 'Falling back to neutral mid-price');
      return NEUTRAL_MID_PRICE;
    }
    return quote.data.midPrice;
  }
}
