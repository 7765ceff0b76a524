import { describe, it, expect } from 'vitest';
import type { BookOrder } from '@rebatemaker/types';
import { QuotePricer, computeMidPrice } from '../quote-pricer';
import { PaperExchange } from '../exchange/paper-exchange';
import { INSTRUMENT, seededExchange, silentLogger } from './helpers/fixtures';

const bid = (price: number): BookOrder => ({ side: 'BUY', price, size: 10 });
const ask = (price: number): BookOrder => ({ side: 'SELL', price, size: 10 });

describe('computeMidPrice', () => {
  it('should average the highest bid and the lowest ask', () => {
    const orders = [bid(0.4), ask(0.6), bid(0.45), ask(0.55), bid(0.3)];

    const quote = computeMidPrice(orders);

    expect(quote).toEqual({ midPrice: 0.5, bestBid: 0.45, bestAsk: 0.55, source: 'book' });
  });

  it('should not depend on the order of the input', () => {
    const orders = [bid(0.21), ask(0.64), bid(0.37), ask(0.41), ask(0.9), bid(0.05)];
    const expected = computeMidPrice(orders).midPrice;

    expect(expected).toBeCloseTo((0.37 + 0.41) / 2, 10);
    expect(computeMidPrice([...orders].reverse()).midPrice).toBe(expected);
    expect(computeMidPrice([orders[3], orders[0], orders[5], orders[1], orders[4], orders[2]]).midPrice).toBe(expected);
  });

  it('should return exactly 0.5 for an empty book', () => {
    expect(computeMidPrice([])).toEqual({ midPrice: 0.5, bestBid: 0, bestAsk: 1, source: 'empty' });
  });

  it('should treat a missing ask side as 1', () => {
    const quote = computeMidPrice([bid(0.4), bid(0.45)]);

    expect(quote.midPrice).toBeCloseTo(0.725, 10);
    expect(quote.bestAsk).toBe(1);
    expect(quote.source).toBe('one-sided');
  });

  it('should treat a missing bid side as 0', () => {
    const quote = computeMidPrice([ask(0.3), ask(0.35)]);

    expect(quote.midPrice).toBeCloseTo(0.15, 10);
    expect(quote.bestBid).toBe(0);
    expect(quote.source).toBe('one-sided');
  });
});

describe('QuotePricer', () => {
  it('should price the instrument from the exchange book', async () => {
    const pricer = new QuotePricer(seededExchange(), silentLogger());

    const result = await pricer.fetchMidPrice(INSTRUMENT);

    expect(result).toEqual({
      success: true,
      data: { midPrice: 0.45, bestBid: 0.4, bestAsk: 0.5, source: 'book' },
    });
    await expect(pricer.midPrice(INSTRUMENT)).resolves.toBe(0.45);
  });

  it('should distinguish a failed read from an empty book', async () => {
    const exchange = new PaperExchange();
    const pricer = new QuotePricer(exchange, silentLogger());

    const empty = await pricer.fetchMidPrice(INSTRUMENT);
    exchange.failNext('listBookOrders');
    const failed = await pricer.fetchMidPrice(INSTRUMENT);

    expect(empty.success && empty.data.source).toBe('empty');
    expect(failed).toEqual({
      success: false,
      error: 'Failed to read book for m1:t1: listBookOrders unavailable (injected failure)',
    });
  });

  it('should fall back to 0.5 when the book cannot be read', async () => {
    const exchange = seededExchange();
    exchange.failNext('listBookOrders');
    const pricer = new QuotePricer(exchange, silentLogger());

    await expect(pricer.midPrice(INSTRUMENT)).resolves.toBe(0.5);
  });
});
