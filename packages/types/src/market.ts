import type { OrderSide } from './order';

/**
 * Resting liquidity on the public book, from any participant
 */
export interface BookOrder {
  side: OrderSide;
  price: number;
  size: number;
}

/**
 * One of the account's own resting orders, as the exchange reports it
 */
export interface OpenOrder extends BookOrder {
  id: string;
}

export type MidPriceSource =
  | 'book'        // both sides present
  | 'one-sided'   // one side missing, defaulted to 0 or 1
  | 'empty';      // no orders at all, neutral prior

export interface MidPriceQuote {
  midPrice: number;
  bestBid: number;
  bestAsk: number;
  source: MidPriceSource;
}

export interface MarketToken {
  tokenId: string;
  outcome: string;
  price?: number;
}

export interface MarketDescriptor {
  conditionId: string;
  description: string;
  tokens: MarketToken[];
  /** Minimum size for an order to earn liquidity rewards */
  rewardsMinSize: number;
  /** Maximum distance from mid for an order to earn liquidity rewards */
  rewardsMaxSpread: number;
  acceptingOrders: boolean;
}
