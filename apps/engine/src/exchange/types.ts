import type {
  BookOrder,
  CancelOrderResponse,
  MarketDescriptor,
  OpenOrder,
  OrderSpec,
  SubmitOrderResponse,
  Trade,
  TradeFilter,
} from '@rebatemaker/types';

/**
 * Narrow exchange surface the strategy depends on.
 * Every method may throw on transport, auth or exchange-side errors; callers
 * convert those into Results.
 */
export interface ExchangeClient {
  submitOrder(spec: OrderSpec): Promise<SubmitOrderResponse>;
  cancelOrder(orderId: string): Promise<CancelOrderResponse>;
  /** Resting orders from all participants for one outcome token */
  listBookOrders(market: string, assetId: string): Promise<BookOrder[]>;
  /** The account's own resting orders for one outcome token */
  listOpenOrders(market: string, assetId: string): Promise<OpenOrder[]>;
  listTrades(filter: TradeFilter): Promise<Trade[]>;
  getAccountAddress(): Promise<string>;
  getMinOrderSize(market: string): Promise<number>;
}

/**
 * Source of liquidity-reward earnings
 */
export interface RewardsSource {
  getRewardsTotal(): Promise<number>;
}

/**
 * Enumerates instruments that currently pay liquidity rewards
 */
export interface MarketCatalog {
  listRewardMarkets(): Promise<MarketDescriptor[]>;
}
