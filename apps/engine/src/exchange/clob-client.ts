import { Wallet } from '@ethersproject/wallet';
import { ClobClient, OrderType, Side } from '@polymarket/clob-client';
import type { ApiKeyCreds } from '@polymarket/clob-client';
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
import {
  END_CURSOR,
  RETRY_PROFILES,
  createLogger,
  retry,
  toErrorMessage,
} from '@rebatemaker/utils';
import type { Logger, RetryConfig } from '@rebatemaker/utils';
import type { ExchangeClient, MarketCatalog } from './types';
import {
  CancelResponseSchema,
  MarketInfoSchema,
  MarketsPageSchema,
  OpenOrdersSchema,
  OrderBookSchema,
  PostOrderResponseSchema,
  TradesSchema,
  parseResponse,
  toMarketDescriptor,
} from './schemas';
import type { MarketInfo } from './schemas';

/**
 * The subset of ClobClient the adapter calls
 */
export type ClobApi = Pick<
  ClobClient,
  | 'createAndPostOrder'
  | 'cancelOrder'
  | 'getOrderBook'
  | 'getOpenOrders'
  | 'getTrades'
  | 'getMarket'
  | 'getSamplingSimplifiedMarkets'
>;

export interface ClobExchangeConfig {
  /** Address that owns the orders: the proxy wallet when one is used, else the signer */
  accountAddress: string;
  retry: Partial<RetryConfig>;
  /** Safety bound on sampling-market pagination */
  maxMarketPages: number;
}

const DEFAULT_CONFIG: Omit<ClobExchangeConfig, 'accountAddress'> = {
  retry: RETRY_PROFILES.EXCHANGE_READ,
  maxMarketPages: 50,
};

/**
 * ExchangeClient and MarketCatalog over the Polymarket CLOB.
 *
 * Signing, auth headers and transport belong to clob-client. Reads are retried
 * with backoff; order submission and cancellation are not, since a timed-out
 * request may still have reached the book.
 */
export class ClobExchangeClient implements ExchangeClient, MarketCatalog {
  private config: ClobExchangeConfig;
  private logger: Logger;
  private marketInfo = new Map<string, MarketInfo>();

  constructor(
    private readonly api: ClobApi,
    config: Partial<ClobExchangeConfig> & Pick<ClobExchangeConfig, 'accountAddress'>,
    logger: Logger = createLogger({ service: 'exchange' })
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger;
  }

  async submitOrder(spec: OrderSpec): Promise<SubmitOrderResponse> {
    const market = await this.getMarketInfo(spec.marketId);

    const payload: unknown = await this.api.createAndPostOrder(
      {
        tokenID: spec.tokenId,
        price: spec.price,
        side: spec.side === 'BUY' ? Side.BUY : Side.SELL,
        size: spec.size,
        feeRateBps: spec.feeRateBps,
      },
      { tickSize: market.minimum_tick_size, negRisk: market.neg_risk },
      OrderType.GTC
    );

    const response = parseResponse('submitOrder', PostOrderResponseSchema, payload);
    if (response.orderID && response.success !== false) {
      return { orderId: response.orderID };
    }
    return { error: response.errorMsg || response.status || 'order rejected' };
  }

  async cancelOrder(orderId: string): Promise<CancelOrderResponse> {
    const payload: unknown = await this.api.cancelOrder({ orderID: orderId });
    const response = parseResponse('cancelOrder', CancelResponseSchema, payload);
    return { canceled: response.canceled, notCanceled: response.not_canceled };
  }

  async listBookOrders(_market: string, assetId: string): Promise<BookOrder[]> {
    return this.read('listBookOrders', async () => {
      const payload: unknown = await this.api.getOrderBook(assetId);
      return parseResponse('listBookOrders', OrderBookSchema, payload);
    });
  }

  async listOpenOrders(market: string, assetId: string): Promise<OpenOrder[]> {
    return this.read('listOpenOrders', async () => {
      const payload: unknown = await this.api.getOpenOrders({ market, asset_id: assetId });
      return parseResponse('listOpenOrders', OpenOrdersSchema, payload);
    });
  }

  async listTrades(filter: TradeFilter): Promise<Trade[]> {
    return this.read('listTrades', async () => {
      const payload: unknown = await this.api.getTrades({
        maker_address: filter.makerAddress,
        market: filter.market,
        asset_id: filter.assetId,
      });
      return parseResponse('listTrades', TradesSchema, payload);
    });
  }

  async getAccountAddress(): Promise<string> {
    return this.config.accountAddress;
  }

  async getMinOrderSize(market: string): Promise<number> {
    const info = await this.getMarketInfo(market);
    return info.minimum_order_size;
  }

  /**
   * Walk every page of sampling markets (reward-enabled) until the end cursor
   */
  async listRewardMarkets(): Promise<MarketDescriptor[]> {
    const markets: MarketDescriptor[] = [];
    let cursor = '';

    for (let page = 0; page < this.config.maxMarketPages; page++) {
      const current = cursor;
      const result = await this.read('listRewardMarkets', async () => {
        const payload: unknown = await this.api.getSamplingSimplifiedMarkets(current);
        return parseResponse('listRewardMarkets', MarketsPageSchema, payload);
      });

      markets.push(...result.data.map(toMarketDescriptor));

      if (!result.next_cursor || result.next_cursor === END_CURSOR) {
        return markets;
      }
      cursor = result.next_cursor;
    }

    this.logger.warn(
      { pages: this.config.maxMarketPages, markets: markets.length },
      'Stopped paging reward markets at the page limit'
    );
    return markets;
  }

  /**
   * Tick size, minimum size and neg-risk flag, cached per market
   */
  private async getMarketInfo(market: string): Promise<MarketInfo> {
    const cached = this.marketInfo.get(market);
    if (cached) return cached;

    const info = await this.read('getMarket', async () => {
      const payload: unknown = await this.api.getMarket(market);
      return parseResponse('getMarket', MarketInfoSchema, payload);
    });
    this.marketInfo.set(market, info);
    return info;
  }

  private async read<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      ...this.config.retry,
      onRetry: (error, attempt, delayMs) => {
        this.logger.debug({ operation, attempt, delayMs, error: toErrorMessage(error) }, 'Retrying exchange read');
      },
    });
  }
}

export interface ClobConnection {
  host: string;
  chainId: number;
  privateKey: string;
  signatureType: number;
  funderAddress?: string;
  creds?: ApiKeyCreds;
}

/**
 * Build an authenticated ClobClient, deriving L2 API credentials when none are configured
 */
export async function connectClob(connection: ClobConnection): Promise<{
  api: ClobClient;
  accountAddress: string;
}> {
  const wallet = new Wallet(connection.privateKey);
  const { host, chainId, signatureType, funderAddress } = connection;

  let creds = connection.creds;
  if (!creds) {
    const bootstrap = new ClobClient(host, chainId, wallet, undefined, signatureType, funderAddress);
    creds = await bootstrap.createOrDeriveApiKey();
  }

  return {
    api: new ClobClient(host, chainId, wallet, creds, signatureType, funderAddress),
    accountAddress: funderAddress ?? wallet.address,
  };
}
