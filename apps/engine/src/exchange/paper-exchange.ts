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
import type { ExchangeClient, MarketCatalog } from './types';
import { InjectedFailureError } from './errors';

export type PaperOperation =
  | 'submitOrder'
  | 'cancelOrder'
  | 'listBookOrders'
  | 'listOpenOrders'
  | 'listTrades'
  | 'getAccountAddress'
  | 'getMinOrderSize'
  | 'listRewardMarkets';

/**
 * How cancel requests are answered:
 * - confirm: order removed, id listed as canceled
 * - unconfirmed: order removed, but the response omits the id
 * - refuse: order keeps resting, id listed as not canceled
 */
export type PaperCancelMode = 'confirm' | 'unconfirmed' | 'refuse';

export interface PaperExchangeConfig {
  accountAddress: string;
  minOrderSize: number;
  /** Per-market overrides of minOrderSize */
  marketMinSizes: Record<string, number>;
  /** Read-only source of other participants' liquidity; replaces the seeded book */
  bookSource?: Pick<ExchangeClient, 'listBookOrders'>;
}

interface PaperOrder extends OpenOrder {
  marketId: string;
  tokenId: string;
}

export const PAPER_ACCOUNT_ADDRESS = '0x0000000000000000000000000000000000000001';

const DEFAULT_CONFIG: PaperExchangeConfig = {
  accountAddress: PAPER_ACCOUNT_ADDRESS,
  minOrderSize: 5,
  marketMinSizes: {},
};

/**
 * In-process exchange for dry runs and tests.
 *
 * Keeps a seeded (or live, through `bookSource`) book of other participants'
 * liquidity plus the account's own resting orders. Nothing fills on its own; `fill` matches an own order and
 * records a CONFIRMED trade.
 */
export class PaperExchange implements ExchangeClient, MarketCatalog {
  private config: PaperExchangeConfig;
  private book = new Map<string, BookOrder[]>();
  private resting = new Map<string, PaperOrder>();
  private trades: Trade[] = [];
  private markets: MarketDescriptor[] = [];
  private failures = new Map<PaperOperation, number>();
  private rejections: string[] = [];
  private cancelMode: PaperCancelMode = 'confirm';
  private sequence = 0;

  /** Every spec received by submitOrder, accepted or not */
  readonly submissions: OrderSpec[] = [];

  constructor(config: Partial<PaperExchangeConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  // ===========================================================================
  // Scenario setup
  // ===========================================================================

  /**
   * Replace the other participants' liquidity for a token
   */
  seedBook(tokenId: string, orders: BookOrder[]): void {
    this.book.set(tokenId, orders.map((order) => ({ ...order })));
  }

  addMarket(market: MarketDescriptor): void {
    this.markets.push(market);
  }

  /**
   * Make the next `times` calls of an operation throw
   */
  failNext(operation: PaperOperation, times: number = 1): void {
    this.failures.set(operation, times);
  }

  failAlways(operation: PaperOperation): void {
    this.failures.set(operation, Number.POSITIVE_INFINITY);
  }

  /**
   * Reject the next submission with an exchange error message
   */
  rejectNextSubmit(reason: string): void {
    this.rejections.push(reason);
  }

  setCancelMode(mode: PaperCancelMode): void {
    this.cancelMode = mode;
  }

  /**
   * Match an own resting order, fully or partially, and record the trade
   */
  fill(orderId: string, size?: number, status: string = 'CONFIRMED'): Trade {
    const order = this.resting.get(orderId);
    if (!order) {
      throw new Error(`No resting paper order ${orderId}`);
    }

    const filled = Math.min(size ?? order.size, order.size);
    const trade: Trade = {
      id: `trade-${++this.sequence}`,
      side: order.side,
      size: filled,
      price: order.price,
      status,
      market: order.marketId,
      assetId: order.tokenId,
      matchedAt: new Date(),
    };
    this.trades.push(trade);

    if (filled >= order.size) {
      this.resting.delete(orderId);
    } else {
      order.size -= filled;
    }
    return trade;
  }

  /**
   * Record a trade that did not come from a paper order
   */
  recordTrade(trade: Trade): void {
    this.trades.push({ ...trade });
  }

  getRestingOrders(): OpenOrder[] {
    return [...this.resting.values()].map(({ id, side, price, size }) => ({ id, side, price, size }));
  }

  // ===========================================================================
  // ExchangeClient
  // ===========================================================================

  async submitOrder(spec: OrderSpec): Promise<SubmitOrderResponse> {
    this.check('submitOrder');
    this.submissions.push({ ...spec });

    const rejection = this.rejections.shift();
    if (rejection !== undefined) {
      return { error: rejection };
    }

    const minSize = this.minSizeFor(spec.marketId);
    if (spec.size < minSize) {
      return { error: `order size ${spec.size} below minimum ${minSize}` };
    }
    if (spec.price <= 0 || spec.price >= 1) {
      return { error: `invalid price ${spec.price}` };
    }

    const id = `paper-${++this.sequence}`;
    this.resting.set(id, {
      id,
      marketId: spec.marketId,
      tokenId: spec.tokenId,
      side: spec.side,
      price: spec.price,
      size: spec.size,
    });
    return { orderId: id };
  }

  async cancelOrder(orderId: string): Promise<CancelOrderResponse> {
    this.check('cancelOrder');

    if (!this.resting.has(orderId)) {
      return { canceled: [], notCanceled: { [orderId]: 'order not found' } };
    }

    switch (this.cancelMode) {
      case 'refuse':
        return { canceled: [], notCanceled: { [orderId]: 'cancel refused' } };
      case 'unconfirmed':
        this.resting.delete(orderId);
        return { canceled: [], notCanceled: {} };
      case 'confirm':
        this.resting.delete(orderId);
        return { canceled: [orderId], notCanceled: {} };
    }
  }

  async listBookOrders(market: string, assetId: string): Promise<BookOrder[]> {
    this.check('listBookOrders');
    const external = this.config.bookSource
      ? await this.config.bookSource.listBookOrders(market, assetId)
      : this.book.get(assetId) ?? [];
    const own = this.ownOrders(market, assetId).map(({ side, price, size }) => ({ side, price, size }));
    return [...external.map((order) => ({ ...order })), ...own];
  }

  async listOpenOrders(market: string, assetId: string): Promise<OpenOrder[]> {
    this.check('listOpenOrders');
    return this.ownOrders(market, assetId).map(({ id, side, price, size }) => ({ id, side, price, size }));
  }

  async listTrades(filter: TradeFilter): Promise<Trade[]> {
    this.check('listTrades');
    return this.trades
      .filter((trade) => filter.market === undefined || trade.market === filter.market)
      .filter((trade) => filter.assetId === undefined || trade.assetId === filter.assetId)
      .map((trade) => ({ ...trade }));
  }

  async getAccountAddress(): Promise<string> {
    this.check('getAccountAddress');
    return this.config.accountAddress;
  }

  async getMinOrderSize(market: string): Promise<number> {
    this.check('getMinOrderSize');
    return this.minSizeFor(market);
  }

  // ===========================================================================
  // MarketCatalog
  // ===========================================================================

  async listRewardMarkets(): Promise<MarketDescriptor[]> {
    this.check('listRewardMarkets');
    return this.markets.map((market) => ({ ...market, tokens: [...market.tokens] }));
  }

  private ownOrders(market: string, assetId: string): PaperOrder[] {
    return [...this.resting.values()].filter(
      (order) => order.marketId === market && order.tokenId === assetId
    );
  }

  private minSizeFor(market: string): number {
    return this.config.marketMinSizes[market] ?? this.config.minOrderSize;
  }

  private check(operation: PaperOperation): void {
    const remaining = this.failures.get(operation) ?? 0;
    if (remaining <= 0) return;
    this.failures.set(operation, remaining - 1);
    throw new InjectedFailureError(operation);
  }
}
