import type {
  CancelOutcome,
  Instrument,
  Order,
  OrderSide,
  OrderStatus,
  Result,
} from '@rebatemaker/types';
import {
  DEFAULT_FEE_RATE_BPS,
  KeyedLock,
  MAX_PRICE,
  MIN_PRICE,
  attempt,
  clamp,
  createLogger,
  fail,
  instrumentKey,
  ok,
  redactSecrets,
  shortId,
} from '@rebatemaker/utils';
import type { Logger } from '@rebatemaker/utils';
import type { ExchangeClient } from './exchange/types';

export interface OrderManagerOptions {
  clock?: () => Date;
  /** CANCELED orders kept per instrument; older ones are dropped */
  retainCanceled?: number;
}

const DEFAULT_RETAIN_CANCELED = 100;

/** Statuses that only a reconciliation against the exchange can resolve */
const UNRESOLVED: ReadonlySet<OrderStatus> = new Set(['UNKNOWN', 'FAILED']);

function cloneOrder(order: Order): Order {
  return {
    ...order,
    instrument: { ...order.instrument },
    placedAt: new Date(order.placedAt.getTime()),
    updatedAt: new Date(order.updatedAt.getTime()),
  };
}

/**
 * Owns the strategy's own orders and every state change they go through.
 *
 * Orders are registered per instrument and each instrument's mutations are
 * serialized, so loops for different instruments can share one manager.
 * Exchange errors come back as failed Results; nothing here throws because
 * of the exchange.
 */
export class OrderManager {
  private registry = new Map<string, Map<string, Order>>();
  /** order id -> instrument key */
  private owners = new Map<string, string>();
  private lock = new KeyedLock();
  private logger: Logger;
  private clock: () => Date;
  private retainCanceled: number;

  constructor(
    private readonly exchange: ExchangeClient,
    logger: Logger = createLogger({ service: 'orders' }),
    options: OrderManagerOptions = {}
  ) {
    this.logger = logger;
    this.clock = options.clock ?? (() => new Date());
    this.retainCanceled = options.retainCanceled ?? DEFAULT_RETAIN_CANCELED;
  }

  /**
   * Submit a GTC limit order. Price is clamped into the exchange's range and
   * size raised to the market minimum before submission. Only accepted orders
   * are recorded.
   */
  async place(
    instrument: Instrument,
    side: OrderSide,
    size: number,
    price: number,
    feeRateBps: number = DEFAULT_FEE_RATE_BPS
  ): Promise<Result<Order>> {
    const key = instrumentKey(instrument);

    // clamping cannot bound NaN or infinities
    if (!Number.isFinite(price)) {
      return this.placementFailed(key, side, `Invalid price ${price}`);
    }
    if (!Number.isFinite(size)) {
      return this.placementFailed(key, side, `Invalid size ${size}`);
    }

    return this.lock.runExclusive(key, async () => {
      const boundedPrice = clamp(price, MIN_PRICE, MAX_PRICE);

      const minSize = await attempt(() => this.exchange.getMinOrderSize(instrument.marketId));
      if (!minSize.success) {
        return this.placementFailed(key, side, `Failed to read minimum order size: ${minSize.error}`);
      }
      const boundedSize = Math.max(size, minSize.data);

      const response = await attempt(() =>
        this.exchange.submitOrder({
          marketId: instrument.marketId,
          tokenId: instrument.tokenId,
          side,
          size: boundedSize,
          price: boundedPrice,
          feeRateBps,
        })
      );
      if (!response.success) {
        return this.placementFailed(key, side, response.error);
      }
      if ('error' in response.data) {
        return this.placementFailed(key, side, `Order rejected: ${response.data.error}`);
      }

      const now = this.clock();
      const order: Order = {
        id: response.data.orderId,
        instrument: { ...instrument },
        side,
        size: boundedSize,
        price: boundedPrice,
        feeRateBps,
        status: 'LIVE',
        placedAt: now,
        updatedAt: now,
      };
      this.ordersFor(key).set(order.id, order);
      this.owners.set(order.id, key);

      this.logger.info(
        { instrument: key, orderId: shortId(order.id), side, size: boundedSize, price: boundedPrice },
        'Order placed'
      );
      return ok(cloneOrder(order));
    });
  }

  /**
   * Request cancellation. A confirmed id becomes CANCELED, an unconfirmed one
   * UNKNOWN, and a call that errors leaves the order FAILED; the last two are
   * resolved by `reconcile`. Ids this manager never placed are still forwarded.
   */
  async cancel(orderId: string): Promise<Result<CancelOutcome>> {
    const key = this.owners.get(orderId);
    if (key === undefined) {
      return this.cancelUnlocked(orderId);
    }
    return this.lock.runExclusive(key, () => this.cancelUnlocked(orderId));
  }

  /**
   * Resolve UNKNOWN and FAILED orders against the account's resting orders:
   * still resting -> LIVE, gone -> CANCELED. Returns the orders it resolved.
   */
  async reconcile(instrument: Instrument): Promise<Result<Order[]>> {
    const key = instrumentKey(instrument);

    return this.lock.runExclusive(key, async () => {
      const unresolved = [...this.ordersFor(key).values()].filter((order) => UNRESOLVED.has(order.status));
      if (unresolved.length === 0) {
        return ok<Order[]>([]);
      }

      const open = await attempt(() =>
        this.exchange.listOpenOrders(instrument.marketId, instrument.tokenId)
      );
      if (!open.success) {
        this.logger.warn({ instrument: key, error: redactSecrets(open.error) }, 'Reconciliation failed');
        return fail(`Failed to list open orders for ${key}: ${open.error}`);
      }

      const resting = new Set(open.data.map((order) => order.id));
      for (const order of unresolved) {
        this.transition(order, resting.has(order.id) ? 'LIVE' : 'CANCELED');
      }

      this.logger.debug(
        { instrument: key, resolved: unresolved.map((order) => `${shortId(order.id)}=${order.status}`) },
        'Reconciled orders'
      );
      return ok(unresolved.map(cloneOrder));
    });
  }

  getOrder(orderId: string): Order | undefined {
    const key = this.owners.get(orderId);
    const order = key === undefined ? undefined : this.registry.get(key)?.get(orderId);
    return order ? cloneOrder(order) : undefined;
  }

  getOrders(instrument: Instrument): Order[] {
    const orders = this.registry.get(instrumentKey(instrument));
    return orders ? [...orders.values()].map(cloneOrder) : [];
  }

  getLiveOrders(instrument: Instrument): Order[] {
    return this.getOrders(instrument).filter((order) => order.status === 'LIVE');
  }

  getUnresolvedOrders(instrument: Instrument): Order[] {
    return this.getOrders(instrument).filter((order) => UNRESOLVED.has(order.status));
  }

  private async cancelUnlocked(orderId: string): Promise<Result<CancelOutcome>> {
    const order = this.findOrder(orderId);
    const response = await attempt(() => this.exchange.cancelOrder(orderId));

    if (!response.success) {
      if (order) this.transition(order, 'FAILED');
      this.logger.warn({ orderId: shortId(orderId), error: redactSecrets(response.error) }, 'Cancel failed');
      return fail(`Failed to cancel ${orderId}: ${response.error}`);
    }

    const confirmed = response.data.canceled.includes(orderId);
    if (order) {
      if (confirmed) {
        this.transition(order, 'CANCELED');
      } else if (order.status !== 'CANCELED') {
        this.transition(order, 'UNKNOWN');
        this.logger.debug(
          { orderId: shortId(orderId), reason: response.data.notCanceled[orderId] },
          'Cancel not confirmed'
        );
      }
    }

    return ok({ orderId, confirmed, status: order ? order.status : null });
  }

  private placementFailed(key: string, side: OrderSide, error: string): Result<Order> {
    this.logger.warn({ instrument: key, side, error: redactSecrets(error) }, 'Order placement failed');
    return fail(error);
  }

  private transition(order: Order, status: OrderStatus): void {
    // CANCELED is terminal
    if (order.status === 'CANCELED' || order.status === status) return;
    order.status = status;
    order.updatedAt = this.clock();
    if (status === 'CANCELED') {
      this.pruneCanceled(instrumentKey(order.instrument));
    }
  }

  // Oldest first: registry maps keep insertion order
  private pruneCanceled(key: string): void {
    const orders = this.registry.get(key);
    if (!orders) return;

    const canceled = [...orders.values()].filter((order) => order.status === 'CANCELED');
    const excess = canceled.slice(0, Math.max(0, canceled.length - this.retainCanceled));
    for (const order of excess) {
      orders.delete(order.id);
      this.owners.delete(order.id);
    }
  }

  private findOrder(orderId: string): Order | undefined {
    const key = this.owners.get(orderId);
    return key === undefined ? undefined : this.registry.get(key)?.get(orderId);
  }

  private ordersFor(key: string): Map<string, Order> {
    let orders = this.registry.get(key);
    if (!orders) {
      orders = new Map();
      this.registry.set(key, orders);
    }
    return orders;
  }
}
