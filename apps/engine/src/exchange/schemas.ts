import { z } from 'zod';
import type { BookOrder, MarketDescriptor, OpenOrder, Trade } from '@rebatemaker/types';
import { ExchangeApiError } from './errors';

/**
 * Response shapes of the CLOB REST API, validated before they reach the strategy.
 * Numeric fields arrive as decimal strings.
 */

const DecimalSchema = z.union([z.string(), z.number()]).pipe(z.coerce.number().finite());

const SideSchema = z
  .string()
  .transform((side) => side.toUpperCase())
  .pipe(z.enum(['BUY', 'SELL']));

// clob-client resolves HTTP failures to `{ error, status }` instead of throwing
const ErrorPayloadSchema = z.object({
  error: z.unknown(),
  status: z.number().optional(),
});

export const OpenOrderSchema = z
  .object({
    id: z.string(),
    side: SideSchema,
    price: DecimalSchema,
    original_size: DecimalSchema,
    size_matched: DecimalSchema.default(0),
  })
  .transform(
    (order): OpenOrder => ({
      id: order.id,
      side: order.side,
      price: order.price,
      size: order.original_size - order.size_matched,
    })
  );

export const OpenOrdersSchema = z.array(OpenOrderSchema);

const BookLevelSchema = z.object({
  price: DecimalSchema,
  size: DecimalSchema,
});

export const OrderBookSchema = z
  .object({
    bids: z.array(BookLevelSchema).default([]),
    asks: z.array(BookLevelSchema).default([]),
  })
  .transform((book): BookOrder[] => [
    ...book.bids.map((level) => ({ side: 'BUY' as const, ...level })),
    ...book.asks.map((level) => ({ side: 'SELL' as const, ...level })),
  ]);

export const TradeSchema = z
  .object({
    id: z.string(),
    side: SideSchema,
    size: DecimalSchema,
    price: DecimalSchema,
    status: z.string(),
    market: z.string().optional(),
    asset_id: z.string().optional(),
    match_time: z.string().optional(),
  })
  .transform(
    (trade): Trade => ({
      id: trade.id,
      side: trade.side,
      size: trade.size,
      price: trade.price,
      status: trade.status,
      market: trade.market,
      assetId: trade.asset_id,
      matchedAt: parseMatchTime(trade.match_time),
    })
  );

export const TradesSchema = z.array(TradeSchema);

export const PostOrderResponseSchema = z.object({
  success: z.boolean().optional(),
  orderID: z.string().optional(),
  errorMsg: z.string().optional(),
  status: z.string().optional(),
});

export const CancelResponseSchema = z.object({
  canceled: z.array(z.string()).default([]),
  not_canceled: z.record(z.string()).default({}),
});

export const TickSizeSchema = z.enum(['0.1', '0.01', '0.001', '0.0001']);

export const MarketInfoSchema = z.object({
  condition_id: z.string(),
  minimum_order_size: DecimalSchema.default(0),
  minimum_tick_size: z.union([z.string(), z.number()]).transform(String).pipe(TickSizeSchema).default('0.01'),
  neg_risk: z.boolean().default(false),
});

const RewardsSchema = z
  .object({
    min_size: DecimalSchema.default(0),
    max_spread: DecimalSchema.default(0),
  })
  .default({});

export const SimplifiedMarketSchema = z.object({
  condition_id: z.string(),
  tokens: z.array(
    z.object({
      token_id: z.string(),
      outcome: z.string(),
      price: DecimalSchema.optional(),
    })
  ),
  rewards: RewardsSchema,
  accepting_orders: z.boolean().default(true),
});

export const MarketsPageSchema = z.object({
  data: z.array(SimplifiedMarketSchema),
  next_cursor: z.string().default(''),
});

export type MarketInfo = z.infer<typeof MarketInfoSchema>;
export type SimplifiedMarket = z.infer<typeof SimplifiedMarketSchema>;

function parseMatchTime(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  // epoch seconds as a string
  const seconds = Number(value);
  const date = Number.isFinite(seconds) ? new Date(seconds * 1000) : new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Display line for a market: last six characters of the condition id plus outcomes
 */
export function describeMarket(conditionId: string, outcomes: string[]): string {
  return `Market ${conditionId.slice(-6)} - Outcomes: ${outcomes.join(', ')}`;
}

export function toMarketDescriptor(market: SimplifiedMarket): MarketDescriptor {
  return {
    conditionId: market.condition_id,
    description: describeMarket(
      market.condition_id,
      market.tokens.map((token) => token.outcome)
    ),
    tokens: market.tokens.map((token) => ({
      tokenId: token.token_id,
      outcome: token.outcome,
      price: token.price,
    })),
    rewardsMinSize: market.rewards.min_size,
    rewardsMaxSpread: market.rewards.max_spread,
    acceptingOrders: market.accepting_orders,
  };
}

/**
 * Validate a CLOB response, turning error payloads and unexpected shapes into thrown errors
 */
export function parseResponse<S extends z.ZodTypeAny>(
  operation: string,
  schema: S,
  payload: unknown
): z.output<S> {
  const errorPayload = ErrorPayloadSchema.safeParse(payload);
  if (errorPayload.success && errorPayload.data.error !== undefined) {
    const { error, status } = errorPayload.data;
    throw new ExchangeApiError(
      operation,
      typeof error === 'string' ? error : JSON.stringify(error),
      status
    );
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ExchangeApiError(
      operation,
      `unexpected response (${issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'invalid'})`
    );
  }
  return parsed.data;
}
