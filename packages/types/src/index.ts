// Instrument types
export type { Instrument } from './instrument';

// Order types
export type {
  OrderSide,
  OrderStatus,
  Order,
  OrderSpec,
  SubmitOrderResponse,
  CancelOrderResponse,
  CancelOutcome,
} from './order';

// Market types
export type {
  BookOrder,
  OpenOrder,
  MidPriceSource,
  MidPriceQuote,
  MarketToken,
  MarketDescriptor,
} from './market';

// Trade & PnL types
export type {
  TradeStatus,
  Trade,
  TradeFilter,
  PnLSnapshot,
} from './trade';

// Run event types
export type {
  StrategyState,
  StateChangeEvent,
  QuotePlacement,
  CycleReport,
  CycleErrorEvent,
  RunSummary,
} from './events';

export type { Result } from './result';
