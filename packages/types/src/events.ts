import type { Instrument } from './instrument';
import type { Order, OrderSide } from './order';
import type { MidPriceQuote } from './market';

export type StrategyState = 'IDLE' | 'RUNNING' | 'WINDING_DOWN' | 'DONE';

export interface StateChangeEvent {
  runId: string;
  from: StrategyState;
  to: StrategyState;
  timestamp: Date;
}

export interface QuotePlacement {
  side: OrderSide;
  price: number;
  /** Present when the exchange accepted the order */
  order?: Order;
  error?: string;
  /** Set when the previous quote on this side is still resting, so no replacement was sent */
  blocked?: boolean;
}

export interface CycleReport {
  runId: string;
  cycle: number;
  instrument: Instrument;
  quote: MidPriceQuote;
  buy: QuotePlacement;
  sell: QuotePlacement;
  timestamp: Date;
}

export interface CycleErrorEvent {
  runId: string;
  cycle: number;
  stage: 'price' | 'cycle';
  error: string;
  timestamp: Date;
}

export interface RunSummary {
  runId: string;
  instrument: Instrument;
  cycles: number;
  errors: number;
  ordersPlaced: number;
  ordersCanceled: number;
  startedAt: Date;
  endedAt: Date;
}
