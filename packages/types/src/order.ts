import type { Instrument } from './instrument';

export type OrderSide = 'BUY' | 'SELL';

export type OrderStatus =
  | 'PENDING'    // Submission in flight; never stored, the exchange has not assigned an id yet
  | 'LIVE'       // Acknowledged and resting on the book
  | 'CANCELED'   // Cancel confirmed, or absent from the book on reconciliation
  | 'FAILED'     // Cancel call errored; resting state unknown until reconciled
  | 'UNKNOWN';   // Cancel sent but not confirmed by the response

export interface Order {
  id: string;
  instrument: Instrument;
  side: OrderSide;
  size: number;
  price: number;
  feeRateBps: number;
  status: OrderStatus;
  placedAt: Date;
  updatedAt: Date;
}

export interface OrderSpec {
  marketId: string;
  tokenId: string;
  side: OrderSide;
  size: number;
  price: number;
  feeRateBps: number;
}

/**
 * Exchange acknowledgment of a submission: an id on acceptance, a message on rejection
 */
export type SubmitOrderResponse = { orderId: string } | { error: string };

export interface CancelOrderResponse {
  canceled: string[];
  /** Ids the exchange refused to cancel, with its reason */
  notCanceled: Record<string, string>;
}

export interface CancelOutcome {
  orderId: string;
  confirmed: boolean;
  /** Local status after the call, or null when the id is not in the registry */
  status: OrderStatus | null;
}
