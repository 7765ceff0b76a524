import type { OrderSide } from './order';

export type TradeStatus = 'CONFIRMED' | (string & {});

export interface Trade {
  id: string;
  side: OrderSide;
  size: number;
  price: number;
  status: TradeStatus;
  market?: string;
  assetId?: string;
  matchedAt?: Date;
}

export interface TradeFilter {
  makerAddress: string;
  market?: string;
  assetId?: string;
}

export interface PnLSnapshot {
  timestamp: Date;
  realizedPnl: number;
  rewards: number;
  totalPnl: number;
}
