/**
 * Position, venue and execution result types
 */

import { OrderKind, OrderSide } from './signal';

export type TakeProfitState = {
  price: number;
  fraction: number;
  filled: boolean;
};

export type Position = {
  symbol: string;
  leverage: number;
  orderKind: OrderKind;
  initialSize: number;
  currentSize: number;
  averageEntryPrice: number;
  stopLoss?: number;
  takeProfits: TakeProfitState[];
  openedAt: Date;
  orderRefs: string[];
  sizeDecimals: number;
};

export type MarketInfo = {
  symbol: string;
  price: number;
  sizeDecimals: number;
};

export type VenueOrder = {
  symbol: string;
  side: OrderSide;
  size: number;
  price: number;
  orderKind: OrderKind;
  reduceOnly: boolean;
};

export type VenueOrderResult = {
  success: true;
  orderRef: string;
  filledSize?: number;
  fillPrice?: number;
} | {
  success: false;
  error: string;
};

/**
 * Read-only market data operations
 */
export interface MarketDataSource {
  getMarketInfo(symbol: string): Promise<MarketInfo | null>;
  getMarketPrice(symbol: string): Promise<number | null>;
}

/**
 * Everything the execution core needs from a trading venue
 */
export interface VenueClient extends MarketDataSource {
  readonly name: string;
  getAccountBalance(): Promise<number>;
  placeOrder(order: VenueOrder): Promise<VenueOrderResult>;
}

export type ExecutionFailureKind = 'SIZING' | 'VENUE' | 'STATE_VIOLATION' | 'INVALID_REQUEST';

export type ExecutionFailure = {
  success: false;
  kind: ExecutionFailureKind;
  error: string;
};

export type OpenPositionResult = {
  success: true;
  position: Position;
  filledLegs: number;
  failedLegs: number;
} | ExecutionFailure;

export type CloseRequest = {
  orderKind: OrderKind;
  price?: number;
  sellFraction?: number;
  /** Exact size to close; takes precedence over sellFraction */
  size?: number;
};

export type ClosePositionResult = {
  success: true;
  symbol: string;
  closedSize: number;
  remainingSize: number;
  exitPrice: number;
  pnlRatio: number;
  orderRef: string;
  positionClosed: boolean;
} | ExecutionFailure;

export type ExecuteIntentResult =
  | ({ action: 'OPEN' } & OpenPositionResult)
  | ({ action: 'CLOSE' } & ClosePositionResult);
