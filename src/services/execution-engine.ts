/**
 * Execution engine: sizes entries, places ladder legs and exits against a venue
 */

import {
  CloseRequest,
  ClosePositionResult,
  ExecuteIntentResult,
  ExecutionFailure,
  ExecutionFailureKind,
  MarketInfo,
  OpenPositionResult,
  Position,
  TradeIntent,
  TradingConfig,
  VenueClient,
  VenueOrder,
  VenueOrderResult
} from '../types';
import { errorMessage, getLogger, logTradeExecution, logVenueError } from '../utils/logger';
import { clamp, floorToDecimals, roundToDecimals } from '../utils/precision';
import { withTimeout } from '../utils/timeout';
import { FractionAllocator } from './fraction-allocator';
import { PositionStore } from './position-store';
import { TradeEventBus } from './trade-events';

export type ExecutionEngineOptions = {
  venue: VenueClient;
  store: PositionStore;
  config: Pick<TradingConfig, 'positionSizePercentage' | 'venueTimeoutMs'>;
  takeProfitAllocator: FractionAllocator;
  entryAllocator?: FractionAllocator;
  events?: TradeEventBus;
};

type FilledLeg = {
  size: number;
  price: number;
  orderRef: string;
};

/**
 * Leveraged return of a long position
 */
export function pnlRatio(price: number, averageEntryPrice: number, leverage: number): number {
  return ((price - averageEntryPrice) / averageEntryPrice) * leverage;
}

function failure(kind: ExecutionFailureKind, error: string): ExecutionFailure {
  return { success: false, kind, error };
}

export class ExecutionEngine {
  private readonly venue: VenueClient;
  private readonly store: PositionStore;
  private readonly config: ExecutionEngineOptions['config'];
  private readonly takeProfitAllocator: FractionAllocator;
  private readonly entryAllocator: FractionAllocator;
  private readonly events: TradeEventBus;

  constructor(options: ExecutionEngineOptions) {
    this.venue = options.venue;
    this.store = options.store;
    this.config = options.config;
    this.takeProfitAllocator = options.takeProfitAllocator;
    this.entryAllocator = options.entryAllocator ?? new FractionAllocator();
    this.events = options.events ?? new TradeEventBus();
  }

  /**
   * Route a parsed intent to the matching operation
   */
  async executeIntent(intent: TradeIntent): Promise<ExecuteIntentResult> {
    if (intent.action === 'OPEN') {
      const result = await this.openPosition(intent);
      return { action: 'OPEN', ...result };
    }

    const limitPrice = intent.entries.find((entry): entry is number => typeof entry === 'number');
    const result = await this.closePosition(intent.symbol, {
      orderKind: intent.orderKind,
      price: intent.orderKind === 'LIMIT' ? limitPrice : undefined,
      sellFraction: intent.sellFraction
    });
    return { action: 'CLOSE', ...result };
  }

  /**
   * Open a long position, one order per entry level
   */
  async openPosition(intent: TradeIntent): Promise<OpenPositionResult> {
    if (intent.action !== 'OPEN') {
      return this.reject(intent.symbol, failure('INVALID_REQUEST', `Cannot open a position from a ${intent.action} intent`));
    }

    if (intent.entries.length === 0) {
      return this.reject(intent.symbol, failure('INVALID_REQUEST', 'Intent has no entry levels'));
    }

    const symbol = intent.symbol.toUpperCase();
    return this.store.withSymbolLock(symbol, () => this.openWithinLock(symbol, intent));
  }

  /**
   * Close all or part of a tracked position
   */
  async closePosition(symbol: string, request: CloseRequest): Promise<ClosePositionResult> {
    const key = symbol.toUpperCase();
    return this.store.withSymbolLock(key, () => this.closeWithinLock(key, request));
  }

  /**
   * Close while the caller already holds the symbol lock
   */
  async closeWithinLock(symbol: string, request: CloseRequest): Promise<ClosePositionResult> {
    const position = this.store.get(symbol);
    if (!position) {
      return this.reject(symbol, failure('STATE_VIOLATION', `No open position for ${symbol}`));
    }

    let exitPrice: number;
    if (request.orderKind === 'MARKET') {
      let marketPrice: number | null;
      try {
        marketPrice = await this.call(this.venue.getMarketPrice(symbol), 'getMarketPrice');
      } catch (error) {
        logVenueError(this.venue.name, error, { action: 'get_market_price', symbol });
        return this.reject(symbol, failure('VENUE', `Market price request failed: ${errorMessage(error)}`));
      }

      if (marketPrice === null || !(marketPrice > 0)) {
        return this.reject(symbol, failure('VENUE', `Market price unavailable for ${symbol}`));
      }
      exitPrice = marketPrice;
    } else {
      if (request.price === undefined || !(request.price > 0)) {
        return this.reject(symbol, failure('INVALID_REQUEST', 'Limit close requires a positive price'));
      }
      exitPrice = request.price;
    }

    const size = this.closeSize(position, request);
    if (size === null) {
      return this.reject(symbol, failure('INVALID_REQUEST', 'Close fraction must be a number'));
    }
    if (size <= 0) {
      return this.reject(symbol, failure('SIZING', `Close size for ${symbol} rounds to zero`));
    }

    const result = await this.submitOrder({
      symbol,
      side: 'SELL',
      size,
      price: exitPrice,
      orderKind: request.orderKind,
      reduceOnly: true
    });

    if (!result.success) {
      return this.reject(symbol, failure('VENUE', result.error));
    }

    // A reduce-only order never fills beyond what was requested
    const filledSize = Math.min(result.filledSize ?? size, size);
    if (!(filledSize > 0)) {
      return this.reject(symbol, failure('VENUE', `Close order for ${symbol} filled nothing`));
    }

    // Position state only changes after the venue confirmed the exit
    const applied = this.store.applyClose(symbol, filledSize);
    if (!applied.success) {
      return this.reject(symbol, failure('STATE_VIOLATION', applied.error));
    }

    const fillPrice = result.fillPrice ?? exitPrice;
    const realized = pnlRatio(fillPrice, position.averageEntryPrice, position.leverage);

    logTradeExecution('CLOSE', {
      symbol,
      orderRef: result.orderRef,
      closedSize: applied.closedSize,
      remainingSize: applied.remainingSize,
      exitPrice: fillPrice,
      pnlPercent: (realized * 100).toFixed(2)
    });

    if (applied.removed) {
      this.events.emit({
        type: 'POSITION_CLOSED',
        symbol,
        closedSize: applied.closedSize,
        exitPrice: fillPrice,
        pnlRatio: realized
      });
    } else {
      this.events.emit({
        type: 'POSITION_REDUCED',
        symbol,
        closedSize: applied.closedSize,
        remainingSize: applied.remainingSize,
        exitPrice: fillPrice,
        pnlRatio: realized
      });
    }

    return {
      success: true,
      symbol,
      closedSize: applied.closedSize,
      remainingSize: applied.remainingSize,
      exitPrice: fillPrice,
      pnlRatio: realized,
      orderRef: result.orderRef,
      positionClosed: applied.removed
    };
  }

  private async openWithinLock(symbol: string, intent: TradeIntent): Promise<OpenPositionResult> {
    if (this.store.has(symbol)) {
      return this.reject(symbol, failure('STATE_VIOLATION', `Position already open for ${symbol}`));
    }

    let market: MarketInfo | null;
    let balance: number;
    try {
      market = await this.call(this.venue.getMarketInfo(symbol), 'getMarketInfo');
      balance = await this.call(this.venue.getAccountBalance(), 'getAccountBalance');
    } catch (error) {
      logVenueError(this.venue.name, error, { action: 'prepare_open', symbol });
      return this.reject(symbol, failure('VENUE', `Venue request failed: ${errorMessage(error)}`));
    }

    if (!market || !(market.price > 0)) {
      return this.reject(symbol, failure('VENUE', `Market data unavailable for ${symbol}`));
    }

    const percentage = clamp(this.config.positionSizePercentage, 0, 1);
    const notional = balance * percentage * intent.leverage;
    if (!(notional > 0)) {
      return this.reject(symbol, failure('SIZING', `Position notional must be positive, got ${notional}`));
    }

    getLogger().info('Opening position', {
      symbol,
      balance,
      notional,
      leverage: intent.leverage,
      legs: intent.entries.length,
      orderKind: intent.orderKind
    });

    const fractions = this.entryAllocator.allocate(intent.entries.length);
    const filled: FilledLeg[] = [];
    let failedLegs = 0;
    let emptyLegs = 0;

    for (const [index, entry] of intent.entries.entries()) {
      const price = intent.orderKind === 'MARKET' || entry === 'market' ? market.price : entry;
      const fraction = fractions[index] ?? 0;
      const size = price > 0 ? floorToDecimals((notional * fraction) / price, market.sizeDecimals) : 0;

      if (size <= 0) {
        emptyLegs++;
        getLogger().warn('Skipping entry leg with zero size', { symbol, leg: index + 1, price });
        continue;
      }

      const result = await this.submitOrder({
        symbol,
        side: 'BUY',
        size,
        price,
        orderKind: intent.orderKind,
        reduceOnly: false
      });

      const filledSize = result.success ? result.filledSize ?? size : 0;
      if (!result.success || !(filledSize > 0)) {
        failedLegs++;
        continue;
      }

      filled.push({
        size: filledSize,
        price: result.fillPrice ?? price,
        orderRef: result.orderRef
      });
    }

    if (filled.length === 0) {
      return emptyLegs === intent.entries.length
        ? this.reject(symbol, failure('SIZING', `Every entry leg for ${symbol} rounds to zero size`))
        : this.reject(symbol, failure('VENUE', `No entry leg for ${symbol} was filled`));
    }

    const totalSize = roundToDecimals(filled.reduce((sum, leg) => sum + leg.size, 0), market.sizeDecimals);
    const averageEntryPrice = filled.reduce((sum, leg) => sum + leg.size * leg.price, 0)
      / filled.reduce((sum, leg) => sum + leg.size, 0);
    const takeProfitFractions = this.takeProfitAllocator.allocate(intent.takeProfits.length);

    const position: Position = {
      symbol,
      leverage: intent.leverage,
      orderKind: intent.orderKind,
      initialSize: totalSize,
      currentSize: totalSize,
      averageEntryPrice,
      stopLoss: intent.stopLoss,
      takeProfits: intent.takeProfits.map((price, index) => ({
        price,
        fraction: takeProfitFractions[index] ?? 0,
        filled: false
      })),
      openedAt: new Date(),
      orderRefs: filled.map(leg => leg.orderRef),
      sizeDecimals: market.sizeDecimals
    };

    if (!this.store.insert(position)) {
      return this.reject(symbol, failure('STATE_VIOLATION', `Position for ${symbol} could not be recorded`));
    }

    logTradeExecution('OPEN', {
      symbol,
      size: totalSize,
      averageEntryPrice,
      leverage: intent.leverage,
      filledLegs: filled.length,
      failedLegs: failedLegs + emptyLegs,
      stopLoss: intent.stopLoss,
      takeProfits: intent.takeProfits
    });

    const stored = this.store.get(symbol) ?? position;
    this.events.emit({ type: 'POSITION_OPENED', position: stored });

    return {
      success: true,
      position: stored,
      filledLegs: filled.length,
      failedLegs: failedLegs + emptyLegs
    };
  }

  /**
   * Size to close, rounded down to the venue precision; null for a malformed request
   */
  private closeSize(position: Position, request: CloseRequest): number | null {
    if (request.size !== undefined) {
      if (!Number.isFinite(request.size)) {
        return null;
      }
      return floorToDecimals(clamp(request.size, 0, position.currentSize), position.sizeDecimals);
    }

    const requested = request.sellFraction ?? 1;
    if (!Number.isFinite(requested)) {
      return null;
    }

    const fraction = clamp(requested, 0, 1);
    return fraction >= 1
      ? position.currentSize
      : floorToDecimals(position.currentSize * fraction, position.sizeDecimals);
  }

  private async submitOrder(order: VenueOrder): Promise<VenueOrderResult> {
    let result: VenueOrderResult;
    try {
      result = await this.call(this.venue.placeOrder(order), 'placeOrder');
    } catch (error) {
      result = { success: false, error: errorMessage(error) };
    }

    if (result.success) {
      logTradeExecution('ORDER', {
        venue: this.venue.name,
        orderRef: result.orderRef,
        ...order
      });
      this.events.emit({ type: 'ORDER_PLACED', order, orderRef: result.orderRef });
    } else {
      logVenueError(this.venue.name, new Error(result.error), { action: 'place_order', ...order });
      this.events.emit({ type: 'ORDER_FAILED', order, error: result.error });
    }

    return result;
  }

  private call<T>(promise: Promise<T>, operation: string): Promise<T> {
    return withTimeout(promise, this.config.venueTimeoutMs, `${this.venue.name}.${operation}`);
  }

  private reject(symbol: string, result: ExecutionFailure): ExecutionFailure {
    getLogger().warn('Execution rejected', {
      symbol,
      kind: result.kind,
      error: result.error
    });
    return result;
  }
}
