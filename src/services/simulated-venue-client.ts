/**
 * Recording venue: fills every order locally, optionally on real market data
 */

import { MarketDataSource, MarketInfo, VenueClient, VenueOrder, VenueOrderResult } from '../types';
import { getLogger } from '../utils/logger';

export type SimulatedVenueOptions = {
  balance: number;
  prices?: Record<string, number>;
  sizeDecimals?: number;
  marketData?: MarketDataSource;
};

export type RecordedOrder = VenueOrder & {
  orderRef: string;
  placedAt: Date;
};

export class SimulatedVenueClient implements VenueClient {
  readonly name = 'simulated';
  readonly orders: RecordedOrder[] = [];
  private balance: number;
  private prices: Map<string, number> = new Map();
  private sizeDecimals: number;
  private marketData?: MarketDataSource;
  private queuedFailures: string[] = [];
  private queuedFills: number[] = [];
  private orderCounter = 0;

  constructor(options: SimulatedVenueOptions) {
    this.balance = options.balance;
    this.sizeDecimals = options.sizeDecimals ?? 6;
    this.marketData = options.marketData;

    for (const [symbol, price] of Object.entries(options.prices ?? {})) {
      this.setPrice(symbol, price);
    }
  }

  setPrice(symbol: string, price: number): void {
    this.prices.set(symbol.toUpperCase(), price);
  }

  removePrice(symbol: string): void {
    this.prices.delete(symbol.toUpperCase());
  }

  setBalance(balance: number): void {
    this.balance = balance;
  }

  /**
   * Reject the next order with the given reason
   */
  queueOrderFailure(reason: string): void {
    this.queuedFailures.push(reason);
  }

  /**
   * Fill the next successful order with this size instead of the requested one
   */
  queuePartialFill(filledSize: number): void {
    this.queuedFills.push(filledSize);
  }

  async getMarketInfo(symbol: string): Promise<MarketInfo | null> {
    const key = symbol.toUpperCase();
    const price = this.prices.get(key);
    if (price !== undefined) {
      return { symbol: key, price, sizeDecimals: this.sizeDecimals };
    }

    return this.marketData ? this.marketData.getMarketInfo(key) : null;
  }

  async getMarketPrice(symbol: string): Promise<number | null> {
    const info = await this.getMarketInfo(symbol);
    return info ? info.price : null;
  }

  async getAccountBalance(): Promise<number> {
    return this.balance;
  }

  async placeOrder(order: VenueOrder): Promise<VenueOrderResult> {
    const failure = this.queuedFailures.shift();
    if (failure !== undefined) {
      getLogger().warn('Simulated order rejected', { symbol: order.symbol, reason: failure });
      return { success: false, error: failure };
    }

    this.orderCounter++;
    const orderRef = `sim-${this.orderCounter}`;
    this.orders.push({ ...order, orderRef, placedAt: new Date() });

    getLogger().info('Simulated order filled', {
      orderRef,
      symbol: order.symbol,
      side: order.side,
      size: order.size,
      price: order.price,
      reduceOnly: order.reduceOnly
    });

    return {
      success: true,
      orderRef,
      filledSize: this.queuedFills.shift() ?? order.size,
      fillPrice: order.price
    };
  }
}
