/**
 * Periodic exit management: stop-loss, take-profit ladder and legacy profit rule
 */

import { ClosePositionResult, MarketDataSource, TradingConfig } from '../types';
import { errorMessage, getLogger, logTradeExecution } from '../utils/logger';
import { floorToDecimals } from '../utils/precision';
import { withTimeout } from '../utils/timeout';
import { ExecutionEngine, pnlRatio } from './execution-engine';
import { FractionAllocator } from './fraction-allocator';
import { PositionStore } from './position-store';
import { TradeEventBus } from './trade-events';

export type MonitorConfig = Pick<
  TradingConfig,
  'stopLossPercentage' | 'takeProfitPercentage' | 'pollingIntervalMs' | 'venueTimeoutMs'
>;

export type PositionMonitorOptions = {
  marketData: MarketDataSource;
  store: PositionStore;
  engine: ExecutionEngine;
  takeProfitAllocator: FractionAllocator;
  config: MonitorConfig;
  events?: TradeEventBus;
};

export type SweepAction =
  | { symbol: string; action: 'SKIPPED'; reason: string }
  | { symbol: string; action: 'HOLD'; price: number }
  | { symbol: string; action: 'STOP_LOSS'; price: number; result: ClosePositionResult }
  | { symbol: string; action: 'TAKE_PROFIT'; price: number; level: number; result: ClosePositionResult | null }
  | { symbol: string; action: 'PROFIT_TARGET'; price: number; result: ClosePositionResult }
  | { symbol: string; action: 'ERROR'; error: string };

export type SweepReport = {
  startedAt: Date;
  actions: SweepAction[];
};

export class PositionMonitor {
  private readonly marketData: MarketDataSource;
  private readonly store: PositionStore;
  private readonly engine: ExecutionEngine;
  private readonly takeProfitAllocator: FractionAllocator;
  private readonly config: MonitorConfig;
  private readonly events: TradeEventBus;
  private monitoringInterval: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(options: PositionMonitorOptions) {
    this.marketData = options.marketData;
    this.store = options.store;
    this.engine = options.engine;
    this.takeProfitAllocator = options.takeProfitAllocator;
    this.config = options.config;
    this.events = options.events ?? new TradeEventBus();
  }

  /**
   * Start periodic sweeps
   */
  start(): void {
    if (this.monitoringInterval) {
      return;
    }

    this.monitoringInterval = setInterval(() => {
      void this.tick();
    }, this.config.pollingIntervalMs);

    getLogger().info('Position monitoring started', {
      intervalMs: this.config.pollingIntervalMs
    });
  }

  /**
   * Stop periodic sweeps
   */
  stop(): void {
    if (this.monitoringInterval) {
      clearInterval(this.monitoringInterval);
      this.monitoringInterval = null;
      getLogger().info('Position monitoring stopped');
    }
  }

  isRunning(): boolean {
    return this.monitoringInterval !== null;
  }

  /**
   * Evaluate every tracked position once; symbols are handled independently
   */
  async sweep(): Promise<SweepReport> {
    const startedAt = new Date();
    const symbols = this.store.symbols();

    const settled = await Promise.allSettled(symbols.map(symbol => this.evaluate(symbol)));
    const actions = settled.map((outcome, index): SweepAction => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      const symbol = symbols[index] ?? 'UNKNOWN';
      getLogger().error('Error evaluating position', {
        symbol,
        error: errorMessage(outcome.reason)
      });
      return { symbol, action: 'ERROR', error: errorMessage(outcome.reason) };
    });

    getLogger().debug('Position sweep finished', {
      positions: symbols.length,
      durationMs: Date.now() - startedAt.getTime()
    });

    return { startedAt, actions };
  }

  private async tick(): Promise<void> {
    // A slow sweep must not stack up behind the interval
    if (this.sweeping) {
      getLogger().debug('Previous sweep still running, skipping');
      return;
    }

    this.sweeping = true;
    try {
      await this.sweep();
    } catch (error) {
      getLogger().error('Position sweep failed', { error: errorMessage(error) });
    } finally {
      this.sweeping = false;
    }
  }

  private async evaluate(symbol: string): Promise<SweepAction> {
    // Fetched outside the lock so a slow quote never blocks a manual close
    let price: number | null;
    try {
      price = await withTimeout(
        this.marketData.getMarketPrice(symbol),
        this.config.venueTimeoutMs,
        `getMarketPrice(${symbol})`
      );
    } catch (error) {
      getLogger().debug('Price unavailable, skipping position', { symbol, error: errorMessage(error) });
      return { symbol, action: 'SKIPPED', reason: 'price unavailable' };
    }

    if (price === null || !(price > 0)) {
      getLogger().debug('Price unavailable, skipping position', { symbol });
      return { symbol, action: 'SKIPPED', reason: 'price unavailable' };
    }

    const currentPrice = price;
    return this.store.withSymbolLock(symbol, () => this.evaluateWithinLock(symbol, currentPrice));
  }

  private async evaluateWithinLock(symbol: string, price: number): Promise<SweepAction> {
    const position = this.store.get(symbol);
    if (!position) {
      return { symbol, action: 'SKIPPED', reason: 'position closed' };
    }

    const ratio = pnlRatio(price, position.averageEntryPrice, position.leverage);
    const stopTriggered = position.stopLoss !== undefined
      ? price <= position.stopLoss
      : ratio <= -this.config.stopLossPercentage;

    if (stopTriggered) {
      logTradeExecution('STOP_LOSS', {
        symbol,
        price,
        stopLoss: position.stopLoss,
        pnlPercent: (ratio * 100).toFixed(2)
      });
      this.events.emit({ type: 'STOP_LOSS_TRIGGERED', symbol, price, stopLoss: position.stopLoss, pnlRatio: ratio });

      const result = await this.engine.closeWithinLock(symbol, { orderKind: 'MARKET', sellFraction: 1 });
      return { symbol, action: 'STOP_LOSS', price, result };
    }

    if (position.takeProfits.length === 0) {
      if (ratio >= this.config.takeProfitPercentage) {
        logTradeExecution('TAKE_PROFIT', {
          symbol,
          price,
          pnlPercent: (ratio * 100).toFixed(2)
        });
        const result = await this.engine.closeWithinLock(symbol, { orderKind: 'MARKET', sellFraction: 1 });
        return { symbol, action: 'PROFIT_TARGET', price, result };
      }
      return { symbol, action: 'HOLD', price };
    }

    const level = position.takeProfits.findIndex(tp => !tp.filled && tp.price <= price);
    const takeProfit = position.takeProfits[level];
    if (level < 0 || !takeProfit) {
      return { symbol, action: 'HOLD', price };
    }

    // Read on every trigger so a weighting change applies to open positions
    const fraction = this.takeProfitAllocator.allocate(position.takeProfits.length)[level] ?? 0;
    // Allocations sum to one, so the last open level flattens whatever rounding left behind
    const isLastOpenLevel = position.takeProfits.every((tp, index) => index === level || tp.filled);
    const targetSize = isLastOpenLevel && fraction > 0
      ? position.currentSize
      : floorToDecimals(Math.min(position.initialSize * fraction, position.currentSize), position.sizeDecimals);

    logTradeExecution('TAKE_PROFIT', {
      symbol,
      price,
      level: level + 1,
      target: takeProfit.price,
      targetSize
    });
    this.events.emit({ type: 'TAKE_PROFIT_TRIGGERED', symbol, price, level: level + 1, targetSize });

    // Marked before the close: a crossed level never retriggers, whatever the venue answers
    this.store.markTakeProfitFilled(symbol, level);

    if (targetSize <= 0) {
      return { symbol, action: 'TAKE_PROFIT', price, level: level + 1, result: null };
    }

    const result = await this.engine.closeWithinLock(symbol, { orderKind: 'MARKET', size: targetSize });
    return { symbol, action: 'TAKE_PROFIT', price, level: level + 1, result };
  }
}
