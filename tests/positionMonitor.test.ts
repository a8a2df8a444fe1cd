import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExecutionEngine } from '../src/services/execution-engine';
import { FractionAllocator } from '../src/services/fraction-allocator';
import { MonitorConfig, PositionMonitor } from '../src/services/position-monitor';
import { PositionStore } from '../src/services/position-store';
import { SimulatedVenueClient } from '../src/services/simulated-venue-client';
import { MarketDataSource, MarketInfo } from '../src/types';
import { makeIntent, makePosition } from './helpers';

const monitorConfig: MonitorConfig = {
  stopLossPercentage: 0.05,
  takeProfitPercentage: 0.02,
  pollingIntervalMs: 60_000,
  venueTimeoutMs: 50
};

describe('PositionMonitor', () => {
  let venue: SimulatedVenueClient;
  let store: PositionStore;
  let allocator: FractionAllocator;
  let engine: ExecutionEngine;
  let monitor: PositionMonitor;

  beforeEach(() => {
    venue = new SimulatedVenueClient({ balance: 1000, prices: { BTC: 50000 } });
    store = new PositionStore();
    allocator = new FractionAllocator();
    engine = new ExecutionEngine({
      venue,
      store,
      config: { positionSizePercentage: 0.1, venueTimeoutMs: 1000 },
      takeProfitAllocator: allocator
    });
    monitor = new PositionMonitor({
      marketData: venue,
      store,
      engine,
      takeProfitAllocator: allocator,
      config: monitorConfig
    });
  });

  afterEach(() => {
    monitor.stop();
    vi.useRealTimers();
  });

  async function openLadder(): Promise<void> {
    const result = await engine.openPosition(makeIntent({
      stopLoss: 48000,
      takeProfits: [52000, 54000, 56000]
    }));
    expect(result.success).toBe(true);
  }

  it('holds, takes the first profit level, then stops out', async () => {
    await openLadder();

    venue.setPrice('BTC', 51000);
    const first = await monitor.sweep();
    expect(first.actions).toEqual([{ symbol: 'BTC', action: 'HOLD', price: 51000 }]);
    expect(store.get('BTC')?.currentSize).toBe(0.004);

    venue.setPrice('BTC', 52500);
    const second = await monitor.sweep();
    expect(second.actions[0]).toMatchObject({ symbol: 'BTC', action: 'TAKE_PROFIT', level: 1 });
    expect(store.get('BTC')?.takeProfits.map(tp => tp.filled)).toEqual([true, false, false]);
    expect(store.get('BTC')?.currentSize).toBeCloseTo(0.002667, 9);
    expect(venue.orders[1]).toMatchObject({ side: 'SELL', size: 0.001333, reduceOnly: true });

    venue.setPrice('BTC', 47000);
    const third = await monitor.sweep();
    expect(third.actions[0]).toMatchObject({
      symbol: 'BTC',
      action: 'STOP_LOSS',
      result: { success: true, positionClosed: true }
    });
    expect(venue.orders[2]?.size).toBeCloseTo(0.002667, 9);
    expect(store.has('BTC')).toBe(false);
  });

  it('never retriggers a filled level', async () => {
    await openLadder();
    venue.setPrice('BTC', 52500);

    await monitor.sweep();
    const repeat = await monitor.sweep();

    expect(repeat.actions).toEqual([{ symbol: 'BTC', action: 'HOLD', price: 52500 }]);
    expect(venue.orders).toHaveLength(2);
  });

  it('fires at most one level per sweep and flattens on the last one', async () => {
    await openLadder();
    venue.setPrice('BTC', 60000);

    const levels: number[] = [];
    for (let i = 0; i < 3; i++) {
      const report = await monitor.sweep();
      const action = report.actions[0];
      if (action?.action === 'TAKE_PROFIT') {
        levels.push(action.level);
      }
    }

    expect(levels).toEqual([1, 2, 3]);
    expect(venue.orders.slice(1).map(order => order.size)).toEqual([0.001333, 0.001333, 0.001334]);
    expect(store.has('BTC')).toBe(false);

    const after = await monitor.sweep();
    expect(after.actions).toEqual([]);
  });

  it('sizes a take-profit against what a racing manual close left', async () => {
    await openLadder();
    venue.setPrice('BTC', 60000);

    const [manual, report] = await Promise.all([
      engine.closePosition('BTC', { orderKind: 'MARKET', sellFraction: 0.75 }),
      monitor.sweep()
    ]);

    expect(manual).toMatchObject({ success: true, closedSize: 0.003 });
    expect(report.actions[0]).toMatchObject({
      action: 'TAKE_PROFIT',
      level: 1,
      result: { success: true, closedSize: 0.001, positionClosed: true }
    });
    expect(venue.orders.slice(1).map(order => order.size)).toEqual([0.003, 0.001]);
    expect(store.has('BTC')).toBe(false);
  });

  it('reads the take-profit weighting at trigger time', async () => {
    await openLadder();
    allocator.setWeighting('50,25,25');
    venue.setPrice('BTC', 52500);

    await monitor.sweep();

    expect(venue.orders[1]?.size).toBe(0.002);
    expect(store.get('BTC')?.currentSize).toBe(0.002);
  });

  it('uses the percentage stop without an absolute stop loss', async () => {
    await engine.openPosition(makeIntent());
    venue.setPrice('BTC', 48500);

    const report = await monitor.sweep();

    // (48500 - 50000) / 50000 * 2 = -0.06
    expect(report.actions[0]).toMatchObject({ action: 'STOP_LOSS', price: 48500 });
    expect(store.has('BTC')).toBe(false);
  });

  it('applies the profit target to positions without levels', async () => {
    await engine.openPosition(makeIntent());

    venue.setPrice('BTC', 50400);
    expect((await monitor.sweep()).actions[0]).toMatchObject({ action: 'HOLD' });

    venue.setPrice('BTC', 50600);
    expect((await monitor.sweep()).actions[0]).toMatchObject({ action: 'PROFIT_TARGET', price: 50600 });
    expect(store.has('BTC')).toBe(false);
  });

  it('skips a position without a price', async () => {
    await openLadder();
    venue.removePrice('BTC');

    const report = await monitor.sweep();

    expect(report.actions).toEqual([{ symbol: 'BTC', action: 'SKIPPED', reason: 'price unavailable' }]);
    expect(store.get('BTC')?.currentSize).toBe(0.004);
  });

  it('marks a level filled even when its close fails', async () => {
    await openLadder();
    venue.setPrice('BTC', 52500);
    venue.queueOrderFailure('venue offline');

    const failed = await monitor.sweep();
    expect(failed.actions[0]).toMatchObject({ action: 'TAKE_PROFIT', result: { success: false, kind: 'VENUE' } });
    expect(store.get('BTC')?.takeProfits[0]?.filled).toBe(true);
    expect(store.get('BTC')?.currentSize).toBe(0.004);

    const repeat = await monitor.sweep();
    expect(repeat.actions).toEqual([{ symbol: 'BTC', action: 'HOLD', price: 52500 }]);
    expect(venue.orders).toHaveLength(1);
  });

  it('marks a zero-size level filled without an order', async () => {
    store.insert(makePosition({
      initialSize: 0.000002,
      currentSize: 0.000002,
      takeProfits: [
        { price: 52000, fraction: 1 / 3, filled: false },
        { price: 54000, fraction: 1 / 3, filled: false },
        { price: 56000, fraction: 1 / 3, filled: false }
      ]
    }));
    venue.setPrice('BTC', 52500);

    const report = await monitor.sweep();

    expect(report.actions[0]).toMatchObject({ action: 'TAKE_PROFIT', level: 1, result: null });
    expect(store.get('BTC')?.takeProfits.map(tp => tp.filled)).toEqual([true, false, false]);
    expect(venue.orders).toHaveLength(0);
  });

  it('does not let a hung quote block other symbols', async () => {
    const hanging: MarketDataSource = {
      getMarketInfo: (symbol: string): Promise<MarketInfo | null> => venue.getMarketInfo(symbol),
      getMarketPrice: (symbol: string): Promise<number | null> =>
        symbol === 'ETH' ? new Promise<number | null>(() => undefined) : venue.getMarketPrice(symbol)
    };
    const isolated = new PositionMonitor({
      marketData: hanging,
      store,
      engine,
      takeProfitAllocator: allocator,
      config: monitorConfig
    });
    store.insert(makePosition({ symbol: 'ETH', averageEntryPrice: 3000 }));
    store.insert(makePosition({ stopLoss: 48000 }));
    venue.setPrice('BTC', 47000);

    const report = await isolated.sweep();

    expect(report.actions).toEqual(expect.arrayContaining([
      { symbol: 'ETH', action: 'SKIPPED', reason: 'price unavailable' },
      expect.objectContaining({ symbol: 'BTC', action: 'STOP_LOSS' })
    ]));
    expect(store.has('BTC')).toBe(false);
    expect(store.has('ETH')).toBe(true);
  });

  it('sweeps on the polling interval until stopped', async () => {
    vi.useFakeTimers();
    const sweep = vi.spyOn(monitor, 'sweep');

    monitor.start();
    expect(monitor.isRunning()).toBe(true);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(sweep).toHaveBeenCalledTimes(1);

    monitor.stop();
    await vi.advanceTimersByTimeAsync(120_000);
    expect(sweep).toHaveBeenCalledTimes(1);
    expect(monitor.isRunning()).toBe(false);
  });
});
