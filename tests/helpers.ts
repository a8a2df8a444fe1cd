import { Position, TradeIntent } from '../src/types';

export function makeIntent(overrides: Partial<TradeIntent> = {}): TradeIntent {
  return {
    action: 'OPEN',
    side: 'BUY',
    symbol: 'BTC',
    orderKind: 'LIMIT',
    entries: [50000],
    leverage: 2,
    takeProfits: [],
    sellFraction: 1,
    rule: 'ACTION_AT_PRICE',
    ...overrides
  };
}

export function makePosition(overrides: Partial<Position> = {}): Position {
  return {
    symbol: 'BTC',
    leverage: 2,
    orderKind: 'LIMIT',
    initialSize: 0.004,
    currentSize: 0.004,
    averageEntryPrice: 50000,
    takeProfits: [],
    openedAt: new Date('2024-01-01T00:00:00Z'),
    orderRefs: ['sim-1'],
    sizeDecimals: 6,
    ...overrides
  };
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}
