/**
 * In-memory position book, one position per symbol
 */

import { Position } from '../types';
import { getLogger, logPositionUpdate } from '../utils/logger';
import { roundToDecimals } from '../utils/precision';

export type ApplyCloseResult = {
  success: true;
  closedSize: number;
  remainingSize: number;
  removed: boolean;
} | {
  success: false;
  error: string;
};

function clonePosition(position: Position): Position {
  return {
    ...position,
    takeProfits: position.takeProfits.map(tp => ({ ...tp })),
    orderRefs: [...position.orderRefs],
    openedAt: new Date(position.openedAt.getTime())
  };
}

export class PositionStore {
  private positions: Map<string, Position> = new Map();
  private locks: Map<string, Promise<void>> = new Map();

  /**
   * Run a task with exclusive access to one symbol.
   * Tasks for the same symbol run one after another; other symbols are unaffected.
   */
  async withSymbolLock<T>(symbol: string, task: () => Promise<T>): Promise<T> {
    const key = symbol.toUpperCase();
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(() => undefined, () => undefined);
    this.locks.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Snapshot of a position; mutate only through the store
   */
  get(symbol: string): Position | undefined {
    const position = this.positions.get(symbol.toUpperCase());
    return position ? clonePosition(position) : undefined;
  }

  has(symbol: string): boolean {
    return this.positions.has(symbol.toUpperCase());
  }

  symbols(): string[] {
    return Array.from(this.positions.keys());
  }

  list(): Position[] {
    return Array.from(this.positions.values()).map(clonePosition);
  }

  count(): number {
    return this.positions.size;
  }

  insert(position: Position): boolean {
    const key = position.symbol.toUpperCase();
    if (this.positions.has(key)) {
      getLogger().warn('Position already tracked', { symbol: key });
      return false;
    }

    if (position.initialSize <= 0 || position.currentSize <= 0 || position.currentSize > position.initialSize) {
      getLogger().warn('Rejected position with invalid size', {
        symbol: key,
        initialSize: position.initialSize,
        currentSize: position.currentSize
      });
      return false;
    }

    this.positions.set(key, clonePosition({ ...position, symbol: key }));

    logPositionUpdate(key, {
      action: 'created',
      size: position.currentSize,
      averageEntryPrice: position.averageEntryPrice,
      leverage: position.leverage,
      takeProfits: position.takeProfits.length
    });

    return true;
  }

  /**
   * Reduce a position after a confirmed exit fill; removes it once flat
   */
  applyClose(symbol: string, size: number): ApplyCloseResult {
    const key = symbol.toUpperCase();
    const position = this.positions.get(key);
    if (!position) {
      return { success: false, error: `No position for ${key}` };
    }

    if (!Number.isFinite(size) || size <= 0) {
      return { success: false, error: `Close size must be positive, got ${size}` };
    }

    const closedSize = Math.min(size, position.currentSize);
    const remainingSize = Math.max(roundToDecimals(position.currentSize - closedSize, position.sizeDecimals), 0);

    if (remainingSize <= 0) {
      this.positions.delete(key);
      logPositionUpdate(key, { action: 'closed', closedSize });
      return { success: true, closedSize, remainingSize: 0, removed: true };
    }

    position.currentSize = remainingSize;
    logPositionUpdate(key, { action: 'reduced', closedSize, remainingSize });
    return { success: true, closedSize, remainingSize, removed: false };
  }

  /**
   * One-way transition; returns false when the level was already filled
   */
  markTakeProfitFilled(symbol: string, index: number): boolean {
    const takeProfit = this.positions.get(symbol.toUpperCase())?.takeProfits[index];
    if (!takeProfit || takeProfit.filled) {
      return false;
    }
    takeProfit.filled = true;
    return true;
  }
}
