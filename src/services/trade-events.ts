/**
 * Typed trade lifecycle events
 */

import { Position, TradeIntent, VenueOrder } from '../types';
import { errorMessage, getLogger } from '../utils/logger';

export type TradeEvent =
  | { type: 'INTENT_PARSED'; intent: TradeIntent; source: string }
  | { type: 'ORDER_PLACED'; order: VenueOrder; orderRef: string }
  | { type: 'ORDER_FAILED'; order: VenueOrder; error: string }
  | { type: 'POSITION_OPENED'; position: Position }
  | { type: 'POSITION_REDUCED'; symbol: string; closedSize: number; remainingSize: number; exitPrice: number; pnlRatio: number }
  | { type: 'POSITION_CLOSED'; symbol: string; closedSize: number; exitPrice: number; pnlRatio: number }
  | { type: 'STOP_LOSS_TRIGGERED'; symbol: string; price: number; stopLoss?: number; pnlRatio: number }
  | { type: 'TAKE_PROFIT_TRIGGERED'; symbol: string; price: number; level: number; targetSize: number };

export type TradeEventHandler = (event: TradeEvent) => void;

export class TradeEventBus {
  private handlers: TradeEventHandler[] = [];

  /**
   * Register a handler; the returned function unregisters it
   */
  on(handler: TradeEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      const index = this.handlers.indexOf(handler);
      if (index > -1) {
        this.handlers.splice(index, 1);
      }
    };
  }

  emit(event: TradeEvent): void {
    getLogger().debug('Trade event', { type: event.type });

    this.handlers.forEach(handler => {
      try {
        handler(event);
      } catch (error) {
        getLogger().error('Trade event handler failed', {
          eventType: event.type,
          error: errorMessage(error)
        });
      }
    });
  }
}
