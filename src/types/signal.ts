/**
 * Trade intent types produced by the intent parser
 */

export type TradeAction = 'OPEN' | 'CLOSE';

export type OrderSide = 'BUY' | 'SELL';

export type OrderKind = 'MARKET' | 'LIMIT';

/**
 * A numeric entry level, or 'market' when the venue price should be used
 */
export type EntryPrice = number | 'market';

/**
 * Identity of the cascade rule (or the block parser) that produced an intent
 */
export type IntentRule =
  | 'BUY_NOW'
  | 'MARKET_DIRECTION'
  | 'MARKET_DEFAULT_SYMBOL'
  | 'EXPLICIT_KIND'
  | 'EXPLICIT_KIND_EMOJI'
  | 'SIGNAL_PREFIX'
  | 'POSITION_PREFIX'
  | 'ACTION_AT_PRICE'
  | 'SYMBOL_FIRST'
  | 'SYMBOL_FIRST_ENTRY'
  | 'DIRECTION_SYMBOL_PRICE'
  | 'SIDE_SYMBOL_PRICE'
  | 'CATCH_ALL'
  | 'MULTILINE';

export type TradeIntent = {
  readonly action: TradeAction;
  readonly side: OrderSide;
  readonly symbol: string;
  readonly orderKind: OrderKind;
  readonly entries: readonly EntryPrice[];
  readonly leverage: number;
  readonly stopLoss?: number;
  readonly takeProfits: readonly number[];
  readonly sellFraction: number;
  readonly rule: IntentRule;
};

/**
 * Fields a supplemental pass can contribute to an already-parsed intent
 */
export type IntentSupplement = {
  stopLoss?: number;
  takeProfits?: number[];
  entries?: number[];
  leverage?: number;
};

export type RawChatMessage = {
  text: string;
  chatId: string;
  messageId: number;
  date: Date;
  senderId?: string;
  senderUsername?: string;
};
