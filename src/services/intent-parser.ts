/**
 * Intent parsing service: turns free-text trade calls into canonical trade intents
 */

import {
  EntryPrice,
  IntentRule,
  IntentSupplement,
  OrderKind,
  OrderSide,
  TradeIntent
} from '../types';
import { getLogger } from '../utils/logger';

export type IntentParserOptions = {
  defaultLeverage?: number;
  defaultMarketSymbol?: string;
};

type PriceMode = 'market' | 'explicit-kind' | 'limit';

type CascadeRule = {
  rule: IntentRule;
  pattern: RegExp;
  priceMode: PriceMode;
};

/**
 * Typed partial intent produced by the first matching cascade rule
 */
type CascadeMatch = {
  rule: IntentRule;
  side: OrderSide;
  symbol: string;
  orderKind: OrderKind;
  price?: number;
  leverage?: number;
  sellFraction: number;
};

// Order encodes precedence: the first rule whose shape matches wins.
const CASCADE: readonly CascadeRule[] = [
  {
    rule: 'BUY_NOW',
    pattern: /BUY[^\S\n]+NOW[^\S\n]+(?<symbol>\w+)(?:[^\S\n]+(?<leverage>\d+)X)?/,
    priceMode: 'market'
  },
  {
    rule: 'MARKET_DIRECTION',
    pattern: /MARKET[^\S\n]+(?<action>LONG|SHORT)[^\S\n]+(?<symbol>\w+)/,
    priceMode: 'market'
  },
  {
    rule: 'MARKET_DEFAULT_SYMBOL',
    pattern: /MARKET[^\S\n]+(?<action>LONG|SHORT)/,
    priceMode: 'market'
  },
  {
    rule: 'EXPLICIT_KIND',
    pattern: /(?<kind>MARKET|LIMIT)[^\S\n]+(?<action>BUY|SELL|LONG|SHORT)[^\S\n]+(?<symbol>\w+)[^\S\n]+\$?(?<price>\d+(?:\.\d+)?)/,
    priceMode: 'explicit-kind'
  },
  {
    rule: 'EXPLICIT_KIND_EMOJI',
    pattern: /(?:🚀|📈|📊)?[^\S\n]*(?<kind>MARKET|LIMIT)[^\S\n]+(?<action>LONG|SHORT|BUY|SELL)[^\S\n]+(?<symbol>\w+)[^\S\n]+\$?(?<price>\d+(?:\.\d+)?)/,
    priceMode: 'explicit-kind'
  },
  {
    rule: 'SIGNAL_PREFIX',
    pattern: /SIGNAL:?[^\S\n]+(?<action>BUY|SELL|LONG|SHORT)[^\S\n]+(?<symbol>\w+)[^\S\n]*\$?(?<price>\d+(?:\.\d+)?)/,
    priceMode: 'limit'
  },
  {
    rule: 'POSITION_PREFIX',
    pattern: /POSITION:?[^\S\n]+(?<action>LONG|SHORT)[^\S\n]+(?<symbol>\w+)[^\S\n]+(?:ENTRY:?)?[^\S\n]*\$?(?<price>\d+(?:\.\d+)?)/,
    priceMode: 'limit'
  },
  {
    rule: 'ACTION_AT_PRICE',
    pattern: /(?<action>BUY|SELL|LONG|SHORT)[^\S\n]+(?<symbol>\w+)[^\S\n]+(?:AT|@)[^\S\n]*\$?(?<price>\d+(?:\.\d+)?)/,
    priceMode: 'limit'
  },
  {
    rule: 'SYMBOL_FIRST',
    pattern: /(?<symbol>\w+)[^\S\n]+(?<action>BUY|SELL|LONG|SHORT)[^\S\n]+\$?(?<price>\d+(?:\.\d+)?)/,
    priceMode: 'limit'
  },
  {
    rule: 'SYMBOL_FIRST_ENTRY',
    pattern: /(?:🚀|📈|📊)?[^\S\n]*(?<symbol>\w+)[^\S\n]+(?<action>LONG|SHORT|BUY|SELL)[^\S\n]+(?:ENTRY:?)?[^\S\n]*\$?(?<price>\d+(?:\.\d+)?)/,
    priceMode: 'limit'
  },
  {
    rule: 'DIRECTION_SYMBOL_PRICE',
    pattern: /(?<action>LONG|SHORT)[^\S\n]+(?<symbol>\w+)[^\S\n]+(?<price>\d+(?:\.\d+)?)/,
    priceMode: 'limit'
  },
  {
    rule: 'SIDE_SYMBOL_PRICE',
    pattern: /(?<action>BUY|SELL)[^\S\n]+(?<symbol>\w+)[^\S\n]+(?<price>\d+(?:\.\d+)?)/,
    priceMode: 'limit'
  },
  {
    rule: 'CATCH_ALL',
    pattern: /(?<action>BUY|SELL|LONG|SHORT)[^\S\n]+(?<symbol>\w+)[^\S\n]+(?:AT|@)?[^\S\n]*\$?(?<price>\d+(?:\.\d+)?)(?<suffix>[KM])?/,
    priceMode: 'limit'
  }
];

const LEVERAGE_PATTERN = /(?<multiplier>\d+)X|LEVERAGE[:\s]*(?<value>\d+)/;
// Only a percentage directly after the price (or symbol, for market calls) sizes a close
const CLOSE_FRACTION_PATTERN = /^[KM]?[^\S\n]*(?<percent>\d+(?:\.\d+)?)[^\S\n]*%/;
const NUMBER_PATTERN = /\d+(?:\.\d+)?/g;
const LEVERAGE_LINE_PATTERN = /(?<value>\d+)X?/;

const MAIN_LINE_PATTERN = /(?<kind>LIMIT|MARKET)?\s*(?<action>LONG|SHORT|BUY|SELL)\s+(?<symbol>\w+)[:,]?\s*(?<prices>[\d./\s]+)/;
const ALT_MAIN_LINE_PATTERNS: readonly RegExp[] = [
  /(?<symbol>\w+)\s+(?<action>LONG|SHORT|BUY|SELL)[:,]\s*(?<prices>[\d./\s]+)/,
  /(?<action>LONG|SHORT|BUY|SELL)\s+(?<symbol>\w+)[:,]\s*(?<prices>[\d./\s]+)/
];

const ACTION_WORDS = ['LONG', 'SHORT', 'BUY', 'SELL'];
const ORDER_KIND_WORDS = ['LIMIT', 'MARKET'];
const ENTRY_KEYWORDS = ['ENTRY', 'ENTRIES'];
const STOP_KEYWORDS = ['STOP LOSS', 'STOP:', 'SL:'];
const TAKE_PROFIT_KEYWORDS = ['TP:', 'TAKE PROFIT', 'TARGET:', 'PROFIT:'];
const LEVERAGE_KEYWORDS = ['LEVERAGE', 'LEV'];
const SUPPLEMENT_HINTS = ['SL', 'STOP', 'TP', 'TAKE PROFIT', 'TARGET'];

const PRICE_MULTIPLIERS: Record<string, number> = {
  K: 1_000,
  M: 1_000_000
};

function containsAny(line: string, words: readonly string[]): boolean {
  return words.some(word => line.includes(word));
}

function toSide(action: string): OrderSide {
  return action === 'LONG' || action === 'BUY' ? 'BUY' : 'SELL';
}

function extractNumbers(text: string): number[] {
  return (text.match(NUMBER_PATTERN) ?? []).map(Number);
}

function firstNumber(text: string): number | undefined {
  return extractNumbers(text)[0];
}

function positive(value: number | undefined): number | undefined {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : undefined;
}

export class IntentParser {
  private readonly defaultLeverage: number;
  private readonly defaultMarketSymbol: string;

  constructor(options: IntentParserOptions = {}) {
    this.defaultLeverage = options.defaultLeverage ?? 2;
    this.defaultMarketSymbol = (options.defaultMarketSymbol ?? 'BTC').toUpperCase();
  }

  /**
   * Parse a single-line trade call through the rule cascade
   */
  parse(rawText: string): TradeIntent | null {
    const text = rawText.toUpperCase();
    const match = this.matchCascade(text);
    const intent = match ? this.finalize(match, text, {}) : null;
    this.report('single-line', rawText, intent);
    return intent;
  }

  /**
   * Parse a block-structured call with one directive per line
   */
  parseMultiline(rawText: string): TradeIntent | null {
    const intent = this.matchMultiline(rawText);
    this.report('multiline', rawText, intent);
    return intent;
  }

  /**
   * Extract stop loss, take profits, entries and leverage from any message
   */
  parseSupplement(rawText: string): IntentSupplement {
    const supplement: IntentSupplement = {};

    for (const rawLine of rawText.trim().split('\n')) {
      const line = rawLine.trim().toUpperCase();
      if (!line) {
        continue;
      }

      if (containsAny(line, STOP_KEYWORDS)) {
        const stopLoss = positive(firstNumber(line));
        if (stopLoss !== undefined) {
          supplement.stopLoss = stopLoss;
        }
        continue;
      }

      if (containsAny(line, TAKE_PROFIT_KEYWORDS)) {
        const prices = extractNumbers(line);
        if (prices.length > 0) {
          supplement.takeProfits = prices;
        }
        continue;
      }

      if (containsAny(line, ENTRY_KEYWORDS)) {
        // A lone entry price never overrides the primary line's price
        const prices = extractNumbers(line);
        if (prices.length > 1) {
          supplement.entries = prices;
        }
        continue;
      }

      if (containsAny(line, LEVERAGE_KEYWORDS)) {
        const leverage = positive(this.leverageFromLine(line));
        if (leverage !== undefined) {
          supplement.leverage = leverage;
        }
      }
    }

    return supplement;
  }

  /**
   * Full chat-message pipeline: single-line cascade, block fallback, then supplement merge
   */
  parseMessage(rawText: string): TradeIntent | null {
    const text = rawText.toUpperCase();
    const match = this.matchCascade(text);

    if (!match) {
      const intent = this.matchMultiline(rawText);
      this.report('multiline', rawText, intent);
      return intent;
    }

    const needsSupplement = rawText.includes('\n') || containsAny(text, SUPPLEMENT_HINTS);
    const supplement = needsSupplement ? this.parseSupplement(rawText) : {};
    const intent = this.finalize(match, text, supplement);
    this.report('single-line', rawText, intent);
    return intent;
  }

  private matchCascade(text: string): CascadeMatch | null {
    for (const candidate of CASCADE) {
      const match = candidate.pattern.exec(text);
      if (!match?.groups) {
        continue;
      }

      const groups = match.groups;
      const symbol = groups.symbol ?? this.defaultMarketSymbol;
      const side = groups.action ? toSide(groups.action) : 'BUY';
      const sellFraction = side === 'SELL' ? this.closeFraction(text.slice(match.index + match[0].length)) : 1;

      if (candidate.priceMode === 'market') {
        return {
          rule: candidate.rule,
          side,
          symbol,
          orderKind: 'MARKET',
          leverage: positive(groups.leverage !== undefined ? Number(groups.leverage) : undefined),
          sellFraction
        };
      }

      const priceToken = groups.price;
      if (priceToken === undefined) {
        continue;
      }

      // Only a K/M immediately after the captured number scales it
      const priceEnd = match.index + match[0].length - (groups.suffix?.length ?? 0);
      const multiplier = PRICE_MULTIPLIERS[text.charAt(priceEnd)] ?? 1;
      const price = positive(Number(priceToken) * multiplier);
      if (price === undefined) {
        return null;
      }

      return {
        rule: candidate.rule,
        side,
        symbol,
        orderKind: candidate.priceMode === 'explicit-kind' && groups.kind === 'MARKET' ? 'MARKET' : 'LIMIT',
        price,
        sellFraction
      };
    }

    return null;
  }

  private matchMultiline(rawText: string): TradeIntent | null {
    const lines = rawText.trim().split('\n');
    if (lines.length < 2) {
      return null;
    }

    let side: OrderSide | undefined;
    let symbol: string | undefined;
    let orderKind: OrderKind | undefined;
    let price: number | undefined;
    let entries: number[] | undefined;
    let stopLoss: number | undefined;
    let takeProfits: number[] | undefined;
    let leverage: number | undefined;

    const applyPrices = (prices: number[]): void => {
      if (prices.length > 1) {
        entries = prices;
      }
      if (prices.length > 0) {
        price = prices[0];
      }
    };

    for (const rawLine of lines) {
      const line = rawLine.trim().toUpperCase();

      if (containsAny(line, ORDER_KIND_WORDS) && containsAny(line, ACTION_WORDS)) {
        const groups = MAIN_LINE_PATTERN.exec(line)?.groups;
        if (groups?.action && groups.symbol) {
          orderKind = groups.kind === 'MARKET' ? 'MARKET' : 'LIMIT';
          side = toSide(groups.action);
          symbol = groups.symbol;
          applyPrices(extractNumbers(groups.prices ?? ''));
        }
      } else if (line.includes(':') && containsAny(line, ACTION_WORDS)) {
        for (const pattern of ALT_MAIN_LINE_PATTERNS) {
          const groups = pattern.exec(line)?.groups;
          if (groups?.action && groups.symbol) {
            side = toSide(groups.action);
            symbol = groups.symbol;
            applyPrices(extractNumbers(groups.prices ?? ''));
            break;
          }
        }
      } else if (containsAny(line, ENTRY_KEYWORDS)) {
        applyPrices(extractNumbers(line));
      } else if (containsAny(line, STOP_KEYWORDS)) {
        stopLoss = positive(firstNumber(line)) ?? stopLoss;
      } else if (containsAny(line, TAKE_PROFIT_KEYWORDS)) {
        const prices = extractNumbers(line);
        if (prices.length > 0) {
          takeProfits = prices;
        }
      } else if (containsAny(line, LEVERAGE_KEYWORDS)) {
        leverage = positive(this.leverageFromLine(line)) ?? leverage;
      }
    }

    if (!side || !symbol || positive(price) === undefined) {
      return null;
    }

    const entryLevels: EntryPrice[] = entries ?? (price !== undefined ? [price] : []);

    return {
      action: side === 'BUY' ? 'OPEN' : 'CLOSE',
      side,
      symbol,
      orderKind: orderKind ?? 'LIMIT',
      entries: entryLevels,
      leverage: leverage ?? this.defaultLeverage,
      stopLoss,
      takeProfits: takeProfits ?? [],
      // Block calls have no close-percentage slot; a SELL block closes in full
      sellFraction: 1,
      rule: 'MULTILINE'
    };
  }

  private finalize(match: CascadeMatch, text: string, supplement: IntentSupplement): TradeIntent {
    // A structurally matched leverage outranks the generic pass
    const leverage = match.leverage ?? this.leverageFromText(text) ?? supplement.leverage ?? this.defaultLeverage;
    const entries: EntryPrice[] = supplement.entries ?? [match.price ?? 'market'];

    return {
      action: match.side === 'BUY' ? 'OPEN' : 'CLOSE',
      side: match.side,
      symbol: match.symbol,
      orderKind: match.orderKind,
      entries,
      leverage,
      stopLoss: supplement.stopLoss,
      takeProfits: supplement.takeProfits ?? [],
      sellFraction: match.sellFraction,
      rule: match.rule
    };
  }

  private leverageFromText(text: string): number | undefined {
    const groups = LEVERAGE_PATTERN.exec(text)?.groups;
    const raw = groups?.multiplier ?? groups?.value;
    return positive(raw !== undefined ? Number(raw) : undefined);
  }

  private leverageFromLine(line: string): number | undefined {
    const raw = LEVERAGE_LINE_PATTERN.exec(line)?.groups?.value;
    return raw !== undefined ? Number(raw) : undefined;
  }

  private closeFraction(afterPrice: string): number {
    const raw = CLOSE_FRACTION_PATTERN.exec(afterPrice)?.groups?.percent;
    if (raw === undefined) {
      return 1;
    }
    return Math.min(Number(raw) / 100, 1);
  }

  private report(mode: 'single-line' | 'multiline', rawText: string, intent: TradeIntent | null): void {
    const logger = getLogger();

    if (!intent) {
      logger.debug('Not a trading message', {
        mode,
        preview: rawText.substring(0, 80)
      });
      return;
    }

    logger.info('Trade intent parsed', {
      mode,
      rule: intent.rule,
      action: intent.action,
      symbol: intent.symbol,
      orderKind: intent.orderKind,
      entries: intent.entries,
      leverage: intent.leverage,
      stopLoss: intent.stopLoss,
      takeProfits: intent.takeProfits,
      sellFraction: intent.sellFraction
    });
  }
}
