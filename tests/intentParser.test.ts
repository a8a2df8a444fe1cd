import { describe, expect, it } from 'vitest';

import { IntentParser } from '../src/services/intent-parser';

const parser = new IntentParser();

describe('IntentParser.parse', () => {
  it('parses an action-at-price call as a limit open', () => {
    const intent = parser.parse('BUY BTC AT 50000');

    expect(intent).toMatchObject({
      action: 'OPEN',
      side: 'BUY',
      symbol: 'BTC',
      orderKind: 'LIMIT',
      entries: [50000],
      leverage: 2,
      takeProfits: [],
      sellFraction: 1,
      rule: 'ACTION_AT_PRICE'
    });
  });

  it('maps SHORT to a sell-side close', () => {
    const intent = parser.parse('SHORT SOL 150');

    expect(intent).toMatchObject({
      action: 'CLOSE',
      side: 'SELL',
      symbol: 'SOL',
      orderKind: 'LIMIT',
      entries: [150],
      leverage: 2,
      sellFraction: 1,
      rule: 'DIRECTION_SYMBOL_PRICE'
    });
  });

  it('takes the explicit leverage of a buy-now call', () => {
    const intent = parser.parse('Buy Now ETH 10X');

    expect(intent).toMatchObject({
      action: 'OPEN',
      symbol: 'ETH',
      orderKind: 'MARKET',
      entries: ['market'],
      leverage: 10,
      rule: 'BUY_NOW'
    });
  });

  it('falls back to the default symbol for a bare market call', () => {
    const intent = parser.parse('Market LONG');

    expect(intent).toMatchObject({
      action: 'OPEN',
      symbol: 'BTC',
      orderKind: 'MARKET',
      entries: ['market'],
      leverage: 2,
      rule: 'MARKET_DEFAULT_SYMBOL'
    });
  });

  it('uses the configured default symbol and leverage', () => {
    const custom = new IntentParser({ defaultLeverage: 3, defaultMarketSymbol: 'eth' });

    expect(custom.parse('market long')).toMatchObject({ symbol: 'ETH', leverage: 3 });
    expect(custom.parse('LONG BTC 50000')).toMatchObject({ symbol: 'BTC', leverage: 3 });
  });

  it('parses a market direction with a symbol', () => {
    expect(parser.parse('Market short ETH')).toMatchObject({
      action: 'CLOSE',
      side: 'SELL',
      symbol: 'ETH',
      orderKind: 'MARKET',
      rule: 'MARKET_DIRECTION'
    });
  });

  it('keeps the captured order kind and reads leverage anywhere in the text', () => {
    expect(parser.parse('LIMIT BUY ETH $3200 20x')).toMatchObject({
      orderKind: 'LIMIT',
      symbol: 'ETH',
      entries: [3200],
      leverage: 20,
      rule: 'EXPLICIT_KIND'
    });

    expect(parser.parse('BUY BTC AT 50000 leverage 5')).toMatchObject({ leverage: 5 });
  });

  it('recognises prefixed and symbol-first phrasings', () => {
    expect(parser.parse('SIGNAL: SELL BTC $51000')).toMatchObject({
      action: 'CLOSE',
      entries: [51000],
      rule: 'SIGNAL_PREFIX'
    });
    expect(parser.parse('Position: LONG ETH entry: 3000')).toMatchObject({
      symbol: 'ETH',
      entries: [3000],
      rule: 'POSITION_PREFIX'
    });
    expect(parser.parse('ETH BUY 3100')).toMatchObject({
      symbol: 'ETH',
      entries: [3100],
      rule: 'SYMBOL_FIRST'
    });
    expect(parser.parse('BTC LONG entry 50000')).toMatchObject({
      symbol: 'BTC',
      entries: [50000],
      rule: 'SYMBOL_FIRST_ENTRY'
    });
  });

  it('scales prices followed by K or M', () => {
    expect(parser.parse('SELL BTC 50K')).toMatchObject({ entries: [50000], rule: 'SIDE_SYMBOL_PRICE' });
    expect(parser.parse('BUY BTC @ 1.5M')).toMatchObject({ entries: [1500000], rule: 'ACTION_AT_PRICE' });
  });

  it('reads a close percentage for sell calls', () => {
    expect(parser.parse('Sell ETH 3500 50%')).toMatchObject({
      action: 'CLOSE',
      entries: [3500],
      sellFraction: 0.5
    });
    expect(parser.parse('SELL ETH 3500 150%')).toMatchObject({ sellFraction: 1 });
  });

  it('only reads a percentage that directly follows the price', () => {
    expect(parser.parse('SHORT BTC 60000 (risk 2%)')).toMatchObject({
      action: 'CLOSE',
      entries: [60000],
      sellFraction: 1
    });
    expect(parser.parse('MARKET SHORT ETH 25%')).toMatchObject({
      rule: 'MARKET_DIRECTION',
      symbol: 'ETH',
      sellFraction: 0.25
    });
  });

  it('returns null for chatter', () => {
    expect(parser.parse('BTC is looking good')).toBeNull();
    expect(parser.parse('gm everyone')).toBeNull();
    expect(parser.parse('')).toBeNull();
  });
});

describe('IntentParser.parseMultiline', () => {
  const block = [
    'Limit Long BTC: 117320/116900/116500',
    'SL: 116250',
    'TP: 118900/119500/120000'
  ].join('\n');

  it('parses a laddered block', () => {
    const intent = parser.parseMultiline(block);

    expect(intent).toMatchObject({
      action: 'OPEN',
      side: 'BUY',
      symbol: 'BTC',
      orderKind: 'LIMIT',
      entries: [117320, 116900, 116500],
      stopLoss: 116250,
      takeProfits: [118900, 119500, 120000],
      leverage: 2,
      rule: 'MULTILINE'
    });
  });

  it('accepts a symbol-first main line with a colon', () => {
    const intent = parser.parseMultiline('ETH SHORT: 3200\nStop: 3400\nTarget: 3000');

    expect(intent).toMatchObject({
      action: 'CLOSE',
      symbol: 'ETH',
      orderKind: 'LIMIT',
      entries: [3200],
      stopLoss: 3400,
      takeProfits: [3000]
    });
  });

  it('requires at least two lines and a main line', () => {
    expect(parser.parseMultiline('LIMIT LONG BTC: 50000')).toBeNull();
    expect(parser.parseMultiline('SL: 100\nTP: 200')).toBeNull();
  });
});

describe('IntentParser.parseSupplement', () => {
  it('extracts stop loss, take profits, entries and leverage', () => {
    const supplement = parser.parseSupplement(
      'LONG BTC 50000\nEntries: 50000/49500\nStop loss 48000\nTake profit 52000 54000\nLeverage: 5x'
    );

    expect(supplement).toEqual({
      entries: [50000, 49500],
      stopLoss: 48000,
      takeProfits: [52000, 54000],
      leverage: 5
    });
  });

  it('ignores a single entry number', () => {
    expect(parser.parseSupplement('Entry: 50000')).toEqual({});
  });
});

describe('IntentParser.parseMessage', () => {
  it('falls back to the block parser', () => {
    const intent = parser.parseMessage('Limit Long BTC: 117320/116900/116500\nSL: 116250\nTP: 118900/119500/120000');

    expect(intent?.rule).toBe('MULTILINE');
    expect(intent?.entries).toEqual([117320, 116900, 116500]);
  });

  it('merges supplement fields into a single-line match', () => {
    const intent = parser.parseMessage('Buy Now ETH 10X\nSL: 3000\nTP: 3300/3500');

    expect(intent).toMatchObject({
      rule: 'BUY_NOW',
      symbol: 'ETH',
      entries: ['market'],
      leverage: 10,
      stopLoss: 3000,
      takeProfits: [3300, 3500]
    });
  });

  it('keeps the default symbol for a bare market call with trailing lines', () => {
    const intent = parser.parseMessage('Market LONG\nSL: 48000\nTP: 52000/54000');

    expect(intent).toMatchObject({
      rule: 'MARKET_DEFAULT_SYMBOL',
      symbol: 'BTC',
      orderKind: 'MARKET',
      entries: ['market'],
      stopLoss: 48000,
      takeProfits: [52000, 54000]
    });
  });

  it('replaces the entry with a supplied ladder', () => {
    const intent = parser.parseMessage('LONG BTC 50000\nEntries: 50000/49500\nLeverage: 5x');

    expect(intent).toMatchObject({
      rule: 'DIRECTION_SYMBOL_PRICE',
      entries: [50000, 49500],
      leverage: 5
    });
  });

  it('returns null for chatter', () => {
    expect(parser.parseMessage('BTC is looking good')).toBeNull();
    expect(parser.parseMessage('hello\nworld')).toBeNull();
  });
});
