/**
 * Main trading bot service that orchestrates all components
 */

import {
  AppConfig,
  ChatSource,
  ExecuteIntentResult,
  RawChatMessage,
  TradeIntent,
  VenueClient
} from '../types';
import { formatExecution, formatIntent, formatPosition } from '../utils/format';
import { errorMessage, getLogger, logChatError, logSignalReceived } from '../utils/logger';
import { ExecutionEngine } from './execution-engine';
import { FractionAllocator } from './fraction-allocator';
import { IntentParser } from './intent-parser';
import { PositionMonitor } from './position-monitor';
import { PositionStore } from './position-store';
import { TradeEventBus } from './trade-events';

export type TradingBotDeps = {
  chat: ChatSource;
  venue: VenueClient;
  events?: TradeEventBus;
};

export type IgnoreReason = 'UNAUTHORIZED' | 'EMPTY' | 'NOT_A_SIGNAL' | 'POSITION_LIMIT';

export type MessageOutcome =
  | { kind: 'IGNORED'; reason: IgnoreReason }
  | { kind: 'COMMAND'; command: string; reply: string }
  | { kind: 'PENDING'; intent: TradeIntent }
  | { kind: 'EXECUTED'; intent: TradeIntent; result: ExecuteIntentResult };

export type BotStatus = {
  isRunning: boolean;
  chatConnected: boolean;
  autoExecute: boolean;
  venue: string;
  openPositions: number;
  maxConcurrentPositions: number;
  pendingSignal: string | null;
  takeProfitWeighting: string;
};

const PERCENT_TOKEN = /^(\d+(?:\.\d+)?)%$/;

export class TradingBot {
  private config: AppConfig;
  private chat: ChatSource;
  private venue: VenueClient;
  private events: TradeEventBus;
  private store: PositionStore;
  private parser: IntentParser;
  private takeProfitAllocator: FractionAllocator;
  private engine: ExecutionEngine;
  private monitor: PositionMonitor;
  private autoExecute: boolean;
  private pendingIntent: TradeIntent | null = null;
  private isRunning = false;

  constructor(config: AppConfig, deps: TradingBotDeps) {
    this.config = config;
    this.chat = deps.chat;
    this.venue = deps.venue;
    this.events = deps.events ?? new TradeEventBus();
    this.autoExecute = config.bot.autoExecute;

    this.store = new PositionStore();
    this.parser = new IntentParser({
      defaultLeverage: config.trading.defaultLeverage,
      defaultMarketSymbol: config.trading.defaultMarketSymbol
    });
    this.takeProfitAllocator = new FractionAllocator(config.trading.takeProfitWeighting);
    this.engine = new ExecutionEngine({
      venue: this.venue,
      store: this.store,
      config: config.trading,
      takeProfitAllocator: this.takeProfitAllocator,
      entryAllocator: new FractionAllocator(config.trading.entryWeighting),
      events: this.events
    });
    this.monitor = new PositionMonitor({
      marketData: this.venue,
      store: this.store,
      engine: this.engine,
      takeProfitAllocator: this.takeProfitAllocator,
      config: config.trading,
      events: this.events
    });
  }

  /**
   * Start the trading bot
   */
  async start(): Promise<void> {
    const logger = getLogger();

    try {
      logger.info('Starting trading bot...');

      logger.info('Testing venue connection...', { venue: this.venue.name });
      const balance = await this.venue.getAccountBalance();
      logger.info('Venue connection successful', { venue: this.venue.name, balance });

      logger.info('Connecting to chat...');
      await this.chat.connect();
      this.chat.onMessage(message => this.handleMessage(message).then(() => undefined));

      this.monitor.start();

      this.isRunning = true;
      logger.info('Trading bot started successfully', {
        signalSource: this.config.telegram.signalSource,
        autoExecute: this.autoExecute,
        positionSizePercentage: this.config.trading.positionSizePercentage
      });
    } catch (error) {
      logger.error('Failed to start trading bot', { error: errorMessage(error) });
      await this.stop();
      throw error;
    }
  }

  /**
   * Stop the trading bot
   */
  async stop(): Promise<void> {
    const logger = getLogger();

    try {
      logger.info('Stopping trading bot...');
      this.isRunning = false;
      this.monitor.stop();

      if (this.chat.isClientConnected()) {
        await this.chat.disconnect();
      }

      logger.info('Trading bot stopped', {
        openPositions: this.store.count()
      });
    } catch (error) {
      logger.error('Error stopping trading bot', { error: errorMessage(error) });
    }
  }

  /**
   * Handle one incoming chat message end to end
   */
  async handleMessage(message: RawChatMessage): Promise<MessageOutcome> {
    const logger = getLogger();

    if (!this.isAuthorized(message)) {
      logger.debug('Ignoring message from unauthorized sender', {
        messageId: message.messageId,
        sender: message.senderUsername ?? message.senderId
      });
      return { kind: 'IGNORED', reason: 'UNAUTHORIZED' };
    }

    const text = message.text.trim();
    if (!text) {
      return { kind: 'IGNORED', reason: 'EMPTY' };
    }

    if (text.startsWith(this.config.bot.commandPrefix)) {
      return this.handleCommand(message, text.slice(this.config.bot.commandPrefix.length));
    }

    logSignalReceived(text, message.senderUsername ?? message.chatId);

    const intent = this.parser.parseMessage(text);
    if (!intent) {
      return { kind: 'IGNORED', reason: 'NOT_A_SIGNAL' };
    }

    this.events.emit({ type: 'INTENT_PARSED', intent, source: message.chatId });

    if (intent.action === 'OPEN' && this.atPositionLimit(intent.symbol)) {
      logger.warn('Maximum concurrent positions reached, skipping signal', {
        symbol: intent.symbol,
        openPositions: this.store.count(),
        maxAllowed: this.config.trading.maxConcurrentPositions
      });
      await this.safeReply(
        message,
        `⚠️ Skipped ${intent.symbol}: ${this.store.count()} positions already open`
      );
      return { kind: 'IGNORED', reason: 'POSITION_LIMIT' };
    }

    if (!this.autoExecute) {
      this.pendingIntent = intent;
      const prefix = this.config.bot.commandPrefix;
      await this.safeReply(
        message,
        `${formatIntent(intent)}\n\nReply ${prefix}confirm to execute or ${prefix}ignore to skip`
      );
      return { kind: 'PENDING', intent };
    }

    const result = await this.engine.executeIntent(intent);
    await this.safeReply(message, formatExecution(result));
    return { kind: 'EXECUTED', intent, result };
  }

  private async handleCommand(message: RawChatMessage, body: string): Promise<MessageOutcome> {
    const [rawName = '', ...args] = body.trim().split(/\s+/);
    const command = rawName.toLowerCase();
    let reply: string;

    switch (command) {
      case 'status':
        reply = this.statusText();
        break;
      case 'close':
        reply = await this.closeCommand(args);
        break;
      case 'toggle_auto':
        this.autoExecute = !this.autoExecute;
        reply = `Auto-execute ${this.autoExecute ? 'enabled' : 'disabled'}`;
        break;
      case 'confirm':
        reply = await this.confirmPending();
        break;
      case 'ignore':
        reply = this.pendingIntent ? `Ignored ${this.pendingIntent.symbol} signal` : 'No pending signal';
        this.pendingIntent = null;
        break;
      case 'weights':
        this.takeProfitAllocator.setWeighting(args.join(' '));
        reply = `Take-profit weighting: ${this.takeProfitAllocator.getWeighting() ?? 'equal'}`;
        break;
      default:
        reply = `Unknown command: ${command}`;
    }

    getLogger().info('Chat command handled', { command, messageId: message.messageId });
    await this.safeReply(message, reply);
    return { kind: 'COMMAND', command, reply };
  }

  /**
   * close <SYMBOL> [PRICE] [N%]: market close without a price, limit close with one
   */
  private async closeCommand(args: string[]): Promise<string> {
    const [rawSymbol, ...rest] = args;
    if (!rawSymbol) {
      return `Usage: ${this.config.bot.commandPrefix}close <SYMBOL> [PRICE] [PERCENT%]`;
    }

    let price: number | undefined;
    let sellFraction = 1;
    for (const token of rest) {
      const percent = PERCENT_TOKEN.exec(token)?.[1];
      if (percent !== undefined) {
        sellFraction = Number(percent) / 100;
      } else if (Number.isFinite(Number(token))) {
        price = Number(token);
      } else {
        return `Invalid close argument: ${token}`;
      }
    }

    const result = await this.engine.closePosition(rawSymbol, {
      orderKind: price === undefined ? 'MARKET' : 'LIMIT',
      price,
      sellFraction
    });
    return formatExecution({ action: 'CLOSE', ...result });
  }

  private async confirmPending(): Promise<string> {
    const intent = this.pendingIntent;
    if (!intent) {
      return 'No pending signal';
    }
    this.pendingIntent = null;

    if (intent.action === 'OPEN' && this.atPositionLimit(intent.symbol)) {
      return `⚠️ Skipped ${intent.symbol}: ${this.store.count()} positions already open`;
    }

    const result = await this.engine.executeIntent(intent);
    return formatExecution(result);
  }

  private statusText(): string {
    const positions = this.store.list();
    const lines = [
      `🤖 Venue: ${this.venue.name} | Auto-execute: ${this.autoExecute ? 'ON' : 'OFF'}`,
      `Open positions: ${positions.length}/${this.config.trading.maxConcurrentPositions}`,
      ...positions.map(formatPosition)
    ];
    if (this.pendingIntent) {
      lines.push(`Pending: ${this.pendingIntent.action} ${this.pendingIntent.symbol}`);
    }
    return lines.join('\n');
  }

  private isAuthorized(message: RawChatMessage): boolean {
    const allowed = this.config.telegram.authorizedSenders.map(sender => sender.toLowerCase());
    if (allowed.length === 0) {
      return true;
    }

    const candidates = [message.senderUsername, message.senderId]
      .filter((value): value is string => value !== undefined)
      .map(value => value.toLowerCase());
    return candidates.some(candidate => allowed.includes(candidate));
  }

  private atPositionLimit(symbol: string): boolean {
    // A duplicate symbol is rejected by the engine, not counted against the limit
    return !this.store.has(symbol) && this.store.count() >= this.config.trading.maxConcurrentPositions;
  }

  private async safeReply(message: RawChatMessage, text: string): Promise<void> {
    try {
      await this.chat.reply(message, text);
    } catch (error) {
      logChatError(error, { action: 'reply', messageId: message.messageId });
    }
  }

  getStatus(): BotStatus {
    return {
      isRunning: this.isRunning,
      chatConnected: this.chat.isClientConnected(),
      autoExecute: this.autoExecute,
      venue: this.venue.name,
      openPositions: this.store.count(),
      maxConcurrentPositions: this.config.trading.maxConcurrentPositions,
      pendingSignal: this.pendingIntent ? `${this.pendingIntent.action} ${this.pendingIntent.symbol}` : null,
      takeProfitWeighting: this.takeProfitAllocator.getWeighting() ?? 'equal'
    };
  }

  getPositions(): ReturnType<PositionStore['list']> {
    return this.store.list();
  }
}
