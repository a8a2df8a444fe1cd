/**
 * Configuration types for the signal trader
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type TelegramConfig = {
  apiId: number;
  apiHash: string;
  sessionString?: string;
  signalSource: string;
  authorizedSenders: string[];
};

export type VenueMode = 'simulated' | 'rest';

export type VenueConfig = {
  mode: VenueMode;
  baseUrl?: string;
  apiKey?: string;
  timeoutMs: number;
  simulatedBalance: number;
};

export type TradingConfig = {
  defaultLeverage: number;
  positionSizePercentage: number; // Fraction of account equity per position, (0, 1]
  stopLossPercentage: number; // Leveraged loss ratio that forces a full close
  takeProfitPercentage: number; // Leveraged gain ratio for positions without TP levels
  takeProfitWeighting?: string;
  entryWeighting?: string;
  pollingIntervalMs: number;
  venueTimeoutMs: number;
  defaultMarketSymbol: string;
  maxConcurrentPositions: number;
};

export type BotConfig = {
  logLevel: LogLevel;
  logDir?: string;
  autoExecute: boolean;
  commandPrefix: string;
};

export type AppConfig = {
  telegram: TelegramConfig;
  venue: VenueConfig;
  trading: TradingConfig;
  bot: BotConfig;
};

export type ConfigValidationResult = {
  valid: true;
  config: AppConfig;
} | {
  valid: false;
  errors: string[];
};
