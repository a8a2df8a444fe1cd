/**
 * Configuration management with validation
 */

import * as dotenv from 'dotenv';
import {
  AppConfig,
  BotConfig,
  ConfigValidationResult,
  LogLevel,
  TelegramConfig,
  TradingConfig,
  VenueConfig,
  VenueMode
} from '../types';

// Load environment variables
dotenv.config();

const VALID_LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const VALID_VENUE_MODES: readonly VenueMode[] = ['simulated', 'rest'];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.some(level => level === value);
}

function isVenueMode(value: string): value is VenueMode {
  return VALID_VENUE_MODES.some(mode => mode === value);
}

function readNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  errors: string[],
  check: (value: number) => boolean,
  requirement: string
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    errors.push(`${key} ${requirement}`);
    return fallback;
  }
  return value;
}

function readOptional(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readList(env: NodeJS.ProcessEnv, key: string): string[] {
  return (env[key] ?? '')
    .split(',')
    .map(item => item.trim().replace(/^@/, ''))
    .filter(item => item.length > 0);
}

/**
 * Validates and loads configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConfigValidationResult {
  const errors: string[] = [];

  // Telegram configuration validation
  const telegramApiId = env.TELEGRAM_API_ID;
  const telegramApiHash = readOptional(env, 'TELEGRAM_API_HASH');
  const telegramSignalSource = readOptional(env, 'TELEGRAM_SIGNAL_SOURCE');

  if (!telegramApiId || isNaN(Number(telegramApiId))) {
    errors.push('TELEGRAM_API_ID must be a valid number');
  }
  if (!telegramApiHash) {
    errors.push('TELEGRAM_API_HASH is required');
  }
  if (!telegramSignalSource) {
    errors.push('TELEGRAM_SIGNAL_SOURCE is required');
  }

  // Venue configuration validation
  const venueMode = (env.VENUE_MODE ?? 'simulated').toLowerCase();
  const venueBaseUrl = readOptional(env, 'VENUE_BASE_URL');
  if (!isVenueMode(venueMode)) {
    errors.push(`VENUE_MODE must be one of: ${VALID_VENUE_MODES.join(', ')}`);
  } else if (venueMode === 'rest' && !venueBaseUrl) {
    errors.push('VENUE_BASE_URL is required when VENUE_MODE is rest');
  }
  const venueTimeoutMs = readNumber(env, 'VENUE_TIMEOUT_MS', 10_000, errors, v => v > 0, 'must be a positive number');
  const simulatedBalance = readNumber(env, 'SIMULATED_BALANCE', 1_000, errors, v => v >= 0, 'must not be negative');

  // Trading configuration validation
  const defaultLeverage = readNumber(env, 'DEFAULT_LEVERAGE', 2, errors, v => v > 0, 'must be a positive number');
  const positionSizePercentage = readNumber(
    env, 'POSITION_SIZE_PERCENTAGE', 0.1, errors, v => v > 0 && v <= 1, 'must be a fraction in (0, 1]'
  );
  const stopLossPercentage = readNumber(env, 'STOP_LOSS_PERCENTAGE', 0.05, errors, v => v > 0, 'must be a positive number');
  const takeProfitPercentage = readNumber(env, 'TAKE_PROFIT_PERCENTAGE', 0.02, errors, v => v > 0, 'must be a positive number');
  const pollingIntervalMs = readNumber(env, 'POLLING_INTERVAL_MS', 60_000, errors, v => v >= 1_000, 'must be at least 1000');
  const maxConcurrentPositions = readNumber(
    env, 'MAX_CONCURRENT_POSITIONS', 5, errors, v => Number.isInteger(v) && v > 0, 'must be a positive integer'
  );

  // Bot configuration validation
  const logLevel = (env.LOG_LEVEL ?? 'info').toLowerCase();
  if (!isLogLevel(logLevel)) {
    errors.push(`LOG_LEVEL must be one of: ${VALID_LOG_LEVELS.join(', ')}`);
  }

  if (errors.length > 0 || !telegramApiHash || !telegramSignalSource || !isLogLevel(logLevel) || !isVenueMode(venueMode)) {
    return {
      valid: false,
      errors
    };
  }

  const telegram: TelegramConfig = {
    apiId: Number(telegramApiId),
    apiHash: telegramApiHash,
    signalSource: telegramSignalSource,
    authorizedSenders: readList(env, 'TELEGRAM_AUTHORIZED_SENDERS')
  };

  const sessionString = readOptional(env, 'TELEGRAM_SESSION_STRING');
  if (sessionString) {
    telegram.sessionString = sessionString;
  }

  const venue: VenueConfig = {
    mode: venueMode,
    baseUrl: venueBaseUrl,
    apiKey: readOptional(env, 'VENUE_API_KEY'),
    timeoutMs: venueTimeoutMs,
    simulatedBalance
  };

  const trading: TradingConfig = {
    defaultLeverage,
    positionSizePercentage,
    stopLossPercentage,
    takeProfitPercentage,
    takeProfitWeighting: readOptional(env, 'TP_WEIGHTING'),
    entryWeighting: readOptional(env, 'ENTRY_WEIGHTING'),
    pollingIntervalMs,
    venueTimeoutMs,
    defaultMarketSymbol: (readOptional(env, 'DEFAULT_MARKET_SYMBOL') ?? 'BTC').toUpperCase(),
    maxConcurrentPositions
  };

  const bot: BotConfig = {
    logLevel,
    logDir: readOptional(env, 'LOG_DIR') ?? 'logs',
    autoExecute: env.AUTO_EXECUTE?.toLowerCase() === 'true',
    commandPrefix: readOptional(env, 'COMMAND_PREFIX') ?? '!'
  };

  return {
    valid: true,
    config: {
      telegram,
      venue,
      trading,
      bot
    }
  };
}

/**
 * Masks sensitive configuration values for logging
 */
export function maskSensitiveConfig(config: AppConfig): Record<string, unknown> {
  return {
    telegram: {
      apiId: config.telegram.apiId,
      apiHash: '***masked***',
      signalSource: config.telegram.signalSource,
      authorizedSenders: config.telegram.authorizedSenders,
      sessionString: config.telegram.sessionString ? '***masked***' : undefined
    },
    venue: {
      mode: config.venue.mode,
      baseUrl: config.venue.baseUrl,
      apiKey: config.venue.apiKey ? config.venue.apiKey.substring(0, 4) + '***masked***' : undefined,
      timeoutMs: config.venue.timeoutMs
    },
    trading: config.trading,
    bot: config.bot
  };
}
