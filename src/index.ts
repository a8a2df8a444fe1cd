/**
 * Main entry point for the chat signal trader
 */

import { loadConfig, maskSensitiveConfig } from './utils/config';
import { errorMessage, initializeLogger, getLogger, logConfigError } from './utils/logger';
import { RestVenueClient } from './services/rest-venue-client';
import { SimulatedVenueClient } from './services/simulated-venue-client';
import { TelegramClient } from './services/telegram-client';
import { TradingBot } from './services/trading-bot';
import { AppConfig, VenueClient } from './types';

const STATUS_INTERVAL_MS = 5 * 60 * 1000;

function createVenue(config: AppConfig): VenueClient {
  if (config.venue.mode === 'rest') {
    return new RestVenueClient(config.venue);
  }
  return new SimulatedVenueClient({ balance: config.venue.simulatedBalance });
}

/**
 * Initialize and start the trading bot
 */
async function main(): Promise<void> {
  const configResult = loadConfig();

  if (!configResult.valid) {
    initializeLogger({ logLevel: 'error' });
    logConfigError(configResult.errors);
    console.error('\nPlease copy .env.example to .env and fill in your credentials.');
    process.exit(1);
  }

  const config = configResult.config;

  initializeLogger(config.bot);
  const logger = getLogger();

  logger.info('Signal trader starting up', {
    config: maskSensitiveConfig(config),
    environment: {
      nodeVersion: process.version,
      platform: process.platform
    }
  });

  const bot = new TradingBot(config, {
    chat: new TelegramClient(config.telegram),
    venue: createVenue(config)
  });

  let statusTimer: NodeJS.Timeout | undefined;

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    if (statusTimer) {
      clearInterval(statusTimer);
    }

    try {
      await bot.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection at Promise', {
      reason: reason instanceof Error ? reason.message : String(reason)
    });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception', {
      error: error.message,
      stack: error.stack
    });
    process.exit(1);
  });

  await bot.start();

  statusTimer = setInterval(() => {
    logger.info('Bot status update', bot.getStatus());
  }, STATUS_INTERVAL_MS);

  logger.info('Signal trader is now running. Press Ctrl+C to stop.');
}

if (require.main === module) {
  main().catch(error => {
    console.error('Failed to start signal trader:', error);
    process.exit(1);
  });
}

export * from './services';
export * from './types';
export { loadConfig } from './utils/config';
