/**
 * Logging utility with different levels and structured output
 */

import path from 'path';
import winston from 'winston';
import { LogLevel } from '../types';

export type LoggerOptions = {
  logLevel: LogLevel;
  logDir?: string;
  silent?: boolean;
};

let logger: winston.Logger | undefined;

/**
 * Initialize logger with configuration
 */
export function initializeLogger(options: LoggerOptions): void {
  const logFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
    winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
      let log = `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}`;

      if (Object.keys(meta).length > 0) {
        log += ` ${JSON.stringify(meta)}`;
      }

      if (stack) {
        log += `\n${String(stack)}`;
      }

      return log;
    })
  );

  const fileTransports = options.logDir && !options.silent
    ? [
      new winston.transports.File({
        filename: path.join(options.logDir, 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5
      }),
      new winston.transports.File({
        filename: path.join(options.logDir, 'combined.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5
      })
    ]
    : [];

  logger = winston.createLogger({
    level: options.logLevel,
    format: logFormat,
    transports: [
      new winston.transports.Console({
        silent: options.silent ?? false,
        format: winston.format.combine(
          winston.format.colorize(),
          logFormat
        )
      }),
      ...fileTransports
    ]
  });
}

/**
 * Get the logger instance
 */
export function getLogger(): winston.Logger {
  if (!logger) {
    throw new Error('Logger not initialized. Call initializeLogger() first.');
  }
  return logger;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Log a chat message that reached the signal pipeline
 */
export function logSignalReceived(text: string, source: string): void {
  getLogger().info('Chat message received', {
    source,
    preview: text.substring(0, 100)
  });
}

/**
 * Log trade execution
 */
export function logTradeExecution(
  action: 'OPEN' | 'CLOSE' | 'STOP_LOSS' | 'TAKE_PROFIT' | 'ORDER',
  details: Record<string, unknown>
): void {
  getLogger().info(`Trade ${action.toLowerCase().replace('_', ' ')}`, details);
}

/**
 * Log venue errors with context
 */
export function logVenueError(venue: string, error: unknown, context?: Record<string, unknown>): void {
  getLogger().error(`${venue.toUpperCase()} venue error`, {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
    context
  });
}

/**
 * Log chat platform errors with context
 */
export function logChatError(error: unknown, context?: Record<string, unknown>): void {
  getLogger().error('Chat error', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
    context
  });
}

/**
 * Log configuration errors
 */
export function logConfigError(errors: string[]): void {
  getLogger().error('Configuration validation failed', { errors });
}

/**
 * Log position updates
 */
export function logPositionUpdate(symbol: string, update: Record<string, unknown>): void {
  getLogger().info('Position updated', {
    symbol,
    ...update
  });
}
