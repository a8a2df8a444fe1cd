/**
 * Barrel export for services
 */

export * from './intent-parser';
export * from './fraction-allocator';
export * from './position-store';
export * from './trade-events';
export * from './execution-engine';
export * from './position-monitor';
export * from './simulated-venue-client';
export * from './rest-venue-client';
export * from './telegram-client';
export * from './trading-bot';
