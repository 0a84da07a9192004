#!/usr/bin/env node
/**
 * Regime Channel Trader
 *
 * Entry point: replays the configured bars file through the strategy.
 */

import { App } from './app.js';
import { logger } from './logger.js';

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
  process.exitCode = 1;
});

async function main(): Promise<void> {
  try {
    logger.info('='.repeat(50));
    logger.info('Regime Channel Trader');
    logger.info('='.repeat(50));

    const app = new App();
    await app.run();
  } catch (error) {
    logger.error('Backtest failed', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
  }
}

// Run
void main();
