/**
 * Position Sizer
 *
 * Converts a target allocation into a whole-share quantity from the
 * account equity, leverage and current price.
 */

import { requireFinite } from '../errors.js';
import type { PositionSizerConfig, PositionSizeResult } from './types.js';

export class PositionSizer {
  private readonly config: PositionSizerConfig;

  constructor(config: PositionSizerConfig) {
    requireFinite('leverage', config.leverage);
    if (config.leverage <= 0) {
      throw new RangeError(`leverage must be positive, got ${config.leverage}`);
    }
    this.config = config;
  }

  /**
   * Calculate the share quantity for an allocation
   *
   * Formula:
   * 1. notionalValue = |allocation| * equity * leverage
   * 2. notionalValue = min(notionalValue, buying power left after currentExposure)
   * 3. quantity = floor(notionalValue / price), signed like allocation
   */
  calculateQuantity(
    allocation: number,
    equity: number,
    price: number,
    currentExposure = 0
  ): PositionSizeResult {
    if (!Number.isFinite(allocation) || allocation === 0) {
      return this.createInvalidResult(`Allocation ${allocation} is not tradable`);
    }

    if (!(price > 0)) {
      return this.createInvalidResult(`Price ${price} must be positive`);
    }

    if (!(equity > 0)) {
      return this.createInvalidResult(`Equity ${equity.toFixed(2)} leaves no buying power`);
    }

    const buyingPower = Math.max(0, equity * this.config.leverage - Math.abs(currentExposure));
    const notionalValue = Math.min(Math.abs(allocation) * equity * this.config.leverage, buyingPower);
    const shares = Math.floor(notionalValue / price);

    if (shares === 0) {
      return this.createInvalidResult(
        `Notional ${notionalValue.toFixed(2)} buys no whole share at ${price}`
      );
    }

    return {
      quantity: Math.sign(allocation) * shares,
      notionalValue: shares * price,
      valid: true,
    };
  }

  getConfig(): Readonly<PositionSizerConfig> {
    return this.config;
  }

  /**
   * Create an invalid position size result
   */
  private createInvalidResult(reason: string): PositionSizeResult {
    return {
      quantity: 0,
      notionalValue: 0,
      valid: false,
      reason,
    };
  }
}
