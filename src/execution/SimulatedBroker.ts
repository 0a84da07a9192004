/**
 * Simulated Broker
 *
 * Backtest host for the order gateway contract. Orders fill immediately
 * and completely at the last marked close.
 */

import { EventEmitter } from 'eventemitter3';
import { logger, round } from '../logger.js';
import type { Bar } from '../types.js';
import { PositionSizer } from './PositionSizer.js';
import type {
  AccountSnapshot,
  BrokerEvents,
  Fill,
  OrderGateway,
  SimulatedBrokerConfig,
} from './types.js';

export class SimulatedBroker extends EventEmitter<BrokerEvents> implements OrderGateway {
  private readonly config: SimulatedBrokerConfig;
  private readonly sizer: PositionSizer;
  private cash: number;
  private position = 0;
  private lastPrice: number | null = null;
  private lastTimestamp = 0;
  private readonly fills: Fill[] = [];

  constructor(config: SimulatedBrokerConfig) {
    super();
    this.config = config;
    this.sizer = new PositionSizer({ leverage: config.leverage });
    this.cash = config.initialCash;

    logger.info('Simulated Broker initialized', {
      symbol: config.symbol,
      initialCash: config.initialCash,
      leverage: config.leverage,
    });
  }

  /**
   * Record the bar that subsequent orders fill against
   */
  markPrice(bar: Bar): void {
    this.lastPrice = bar.close;
    this.lastTimestamp = bar.timestamp;
  }

  placeOrder(signedQuantity: number, tag: string): number {
    if (this.lastPrice === null) {
      throw new Error(`Cannot fill "${tag}" before a price has been marked`);
    }

    if (signedQuantity === 0) {
      logger.warn('Ignoring zero-quantity order', { tag });
      return 0;
    }

    const fill: Fill = {
      symbol: this.config.symbol,
      quantity: signedQuantity,
      price: this.lastPrice,
      tag,
      timestamp: this.lastTimestamp,
    };

    this.cash -= signedQuantity * this.lastPrice;
    this.position += signedQuantity;
    this.fills.push(fill);

    logger.info('Order filled', {
      symbol: fill.symbol,
      quantity: fill.quantity,
      price: fill.price,
      tag: fill.tag,
      position: this.position,
    });

    this.emit('orderFilled', fill);
    return signedQuantity;
  }

  sizeOrder(targetAllocation: number): number {
    if (this.lastPrice === null) {
      return 0;
    }

    const result = this.sizer.calculateQuantity(
      targetAllocation,
      this.getEquity(),
      this.lastPrice,
      this.position * this.lastPrice
    );

    if (!result.valid) {
      logger.warn('Order sizing rejected', { targetAllocation, reason: result.reason });
      return 0;
    }

    return result.quantity;
  }

  getEquity(): number {
    return this.cash + this.position * (this.lastPrice ?? 0);
  }

  getAccount(): AccountSnapshot {
    return {
      cash: round(this.cash, 2),
      position: this.position,
      lastPrice: this.lastPrice,
      equity: round(this.getEquity(), 2),
    };
  }

  getFills(): readonly Fill[] {
    return this.fills;
  }
}
