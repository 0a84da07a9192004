/**
 * Strategy Engine
 *
 * Per-bar pipeline: update the channel and trend-quality indicators, then,
 * once both are ready, run the regime signal engine against the order
 * gateway and keep the returned position ledger.
 */

import { EventEmitter } from 'eventemitter3';
import { logger, round } from '../logger.js';
import type { OrderGateway } from '../execution/types.js';
import { snapshotChannel } from '../indicators/channel.js';
import type { ChannelIndicator, Indicator } from '../indicators/types.js';
import type { Bar } from '../types.js';
import { createLedger, netPosition } from './PositionLedger.js';
import { RegimeSignalEngine } from './RegimeSignalEngine.js';
import type {
  OrderAction,
  PositionLedger,
  SignalResult,
  StrategyEngineConfig,
  StrategyEvents,
} from './types.js';

export class StrategyEngine extends EventEmitter<StrategyEvents> {
  private readonly config: StrategyEngineConfig;
  private readonly channel: ChannelIndicator;
  private readonly trendQuality: Indicator;
  private readonly signals: RegimeSignalEngine;
  private readonly gateway: OrderGateway;
  private ledger: PositionLedger = createLedger();
  private lastProcessedTimestamp = Number.NEGATIVE_INFINITY;
  private barsProcessed = 0;

  constructor(
    config: StrategyEngineConfig,
    channel: ChannelIndicator,
    trendQuality: Indicator,
    gateway: OrderGateway
  ) {
    super();
    this.config = config;
    this.channel = channel;
    this.trendQuality = trendQuality;
    this.gateway = gateway;
    this.signals = new RegimeSignalEngine(config.regime);

    logger.info('Strategy Engine initialized', {
      symbol: config.symbol,
      channel: channel.name,
      channelWarmUp: channel.warmUpPeriod,
      trendQualityWarmUp: trendQuality.warmUpPeriod,
      lowThreshold: config.regime.lowThreshold,
      highThreshold: config.regime.highThreshold,
      maxOrders: config.regime.maxOrders,
    });
  }

  /**
   * Process one bar. This is the main entry point from the bar feed.
   * @returns the order actions emitted on this bar
   */
  public processBar(bar: Bar): OrderAction[] {
    if (!Number.isFinite(bar.timestamp)) {
      logger.warn('Skipping bar with non-finite timestamp', { close: bar.close });
      return [];
    }

    // Guard: bars must arrive in strictly increasing time order
    if (bar.timestamp <= this.lastProcessedTimestamp) {
      logger.debug('Skipping duplicate or out-of-order bar', {
        timestamp: bar.timestamp,
        lastProcessed: this.lastProcessedTimestamp,
      });
      return [];
    }

    if (!Number.isFinite(bar.close)) {
      logger.warn('Skipping bar with non-finite close', { timestamp: bar.timestamp });
      return [];
    }

    this.lastProcessedTimestamp = bar.timestamp;
    this.barsProcessed += 1;

    this.channel.update(bar.close);
    this.trendQuality.update(bar.close);

    const ready = this.channel.isReady && this.trendQuality.isReady;
    const channel = snapshotChannel(this.channel);

    this.emit('indicatorsUpdated', {
      bar,
      channel,
      trendQuality: this.trendQuality.value,
      ready,
    });

    // Guard: both indicators must be warm before trading
    if (!ready) {
      logger.debug('Indicators warming up', {
        barsProcessed: this.barsProcessed,
        channelReady: this.channel.isReady,
        trendQualityReady: this.trendQuality.isReady,
      });
      return [];
    }

    let result: SignalResult;
    try {
      result = this.signals.evaluate(
        {
          close: bar.close,
          upperBound: channel.upper,
          lowerBound: channel.lower,
          trendQuality: this.trendQuality.value,
        },
        this.ledger,
        this.gateway
      );
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Signal evaluation failed', {
        timestamp: bar.timestamp,
        error: err.message,
      });
      this.emit('error', err);
      throw err;
    }
    this.ledger = result.ledger;

    logger.debug('Strategy evaluation', {
      close: bar.close,
      upper: round(channel.upper),
      lower: round(channel.lower),
      trendQuality: round(this.trendQuality.value),
      actions: result.actions.length,
      netPosition: netPosition(this.ledger),
    });

    for (const action of result.actions) {
      this.emit('orderPlaced', { bar, action, ledger: this.ledger });
    }

    return result.actions;
  }

  public getLedger(): PositionLedger {
    return this.ledger;
  }

  public getBarsProcessed(): number {
    return this.barsProcessed;
  }

  /**
   * Reset indicators and position bookkeeping
   * Used for testing or restart scenarios
   */
  public reset(): void {
    this.channel.reset();
    this.trendQuality.reset();
    this.ledger = createLedger();
    this.lastProcessedTimestamp = Number.NEGATIVE_INFINITY;
    this.barsProcessed = 0;
    logger.info('Strategy Engine state reset', { symbol: this.config.symbol });
  }
}
