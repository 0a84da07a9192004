/**
 * Regime Signal Engine
 *
 * Switches between mean reversion and breakout depending on trend quality:
 * - Close > upper channel, weak trend   → short (reversion)
 * - Close < lower channel, weak trend   → long (reversion)
 * - Close > upper channel, strong trend → flatten shorts, long (breakout)
 * - Close < lower channel, strong trend → flatten longs, short (breakout)
 *
 * Every bar runs all four entry checks, then all four exit checks, in a
 * fixed order. Checks are independent, so one bar may both open a leg and
 * close an unrelated one. The ledger is passed in and a new one returned.
 */

import { logger } from '../logger.js';
import { ConfigurationError, requireFinite, requireInteger } from '../errors.js';
import type { OrderGateway } from '../execution/types.js';
import {
  isAboveChannel,
  isBelowChannel,
  isInsideRegimeBand,
  isOutsideRegimeBand,
  tightenedLower,
  tightenedUpper,
} from './conditions.js';
import { LEG_DIRECTION, addToLeg, reduceLegs, sharesIn } from './PositionLedger.js';
import type {
  Direction,
  LegName,
  OrderAction,
  PositionLedger,
  RegimeSignalConfig,
  SignalInput,
  SignalResult,
} from './types.js';

export const DEFAULT_REGIME_SIGNAL_CONFIG: RegimeSignalConfig = {
  lowThreshold: -4,
  highThreshold: 2.5,
  betweenFactor: 0.0005,
  maxOrders: 3,
  entryAllocation: 0.5,
  enabledEntries: {
    reversionShort: true,
    reversionLong: true,
    breakoutLong: true,
    breakoutShort: true,
  },
};

export const ENTRY_TAGS: Readonly<Record<LegName, string>> = {
  reversionShort: 'Reversion Short Entry',
  reversionLong: 'Reversion Long Entry',
  breakoutLong: 'Breakout Long Entry',
  breakoutShort: 'Breakout Short Entry',
};

export const EXIT_TAGS: Readonly<Record<LegName, string>> = {
  reversionShort: 'Reversion Short Exit',
  reversionLong: 'Reversion Long Exit',
  breakoutLong: 'Breakout Long Exit',
  breakoutShort: 'Breakout Short Exit',
};

export const FLATTEN_TAGS: Readonly<Record<Direction, string>> = {
  LONG: 'Close Open Long Exposure',
  SHORT: 'Close Open Short Exposure',
};

const SHORT_LEGS: readonly LegName[] = ['reversionShort', 'breakoutShort'];
const LONG_LEGS: readonly LegName[] = ['reversionLong', 'breakoutLong'];

/**
 * Working state for one bar's evaluation
 */
interface Evaluation {
  input: SignalInput;
  gateway: OrderGateway;
  ledger: PositionLedger;
  actions: OrderAction[];
}

export class RegimeSignalEngine {
  private readonly config: RegimeSignalConfig;

  constructor(config: Partial<RegimeSignalConfig> = {}) {
    const merged: RegimeSignalConfig = {
      ...DEFAULT_REGIME_SIGNAL_CONFIG,
      ...config,
      enabledEntries: {
        ...DEFAULT_REGIME_SIGNAL_CONFIG.enabledEntries,
        ...config.enabledEntries,
      },
    };

    requireFinite('lowThreshold', merged.lowThreshold);
    requireFinite('highThreshold', merged.highThreshold);
    if (merged.lowThreshold >= merged.highThreshold) {
      throw new ConfigurationError(
        'lowThreshold',
        `lowThreshold (${merged.lowThreshold}) must be below highThreshold (${merged.highThreshold})`
      );
    }
    requireFinite('betweenFactor', merged.betweenFactor);
    requireInteger('maxOrders', merged.maxOrders, 0);
    requireFinite('entryAllocation', merged.entryAllocation);
    if (merged.entryAllocation <= 0) {
      throw new ConfigurationError('entryAllocation', 'entryAllocation must be positive');
    }

    this.config = merged;
  }

  /**
   * Run all entry then exit checks for one bar
   */
  evaluate(input: SignalInput, ledger: PositionLedger, gateway: OrderGateway): SignalResult {
    const evaluation: Evaluation = { input, gateway, ledger, actions: [] };

    this.evaluateEntries(evaluation);
    this.evaluateExits(evaluation);

    return { ledger: evaluation.ledger, actions: evaluation.actions };
  }

  getConfig(): Readonly<RegimeSignalConfig> {
    return this.config;
  }

  private evaluateEntries(evaluation: Evaluation): void {
    const { close, upperBound, lowerBound, trendQuality } = evaluation.input;
    const { lowThreshold, highThreshold, enabledEntries } = this.config;

    // Reversion short: stretched above the channel without a strong trend
    if (
      enabledEntries.reversionShort &&
      isAboveChannel(close, upperBound) &&
      trendQuality < highThreshold
    ) {
      this.openLeg(evaluation, 'reversionShort');
    }

    // Reversion long: stretched below the channel without a strong downtrend
    if (
      enabledEntries.reversionLong &&
      isBelowChannel(close, lowerBound) &&
      trendQuality > lowThreshold
    ) {
      this.openLeg(evaluation, 'reversionLong');
    }

    // Breakout long: strong trend through the upper bound
    if (
      enabledEntries.breakoutLong &&
      isAboveChannel(close, upperBound) &&
      trendQuality > highThreshold
    ) {
      this.flattenExposure(evaluation, SHORT_LEGS, 'SHORT');
      this.openLeg(evaluation, 'breakoutLong');
    }

    // Breakout short: strong downtrend through the lower bound
    if (
      enabledEntries.breakoutShort &&
      isBelowChannel(close, lowerBound) &&
      trendQuality < lowThreshold
    ) {
      this.flattenExposure(evaluation, LONG_LEGS, 'LONG');
      this.openLeg(evaluation, 'breakoutShort');
    }
  }

  private evaluateExits(evaluation: Evaluation): void {
    const { close, upperBound, lowerBound, trendQuality } = evaluation.input;
    const { lowThreshold, highThreshold, betweenFactor } = this.config;

    const backBelowUpper = close < tightenedUpper(close, upperBound, betweenFactor);
    const backAboveLower = close > tightenedLower(close, lowerBound, betweenFactor);
    const trending = isOutsideRegimeBand(trendQuality, lowThreshold, highThreshold);
    const ranging = isInsideRegimeBand(trendQuality, lowThreshold, highThreshold);

    // Reversion legs close on reversion or when a strong trend appears
    this.closeLegIf(evaluation, 'reversionShort', backBelowUpper || trending);
    this.closeLegIf(evaluation, 'reversionLong', backAboveLower || trending);

    // Breakout legs close once price and trend quality are both back inside
    this.closeLegIf(evaluation, 'breakoutLong', backBelowUpper && ranging);
    this.closeLegIf(evaluation, 'breakoutShort', backAboveLower && ranging);
  }

  /**
   * Add one sized order to a leg if it is under the order cap
   */
  private openLeg(evaluation: Evaluation, leg: LegName): void {
    const state = evaluation.ledger[leg];
    if (state.orderCount >= this.config.maxOrders) {
      logger.debug('Entry skipped, leg at order cap', {
        leg,
        orderCount: state.orderCount,
        maxOrders: this.config.maxOrders,
      });
      return;
    }

    const direction = LEG_DIRECTION[leg];
    const allocation =
      direction === 'LONG' ? this.config.entryAllocation : -this.config.entryAllocation;
    const size = Math.abs(evaluation.gateway.sizeOrder(allocation));
    if (size === 0) {
      logger.warn('Entry skipped, sized quantity is zero', { leg, allocation });
      return;
    }

    const requested = direction === 'LONG' ? size : -size;
    const tag = ENTRY_TAGS[leg];
    const filled = evaluation.gateway.placeOrder(requested, tag);
    if (filled === 0) {
      logger.warn('Entry order was not filled', { leg, requested, tag });
      return;
    }

    evaluation.ledger = addToLeg(evaluation.ledger, leg, filled);
    this.record(evaluation, {
      kind: 'entry',
      legs: [leg],
      requestedQuantity: requested,
      filledQuantity: filled,
      tag,
    });
  }

  /**
   * Close every leg of one direction with a single combined order.
   * A short fill drains the legs in order and leaves the rest open.
   */
  private flattenExposure(
    evaluation: Evaluation,
    legs: readonly LegName[],
    direction: Direction
  ): void {
    const total = sharesIn(evaluation.ledger, legs);
    if (total <= 0) {
      return;
    }

    const requested = direction === 'LONG' ? -total : total;
    const tag = FLATTEN_TAGS[direction];
    const filled = evaluation.gateway.placeOrder(requested, tag);
    this.warnOnPartialFill(requested, filled, tag);

    evaluation.ledger = reduceLegs(evaluation.ledger, legs, filled);
    this.record(evaluation, {
      kind: 'flatten',
      legs,
      requestedQuantity: requested,
      filledQuantity: filled,
      tag,
    });
  }

  private closeLegIf(evaluation: Evaluation, leg: LegName, condition: boolean): void {
    const shares = evaluation.ledger[leg].shares;
    if (shares <= 0 || !condition) {
      return;
    }

    const requested = LEG_DIRECTION[leg] === 'LONG' ? -shares : shares;
    const tag = EXIT_TAGS[leg];
    const filled = evaluation.gateway.placeOrder(requested, tag);
    this.warnOnPartialFill(requested, filled, tag);

    evaluation.ledger = reduceLegs(evaluation.ledger, [leg], filled);
    this.record(evaluation, {
      kind: 'exit',
      legs: [leg],
      requestedQuantity: requested,
      filledQuantity: filled,
      tag,
    });
  }

  private record(evaluation: Evaluation, action: OrderAction): void {
    evaluation.actions.push(action);
    logger.info('Order action', {
      kind: action.kind,
      legs: action.legs.join(','),
      requested: action.requestedQuantity,
      filled: action.filledQuantity,
      tag: action.tag,
      close: evaluation.input.close,
      trendQuality: evaluation.input.trendQuality,
    });
  }

  private warnOnPartialFill(requested: number, filled: number, tag: string): void {
    if (filled !== requested) {
      logger.warn('Closing order filled a different quantity; remainder stays on the ledger', {
        requested,
        filled,
        tag,
      });
    }
  }
}
