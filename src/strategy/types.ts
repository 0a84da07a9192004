/**
 * Types for the regime signal engine
 */

import type { ChannelSnapshot } from '../indicators/types.js';
import type { Bar } from '../types.js';

export type LegName = 'reversionShort' | 'reversionLong' | 'breakoutLong' | 'breakoutShort';

export const LEG_NAMES: readonly LegName[] = [
  'reversionShort',
  'reversionLong',
  'breakoutLong',
  'breakoutShort',
];

export type Direction = 'LONG' | 'SHORT';

/**
 * Shares are always >= 0; the leg name carries the direction
 */
export interface LegState {
  readonly shares: number;
  readonly orderCount: number;
}

export type PositionLedger = Readonly<Record<LegName, LegState>>;

/**
 * Configuration for RegimeSignalEngine
 */
export interface RegimeSignalConfig {
  lowThreshold: number;
  highThreshold: number;
  /** Exit bounds are tightened by close * betweenFactor */
  betweenFactor: number;
  /** Pyramiding cap per leg */
  maxOrders: number;
  /** Allocation sized into each entry, signed by leg direction */
  entryAllocation: number;
  /** Entry switches per leg; exits always run */
  enabledEntries: Readonly<Record<LegName, boolean>>;
}

/**
 * Per-bar inputs to the signal engine
 */
export interface SignalInput {
  close: number;
  upperBound: number;
  lowerBound: number;
  trendQuality: number;
}

export type OrderActionKind = 'entry' | 'flatten' | 'exit';

/**
 * One order emitted while evaluating a bar
 */
export interface OrderAction {
  kind: OrderActionKind;
  /** Legs the order opens or closes */
  legs: readonly LegName[];
  requestedQuantity: number;
  filledQuantity: number;
  tag: string;
}

export interface SignalResult {
  ledger: PositionLedger;
  actions: OrderAction[];
}

/**
 * Configuration for StrategyEngine
 */
export interface StrategyEngineConfig {
  symbol: string;
  regime: RegimeSignalConfig;
}

export interface IndicatorsUpdatedEvent {
  bar: Bar;
  channel: ChannelSnapshot;
  trendQuality: number;
  ready: boolean;
}

export interface OrderPlacedEvent {
  bar: Bar;
  action: OrderAction;
  ledger: PositionLedger;
}

export type StrategyEvents = {
  indicatorsUpdated: [event: IndicatorsUpdatedEvent];
  orderPlaced: [event: OrderPlacedEvent];
  error: [error: Error];
};
