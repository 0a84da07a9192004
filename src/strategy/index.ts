export { StrategyEngine } from './StrategyEngine.js';
export {
  RegimeSignalEngine,
  DEFAULT_REGIME_SIGNAL_CONFIG,
  ENTRY_TAGS,
  EXIT_TAGS,
  FLATTEN_TAGS,
} from './RegimeSignalEngine.js';
export {
  createLedger,
  withLeg,
  addToLeg,
  reduceLegs,
  sharesIn,
  netPosition,
  LEG_DIRECTION,
} from './PositionLedger.js';
export {
  isAboveChannel,
  isBelowChannel,
  isInsideRegimeBand,
  isOutsideRegimeBand,
  tightenedUpper,
  tightenedLower,
} from './conditions.js';
export { LEG_NAMES } from './types.js';
export type {
  LegName,
  LegState,
  Direction,
  PositionLedger,
  RegimeSignalConfig,
  SignalInput,
  SignalResult,
  OrderAction,
  OrderActionKind,
  StrategyEngineConfig,
  StrategyEvents,
  IndicatorsUpdatedEvent,
  OrderPlacedEvent,
} from './types.js';
