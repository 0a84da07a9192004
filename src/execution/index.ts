/**
 * Execution Module
 *
 * Host contract for order placement plus the backtest implementation.
 */

// Types
export type {
  OrderGateway,
  PositionSizerConfig,
  SimulatedBrokerConfig,
  PositionSizeResult,
  Fill,
  AccountSnapshot,
  BrokerEvents,
} from './types.js';

// Classes
export { PositionSizer } from './PositionSizer.js';
export { SimulatedBroker } from './SimulatedBroker.js';
