/**
 * Common types for the regime channel trader
 */

// ===========================================
// Market Data Types
// ===========================================

/**
 * One aggregated price bar delivered by the host, in timestamp order
 */
export interface Bar {
  /** Epoch milliseconds, strictly increasing */
  readonly timestamp: number;
  readonly close: number;
}

// ===========================================
// Re-exports
// ===========================================

export type { ChannelSnapshot, Indicator, ChannelIndicator } from './indicators/types.js';
export type { OrderAction, PositionLedger, LegName } from './strategy/types.js';
export type { OrderGateway, Fill } from './execution/types.js';
