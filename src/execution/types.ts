/**
 * Types for order execution
 */

// ===========================================
// Host Contract
// ===========================================

/**
 * Order placement and sizing supplied by the host runtime.
 * Both calls are synchronous and complete within the current bar.
 */
export interface OrderGateway {
  /**
   * Place a market order. Positive quantity buys, negative sells.
   * @returns the executed quantity, signed like the request
   */
  placeOrder(signedQuantity: number, tag: string): number;

  /**
   * Convert a target allocation (0.5 = 50% of tradable capital) into a
   * share quantity carrying the allocation's sign
   */
  sizeOrder(targetAllocation: number): number;
}

// ===========================================
// Configuration Types
// ===========================================

export interface PositionSizerConfig {
  /** Buying power multiple of equity */
  leverage: number;
}

export interface SimulatedBrokerConfig extends PositionSizerConfig {
  symbol: string;
  initialCash: number;
}

// ===========================================
// Result Types
// ===========================================

/**
 * Position size calculation result
 */
export interface PositionSizeResult {
  /** Signed share quantity */
  quantity: number;
  notionalValue: number;
  valid: boolean;
  reason?: string;
}

export interface Fill {
  symbol: string;
  quantity: number;
  price: number;
  tag: string;
  timestamp: number;
}

export interface AccountSnapshot {
  cash: number;
  position: number;
  lastPrice: number | null;
  equity: number;
}

// ===========================================
// Event Types
// ===========================================

export type BrokerEvents = {
  orderFilled: [fill: Fill];
};
