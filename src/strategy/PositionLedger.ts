import { LEG_NAMES } from './types.js';
import type { Direction, LegName, LegState, PositionLedger } from './types.js';

const FLAT: LegState = { shares: 0, orderCount: 0 };

export const LEG_DIRECTION: Readonly<Record<LegName, Direction>> = {
  reversionShort: 'SHORT',
  reversionLong: 'LONG',
  breakoutLong: 'LONG',
  breakoutShort: 'SHORT',
};

export function createLedger(): PositionLedger {
  return {
    reversionShort: FLAT,
    reversionLong: FLAT,
    breakoutLong: FLAT,
    breakoutShort: FLAT,
  };
}

export function withLeg(ledger: PositionLedger, leg: LegName, state: LegState): PositionLedger {
  return { ...ledger, [leg]: state };
}

export function addToLeg(ledger: PositionLedger, leg: LegName, shares: number): PositionLedger {
  const current = ledger[leg];
  return withLeg(ledger, leg, {
    shares: current.shares + Math.abs(shares),
    orderCount: current.orderCount + 1,
  });
}

/**
 * Remove closed shares from legs, draining them in the order given.
 * A leg that reaches zero also resets its order count.
 */
export function reduceLegs(
  ledger: PositionLedger,
  legs: readonly LegName[],
  closedShares: number
): PositionLedger {
  let remaining = Math.abs(closedShares);
  return legs.reduce((next, leg) => {
    const current = next[leg];
    const taken = Math.min(current.shares, remaining);
    remaining -= taken;
    const shares = current.shares - taken;
    return withLeg(next, leg, shares > 0 ? { shares, orderCount: current.orderCount } : FLAT);
  }, ledger);
}

export function sharesIn(ledger: PositionLedger, legs: readonly LegName[]): number {
  return legs.reduce((sum, leg) => sum + ledger[leg].shares, 0);
}

/**
 * Long shares minus short shares across all legs
 */
export function netPosition(ledger: PositionLedger): number {
  return LEG_NAMES.reduce(
    (net, leg) =>
      LEG_DIRECTION[leg] === 'LONG' ? net + ledger[leg].shares : net - ledger[leg].shares,
    0
  );
}
