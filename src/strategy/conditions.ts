/**
 * Signal Conditions
 *
 * Pure predicates for channel breaches and trend-quality regimes.
 * All comparisons are strict.
 */

/**
 * Check if price closed above the upper channel bound
 */
export function isAboveChannel(close: number, upperBound: number): boolean {
  return close > upperBound;
}

/**
 * Check if price closed below the lower channel bound
 */
export function isBelowChannel(close: number, lowerBound: number): boolean {
  return close < lowerBound;
}

/**
 * Trend quality strictly inside (low, high): no strong trend either way
 */
export function isInsideRegimeBand(
  trendQuality: number,
  lowThreshold: number,
  highThreshold: number
): boolean {
  return lowThreshold < trendQuality && trendQuality < highThreshold;
}

/**
 * Trend quality strictly outside [low, high]: a strong trend in either direction
 */
export function isOutsideRegimeBand(
  trendQuality: number,
  lowThreshold: number,
  highThreshold: number
): boolean {
  return trendQuality < lowThreshold || trendQuality > highThreshold;
}

/**
 * Upper bound pulled in by close * betweenFactor, used by exits
 */
export function tightenedUpper(close: number, upperBound: number, betweenFactor: number): number {
  return upperBound - close * betweenFactor;
}

/**
 * Lower bound pulled in by close * betweenFactor, used by exits
 */
export function tightenedLower(close: number, lowerBound: number, betweenFactor: number): number {
  return lowerBound + close * betweenFactor;
}
