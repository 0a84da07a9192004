/**
 * Types for streaming indicators
 */

/**
 * Capability shared by every streaming indicator.
 * `update` returns true once the indicator holds a usable value.
 */
export interface Indicator {
  readonly name: string;
  /** Last computed value, 0 before the first ready update */
  readonly value: number;
  readonly isReady: boolean;
  /** Bars needed before the first ready update */
  readonly warmUpPeriod: number;
  update(close: number): boolean;
  reset(): void;
}

/**
 * Indicator that publishes a price channel
 */
export interface ChannelIndicator extends Indicator {
  readonly upperBand: number;
  readonly middle: number;
  readonly lowerBand: number;
}

export interface ChannelSnapshot {
  upper: number;
  middle: number;
  lower: number;
}

/**
 * Least-squares line over a window, x = 0 (oldest) .. n-1 (newest)
 */
export interface RegressionFit {
  slope: number;
  intercept: number;
  /** Regression value at x = n - 1 */
  centerValue: number;
  /** Sample (n - 1) standard deviation of the residuals */
  residualStdDev: number;
}

export type NoiseType = 'LINEAR' | 'SQUARED';

export interface LinearRegressionConfig {
  count: number;
}

export interface LinearRegressionChannelConfig extends LinearRegressionConfig {
  upperDeviation: number;
  lowerDeviation: number;
}

export interface BollingerChannelConfig {
  length: number;
  multiplier: number;
}

export interface TrendQualityConfig {
  fastLength: number;
  slowLength: number;
  /** Smoothing length, alpha = 2 / (1 + trendLength) */
  trendLength: number;
  noiseLength: number;
  correctionFactor: number;
  /** LINEAR or SQUARED, case-insensitive */
  noiseType: string;
}

/**
 * Channel source selection, discriminated by `type`
 */
export type ChannelSettings =
  | ({ type: 'linreg' } & LinearRegressionChannelConfig)
  | ({ type: 'bollinger' } & BollingerChannelConfig);
