/**
 * Linear Regression
 *
 * Closed-form least-squares fit over the last `count` closes, refitted
 * from scratch on every bar. Usable on its own as a value-only indicator
 * (regression value at the newest bar) and as the engine behind
 * LinearRegressionChannel.
 */

import { assertFinitePrice, requireInteger } from '../errors.js';
import { RollingWindow } from './RollingWindow.js';
import type { Indicator, LinearRegressionConfig, RegressionFit } from './types.js';

export const DEFAULT_LINEAR_REGRESSION_CONFIG: LinearRegressionConfig = {
  count: 20,
};

/**
 * Fit y = slope * x + intercept to points (i, samples[i]), i = 0..n-1.
 *
 * Uses the analytic index sums Σx = n(n-1)/2 and Σx² = (n-1)n(2n-1)/6.
 * Returns null when the system is degenerate (n <= 1).
 */
export function fitLinearRegression(samples: readonly number[]): RegressionFit | null {
  const n = samples.length;
  if (n === 0) {
    return null;
  }

  const sumX = (n * (n - 1)) / 2;
  const sumX2 = ((n - 1) * n * (2 * n - 1)) / 6;
  let sumY = 0;
  let sumXY = 0;
  for (let i = 0; i < n; i++) {
    sumY += samples[i];
    sumXY += i * samples[i];
  }

  const denominator = n * sumX2 - sumX * sumX;
  if (denominator === 0) {
    return null;
  }

  const slope = (n * sumXY - sumX * sumY) / denominator;
  const intercept = (sumY - slope * sumX) / n;
  const centerValue = slope * (n - 1) + intercept;

  // Residuals: actual - predicted
  const residuals = samples.map((y, i) => y - (slope * i + intercept));
  const meanResidual = residuals.reduce((sum, r) => sum + r, 0) / n;
  const variance =
    n > 1
      ? residuals.reduce((sum, r) => sum + (r - meanResidual) ** 2, 0) / (n - 1)
      : 0;

  return {
    slope,
    intercept,
    centerValue,
    residualStdDev: variance > 0 ? Math.sqrt(variance) : 0,
  };
}

export class LinearRegression implements Indicator {
  readonly name = 'LinearRegression';
  readonly count: number;
  private readonly prices: RollingWindow<number>;
  private fit: RegressionFit | null = null;

  constructor(config: Partial<LinearRegressionConfig> = {}) {
    const { count } = { ...DEFAULT_LINEAR_REGRESSION_CONFIG, ...config };
    this.count = requireInteger('count', count, 1);
    this.prices = new RollingWindow<number>(this.count);
  }

  get warmUpPeriod(): number {
    return this.count;
  }

  get isReady(): boolean {
    return this.fit !== null;
  }

  /** Regression value at the newest bar */
  get value(): number {
    return this.centerValue;
  }

  get centerValue(): number {
    return this.fit?.centerValue ?? 0;
  }

  get slope(): number {
    return this.fit?.slope ?? 0;
  }

  get intercept(): number {
    return this.fit?.intercept ?? 0;
  }

  get residualStdDev(): number {
    return this.fit?.residualStdDev ?? 0;
  }

  /**
   * Latest fit, or null while warming up
   */
  getFit(): Readonly<RegressionFit> | null {
    return this.fit;
  }

  update(close: number): boolean {
    assertFinitePrice(this.name, close);
    this.prices.push(close);

    if (!this.prices.isFull()) {
      return false;
    }

    this.fit = fitLinearRegression(this.prices.values());
    return this.fit !== null;
  }

  reset(): void {
    this.prices.clear();
    this.fit = null;
  }
}
