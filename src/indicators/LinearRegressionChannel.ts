/**
 * Linear Regression Channel
 *
 * Center line is the regression value at the current bar. Bands sit a
 * configurable number of residual standard deviations above and below it,
 * so unlike Bollinger Bands they follow the slope of the fit.
 */

import { requireFinite } from '../errors.js';
import { LinearRegression } from './LinearRegression.js';
import type {
  ChannelIndicator,
  LinearRegressionChannelConfig,
  RegressionFit,
} from './types.js';

export const DEFAULT_LINEAR_REGRESSION_CHANNEL_CONFIG: LinearRegressionChannelConfig = {
  count: 20,
  upperDeviation: 2,
  lowerDeviation: 2,
};

export class LinearRegressionChannel implements ChannelIndicator {
  readonly name = 'LinearRegressionChannel';
  readonly upperDeviation: number;
  readonly lowerDeviation: number;
  private readonly regression: LinearRegression;

  constructor(config: Partial<LinearRegressionChannelConfig> = {}) {
    const merged = { ...DEFAULT_LINEAR_REGRESSION_CHANNEL_CONFIG, ...config };
    this.upperDeviation = requireFinite('upperDeviation', merged.upperDeviation);
    this.lowerDeviation = requireFinite('lowerDeviation', merged.lowerDeviation);
    this.regression = new LinearRegression({ count: merged.count });
  }

  get warmUpPeriod(): number {
    return this.regression.warmUpPeriod;
  }

  get isReady(): boolean {
    return this.regression.isReady;
  }

  get value(): number {
    return this.regression.centerValue;
  }

  get middle(): number {
    return this.regression.centerValue;
  }

  get upperBand(): number {
    return this.regression.centerValue + this.upperDeviation * this.regression.residualStdDev;
  }

  get lowerBand(): number {
    return this.regression.centerValue - this.lowerDeviation * this.regression.residualStdDev;
  }

  get slope(): number {
    return this.regression.slope;
  }

  get intercept(): number {
    return this.regression.intercept;
  }

  get residualStdDev(): number {
    return this.regression.residualStdDev;
  }

  getFit(): Readonly<RegressionFit> | null {
    return this.regression.getFit();
  }

  update(close: number): boolean {
    return this.regression.update(close);
  }

  reset(): void {
    this.regression.reset();
  }
}
