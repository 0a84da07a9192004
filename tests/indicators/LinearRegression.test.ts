/**
 * Tests for LinearRegression
 */

import { describe, it, expect } from 'vitest';
import {
  LinearRegression,
  fitLinearRegression,
} from '../../src/indicators/LinearRegression.js';
import { ConfigurationError } from '../../src/errors.js';

/**
 * Mean-centered least squares, written independently of the closed-form sums
 */
function ordinaryLeastSquares(ys: number[]): { slope: number; intercept: number } {
  const n = ys.length;
  const xMean = (n - 1) / 2;
  const yMean = ys.reduce((a, b) => a + b, 0) / n;
  let sxy = 0;
  let sxx = 0;
  ys.forEach((y, x) => {
    sxy += (x - xMean) * (y - yMean);
    sxx += (x - xMean) ** 2;
  });
  const slope = sxy / sxx;
  return { slope, intercept: yMean - slope * xMean };
}

function series(length: number): number[] {
  return Array.from({ length }, (_, i) => 100 + Math.sin(i * 0.7) * 4 + i * 0.3);
}

describe('fitLinearRegression', () => {
  it('should return zero residual deviation for collinear prices', () => {
    const fit = fitLinearRegression([1, 3, 5, 7]);

    expect(fit).not.toBeNull();
    expect(fit!.slope).toBe(2);
    expect(fit!.intercept).toBe(1);
    expect(fit!.centerValue).toBe(7);
    expect(fit!.residualStdDev).toBe(0);
  });

  it('should fit a noisy window', () => {
    // slope 1.1, intercept 10.2, residuals -0.2, 0.7, -1.4, 1.5, -0.6
    const fit = fitLinearRegression([10, 12, 11, 15, 14]);

    expect(fit).not.toBeNull();
    expect(fit!.slope).toBeCloseTo(1.1, 10);
    expect(fit!.intercept).toBeCloseTo(10.2, 10);
    expect(fit!.centerValue).toBeCloseTo(14.6, 10);
    expect(fit!.residualStdDev).toBeCloseTo(Math.sqrt(5.1 / 4), 10);
  });

  it('should match an independent least-squares solve for every window size', () => {
    for (let n = 2; n <= 60; n++) {
      const ys = series(n);
      const fit = fitLinearRegression(ys);
      const ols = ordinaryLeastSquares(ys);

      expect(fit).not.toBeNull();
      expect(fit!.slope).toBeCloseTo(ols.slope, 8);
      expect(fit!.centerValue).toBeCloseTo(ols.slope * (n - 1) + ols.intercept, 8);
    }
  });

  it('should keep centerValue on the fitted line at the newest index', () => {
    const ys = series(25);
    const fit = fitLinearRegression(ys);

    expect(fit!.centerValue).toBeCloseTo(fit!.slope * 24 + fit!.intercept, 10);
  });

  it('should never report a negative residual deviation', () => {
    for (let n = 2; n <= 30; n++) {
      expect(fitLinearRegression(series(n))!.residualStdDev).toBeGreaterThanOrEqual(0);
    }
  });

  it('should treat a single sample as degenerate', () => {
    expect(fitLinearRegression([5])).toBeNull();
  });

  it('should return null for an empty window', () => {
    expect(fitLinearRegression([])).toBeNull();
  });
});

describe('LinearRegression', () => {
  it('should not be ready until the window is full', () => {
    const regression = new LinearRegression({ count: 3 });

    expect(regression.update(1)).toBe(false);
    expect(regression.update(2)).toBe(false);
    expect(regression.isReady).toBe(false);
    expect(regression.value).toBe(0);
  });

  it('should fit the window once full', () => {
    const regression = new LinearRegression({ count: 3 });
    regression.update(1);
    regression.update(2);

    expect(regression.update(4)).toBe(true);
    expect(regression.isReady).toBe(true);
    expect(regression.slope).toBeCloseTo(1.5, 10);
    expect(regression.intercept).toBeCloseTo(5 / 6, 10);
    expect(regression.value).toBeCloseTo(23 / 6, 10);
    expect(regression.residualStdDev).toBeCloseTo(Math.sqrt(1 / 12), 10);
  });

  it('should refit over the sliding window', () => {
    const regression = new LinearRegression({ count: 3 });
    [1, 2, 4, 6].forEach((p) => regression.update(p));

    // Window [2, 4, 6] is collinear
    expect(regression.slope).toBeCloseTo(2, 10);
    expect(regression.value).toBeCloseTo(6, 10);
    expect(regression.residualStdDev).toBe(0);
  });

  it('should never become ready with a single-bar window', () => {
    const regression = new LinearRegression({ count: 1 });

    expect(regression.update(5)).toBe(false);
    expect(regression.isReady).toBe(false);
  });

  it('should use the default count as warm-up period', () => {
    expect(new LinearRegression().warmUpPeriod).toBe(20);
  });

  it('should reject an invalid count', () => {
    expect(() => new LinearRegression({ count: 0 })).toThrow(ConfigurationError);
  });

  it('should reject non-finite closes', () => {
    const regression = new LinearRegression({ count: 3 });
    expect(() => regression.update(Number.NaN)).toThrow(RangeError);
  });

  it('should reproduce identical values after reset', () => {
    const regression = new LinearRegression({ count: 5 });
    const prices = series(30);

    const first = prices.map((p) => {
      regression.update(p);
      return [regression.value, regression.slope, regression.residualStdDev];
    });

    regression.reset();
    expect(regression.isReady).toBe(false);
    expect(regression.value).toBe(0);

    const second = prices.map((p) => {
      regression.update(p);
      return [regression.value, regression.slope, regression.residualStdDev];
    });

    expect(second).toEqual(first);
  });
});
