/**
 * Tests for LinearRegressionChannel
 */

import { describe, it, expect } from 'vitest';
import { LinearRegressionChannel } from '../../src/indicators/LinearRegressionChannel.js';
import { ConfigurationError } from '../../src/errors.js';

describe('LinearRegressionChannel', () => {
  it('should report zero bands before the window is full', () => {
    const channel = new LinearRegressionChannel({ count: 3 });
    channel.update(100);

    expect(channel.isReady).toBe(false);
    expect(channel.upperBand).toBe(0);
    expect(channel.lowerBand).toBe(0);
    expect(channel.middle).toBe(0);
  });

  it('should place asymmetric bands around the regression value', () => {
    const channel = new LinearRegressionChannel({
      count: 3,
      upperDeviation: 2,
      lowerDeviation: 1,
    });
    [1, 2, 4].forEach((p) => channel.update(p));

    const center = 23 / 6;
    const deviation = Math.sqrt(1 / 12);

    expect(channel.isReady).toBe(true);
    expect(channel.middle).toBeCloseTo(center, 10);
    expect(channel.value).toBeCloseTo(center, 10);
    expect(channel.upperBand).toBeCloseTo(center + 2 * deviation, 10);
    expect(channel.lowerBand).toBeCloseTo(center - deviation, 10);
    expect(channel.slope).toBeCloseTo(1.5, 10);
    expect(channel.intercept).toBeCloseTo(5 / 6, 10);
    expect(channel.residualStdDev).toBeCloseTo(deviation, 10);
  });

  it('should collapse the bands onto the line for collinear prices', () => {
    const channel = new LinearRegressionChannel({ count: 4 });
    [10, 11, 12, 13].forEach((p) => channel.update(p));

    expect(channel.upperBand).toBe(13);
    expect(channel.lowerBand).toBe(13);
  });

  it('should follow a sloped trend instead of a flat average', () => {
    const channel = new LinearRegressionChannel({ count: 5 });
    [100, 102, 104, 106, 108].forEach((p) => channel.update(p));

    // A moving average would sit at 104
    expect(channel.middle).toBeCloseTo(108, 10);
  });

  it('should expose the latest fit', () => {
    const channel = new LinearRegressionChannel({ count: 2 });
    expect(channel.getFit()).toBeNull();

    channel.update(1);
    channel.update(3);

    expect(channel.getFit()).toEqual({
      slope: 2,
      intercept: 1,
      centerValue: 3,
      residualStdDev: 0,
    });
  });

  it('should clear every derived field on reset', () => {
    const channel = new LinearRegressionChannel({ count: 3 });
    [1, 2, 4].forEach((p) => channel.update(p));
    channel.reset();

    expect(channel.isReady).toBe(false);
    expect(channel.value).toBe(0);
    expect(channel.slope).toBe(0);
    expect(channel.intercept).toBe(0);
    expect(channel.residualStdDev).toBe(0);
    expect(channel.upperBand).toBe(0);
    expect(channel.lowerBand).toBe(0);
  });

  it('should reproduce identical bands after reset', () => {
    const channel = new LinearRegressionChannel({ count: 6, upperDeviation: 1.5, lowerDeviation: 2.5 });
    const prices = Array.from({ length: 40 }, (_, i) => 50 + Math.cos(i / 3) * 2 + i * 0.1);

    const run = (): number[][] =>
      prices.map((p) => {
        channel.update(p);
        return [channel.upperBand, channel.middle, channel.lowerBand];
      });

    const first = run();
    channel.reset();
    expect(run()).toEqual(first);
  });

  it('should use default parameters', () => {
    const channel = new LinearRegressionChannel();
    expect(channel.warmUpPeriod).toBe(20);
    expect(channel.upperDeviation).toBe(2);
    expect(channel.lowerDeviation).toBe(2);
  });

  it('should reject non-finite deviation multipliers', () => {
    expect(() => new LinearRegressionChannel({ upperDeviation: Number.NaN })).toThrow(
      ConfigurationError
    );
  });
});
