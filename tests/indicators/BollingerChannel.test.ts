/**
 * Tests for BollingerChannel
 */

import { describe, it, expect } from 'vitest';
import { BollingerChannel } from '../../src/indicators/BollingerChannel.js';
import { ConfigurationError } from '../../src/errors.js';

describe('BollingerChannel', () => {
  it('should not be ready before the period is filled', () => {
    const channel = new BollingerChannel({ length: 4, multiplier: 2 });
    [2, 4, 4].forEach((p) => channel.update(p));

    expect(channel.isReady).toBe(false);
    expect(channel.upperBand).toBe(0);
    expect(channel.lowerBand).toBe(0);
  });

  it('should build symmetric bands from SMA and sample deviation', () => {
    const channel = new BollingerChannel({ length: 4, multiplier: 2 });
    [2, 4, 4].forEach((p) => channel.update(p));

    expect(channel.update(4)).toBe(true);
    // SMA 3.5, sample deviation 1
    expect(channel.middle).toBeCloseTo(3.5, 10);
    expect(channel.standardDeviation).toBe(1);
    expect(channel.upperBand).toBeCloseTo(5.5, 10);
    expect(channel.lowerBand).toBeCloseTo(1.5, 10);
  });

  it('should slide the average with new closes', () => {
    const channel = new BollingerChannel({ length: 4, multiplier: 1 });
    [2, 4, 4, 4, 5].forEach((p) => channel.update(p));

    // window [4, 4, 4, 5]: SMA 4.25, squared deviations sum to 0.75
    expect(channel.middle).toBeCloseTo(4.25, 10);
    expect(channel.upperBand).toBeCloseTo(4.25 + Math.sqrt(0.25), 10);
    expect(channel.lowerBand).toBeCloseTo(4.25 - Math.sqrt(0.25), 10);
  });

  it('should reproduce identical bands after reset', () => {
    const channel = new BollingerChannel({ length: 5, multiplier: 2 });
    const prices = Array.from({ length: 30 }, (_, i) => 100 + Math.sin(i) * 5);

    const run = (): number[][] =>
      prices.map((p) => {
        channel.update(p);
        return [channel.upperBand, channel.middle, channel.lowerBand];
      });

    const first = run();
    channel.reset();
    expect(channel.isReady).toBe(false);
    expect(run()).toEqual(first);
  });

  it('should use default parameters', () => {
    const channel = new BollingerChannel();
    expect(channel.warmUpPeriod).toBe(20);
    expect(channel.multiplier).toBe(2);
  });

  it('should reject an invalid length', () => {
    expect(() => new BollingerChannel({ length: 0 })).toThrow(ConfigurationError);
  });
});
