/**
 * Bollinger Channel
 *
 * Simple moving average ± multiplier × sample standard deviation.
 * The SMA is the streaming SMA from technicalindicators; the deviation uses
 * the n - 1 denominator instead of the library's population deviation.
 */

import { SMA } from 'technicalindicators';
import { assertFinitePrice, requireFinite, requireInteger } from '../errors.js';
import { SampleStdDev } from './SampleStdDev.js';
import type { BollingerChannelConfig, ChannelIndicator } from './types.js';

export const DEFAULT_BOLLINGER_CHANNEL_CONFIG: BollingerChannelConfig = {
  length: 20,
  multiplier: 2,
};

function createSma(period: number): SMA {
  return new SMA({ period, values: [] });
}

export class BollingerChannel implements ChannelIndicator {
  readonly name = 'BollingerChannel';
  readonly length: number;
  readonly multiplier: number;
  private sma: SMA;
  private readonly stdDev: SampleStdDev;
  private average: number | undefined;

  constructor(config: Partial<BollingerChannelConfig> = {}) {
    const merged = { ...DEFAULT_BOLLINGER_CHANNEL_CONFIG, ...config };
    this.length = requireInteger('length', merged.length, 1);
    this.multiplier = requireFinite('multiplier', merged.multiplier);
    this.sma = createSma(this.length);
    this.stdDev = new SampleStdDev(this.length);
  }

  get warmUpPeriod(): number {
    return this.length;
  }

  get isReady(): boolean {
    return this.average !== undefined && this.stdDev.isReady;
  }

  get value(): number {
    return this.middle;
  }

  get middle(): number {
    return this.average ?? 0;
  }

  get upperBand(): number {
    return this.isReady ? this.middle + this.multiplier * this.stdDev.value : 0;
  }

  get lowerBand(): number {
    return this.isReady ? this.middle - this.multiplier * this.stdDev.value : 0;
  }

  get standardDeviation(): number {
    return this.stdDev.value;
  }

  update(close: number): boolean {
    assertFinitePrice(this.name, close);
    const average: number | undefined = this.sma.nextValue(close);
    if (average !== undefined) {
      this.average = average;
    }
    this.stdDev.update(close);
    return this.isReady;
  }

  reset(): void {
    this.sma = createSma(this.length);
    this.stdDev.reset();
    this.average = undefined;
  }
}
