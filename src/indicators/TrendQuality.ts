/**
 * Trend-Quality Indicator
 *
 * TQ = smoothed cumulative price change / average noise
 *
 * High positive values mark a clean uptrend, high negative values a clean
 * downtrend, values near zero a choppy market. The cumulative change and
 * its smoothed trend restart from zero whenever the fast/slow EMA regime
 * flips, so trend strength is measured only within the current regime.
 */

import { EMA } from 'technicalindicators';
import { ConfigurationError, assertFinitePrice, requireFinite, requireInteger } from '../errors.js';
import { RollingWindow } from './RollingWindow.js';
import type { Indicator, NoiseType, TrendQualityConfig } from './types.js';

export const DEFAULT_TREND_QUALITY_CONFIG: TrendQualityConfig = {
  fastLength: 7,
  slowLength: 13,
  trendLength: 4,
  noiseLength: 250,
  correctionFactor: 2,
  noiseType: 'LINEAR',
};

/** +1 fast above slow, -1 fast below slow, 0 equal */
export type RegimeSign = -1 | 0 | 1;

export function parseNoiseType(value: string): NoiseType {
  const normalized = value.trim().toUpperCase();
  if (normalized === 'LINEAR' || normalized === 'SQUARED') {
    return normalized;
  }
  throw new ConfigurationError('noiseType', "noiseType must be 'LINEAR' or 'SQUARED'");
}

/**
 * LINEAR: mean absolute deviation. SQUARED: root mean square deviation.
 */
export function computeNoise(
  deviations: readonly number[],
  noiseType: NoiseType,
  correctionFactor: number
): number {
  const n = deviations.length;
  if (n === 0) {
    return 0;
  }

  switch (noiseType) {
    case 'LINEAR':
      return (correctionFactor * deviations.reduce((sum, d) => sum + d, 0)) / n;
    case 'SQUARED':
      return correctionFactor * Math.sqrt(deviations.reduce((sum, d) => sum + d * d, 0) / n);
    default: {
      const unknown: never = noiseType;
      throw new ConfigurationError('noiseType', `Unsupported noise type: ${String(unknown)}`);
    }
  }
}

function regimeOf(fast: number, slow: number): RegimeSign {
  if (fast > slow) return 1;
  if (fast < slow) return -1;
  return 0;
}

function createEma(period: number): EMA {
  return new EMA({ period, values: [] });
}

export class TrendQuality implements Indicator {
  readonly name = 'TrendQuality';
  readonly fastLength: number;
  readonly slowLength: number;
  readonly trendLength: number;
  readonly noiseLength: number;
  readonly correctionFactor: number;
  readonly noiseType: NoiseType;
  /** Smoothing factor for the cumulative change */
  readonly smoothingFactor: number;

  private emaFast: EMA;
  private emaSlow: EMA;
  private fastValue: number | undefined;
  private slowValue: number | undefined;

  private cpc = 0;
  private trend = 0;
  private prevClose: number | null = null;
  private prevRegime: RegimeSign | null = null;
  private readonly diffHistory: RollingWindow<number>;
  private lastNoise = 0;
  private current = 0;

  constructor(config: Partial<TrendQualityConfig> = {}) {
    const merged = { ...DEFAULT_TREND_QUALITY_CONFIG, ...config };
    this.fastLength = requireInteger('fastLength', merged.fastLength, 1);
    this.slowLength = requireInteger('slowLength', merged.slowLength, 1);
    this.trendLength = requireInteger('trendLength', merged.trendLength, 1);
    this.noiseLength = requireInteger('noiseLength', merged.noiseLength, 1);
    this.correctionFactor = requireFinite('correctionFactor', merged.correctionFactor);
    this.noiseType = parseNoiseType(merged.noiseType);

    this.smoothingFactor = 2 / (1 + this.trendLength);
    this.emaFast = createEma(this.fastLength);
    this.emaSlow = createEma(this.slowLength);
    this.diffHistory = new RollingWindow<number>(this.noiseLength);
  }

  get warmUpPeriod(): number {
    return Math.max(this.fastLength, this.slowLength) + this.noiseLength;
  }

  get isReady(): boolean {
    return this.diffHistory.isFull();
  }

  get value(): number {
    return this.current;
  }

  get cumulativePriceChange(): number {
    return this.cpc;
  }

  get smoothedTrend(): number {
    return this.trend;
  }

  get noise(): number {
    return this.lastNoise;
  }

  /** Regime of the last bar processed with both EMAs warm */
  get regime(): RegimeSign | null {
    return this.prevRegime;
  }

  update(close: number): boolean {
    assertFinitePrice(this.name, close);

    const fast: number | undefined = this.emaFast.nextValue(close);
    const slow: number | undefined = this.emaSlow.nextValue(close);
    if (fast !== undefined) this.fastValue = fast;
    if (slow !== undefined) this.slowValue = slow;

    if (this.fastValue === undefined || this.slowValue === undefined) {
      this.prevClose = close;
      return false;
    }

    const regime = regimeOf(this.fastValue, this.slowValue);

    if (this.prevClose !== null) {
      if (this.prevRegime === null || this.prevRegime !== regime) {
        // Regime flipped: restart trend memory
        this.cpc = 0;
        this.trend = 0;
      } else {
        this.cpc += close - this.prevClose;
        this.trend = this.trend * (1 - this.smoothingFactor) + this.cpc * this.smoothingFactor;
      }
    }

    this.diffHistory.push(Math.abs(this.cpc - this.trend));
    this.prevClose = close;
    this.prevRegime = regime;

    if (!this.diffHistory.isFull()) {
      return false;
    }

    this.lastNoise = computeNoise(this.diffHistory.values(), this.noiseType, this.correctionFactor);
    this.current = this.lastNoise !== 0 ? this.trend / this.lastNoise : 0;
    return true;
  }

  reset(): void {
    this.emaFast = createEma(this.fastLength);
    this.emaSlow = createEma(this.slowLength);
    this.fastValue = undefined;
    this.slowValue = undefined;
    this.cpc = 0;
    this.trend = 0;
    this.prevClose = null;
    this.prevRegime = null;
    this.diffHistory.clear();
    this.lastNoise = 0;
    this.current = 0;
  }
}
