import { assertFinitePrice, requireInteger } from '../errors.js';
import { RollingWindow } from './RollingWindow.js';
import type { Indicator } from './types.js';

/**
 * Rolling sample standard deviation (n - 1 denominator) of closes
 */
export class SampleStdDev implements Indicator {
  readonly name = 'SampleStdDev';
  readonly period: number;
  private readonly values: RollingWindow<number>;
  private current = 0;
  private ready = false;

  constructor(period: number) {
    this.period = requireInteger('period', period, 1);
    this.values = new RollingWindow<number>(this.period);
  }

  get warmUpPeriod(): number {
    return this.period;
  }

  get isReady(): boolean {
    return this.ready;
  }

  get value(): number {
    return this.current;
  }

  update(close: number): boolean {
    assertFinitePrice(this.name, close);
    this.values.push(close);

    if (!this.values.isFull()) {
      return false;
    }

    const samples = this.values.values();
    const n = samples.length;
    const mean = samples.reduce((sum, x) => sum + x, 0) / n;
    const variance =
      n > 1 ? samples.reduce((sum, x) => sum + (x - mean) ** 2, 0) / (n - 1) : 0;

    this.current = variance > 0 ? Math.sqrt(variance) : 0;
    this.ready = true;
    return true;
  }

  reset(): void {
    this.values.clear();
    this.current = 0;
    this.ready = false;
  }
}
