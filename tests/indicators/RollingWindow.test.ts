/**
 * Tests for RollingWindow
 */

import { describe, it, expect } from 'vitest';
import { RollingWindow } from '../../src/indicators/RollingWindow.js';
import { ConfigurationError } from '../../src/errors.js';

describe('RollingWindow', () => {
  it('should keep only the last capacity values in arrival order', () => {
    const window = new RollingWindow<number>(3);
    [1, 2, 3, 4, 5].forEach((v) => window.push(v));

    expect(window.values()).toEqual([3, 4, 5]);
    expect(window.size).toBe(3);
    expect(window.isFull()).toBe(true);
  });

  it('should never exceed capacity', () => {
    const window = new RollingWindow<number>(4);
    for (let i = 0; i < 20; i++) {
      window.push(i);
      expect(window.size).toBeLessThanOrEqual(4);
    }
    expect(window.values()).toEqual([16, 17, 18, 19]);
  });

  it('should evict the oldest value once full', () => {
    const window = new RollingWindow<number>(2);
    window.push(1);
    window.push(2);
    window.push(3);

    expect(window.values()).toEqual([2, 3]);
  });

  it('should report full only at capacity', () => {
    const window = new RollingWindow<string>(2);
    window.push('a');
    expect(window.isFull()).toBe(false);
    window.push('b');
    expect(window.isFull()).toBe(true);
  });

  it('should clear contents', () => {
    const window = new RollingWindow<number>(2);
    window.push(1);
    window.push(2);
    window.clear();

    expect(window.size).toBe(0);
    expect(window.isFull()).toBe(false);
    expect(window.values()).toEqual([]);
  });

  it('should reject capacity below 1', () => {
    expect(() => new RollingWindow<number>(0)).toThrow(ConfigurationError);
  });

  it('should reject fractional capacity', () => {
    expect(() => new RollingWindow<number>(2.5)).toThrow(ConfigurationError);
  });
});
