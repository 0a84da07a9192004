/**
 * Tests for PositionSizer
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PositionSizer } from '../../src/execution/PositionSizer.js';
import { ConfigurationError } from '../../src/errors.js';

describe('PositionSizer', () => {
  let sizer: PositionSizer;

  beforeEach(() => {
    sizer = new PositionSizer({ leverage: 2 });
  });

  describe('calculateQuantity', () => {
    it('should calculate position size correctly', () => {
      const result = sizer.calculateQuantity(0.5, 100000, 250);

      expect(result.valid).toBe(true);
      // notional = 0.5 * 100000 * 2 = 100000
      // quantity = 100000 / 250 = 400
      expect(result.quantity).toBe(400);
      expect(result.notionalValue).toBe(100000);
    });

    it('should carry the sign of the allocation', () => {
      const result = sizer.calculateQuantity(-0.5, 100000, 250);

      expect(result.valid).toBe(true);
      expect(result.quantity).toBe(-400);
      expect(result.notionalValue).toBe(100000);
    });

    it('should round down to whole shares', () => {
      const result = sizer.calculateQuantity(0.5, 1000, 300);

      // notional = 1000, 1000 / 300 = 3.33
      expect(result.quantity).toBe(3);
      expect(result.notionalValue).toBe(900);
    });

    it('should cap the order at the buying power left', () => {
      // buying power = 200000 - 150000 = 50000
      expect(sizer.calculateQuantity(0.5, 100000, 250, 150000).quantity).toBe(200);
      expect(sizer.calculateQuantity(0.5, 100000, 250, -150000).quantity).toBe(200);
    });

    it('should reject a zero allocation', () => {
      const result = sizer.calculateQuantity(0, 100000, 250);

      expect(result.valid).toBe(false);
      expect(result.quantity).toBe(0);
      expect(result.reason).toBe('Allocation 0 is not tradable');
    });

    it('should reject a non-positive price', () => {
      const result = sizer.calculateQuantity(0.5, 100000, 0);

      expect(result.valid).toBe(false);
      expect(result.reason).toBe('Price 0 must be positive');
    });

    it('should reject an account without equity', () => {
      const result = sizer.calculateQuantity(0.5, 0, 250);

      expect(result.valid).toBe(false);
      expect(result.reason).toBe('Equity 0.00 leaves no buying power');
    });

    it('should reject a notional too small for one share', () => {
      const result = sizer.calculateQuantity(0.0001, 1000, 250);

      expect(result.valid).toBe(false);
      expect(result.reason).toBe('Notional 0.20 buys no whole share at 250');
    });

    it('should reject when exposure has used all buying power', () => {
      const result = sizer.calculateQuantity(0.5, 100000, 250, 200000);

      expect(result.valid).toBe(false);
      expect(result.quantity).toBe(0);
    });
  });

  describe('configuration', () => {
    it('should reject non-positive leverage', () => {
      expect(() => new PositionSizer({ leverage: 0 })).toThrow(RangeError);
    });

    it('should reject non-finite leverage', () => {
      expect(() => new PositionSizer({ leverage: Number.NaN })).toThrow(ConfigurationError);
    });

    it('should expose its configuration', () => {
      expect(sizer.getConfig()).toEqual({ leverage: 2 });
    });
  });
});
