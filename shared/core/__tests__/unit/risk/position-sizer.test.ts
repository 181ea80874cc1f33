/**
 * PositionSizer Tests
 *
 * Covers every sizing mode, the hard ceiling, the Kelly no-edge boundary
 * and input validation.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { createRiskLimits } from '@riskengine/config';
import { InvalidInputError } from '@riskengine/types';
import type { SizingRequest } from '@riskengine/types';

import { PositionSizer, getPositionSizer, resetPositionSizer } from '../../../src/risk/position-sizer';
import { RecordingLogger } from '../../../src/logging';

describe('PositionSizer', () => {
  let logger: RecordingLogger;
  let sizer: PositionSizer;
  const limits = createRiskLimits();

  beforeEach(() => {
    logger = new RecordingLogger();
    sizer = new PositionSizer({ logger });
  });

  // ===========================================================================
  // Fixed Fraction
  // ===========================================================================

  describe('FIXED_FRACTION', () => {
    it('should size floor(equity * maxPositionSize / price)', () => {
      const result = sizer.calculateSize('AAPL', 175, 100000, limits, { mode: 'FIXED_FRACTION' });

      expect(result.quantity).toBe(11);
      expect(result.ceilingQuantity).toBe(11);
      expect(result.requestedFraction).toBe(0.02);
      expect(result.capped).toBe(false);
      expect(result.reason).toBeUndefined();
    });

    it('should default to fixed fraction when no request is given', () => {
      expect(sizer.size('AAPL', 175, 100000, limits)).toBe(11);
    });

    it('should return zero with a reason when equity is zero', () => {
      const result = sizer.calculateSize('AAPL', 175, 0, limits);

      expect(result.quantity).toBe(0);
      expect(result.reason).toBe('Position size rounds down to zero shares');
    });

    it('should log the calculation at debug', () => {
      sizer.calculateSize('AAPL', 175, 100000, limits);
      expect(logger.hasLogWithMeta('debug', { symbol: 'AAPL', quantity: 11 })).toBe(true);
    });
  });

  // ===========================================================================
  // Volatility Adjusted
  // ===========================================================================

  describe('VOLATILITY_ADJUSTED', () => {
    it('should scale down when relative volatility exceeds the target', () => {
      // ATR 4 on price 100 is 4% against a 2% target: half size
      const result = sizer.calculateSize('MSFT', 100, 100000, limits, {
        mode: 'VOLATILITY_ADJUSTED',
        volatility: 4,
      });

      expect(result.quantity).toBe(10);
      expect(result.requestedFraction).toBe(0.01);
    });

    it('should not scale above fixed fraction when volatility is below the target', () => {
      const result = sizer.calculateSize('MSFT', 100, 100000, limits, {
        mode: 'VOLATILITY_ADJUSTED',
        volatility: 1,
      });

      expect(result.quantity).toBe(20);
      expect(result.capped).toBe(false);
    });

    it('should use targetVolatility over the configured target', () => {
      const result = sizer.calculateSize('MSFT', 100, 100000, limits, {
        mode: 'VOLATILITY_ADJUSTED',
        volatility: 4,
        targetVolatility: 0.04,
      });

      expect(result.quantity).toBe(20);
    });

    it('should fall back to fixed fraction on zero volatility', () => {
      const result = sizer.calculateSize('MSFT', 100, 100000, limits, {
        mode: 'VOLATILITY_ADJUSTED',
        volatility: 0,
      });

      expect(result.quantity).toBe(20);
      expect(result.mode).toBe('VOLATILITY_ADJUSTED');
    });

    it('should reject negative volatility', () => {
      expect(() =>
        sizer.calculateSize('MSFT', 100, 100000, limits, { mode: 'VOLATILITY_ADJUSTED', volatility: -1 })
      ).toThrow(InvalidInputError);
    });

    it('should reject a non-positive target', () => {
      expect(() =>
        sizer.calculateSize('MSFT', 100, 100000, limits, {
          mode: 'VOLATILITY_ADJUSTED',
          volatility: 1,
          targetVolatility: 0,
        })
      ).toThrow('targetVolatility must be a positive finite number, got 0');
    });
  });

  // ===========================================================================
  // Kelly
  // ===========================================================================

  describe('KELLY', () => {
    const kellyLimits = createRiskLimits({ maxPositionSize: 0.25 });

    it('should size by half Kelly under the cap', () => {
      // f = 0.55 - 0.45 / 1.5 = 0.25, scaled 0.125
      const result = sizer.calculateSize('AAPL', 175, 100000, kellyLimits, {
        mode: 'KELLY',
        winRate: 0.55,
        avgWin: 150,
        avgLoss: 100,
      });

      expect(result.quantity).toBe(71);
      expect(result.kellyFraction).toBeCloseTo(0.25, 10);
      expect(result.adjustedKelly).toBeCloseTo(0.125, 10);
      expect(result.ceilingQuantity).toBe(142);
      expect(result.capped).toBe(false);
    });

    it('should cap the scaled fraction at kellyCap', () => {
      // f = 0.9 - 0.1 / 2 = 0.85, scaled 0.425, capped 0.20
      const result = sizer.calculateSize('AAPL', 175, 100000, kellyLimits, {
        mode: 'KELLY',
        winRate: 0.9,
        avgWin: 200,
        avgLoss: 100,
      });

      expect(result.adjustedKelly).toBe(0.2);
      expect(result.quantity).toBe(114);
    });

    it('should clamp to the hard ceiling', () => {
      const result = sizer.calculateSize('AAPL', 175, 100000, limits, {
        mode: 'KELLY',
        winRate: 0.55,
        avgWin: 150,
        avgLoss: 100,
      });

      expect(result.quantity).toBe(11);
      expect(result.capped).toBe(true);
    });

    it('should size zero at break-even edge', () => {
      // f = 0.4 - 0.6 / 1.5 = 0 (5.5e-17 in floating point)
      const result = sizer.calculateSize('AAPL', 175, 100000, kellyLimits, {
        mode: 'KELLY',
        winRate: 0.4,
        avgWin: 150,
        avgLoss: 100,
      });

      expect(result.quantity).toBe(0);
      expect(result.adjustedKelly).toBe(0);
      expect(result.reason).toMatch(/^No edge/);
    });

    it('should size zero for negative edge', () => {
      const result = sizer.calculateSize('AAPL', 175, 100000, kellyLimits, {
        mode: 'KELLY',
        winRate: 0.3,
        avgWin: 100,
        avgLoss: 100,
      });

      expect(result.quantity).toBe(0);
      expect(result.kellyFraction).toBeLessThan(0);
    });

    it('should size positive just above break-even', () => {
      const result = sizer.calculateSize('AAPL', 10, 100000, kellyLimits, {
        mode: 'KELLY',
        winRate: 0.51,
        avgWin: 100,
        avgLoss: 100,
      });

      // f = 0.02, scaled 0.01
      expect(result.quantity).toBe(100);
    });

    it.each([
      ['winRate', { winRate: 1.2, avgWin: 100, avgLoss: 100 }],
      ['winRate', { winRate: -0.1, avgWin: 100, avgLoss: 100 }],
      ['avgWin', { winRate: 0.5, avgWin: 0, avgLoss: 100 }],
      ['avgLoss', { winRate: 0.5, avgWin: 100, avgLoss: -5 }],
    ])('should reject invalid %s', (field, inputs) => {
      let caught: unknown;
      try {
        sizer.calculateSize('AAPL', 175, 100000, limits, { mode: 'KELLY', ...inputs });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidInputError);
      expect(caught instanceof InvalidInputError && caught.field).toBe(field);
    });
  });

  // ===========================================================================
  // Conservative
  // ===========================================================================

  describe('CONSERVATIVE', () => {
    it('should equal fixed fraction without optional inputs', () => {
      expect(sizer.size('AAPL', 175, 100000, limits, { mode: 'CONSERVATIVE' })).toBe(11);
    });

    it('should take the smallest of the supplied methods', () => {
      const result = sizer.calculateSize('MSFT', 100, 100000, createRiskLimits({ maxPositionSize: 0.25 }), {
        mode: 'CONSERVATIVE',
        volatility: 40,
        kelly: { winRate: 0.55, avgWin: 150, avgLoss: 100 },
      });

      // fixed 250, volatility 0.25 * 0.05 = 0.0125 -> 12, Kelly 125
      expect(result.quantity).toBe(12);
      expect(result.mode).toBe('CONSERVATIVE');
      expect(result.kellyFraction).toBeCloseTo(0.25, 10);
    });

    it('should pick Kelly when it is the smallest', () => {
      const result = sizer.calculateSize('MSFT', 100, 100000, limits, {
        mode: 'CONSERVATIVE',
        volatility: 1,
        kelly: { winRate: 0.51, avgWin: 100, avgLoss: 100 },
      });

      // fixed 20, volatility 20, Kelly 0.01 -> 10
      expect(result.quantity).toBe(10);
      expect(result.adjustedKelly).toBeCloseTo(0.01, 10);
    });
  });

  // ===========================================================================
  // Hard Ceiling
  // ===========================================================================

  describe('hard ceiling', () => {
    const requests: SizingRequest[] = [
      { mode: 'FIXED_FRACTION' },
      { mode: 'VOLATILITY_ADJUSTED', volatility: 0.5 },
      { mode: 'VOLATILITY_ADJUSTED', volatility: 0, targetVolatility: 0.5 },
      { mode: 'KELLY', winRate: 0.95, avgWin: 500, avgLoss: 10 },
      { mode: 'CONSERVATIVE', volatility: 0.1, kelly: { winRate: 0.9, avgWin: 300, avgLoss: 50 } },
    ];
    const prices = [0.37, 1, 12.5, 175, 4999.99];
    const equities = [0, 1000, 100000, 2500000];

    it('should never exceed floor(equity * maxPositionSize / price) in any mode', () => {
      for (const request of requests) {
        for (const price of prices) {
          for (const equity of equities) {
            const quantity = sizer.size('TEST', price, equity, limits, request);
            const ceiling = Math.floor((equity * limits.maxPositionSize) / price);

            expect(Number.isInteger(quantity)).toBe(true);
            expect(quantity).toBeGreaterThanOrEqual(0);
            expect(quantity).toBeLessThanOrEqual(ceiling);
          }
        }
      }
    });
  });

  // ===========================================================================
  // Validation
  // ===========================================================================

  describe('validation', () => {
    it.each([0, -175, Number.NaN, Number.POSITIVE_INFINITY])('should reject price %p', (price) => {
      expect(() => sizer.size('AAPL', price, 100000, limits)).toThrow(InvalidInputError);
    });

    it('should reject negative equity', () => {
      expect(() => sizer.size('AAPL', 175, -1, limits)).toThrow('equity must be a non-negative finite number, got -1');
    });
  });

  describe('singleton', () => {
    it('should return the same instance until reset', () => {
      resetPositionSizer();
      const first = getPositionSizer();
      expect(getPositionSizer()).toBe(first);
      resetPositionSizer();
      expect(getPositionSizer()).not.toBe(first);
      resetPositionSizer();
    });
  });
});
