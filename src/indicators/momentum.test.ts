import { describe, it, expect } from 'vitest';

import { PriceSeries } from '../series/price-series.js';
import {
  barsWithWicks,
  constantCloses,
  seriesFromCloses,
  wavyCloses,
} from '../test-utils.js';
import { InsufficientDataError, InvalidParameterError } from '../utils/errors.js';

import { adx, macd, momentum, roc, rsi, rsiFromAverages, stochastic } from './momentum.js';
import { ema } from './moving-averages.js';
import { availableValues, firstAvailableIndex } from './types.js';

describe('Momentum indicators', () => {
  describe('rsi', () => {
    it('should read 50 on a constant series', () => {
      const result = rsi(seriesFromCloses(constantCloses(1.2, 30)));

      expect(firstAvailableIndex(result)).toBe(14);
      expect(availableValues(result)).toHaveLength(16);
      for (const value of availableValues(result)) {
        expect(value).toBe(50);
      }
    });

    it('should read 100 after a jump with no losses', () => {
      const result = rsi(seriesFromCloses([...constantCloses(1.08, 40), 1.09]));

      expect(result[40]).toBe(100);
    });

    it('should read 0 on a falling series', () => {
      const closes = Array.from({ length: 20 }, (_, i) => 1.2 - i * 0.001);

      expect(rsi(seriesFromCloses(closes))[19]).toBe(0);
    });

    it('should apply Wilder smoothing', () => {
      // Seed at index 2: avgGain 0.5, avgLoss 0.5 -> 50.
      // Index 3: avgGain (0.5 + 1) / 2 = 0.75, avgLoss 0.25 -> RS 3 -> 75.
      const result = rsi(seriesFromCloses([1, 2, 1, 2]), 2);

      expect(result[0]).toBeUndefined();
      expect(result[1]).toBeUndefined();
      expect(result[2]).toBe(50);
      expect(result[3]).toBeCloseTo(75, 10);
    });

    it('should stay within 0 and 100', () => {
      for (const value of availableValues(rsi(seriesFromCloses(wavyCloses(80))))) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(100);
      }
    });

    it('should need period + 1 observations', () => {
      expect(() => rsi(seriesFromCloses(constantCloses(1.1, 14)))).toThrow(
        'RSI needs at least 15 observations, got 14'
      );
    });

    it('should reject an invalid period', () => {
      expect(() => rsi(seriesFromCloses(constantCloses(1.1, 20)), 0)).toThrow(
        InvalidParameterError
      );
    });
  });

  describe('rsiFromAverages', () => {
    it('should cover the degenerate averages', () => {
      expect(rsiFromAverages(0, 0)).toBe(50);
      expect(rsiFromAverages(0.01, 0)).toBe(100);
      expect(rsiFromAverages(0, 0.01)).toBe(0);
      expect(rsiFromAverages(1, 1)).toBe(50);
    });
  });

  describe('macd', () => {
    const options = { fast: 3, slow: 6, signal: 4 };

    it('should equal EMA(fast) - EMA(slow) wherever it is defined', () => {
      const series = seriesFromCloses(wavyCloses(40));
      const fast = ema(series, 3);
      const slow = ema(series, 6);
      const result = macd(series, options);

      result.forEach((point, i) => {
        if (point === undefined) return;
        const f = fast[i];
        const s = slow[i];
        expect(f).toBeDefined();
        expect(s).toBeDefined();
        if (f !== undefined && s !== undefined) {
          expect(point.macd).toBeCloseTo(f - s, 12);
        }
        expect(point.histogram).toBeCloseTo(point.macd - point.signal, 12);
      });
    });

    it('should first be defined at slow + signal - 2', () => {
      const result = macd(seriesFromCloses(wavyCloses(40)), options);

      expect(firstAvailableIndex(result)).toBe(8);
      expect(availableValues(result)).toHaveLength(32);
    });

    it('should stay near zero on a constant series', () => {
      for (const point of availableValues(macd(seriesFromCloses(constantCloses(1.2, 60))))) {
        expect(point.macd).toBeCloseTo(0, 10);
        expect(point.signal).toBeCloseTo(0, 10);
        expect(point.histogram).toBeCloseTo(0, 10);
      }
    });

    it('should turn the histogram positive after an upward jump', () => {
      const result = macd(seriesFromCloses([...constantCloses(1.08, 40), 1.09]));
      const before = result[39];
      const after = result[40];

      expect(before?.histogram).toBeCloseTo(0, 10);
      expect(after?.histogram).toBeGreaterThan(0);
      expect(after?.macd).toBeGreaterThan(0);
    });

    it('should require fast < slow', () => {
      const series = seriesFromCloses(wavyCloses(40));

      expect(() => macd(series, { fast: 6, slow: 6, signal: 3 })).toThrow(
        'MACD fast period (6) must be shorter than the slow period (6)'
      );
    });

    it('should need slow + signal - 1 observations', () => {
      expect(() => macd(seriesFromCloses(wavyCloses(8)), options)).toThrow(InsufficientDataError);
      expect(() => macd(seriesFromCloses(wavyCloses(9)), options)).not.toThrow();
    });
  });

  describe('stochastic', () => {
    it('should place the close inside the recent range', () => {
      // %K: 50, 100, 66.67 from index 2; %D (2) from index 3.
      const result = stochastic(seriesFromCloses([3, 1, 2, 5, 4]), { kPeriod: 3, dPeriod: 2 });

      expect(result.slice(0, 3)).toEqual([undefined, undefined, undefined]);
      expect(result[3]).toEqual({ k: 100, d: 75 });
      expect(result[4]?.k).toBeCloseTo(200 / 3, 10);
      expect(result[4]?.d).toBeCloseTo(250 / 3, 10);
    });

    it('should read 50 when the range is flat', () => {
      const result = stochastic(seriesFromCloses(constantCloses(1.2, 20)));

      expect(availableValues(result).every(point => point.k === 50 && point.d === 50)).toBe(true);
    });

    it('should stay within 0 and 100 with wicks', () => {
      const series = PriceSeries.from(barsWithWicks(wavyCloses(50)));

      for (const point of availableValues(stochastic(series))) {
        expect(point.k).toBeGreaterThanOrEqual(0);
        expect(point.k).toBeLessThanOrEqual(100);
      }
    });

    it('should handle a window larger than the argument limit of Math.max', () => {
      const result = stochastic(seriesFromCloses(constantCloses(1.2, 150_001)), {
        kPeriod: 150_000,
        dPeriod: 2,
      });

      expect(result[150_000]).toEqual({ k: 50, d: 50 });
    });
  });

  describe('roc', () => {
    it('should measure the percent change against the close period bars back', () => {
      expect(roc(seriesFromCloses([1, 2, 4, 8]), 1)).toEqual([undefined, 100, 100, 100]);
    });

    it('should be unavailable against a zero close', () => {
      expect(roc(seriesFromCloses([0, 1, 2]), 1)).toEqual([undefined, undefined, 100]);
    });

    it('should reject a period longer than the series', () => {
      expect(() => roc(seriesFromCloses([1, 2, 3]), 3)).toThrow(InsufficientDataError);
    });
  });

  describe('momentum', () => {
    it('should subtract the close period bars back', () => {
      expect(momentum(seriesFromCloses([1, 2, 4, 8]), 2)).toEqual([undefined, undefined, 3, 6]);
    });
  });

  describe('adx', () => {
    it('should read full strength on a steady rise', () => {
      const result = adx(seriesFromCloses([1, 2, 3, 4, 5, 6]), 3);

      expect(firstAvailableIndex(result)).toBe(5);
      expect(result[5]).toEqual({ adx: 100, plusDi: 100, minusDi: 0 });
    });

    it('should put the movement on -DI on a steady fall', () => {
      const result = adx(seriesFromCloses([6, 5, 4, 3, 2, 1]), 3);

      expect(result[5]).toEqual({ adx: 100, plusDi: 0, minusDi: 100 });
    });

    it('should read 0 on a constant series', () => {
      const result = adx(seriesFromCloses(constantCloses(1.2, 10)), 3);

      expect(availableValues(result)).toHaveLength(5);
      expect(result[9]).toEqual({ adx: 0, plusDi: 0, minusDi: 0 });
    });

    it('should need twice the period of observations', () => {
      expect(() => adx(seriesFromCloses(constantCloses(1.2, 5)), 3)).toThrow(
        'ADX needs at least 6 observations, got 5'
      );
    });
  });
});
