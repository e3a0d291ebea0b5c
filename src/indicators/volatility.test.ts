import { describe, it, expect } from 'vitest';

import { PriceSeries, type PriceObservation } from '../series/price-series.js';
import {
  BASE_TIMESTAMP,
  HOUR_MS,
  barsWithWicks,
  constantCloses,
  seriesFromCloses,
  wavyCloses,
} from '../test-utils.js';
import { InsufficientDataError, InvalidParameterError } from '../utils/errors.js';

import { availableValues } from './types.js';
import {
  atr,
  bollingerBands,
  calculateTrueRange,
  donchianChannel,
  fibonacciRetracements,
  pivotPoints,
  trueRange,
} from './volatility.js';

describe('Volatility indicators', () => {
  const ohlc = (
    index: number,
    open: number,
    high: number,
    low: number,
    close: number
  ): PriceObservation => ({ timestamp: BASE_TIMESTAMP + index * HOUR_MS, open, high, low, close });

  describe('bollingerBands', () => {
    it('should collapse onto the price for a constant series', () => {
      for (const band of availableValues(bollingerBands(seriesFromCloses(constantCloses(1.2, 30))))) {
        expect(band.upper).toBeCloseTo(1.2, 10);
        expect(band.middle).toBeCloseTo(1.2, 10);
        expect(band.lower).toBeCloseTo(1.2, 10);
      }
    });

    it('should use the population standard deviation', () => {
      const result = bollingerBands(seriesFromCloses([1, 2, 3]), { period: 3, multiplier: 2 });
      const width = 2 * Math.sqrt(2 / 3);

      expect(result[0]).toBeUndefined();
      expect(result[1]).toBeUndefined();
      expect(result[2]?.middle).toBe(2);
      expect(result[2]?.upper).toBeCloseTo(2 + width, 12);
      expect(result[2]?.lower).toBeCloseTo(2 - width, 12);
    });

    it('should keep upper >= middle >= lower', () => {
      const bands = availableValues(bollingerBands(seriesFromCloses(wavyCloses(60))));

      expect(bands).toHaveLength(41);
      for (const band of bands) {
        expect(band.upper).toBeGreaterThanOrEqual(band.middle);
        expect(band.middle).toBeGreaterThanOrEqual(band.lower);
      }
    });

    it('should reject a non-positive multiplier', () => {
      const series = seriesFromCloses(wavyCloses(30));

      expect(() => bollingerBands(series, { multiplier: 0 })).toThrow(
        'Bollinger Bands multiplier must be greater than 0, got 0'
      );
      expect(() => bollingerBands(series, { multiplier: -1 })).toThrow(InvalidParameterError);
    });

    it('should need a full window', () => {
      expect(() => bollingerBands(seriesFromCloses(wavyCloses(19)))).toThrow(
        InsufficientDataError
      );
    });
  });

  describe('trueRange', () => {
    it('should use high - low for the first bar and the widest range after', () => {
      const series = PriceSeries.from([
        ohlc(0, 1.1, 1.2, 1.0, 1.15),
        ohlc(1, 1.15, 1.3, 1.1, 1.25),
        ohlc(2, 1.25, 1.26, 1.05, 1.1),
      ]);
      const result = trueRange(series);

      expect(result[0]).toBeCloseTo(0.2, 12);
      expect(result[1]).toBeCloseTo(0.2, 12);
      expect(result[2]).toBeCloseTo(0.21, 12);
    });

    it('should include a gap from the previous close', () => {
      const previous = ohlc(0, 1, 1.01, 0.99, 1);
      const current = ohlc(1, 1.05, 1.06, 1.04, 1.05);

      expect(calculateTrueRange(current, previous)).toBeCloseTo(0.06, 12);
      expect(calculateTrueRange(current)).toBeCloseTo(0.02, 12);
    });
  });

  describe('atr', () => {
    it('should average the first period true ranges and then smooth', () => {
      // True ranges: 0, 1, 2, 3
      const result = atr(seriesFromCloses([1, 2, 4, 7]), 2);

      expect(result).toEqual([undefined, undefined, 1.5, 2.25]);
    });

    it('should be zero on a flat constant series', () => {
      expect(availableValues(atr(seriesFromCloses(constantCloses(1.2, 20))))).toEqual(
        constantCloses(0, 6)
      );
    });

    it('should be positive when bars have wicks', () => {
      for (const value of availableValues(atr(PriceSeries.from(barsWithWicks(wavyCloses(30)))))) {
        expect(value).toBeGreaterThan(0);
      }
    });

    it('should need period + 1 observations', () => {
      expect(() => atr(seriesFromCloses(constantCloses(1.2, 14)))).toThrow(
        'ATR needs at least 15 observations, got 14'
      );
    });
  });

  describe('pivotPoints', () => {
    it('should derive the floor-trader levels', () => {
      const levels = pivotPoints(ohlc(0, 1.05, 1.2, 1.0, 1.1));

      expect(levels.pivot).toBeCloseTo(1.1, 12);
      expect(levels.r1).toBeCloseTo(1.2, 12);
      expect(levels.r2).toBeCloseTo(1.3, 12);
      expect(levels.r3).toBeCloseTo(1.4, 12);
      expect(levels.s1).toBeCloseTo(1.0, 12);
      expect(levels.s2).toBeCloseTo(0.9, 12);
      expect(levels.s3).toBeCloseTo(0.8, 12);
      expect(levels.r4).toBeCloseTo(1.5, 12);
      expect(levels.s4).toBeCloseTo(0.7, 12);
    });
  });

  describe('donchianChannel', () => {
    it('should track the highest high and lowest low of the window', () => {
      const result = donchianChannel(seriesFromCloses([1, 3, 2, 5, 4]), 3);

      expect(result.slice(0, 2)).toEqual([undefined, undefined]);
      expect(result[2]).toEqual({ upper: 3, middle: 2, lower: 1 });
      expect(result[3]).toEqual({ upper: 5, middle: 3.5, lower: 2 });
      expect(result[4]).toEqual({ upper: 5, middle: 3.5, lower: 2 });
    });

    it('should read the wicks rather than the closes', () => {
      const result = donchianChannel(
        PriceSeries.from([ohlc(0, 1.1, 1.15, 1.05, 1.1), ohlc(1, 1.1, 1.2, 1.08, 1.12)]),
        2
      );

      expect(result[1]).toEqual({ upper: 1.2, middle: (1.2 + 1.05) / 2, lower: 1.05 });
    });

    it('should reject a period longer than the series', () => {
      expect(() => donchianChannel(seriesFromCloses([1, 2]), 3)).toThrow(InsufficientDataError);
    });
  });

  describe('fibonacciRetracements', () => {
    it('should step from the swing high down to the swing low', () => {
      const levels = fibonacciRetracements(1.2, 1.1);

      expect(levels.map(level => level.ratio)).toEqual([0, 0.236, 0.382, 0.5, 0.618, 0.786, 1]);
      expect(levels[0].price).toBe(1.2);
      expect(levels[3].price).toBeCloseTo(1.15, 12);
      expect(levels[4].price).toBeCloseTo(1.1382, 12);
      expect(levels[6].price).toBe(1.1);
    });

    it('should reject a high below the low', () => {
      expect(() => fibonacciRetracements(1.1, 1.2)).toThrow(InvalidParameterError);
    });
  });
});
