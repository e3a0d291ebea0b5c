import type { PriceSeries } from '../series/price-series.js';
import { InsufficientDataError, InvalidParameterError } from '../utils/errors.js';

import { assertPeriod, type IndicatorSeries, type IndicatorValue } from './types.js';

/**
 * Simple moving average over a window of raw values ending at each index.
 * Each window is summed on its own so long series do not accumulate drift.
 */
export const rollingMean = (values: ReadonlyArray<number>, period: number): IndicatorValue[] =>
  values.map((_, i) => {
    if (i < period - 1) return undefined;
    let windowSum = 0;
    for (let j = i - period + 1; j <= i; j++) {
      windowSum += values[j];
    }
    return windowSum / period;
  });

/**
 * Simple Moving Average of closes.
 * @returns Values aligned with the series; undefined before index `period - 1`
 */
export const sma = (series: PriceSeries, period: number): IndicatorSeries => {
  assertPeriod(period, 'SMA');
  series.requireLength(period, 'SMA');
  return rollingMean(series.closes(), period);
};

/**
 * EMA over a sequence that may start with undefined values (e.g. the MACD line).
 * The first `period` defined values seed the average with their simple mean; a
 * gap after the first defined value is not allowed.
 */
export const emaOfValues = (
  values: ReadonlyArray<IndicatorValue>,
  period: number,
  indicator = 'EMA'
): IndicatorSeries => {
  assertPeriod(period, indicator);

  const start = values.findIndex(value => value !== undefined);
  const defined = start === -1 ? 0 : values.length - start;
  if (defined < period) {
    throw new InsufficientDataError(indicator, period, defined);
  }

  const k = 2 / (period + 1);
  const result: IndicatorValue[] = new Array(values.length).fill(undefined);
  const seedIndex = start + period - 1;

  let seedSum = 0;
  let previous = 0;
  for (let i = start; i < values.length; i++) {
    const value = values[i];
    if (value === undefined) {
      throw new InsufficientDataError(indicator, period, i - start, { index: i });
    }

    if (i < seedIndex) {
      seedSum += value;
      continue;
    }

    previous = i === seedIndex ? (seedSum + value) / period : value * k + previous * (1 - k);
    result[i] = previous;
  }

  return result;
};

/**
 * Exponential Moving Average of closes, seeded with the SMA of the first
 * `period` closes at index `period - 1`.
 */
export const ema = (series: PriceSeries, period: number): IndicatorSeries => {
  assertPeriod(period, 'EMA');
  series.requireLength(period, 'EMA');
  return emaOfValues(series.closes(), period);
};

/**
 * Linearly weighted mean of the window ending at each index. A window that
 * holds an unavailable value is itself unavailable.
 */
export const weightedMean = (
  values: ReadonlyArray<IndicatorValue>,
  period: number
): IndicatorValue[] => {
  const weightSum = (period * (period + 1)) / 2;
  return values.map((_, i) => {
    if (i < period - 1) return undefined;
    let weighted = 0;
    for (let j = 0; j < period; j++) {
      const value = values[i - period + 1 + j];
      if (value === undefined) return undefined;
      weighted += value * (j + 1);
    }
    return weighted / weightSum;
  });
};

/**
 * Linearly weighted moving average; the most recent close has weight `period`.
 */
export const wma = (series: PriceSeries, period: number): IndicatorSeries => {
  assertPeriod(period, 'WMA');
  series.requireLength(period, 'WMA');
  return weightedMean(series.closes(), period);
};

/**
 * Hull moving average: WMA over floor(sqrt(period)) of
 * 2 * WMA(period / 2) - WMA(period). First defined at index
 * `period + floor(sqrt(period)) - 2`.
 */
export const hma = (series: PriceSeries, period: number): IndicatorSeries => {
  assertPeriod(period, 'HMA');
  if (period < 2) {
    throw new InvalidParameterError(`HMA period must be at least 2, got ${period}`, {
      indicator: 'HMA',
      period,
    });
  }

  const half = Math.floor(period / 2);
  const root = Math.floor(Math.sqrt(period));
  series.requireLength(period + root - 1, 'HMA');

  const closes = series.closes();
  const halfWma = weightedMean(closes, half);
  const fullWma = weightedMean(closes, period);
  const raw = closes.map((_, i) => {
    const h = halfWma[i];
    const f = fullWma[i];
    return h === undefined || f === undefined ? undefined : 2 * h - f;
  });

  return weightedMean(raw, root);
};
