import type { PriceObservation, PriceSeries } from '../series/price-series.js';

import { InvalidParameterError } from '../utils/errors.js';

import { rollingMean } from './moving-averages.js';
import {
  assertPeriod,
  assertPositive,
  type BollingerPoint,
  type DonchianPoint,
  type FibonacciLevel,
  type IndicatorSeries,
  type IndicatorValue,
  type PivotLevels,
} from './types.js';

export const DEFAULT_BOLLINGER_PERIOD = 20;
export const DEFAULT_BOLLINGER_MULTIPLIER = 2;
export const DEFAULT_ATR_PERIOD = 14;
export const DEFAULT_DONCHIAN_PERIOD = 20;

export const FIBONACCI_RATIOS = [0, 0.236, 0.382, 0.5, 0.618, 0.786, 1] as const;

/**
 * True range of a bar against the previous close.
 * The first bar of a series has no previous close and uses high - low.
 */
export const calculateTrueRange = (
  current: Readonly<PriceObservation>,
  previous?: Readonly<PriceObservation>
): number => {
  const highLow = current.high - current.low;
  if (!previous) {
    return highLow;
  }
  const highPrevClose = Math.abs(current.high - previous.close);
  const lowPrevClose = Math.abs(current.low - previous.close);
  return Math.max(highLow, highPrevClose, lowPrevClose);
};

export const trueRange = (series: PriceSeries): number[] => {
  series.requireLength(1, 'True range');
  return series.observations.map((observation, i) =>
    calculateTrueRange(observation, series.observations[i - 1])
  );
};

/**
 * Highest high and lowest low of `observations[start..end]` (inclusive).
 */
export const highLowRange = (
  observations: ReadonlyArray<Readonly<PriceObservation>>,
  start: number,
  end: number
): { highest: number; lowest: number } => {
  let highest = observations[start].high;
  let lowest = observations[start].low;
  for (let j = start + 1; j <= end; j++) {
    highest = Math.max(highest, observations[j].high);
    lowest = Math.min(lowest, observations[j].low);
  }
  return { highest, lowest };
};

/**
 * Donchian channel: highest high and lowest low of the last `period` bars,
 * with their midpoint.
 */
export const donchianChannel = (
  series: PriceSeries,
  period: number = DEFAULT_DONCHIAN_PERIOD
): IndicatorSeries<DonchianPoint> => {
  assertPeriod(period, 'Donchian channel');
  series.requireLength(period, 'Donchian channel');

  const { observations } = series;
  return observations.map((_, i) => {
    if (i < period - 1) return undefined;
    const { highest, lowest } = highLowRange(observations, i - period + 1, i);
    return { upper: highest, middle: (highest + lowest) / 2, lower: lowest };
  });
};

/**
 * Population standard deviation of the window ending at `end` (inclusive).
 */
const windowStdDev = (
  values: ReadonlyArray<number>,
  end: number,
  period: number,
  mean: number
): number => {
  let squares = 0;
  for (let j = end - period + 1; j <= end; j++) {
    squares += (values[j] - mean) ** 2;
  }
  return Math.sqrt(squares / period);
};

export interface BollingerOptions {
  period?: number;
  multiplier?: number;
}

/**
 * Bollinger Bands: SMA middle band, upper/lower at ± multiplier × population
 * standard deviation of the same window.
 */
export const bollingerBands = (
  series: PriceSeries,
  options: BollingerOptions = {}
): IndicatorSeries<BollingerPoint> => {
  const { period = DEFAULT_BOLLINGER_PERIOD, multiplier = DEFAULT_BOLLINGER_MULTIPLIER } = options;
  assertPeriod(period, 'Bollinger Bands');
  assertPositive(multiplier, 'Bollinger Bands', 'multiplier');
  series.requireLength(period, 'Bollinger Bands');

  const closes = series.closes();
  return rollingMean(closes, period).map((middle, i) => {
    if (middle === undefined) return undefined;
    const width = multiplier * windowStdDev(closes, i, period, middle);
    return { upper: middle + width, middle, lower: middle - width };
  });
};

/**
 * Average True Range with Wilder smoothing. The first value, at index `period`,
 * is the mean of the true ranges of bars 1..period.
 */
export const atr = (series: PriceSeries, period: number = DEFAULT_ATR_PERIOD): IndicatorSeries => {
  assertPeriod(period, 'ATR');
  series.requireLength(period + 1, 'ATR');

  const ranges = trueRange(series);
  const result: IndicatorValue[] = new Array(ranges.length).fill(undefined);

  let average = 0;
  for (let i = 1; i < ranges.length; i++) {
    if (i <= period) {
      average += ranges[i] / period;
      if (i < period) continue;
    } else {
      average = (average * (period - 1) + ranges[i]) / period;
    }
    result[i] = average;
  }

  return result;
};

/**
 * Classic floor-trader pivot levels computed from one (usually the previous) bar.
 */
export const pivotPoints = (bar: Readonly<PriceObservation>): PivotLevels => {
  const { high, low, close } = bar;
  const pivot = (high + low + close) / 3;
  return {
    pivot,
    r1: 2 * pivot - low,
    r2: pivot + (high - low),
    r3: high + 2 * (pivot - low),
    r4: high + 3 * (pivot - low),
    s1: 2 * pivot - high,
    s2: pivot - (high - low),
    s3: low - 2 * (high - pivot),
    s4: low - 3 * (high - pivot),
  };
};

/**
 * Retracement levels between a swing high and low, from the high (ratio 0)
 * down to the low (ratio 1).
 */
export const fibonacciRetracements = (high: number, low: number): FibonacciLevel[] => {
  if (!Number.isFinite(high) || !Number.isFinite(low) || high < low) {
    throw new InvalidParameterError(
      `Fibonacci swing high (${high}) must be a number no lower than the swing low (${low})`,
      { high, low }
    );
  }
  const range = high - low;
  return FIBONACCI_RATIOS.map(ratio => ({
    ratio,
    price: ratio === 1 ? low : high - range * ratio,
  }));
};
