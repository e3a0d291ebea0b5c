import type { PriceSeries } from '../series/price-series.js';
import { InvalidParameterError } from '../utils/errors.js';

import { emaOfValues, rollingMean } from './moving-averages.js';
import {
  assertPeriod,
  availableValues,
  type AdxPoint,
  type IndicatorSeries,
  type IndicatorValue,
  type MacdPoint,
  type StochasticPoint,
} from './types.js';
import { calculateTrueRange, highLowRange } from './volatility.js';

export const DEFAULT_RSI_PERIOD = 14;
export const DEFAULT_MACD_FAST = 12;
export const DEFAULT_MACD_SLOW = 26;
export const DEFAULT_MACD_SIGNAL = 9;
export const DEFAULT_ROC_PERIOD = 10;
export const DEFAULT_MOMENTUM_PERIOD = 10;
export const DEFAULT_ADX_PERIOD = 14;

/**
 * RSI from smoothed average gain and loss.
 *
 * No losses and some gains is a pure uptrend (100). No movement at all has no
 * direction either way and reads as neutral (50).
 */
export const rsiFromAverages = (avgGain: number, avgLoss: number): number => {
  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
};

/**
 * Relative Strength Index with Wilder smoothing.
 *
 * The first value, at index `period`, averages the first `period` close-to-close
 * changes; after that each average moves by 1/period of the new change.
 */
export const rsi = (series: PriceSeries, period: number = DEFAULT_RSI_PERIOD): IndicatorSeries => {
  assertPeriod(period, 'RSI');
  series.requireLength(period + 1, 'RSI');

  const closes = series.closes();
  const result: IndicatorValue[] = new Array(closes.length).fill(undefined);

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    const gain = change > 0 ? change : 0;
    const loss = change < 0 ? -change : 0;

    if (i <= period) {
      avgGain += gain / period;
      avgLoss += loss / period;
      if (i < period) continue;
    } else {
      avgGain = (avgGain * (period - 1) + gain) / period;
      avgLoss = (avgLoss * (period - 1) + loss) / period;
    }

    result[i] = rsiFromAverages(avgGain, avgLoss);
  }

  return result;
};

export interface MacdOptions {
  fast?: number;
  slow?: number;
  signal?: number;
}

/**
 * Moving Average Convergence Divergence.
 *
 * The line, signal and histogram share one warm-up: every point is undefined
 * until the signal EMA (over the MACD line) is seeded at index `slow + signal - 2`.
 */
export const macd = (series: PriceSeries, options: MacdOptions = {}): IndicatorSeries<MacdPoint> => {
  const {
    fast = DEFAULT_MACD_FAST,
    slow = DEFAULT_MACD_SLOW,
    signal = DEFAULT_MACD_SIGNAL,
  } = options;

  assertPeriod(fast, 'MACD', 'fast');
  assertPeriod(slow, 'MACD', 'slow');
  assertPeriod(signal, 'MACD', 'signal');
  if (fast >= slow) {
    throw new InvalidParameterError(
      `MACD fast period (${fast}) must be shorter than the slow period (${slow})`,
      { indicator: 'MACD', fast, slow }
    );
  }
  series.requireLength(slow + signal - 1, 'MACD');

  const closes = series.closes();
  const fastEma = emaOfValues(closes, fast);
  const slowEma = emaOfValues(closes, slow);

  const line: IndicatorValue[] = closes.map((_, i) => {
    const f = fastEma[i];
    const s = slowEma[i];
    return f === undefined || s === undefined ? undefined : f - s;
  });
  const signalLine = emaOfValues(line, signal, 'MACD signal');

  return line.map((value, i) => {
    const signalValue = signalLine[i];
    if (value === undefined || signalValue === undefined) return undefined;
    return { macd: value, signal: signalValue, histogram: value - signalValue };
  });
};

export interface StochasticOptions {
  kPeriod?: number;
  dPeriod?: number;
}

/**
 * Stochastic oscillator. %K is the close's position inside the high/low range of
 * the last `kPeriod` bars (50 when the range is flat), %D its `dPeriod` SMA.
 */
export const stochastic = (
  series: PriceSeries,
  options: StochasticOptions = {}
): IndicatorSeries<StochasticPoint> => {
  const { kPeriod = 14, dPeriod = 3 } = options;
  assertPeriod(kPeriod, 'Stochastic', 'kPeriod');
  assertPeriod(dPeriod, 'Stochastic', 'dPeriod');
  series.requireLength(kPeriod + dPeriod - 1, 'Stochastic');

  const { observations } = series;
  const percentK: IndicatorValue[] = observations.map((observation, i) => {
    if (i < kPeriod - 1) return undefined;
    const { highest, lowest } = highLowRange(observations, i - kPeriod + 1, i);
    const range = highest - lowest;
    return range === 0 ? 50 : ((observation.close - lowest) / range) * 100;
  });

  const definedK = availableValues(percentK);
  const percentD = [
    ...new Array<IndicatorValue>(kPeriod - 1).fill(undefined),
    ...rollingMean(definedK, dPeriod),
  ];

  return percentK.map((k, i) => {
    const d = percentD[i];
    return k === undefined || d === undefined ? undefined : { k, d };
  });
};

/**
 * Compares each close with the close `period` bars earlier. First defined at
 * index `period`.
 */
const againstLookback = (
  series: PriceSeries,
  period: number,
  indicator: string,
  change: (current: number, past: number) => IndicatorValue
): IndicatorSeries => {
  assertPeriod(period, indicator);
  series.requireLength(period + 1, indicator);

  const closes = series.closes();
  return closes.map((close, i) => (i < period ? undefined : change(close, closes[i - period])));
};

/**
 * Rate of change in percent. Unavailable where the earlier close is 0.
 */
export const roc = (series: PriceSeries, period: number = DEFAULT_ROC_PERIOD): IndicatorSeries =>
  againstLookback(series, period, 'ROC', (current, past) =>
    past === 0 ? undefined : ((current - past) / past) * 100
  );

/**
 * Price momentum: the close minus the close `period` bars earlier.
 */
export const momentum = (
  series: PriceSeries,
  period: number = DEFAULT_MOMENTUM_PERIOD
): IndicatorSeries =>
  againstLookback(series, period, 'Momentum', (current, past) => current - past);

/**
 * Average Directional Index with +DI and -DI.
 *
 * Directional movement and true range start at bar 1. +DI, -DI and DX average
 * the last `period` of them; ADX averages the last `period` DX values, so every
 * point is undefined before index `2 * period - 1`. A flat window reads 0.
 */
export const adx = (
  series: PriceSeries,
  period: number = DEFAULT_ADX_PERIOD
): IndicatorSeries<AdxPoint> => {
  assertPeriod(period, 'ADX');
  series.requireLength(2 * period, 'ADX');

  const { observations } = series;
  const moves = observations.slice(1).map((bar, i) => {
    const previous = observations[i];
    const up = bar.high - previous.high;
    const down = previous.low - bar.low;
    return {
      plus: up > down && up > 0 ? up : 0,
      minus: down > up && down > 0 ? down : 0,
      range: calculateTrueRange(bar, previous),
    };
  });

  const avgRange = rollingMean(moves.map(move => move.range), period);
  const avgPlus = rollingMean(moves.map(move => move.plus), period);
  const avgMinus = rollingMean(moves.map(move => move.minus), period);

  const directional = moves.map((_, i) => {
    const range = avgRange[i];
    const plus = avgPlus[i];
    const minus = avgMinus[i];
    if (range === undefined || plus === undefined || minus === undefined) return undefined;

    const plusDi = range === 0 ? 0 : (100 * plus) / range;
    const minusDi = range === 0 ? 0 : (100 * minus) / range;
    const total = plusDi + minusDi;
    return { plusDi, minusDi, dx: total === 0 ? 0 : (100 * Math.abs(plusDi - minusDi)) / total };
  });

  const dxValues = directional.flatMap(point => (point === undefined ? [] : [point.dx]));
  const smoothed = [
    ...new Array<IndicatorValue>(period - 1).fill(undefined),
    ...rollingMean(dxValues, period),
  ];

  return [
    undefined,
    ...directional.map((point, i) => {
      const value = smoothed[i];
      if (point === undefined || value === undefined) return undefined;
      return { adx: value, plusDi: point.plusDi, minusDi: point.minusDi };
    }),
  ];
};
