import { macd, rsi } from '../indicators/momentum.js';
import { sma } from '../indicators/moving-averages.js';
import {
  firstAvailableIndex,
  type BollingerPoint,
  type IndicatorSeries,
  type MacdPoint,
} from '../indicators/types.js';
import { atr, bollingerBands } from '../indicators/volatility.js';
import type { PriceSeries } from '../series/price-series.js';
import type { EngineConfig } from '../utils/config.js';
import { InsufficientDataError, InvalidSeriesError } from '../utils/errors.js';

import type { IndicatorSnapshot } from './types.js';

export type IndicatorPeriods = Pick<
  EngineConfig,
  | 'rsiPeriod'
  | 'smaShortPeriod'
  | 'smaLongPeriod'
  | 'macdFast'
  | 'macdSlow'
  | 'macdSignal'
  | 'bollingerPeriod'
  | 'bollingerMultiplier'
  | 'atrPeriod'
  | 'useAtr'
>;

/**
 * Every indicator the evaluator reads, computed once over a whole series.
 */
export interface IndicatorSet {
  series: PriceSeries;
  rsi: IndicatorSeries;
  smaShort: IndicatorSeries;
  smaLong: IndicatorSeries;
  macd: IndicatorSeries<MacdPoint>;
  bollinger: IndicatorSeries<BollingerPoint>;
  atr: IndicatorSeries;
}

/**
 * First index at which every configured indicator, including the previous MACD
 * point used for crossover detection, is defined.
 */
export const warmUpIndex = (periods: IndicatorPeriods): number => {
  const readiness = [
    periods.rsiPeriod,
    periods.smaShortPeriod - 1,
    periods.smaLongPeriod - 1,
    periods.macdSlow + periods.macdSignal - 1,
    periods.bollingerPeriod - 1,
  ];
  if (periods.useAtr) {
    readiness.push(periods.atrPeriod);
  }
  return Math.max(...readiness);
};

/**
 * Minimum series length needed to evaluate at least one index.
 */
export const minimumSeriesLength = (periods: IndicatorPeriods): number => warmUpIndex(periods) + 1;

/**
 * Runs one indicator. With `lenient`, a window that does not fit the history
 * yields an all-unavailable series instead of an InsufficientDataError, so
 * partial evaluation can still vote with the indicators that have warmed up.
 */
const compute = <T>(
  series: PriceSeries,
  lenient: boolean,
  calculate: () => IndicatorSeries<T>
): IndicatorSeries<T> => {
  if (!lenient) {
    return calculate();
  }
  try {
    return calculate();
  } catch (error) {
    if (error instanceof InsufficientDataError) {
      return series.observations.map(() => undefined);
    }
    throw error;
  }
};

export const computeIndicatorSet = (
  series: PriceSeries,
  periods: IndicatorPeriods,
  options: { lenient?: boolean } = {}
): IndicatorSet => {
  const lenient = options.lenient ?? false;
  return {
    series,
    rsi: compute(series, lenient, () => rsi(series, periods.rsiPeriod)),
    smaShort: compute(series, lenient, () => sma(series, periods.smaShortPeriod)),
    smaLong: compute(series, lenient, () => sma(series, periods.smaLongPeriod)),
    macd: compute(series, lenient, () =>
      macd(series, {
        fast: periods.macdFast,
        slow: periods.macdSlow,
        signal: periods.macdSignal,
      })
    ),
    bollinger: compute(series, lenient, () =>
      bollingerBands(series, {
        period: periods.bollingerPeriod,
        multiplier: periods.bollingerMultiplier,
      })
    ),
    atr: periods.useAtr
      ? compute(series, lenient, () => atr(series, periods.atrPeriod))
      : series.observations.map(() => undefined),
  };
};

/**
 * First index at which any indicator of the set has a value, or -1 when none
 * does. Partial evaluation starts here instead of at the full warm-up index.
 */
export const firstPartialIndex = (set: IndicatorSet): number => {
  const starts = [set.rsi, set.smaShort, set.smaLong, set.macd, set.bollinger, set.atr]
    .map(values => firstAvailableIndex<unknown>(values))
    .filter(index => index >= 0);
  return starts.length === 0 ? -1 : Math.min(...starts);
};

export const snapshotAt = (set: IndicatorSet, index: number, pair: string): IndicatorSnapshot => {
  if (!Number.isInteger(index) || index < 0 || index >= set.series.length) {
    throw new InvalidSeriesError(
      `Index ${index} is outside the series (length ${set.series.length})`,
      { index }
    );
  }

  const observation = set.series.at(index);
  return {
    pair,
    index,
    timestamp: observation.timestamp,
    price: observation.close,
    rsi: set.rsi[index],
    smaShort: set.smaShort[index],
    smaLong: set.smaLong[index],
    macd: set.macd[index],
    previousMacd: index > 0 ? set.macd[index - 1] : undefined,
    bollinger: set.bollinger[index],
    atr: set.atr[index],
  };
};
