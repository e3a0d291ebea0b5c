import { InvalidParameterError } from '../utils/errors.js';

/**
 * A value that may not be available yet. `undefined` marks the warm-up region of
 * an indicator and is never coerced to a number: 0 is a legitimate RSI or MACD
 * reading.
 */
export type IndicatorValue<T = number> = T | undefined;

/**
 * Indicator output aligned 1:1 with the source series.
 */
export type IndicatorSeries<T = number> = ReadonlyArray<IndicatorValue<T>>;

export interface MacdPoint {
  macd: number;
  signal: number;
  histogram: number;
}

export interface BollingerPoint {
  upper: number;
  middle: number;
  lower: number;
}

export interface StochasticPoint {
  k: number;
  d: number;
}

export interface DonchianPoint {
  upper: number;
  middle: number;
  lower: number;
}

export interface AdxPoint {
  adx: number;
  plusDi: number;
  minusDi: number;
}

export interface PivotLevels {
  pivot: number;
  r1: number;
  r2: number;
  r3: number;
  r4: number;
  s1: number;
  s2: number;
  s3: number;
  s4: number;
}

export interface FibonacciLevel {
  ratio: number;
  price: number;
}

export const isAvailable = <T>(value: IndicatorValue<T>): value is T => value !== undefined;

/**
 * The defined values of an indicator series, in order.
 */
export const availableValues = <T>(series: IndicatorSeries<T>): T[] => series.filter(isAvailable);

/**
 * Index of the first defined value, or -1 when the series never warms up.
 */
export const firstAvailableIndex = <T>(series: IndicatorSeries<T>): number =>
  series.findIndex(value => value !== undefined);

export const assertPeriod = (period: number, indicator: string, name = 'period'): void => {
  if (!Number.isInteger(period) || period < 1) {
    throw new InvalidParameterError(`${indicator} ${name} must be a positive integer, got ${period}`, {
      indicator,
      [name]: period,
    });
  }
};

export const assertPositive = (value: number, indicator: string, name: string): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(`${indicator} ${name} must be greater than 0, got ${value}`, {
      indicator,
      [name]: value,
    });
  }
};
