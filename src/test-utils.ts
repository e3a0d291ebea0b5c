import { PriceSeries, type PriceObservation } from './series/price-series.js';

export const BASE_TIMESTAMP = new Date(2024, 0, 2, 0, 0).getTime();
export const HOUR_MS = 60 * 60 * 1000;

/**
 * Hourly bars whose open, high and low all equal the close, so the true range of
 * bar i is |close[i] - close[i - 1]|.
 */
export const flatBars = (closes: ReadonlyArray<number>): PriceObservation[] =>
  closes.map((close, i) => ({
    timestamp: BASE_TIMESTAMP + i * HOUR_MS,
    open: close,
    high: close,
    low: close,
    close,
  }));

export const seriesFromCloses = (closes: ReadonlyArray<number>): PriceSeries =>
  PriceSeries.from(flatBars(closes));

export const constantCloses = (value: number, length: number): number[] =>
  new Array<number>(length).fill(value);

/**
 * Deterministic, non-trivial price path around `start`.
 */
export const wavyCloses = (length: number, start = 1.08): number[] =>
  Array.from({ length }, (_, i) => start + 0.01 * Math.sin(i / 3) + 0.0005 * (i % 4));

/**
 * Bars with real wicks around the given closes.
 */
export const barsWithWicks = (closes: ReadonlyArray<number>): PriceObservation[] =>
  closes.map((close, i) => {
    const open = i === 0 ? close : closes[i - 1];
    return {
      timestamp: BASE_TIMESTAMP + i * HOUR_MS,
      open,
      high: Math.max(open, close) + 0.002,
      low: Math.min(open, close) - 0.001,
      close,
      volume: 1000 + i,
    };
  });
