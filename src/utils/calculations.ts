import { format } from 'date-fns';

// Relative tolerance for crossover comparisons. Values closer than this count as equal.
export const COMPARISON_TOLERANCE = 1e-12;

/**
 * Three-way comparison with a small tolerance: -1 when a < b, 1 when a > b, 0 when
 * they are equal up to rounding.
 */
export const compareValues = (a: number, b: number): -1 | 0 | 1 => {
  const scale = Math.max(1, Math.abs(a), Math.abs(b));
  if (Math.abs(a - b) <= COMPARISON_TOLERANCE * scale) return 0;
  return a > b ? 1 : -1;
};

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

// Helper formatting functions
export const formatTimestamp = (timestamp: number): string =>
  format(new Date(timestamp), 'yyyy-MM-dd HH:mm');

export const formatPrice = (value: number, decimals = 5): string => value.toFixed(decimals);

const PIP_SIZES: Record<string, number> = { JPY: 0.01, IDR: 1 };
const PRICE_DECIMALS: Record<string, number> = { JPY: 3, IDR: 1 };

const quoteCurrency = (pair: string): string => pair.slice(-3).toUpperCase();

/**
 * Pip size of a pair, by its quote currency: 0.01 for JPY, 1 for IDR, 0.0001 otherwise.
 */
export const pipSize = (pair: string): number => PIP_SIZES[quoteCurrency(pair)] ?? 0.0001;

/**
 * Decimals to print a pair's prices with: one past the pip.
 */
export const priceDecimals = (pair: string): number =>
  PRICE_DECIMALS[quoteCurrency(pair)] ?? 5;

export const formatPercent = (value: number): string => `${value.toFixed(2)}%`;

export const formatSigned = (value: number, decimals = 5): string =>
  `${value >= 0 ? '+' : ''}${value.toFixed(decimals)}`;

export const calculateWinRate = (winningTrades: number, totalTrades: number): number => {
  return totalTrades > 0 ? (winningTrades / totalTrades) * 100 : 0;
};

export const calculateMeanReturn = (returns: number[]): number => {
  return returns.length > 0 ? returns.reduce((a, b) => a + b, 0) / returns.length : 0;
};

export const calculateMedianReturn = (returns: number[]): number => {
  if (returns.length === 0) return 0;

  const sortedReturns = [...returns].sort((a, b) => a - b);

  const mid = Math.floor(sortedReturns.length / 2);
  if (sortedReturns.length % 2 === 0) {
    return (sortedReturns[mid - 1] + sortedReturns[mid]) / 2;
  }
  return sortedReturns[mid];
};
