import { compareValues } from '../utils/calculations.js';

import type { IndicatorSnapshot, Signal, Trend } from './types.js';

/**
 * Majority of three checks: price above the short SMA, short SMA above the long
 * SMA, MACD above its signal line. Unavailable inputs do not vote; a tie or no
 * votes at all is neutral.
 */
export const classifyTrend = (snapshot: IndicatorSnapshot): Trend => {
  const checks: Array<-1 | 0 | 1> = [];

  if (snapshot.smaShort !== undefined) {
    checks.push(compareValues(snapshot.price, snapshot.smaShort));
  }
  if (snapshot.smaShort !== undefined && snapshot.smaLong !== undefined) {
    checks.push(compareValues(snapshot.smaShort, snapshot.smaLong));
  }
  if (snapshot.macd !== undefined) {
    checks.push(compareValues(snapshot.macd.macd, snapshot.macd.signal));
  }

  const bullish = checks.filter(check => check > 0).length;
  const bearish = checks.filter(check => check < 0).length;

  if (bullish > bearish) return 'bullish';
  if (bearish > bullish) return 'bearish';
  return 'neutral';
};

export const rsiState = (value: number | undefined): string => {
  if (value === undefined) return 'n/a';
  if (value > 70) return 'overbought';
  if (value < 30) return 'oversold';
  return 'neutral';
};

/**
 * One-line summary, e.g. `Trend: BULLISH | RSI: 55.2 (neutral) | MACD: 0.00012 | Signal: HOLD`.
 */
export const summarizeSnapshot = (snapshot: IndicatorSnapshot, signal: Signal): string => {
  const parts = [
    `Trend: ${classifyTrend(snapshot).toUpperCase()}`,
    `RSI: ${snapshot.rsi === undefined ? 'n/a' : snapshot.rsi.toFixed(1)} (${rsiState(snapshot.rsi)})`,
    `MACD: ${snapshot.macd === undefined ? 'n/a' : snapshot.macd.macd.toFixed(5)}`,
    `Signal: ${signal.type}`,
  ];
  return parts.join(' | ');
};
