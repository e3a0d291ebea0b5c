import type { BollingerPoint, IndicatorValue, MacdPoint } from '../indicators/types.js';

export type SignalType = 'BUY' | 'SELL' | 'HOLD';

export type Vote = 'bullish' | 'bearish' | 'neutral';

export type Trend = Vote;

/**
 * Indicator readings at one index of one series, plus the previous MACD point
 * needed to detect a crossover on this step.
 */
export interface IndicatorSnapshot {
  pair: string;
  index: number;
  timestamp: number;
  price: number;
  rsi: IndicatorValue;
  smaShort: IndicatorValue;
  smaLong: IndicatorValue;
  macd: IndicatorValue<MacdPoint>;
  previousMacd: IndicatorValue<MacdPoint>;
  bollinger: IndicatorValue<BollingerPoint>;
  atr: IndicatorValue;
}

export interface IndicatorVote {
  indicator: 'RSI' | 'MA' | 'MACD';
  vote: Vote;
  reason?: string;
}

export interface Signal {
  pair: string;
  timestamp: number;
  type: SignalType;
  /** Bullishness on a 0-100 scale; 50 is balanced. */
  confidence: number;
  /** Conviction in the signal's own direction: `confidence` when bullish, `100 - confidence` otherwise. */
  strength: number;
  entryPrice: number;
  stopLoss: number;
  takeProfit: number;
  riskSource: 'atr' | 'percent';
  rationale: ReadonlyArray<string>;
  votes: ReadonlyArray<IndicatorVote>;
}
