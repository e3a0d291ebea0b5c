import type { IndicatorValue, MacdPoint } from '../indicators/types.js';
import type { PriceSeries } from '../series/price-series.js';
import { clamp, compareValues } from '../utils/calculations.js';
import { parseEngineConfig, type EngineConfig, type EngineConfigInput } from '../utils/config.js';
import { IndicatorUnavailableError } from '../utils/errors.js';

import {
  computeIndicatorSet,
  firstPartialIndex,
  snapshotAt,
  warmUpIndex,
} from './indicator-set.js';
import type { IndicatorSnapshot, IndicatorVote, Signal, SignalType } from './types.js';

const VOTE_WEIGHT = { bullish: 1, bearish: -1, neutral: 0 } as const;

/**
 * Turns one indicator snapshot into a BUY / SELL / HOLD signal.
 *
 * Each of RSI, the short/long moving-average pair and the MACD crossover casts a
 * bullish, bearish or neutral vote; the net vote count sets the confidence and,
 * against the configured threshold, the signal type. The configuration is
 * validated once here, evaluation itself never re-checks it.
 */
export class SignalEvaluator {
  readonly config: EngineConfig;

  constructor(config: EngineConfigInput | EngineConfig = {}) {
    this.config = parseEngineConfig(config);
  }

  evaluate(snapshot: IndicatorSnapshot): Signal {
    const votes = [
      this.rsiVote(snapshot),
      this.movingAverageVote(snapshot),
      this.macdVote(snapshot),
    ];

    const netVotes = votes.reduce((net, vote) => net + VOTE_WEIGHT[vote.vote], 0);
    const confidence = clamp(50 + this.config.confidencePerVote * netVotes, 0, 100);
    const strength = netVotes > 0 ? confidence : 100 - confidence;
    const type = this.classify(netVotes, strength);
    const risk = this.riskLevels(snapshot, type);

    return Object.freeze({
      pair: snapshot.pair,
      timestamp: snapshot.timestamp,
      type,
      confidence,
      strength,
      entryPrice: snapshot.price,
      stopLoss: risk.stopLoss,
      takeProfit: risk.takeProfit,
      riskSource: risk.source,
      rationale: Object.freeze(
        votes.flatMap(vote => (vote.vote !== 'neutral' && vote.reason ? [vote.reason] : []))
      ),
      votes: Object.freeze(votes),
    });
  }

  private require<T>(value: IndicatorValue<T>, indicator: string, index: number): T | undefined {
    if (value === undefined && !this.config.allowPartialEvaluation) {
      throw new IndicatorUnavailableError(indicator, index);
    }
    return value;
  }

  private rsiVote(snapshot: IndicatorSnapshot): IndicatorVote {
    const value = this.require(snapshot.rsi, 'RSI', snapshot.index);
    if (value === undefined) return { indicator: 'RSI', vote: 'neutral' };

    if (value < this.config.rsiOversold) {
      return { indicator: 'RSI', vote: 'bullish', reason: `RSI oversold (${value.toFixed(2)})` };
    }
    if (value > this.config.rsiOverbought) {
      return { indicator: 'RSI', vote: 'bearish', reason: `RSI overbought (${value.toFixed(2)})` };
    }
    return { indicator: 'RSI', vote: 'neutral' };
  }

  private movingAverageVote(snapshot: IndicatorSnapshot): IndicatorVote {
    const short = this.require(snapshot.smaShort, 'SMA short', snapshot.index);
    const long = this.require(snapshot.smaLong, 'SMA long', snapshot.index);
    if (short === undefined || long === undefined) return { indicator: 'MA', vote: 'neutral' };

    const { smaShortPeriod, smaLongPeriod } = this.config;
    switch (compareValues(short, long)) {
      case 1:
        return {
          indicator: 'MA',
          vote: 'bullish',
          reason: `SMA${smaShortPeriod} above SMA${smaLongPeriod}`,
        };
      case -1:
        return {
          indicator: 'MA',
          vote: 'bearish',
          reason: `SMA${smaShortPeriod} below SMA${smaLongPeriod}`,
        };
      default:
        return { indicator: 'MA', vote: 'neutral' };
    }
  }

  private macdVote(snapshot: IndicatorSnapshot): IndicatorVote {
    const current = this.require<MacdPoint>(snapshot.macd, 'MACD', snapshot.index);
    const previous = this.require<MacdPoint>(snapshot.previousMacd, 'MACD', snapshot.index - 1);
    if (current === undefined || previous === undefined) {
      return { indicator: 'MACD', vote: 'neutral' };
    }

    const before = compareValues(previous.macd, previous.signal);
    const now = compareValues(current.macd, current.signal);
    if (before <= 0 && now > 0) {
      return { indicator: 'MACD', vote: 'bullish', reason: 'MACD crossed above signal line' };
    }
    if (before >= 0 && now < 0) {
      return { indicator: 'MACD', vote: 'bearish', reason: 'MACD crossed below signal line' };
    }
    return { indicator: 'MACD', vote: 'neutral' };
  }

  private classify(netVotes: number, strength: number): SignalType {
    if (netVotes === 0 || strength < this.config.minConfidenceThreshold) {
      return 'HOLD';
    }
    return netVotes > 0 ? 'BUY' : 'SELL';
  }

  private riskLevels(
    snapshot: IndicatorSnapshot,
    type: SignalType
  ): { stopLoss: number; takeProfit: number; source: 'atr' | 'percent' } {
    const entry = snapshot.price;
    const atrValue = this.config.useAtr
      ? this.require(snapshot.atr, 'ATR', snapshot.index)
      : undefined;

    const stopDistance =
      atrValue !== undefined
        ? atrValue * this.config.stopLossAtrMultiplier
        : entry * (this.config.stopLossPercent / 100);
    const targetDistance =
      atrValue !== undefined
        ? atrValue * this.config.takeProfitAtrMultiplier
        : entry * (this.config.takeProfitPercent / 100);
    const source = atrValue !== undefined ? 'atr' : 'percent';

    switch (type) {
      case 'BUY':
        return { stopLoss: entry - stopDistance, takeProfit: entry + targetDistance, source };
      case 'SELL':
        return { stopLoss: entry + stopDistance, takeProfit: entry - targetDistance, source };
      default:
        return { stopLoss: entry, takeProfit: entry, source };
    }
  }
}

/**
 * Signal for the most recent observation of a series.
 */
export const evaluateLatest = (
  series: PriceSeries,
  pair: string,
  evaluator: SignalEvaluator
): { signal: Signal; snapshot: IndicatorSnapshot } => {
  const set = computeIndicatorSet(series, evaluator.config, {
    lenient: evaluator.config.allowPartialEvaluation,
  });
  const snapshot = snapshotAt(set, series.length - 1, pair);
  return { signal: evaluator.evaluate(snapshot), snapshot };
};

/**
 * Signals for every index from the warm-up index onward, in chronological order.
 * Under partial evaluation the run starts at the first index where any
 * indicator is available, and a series too short for every indicator yields no
 * signals.
 */
export const generateSignals = (
  series: PriceSeries,
  pair: string,
  evaluator: SignalEvaluator
): Signal[] => {
  const partial = evaluator.config.allowPartialEvaluation;
  const set = computeIndicatorSet(series, evaluator.config, { lenient: partial });
  const start = partial ? firstPartialIndex(set) : warmUpIndex(evaluator.config);
  if (start < 0) {
    return [];
  }

  const signals: Signal[] = [];
  for (let index = start; index < series.length; index++) {
    signals.push(evaluator.evaluate(snapshotAt(set, index, pair)));
  }
  return signals;
};
