import type { PriceSeries } from '../series/price-series.js';
import { evaluateLatest, type SignalEvaluator } from '../signals/signal-evaluator.js';
import { classifyTrend } from '../signals/trend.js';
import type { IndicatorSnapshot, Signal, Trend } from '../signals/types.js';
import { SignalEngineError } from '../utils/errors.js';

export interface PairInput {
  pair: string;
  series: PriceSeries;
}

export interface PairAnalysis {
  pair: string;
  signal: Signal;
  snapshot: IndicatorSnapshot;
  trend: Trend;
}

export interface SkippedPair {
  pair: string;
  reason: string;
}

export interface ScanResult {
  analyses: PairAnalysis[];
  skipped: SkippedPair[];
}

export interface DailySummary {
  date: number;
  pairsChecked: number;
  totalSignals: number;
  buySignals: number;
  sellSignals: number;
  topOpportunity: Signal | undefined;
  pairs: string[];
}

/**
 * Evaluates the latest observation of every pair. Pairs are independent: a pair
 * whose data the engine rejects is listed under `skipped` with the error message
 * and the scan goes on. Anything that is not an engine error propagates.
 */
export const scanPairs = (
  inputs: ReadonlyArray<PairInput>,
  evaluator: SignalEvaluator
): ScanResult => {
  const analyses: PairAnalysis[] = [];
  const skipped: SkippedPair[] = [];

  for (const { pair, series } of inputs) {
    try {
      const { signal, snapshot } = evaluateLatest(series, pair, evaluator);
      analyses.push({ pair, signal, snapshot, trend: classifyTrend(snapshot) });
    } catch (error) {
      if (!(error instanceof SignalEngineError)) {
        throw error;
      }
      skipped.push({ pair, reason: error.message });
    }
  }

  return { analyses, skipped };
};

/**
 * Actionable signals at or above `minStrength`, strongest first.
 */
export const getOpportunities = (result: ScanResult, minStrength: number): Signal[] =>
  result.analyses
    .map(analysis => analysis.signal)
    .filter(signal => signal.type !== 'HOLD' && signal.strength >= minStrength)
    .sort((a, b) => b.strength - a.strength);

export const buildDailySummary = (
  result: ScanResult,
  minStrength: number,
  now: number = Date.now()
): DailySummary => {
  const opportunities = getOpportunities(result, minStrength);
  return {
    date: now,
    pairsChecked: result.analyses.length,
    totalSignals: opportunities.length,
    buySignals: opportunities.filter(signal => signal.type === 'BUY').length,
    sellSignals: opportunities.filter(signal => signal.type === 'SELL').length,
    topOpportunity: opportunities[0],
    pairs: result.analyses.map(analysis => analysis.pair),
  };
};
