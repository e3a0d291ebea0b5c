import type { IndicatorSeries } from '../indicators/types.js';
import type { PriceSeries } from '../series/price-series.js';

export const STRATEGY_IDS = ['smaCrossover', 'emaCrossover'] as const;

export type StrategyId = (typeof STRATEGY_IDS)[number];

export type EventSide = 'BUY' | 'SELL';

export type PositionDirection = 'long' | 'short';

export interface StrategyParams {
  shortPeriod: number;
  longPeriod: number;
}

/**
 * A two-line crossover rule. `lines` must only use data up to each index, which
 * holds for every trailing moving average.
 */
export interface CrossoverStrategy {
  id: StrategyId;
  name: string;
  description: string;
  lines: (
    series: PriceSeries,
    params: StrategyParams
  ) => { short: IndicatorSeries; long: IndicatorSeries };
}

export interface TradeEvent {
  index: number;
  timestamp: number;
  side: EventSide;
  price: number;
}

export interface ClosedTrade {
  direction: PositionDirection;
  entryTimestamp: number;
  entryPrice: number;
  exitTimestamp: number;
  exitPrice: number;
  pnl: number;
  returnPct: number;
}

export interface OpenPosition {
  direction: PositionDirection;
  entryTimestamp: number;
  entryPrice: number;
  markPrice: number;
  unrealizedPnl: number;
}

export interface BacktestResult {
  strategy: StrategyId;
  params: StrategyParams;
  events: ReadonlyArray<TradeEvent>;
  trades: ReadonlyArray<ClosedTrade>;
  buyCount: number;
  sellCount: number;
  netReturn: number;
  netReturnPct: number;
  winRate: number;
  medianReturnPct: number;
  openPosition: OpenPosition | undefined;
}
