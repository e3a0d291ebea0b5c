import { assertPeriod, type IndicatorSeries } from '../indicators/types.js';
import type { PriceSeries } from '../series/price-series.js';
import {
  calculateMedianReturn,
  calculateWinRate,
  compareValues,
} from '../utils/calculations.js';
import { InvalidParameterError } from '../utils/errors.js';

import { getStrategy } from './strategy-factory.js';
import type {
  BacktestResult,
  ClosedTrade,
  OpenPosition,
  PositionDirection,
  StrategyParams,
  TradeEvent,
} from './types.js';

/**
 * Crossover events between two lines. Evaluating index i reads only the values at
 * i - 1 and i, so an event never depends on later observations.
 */
export const detectCrossovers = (
  series: PriceSeries,
  short: IndicatorSeries,
  long: IndicatorSeries
): TradeEvent[] => {
  const events: TradeEvent[] = [];

  for (let i = 1; i < series.length; i++) {
    const prevShort = short[i - 1];
    const prevLong = long[i - 1];
    const curShort = short[i];
    const curLong = long[i];
    if (
      prevShort === undefined ||
      prevLong === undefined ||
      curShort === undefined ||
      curLong === undefined
    ) {
      continue;
    }

    const before = compareValues(prevShort, prevLong);
    const now = compareValues(curShort, curLong);
    const { timestamp, close } = series.at(i);

    if (before <= 0 && now > 0) {
      events.push({ index: i, timestamp, side: 'BUY', price: close });
    } else if (before >= 0 && now < 0) {
      events.push({ index: i, timestamp, side: 'SELL', price: close });
    }
  }

  return events;
};

interface Position {
  direction: PositionDirection;
  entryTimestamp: number;
  entryPrice: number;
}

const closePosition = (position: Position, exit: TradeEvent): ClosedTrade => {
  const sign = position.direction === 'long' ? 1 : -1;
  const pnl = (exit.price - position.entryPrice) * sign;
  return {
    direction: position.direction,
    entryTimestamp: position.entryTimestamp,
    entryPrice: position.entryPrice,
    exitTimestamp: exit.timestamp,
    exitPrice: exit.price,
    pnl,
    returnPct: (pnl / position.entryPrice) * 100,
  };
};

/**
 * Replays the event list once with a one-unit position: every event closes the
 * opposite position, if any, and opens a new one in its own direction.
 */
export const summarizeEvents = (
  events: ReadonlyArray<TradeEvent>,
  markPrice: number
): Pick<
  BacktestResult,
  | 'trades'
  | 'buyCount'
  | 'sellCount'
  | 'netReturn'
  | 'netReturnPct'
  | 'winRate'
  | 'medianReturnPct'
  | 'openPosition'
> => {
  const trades: ClosedTrade[] = [];
  let position: Position | undefined;
  let buyCount = 0;
  let sellCount = 0;

  for (const event of events) {
    const direction: PositionDirection = event.side === 'BUY' ? 'long' : 'short';
    if (event.side === 'BUY') buyCount++;
    else sellCount++;

    if (position && position.direction === direction) {
      continue;
    }
    if (position) {
      trades.push(closePosition(position, event));
    }
    position = { direction, entryTimestamp: event.timestamp, entryPrice: event.price };
  }

  let openPosition: OpenPosition | undefined;
  if (position) {
    const sign = position.direction === 'long' ? 1 : -1;
    openPosition = {
      ...position,
      markPrice,
      unrealizedPnl: (markPrice - position.entryPrice) * sign,
    };
  }

  const returns = trades.map(trade => trade.returnPct);
  return {
    trades: Object.freeze(trades),
    buyCount,
    sellCount,
    netReturn: trades.reduce((sum, trade) => sum + trade.pnl, 0),
    netReturnPct: returns.reduce((sum, value) => sum + value, 0),
    winRate: calculateWinRate(trades.filter(trade => trade.pnl > 0).length, trades.length),
    medianReturnPct: calculateMedianReturn(returns),
    openPosition,
  };
};

/**
 * Replays a series through a crossover strategy in chronological order.
 */
export const runBacktest = (
  series: PriceSeries,
  strategyId: string,
  params: StrategyParams
): BacktestResult => {
  const strategy = getStrategy(strategyId);
  assertPeriod(params.shortPeriod, strategy.name, 'shortPeriod');
  assertPeriod(params.longPeriod, strategy.name, 'longPeriod');
  if (params.shortPeriod >= params.longPeriod) {
    throw new InvalidParameterError(
      `${strategy.name} short period (${params.shortPeriod}) must be shorter than the long period (${params.longPeriod})`,
      { strategy: strategy.id, ...params }
    );
  }

  const { short, long } = strategy.lines(series, params);
  const events = detectCrossovers(series, short, long);

  return Object.freeze({
    strategy: strategy.id,
    params: { ...params },
    events: Object.freeze(events),
    ...summarizeEvents(events, series.last().close),
  });
};
