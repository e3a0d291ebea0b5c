import { ema, sma } from '../indicators/moving-averages.js';
import { InvalidParameterError } from '../utils/errors.js';

import { STRATEGY_IDS, type CrossoverStrategy, type StrategyId } from './types.js';

const smaCrossoverStrategy: CrossoverStrategy = {
  id: 'smaCrossover',
  name: 'SMA Crossover',
  description: 'BUY when the short SMA crosses above the long SMA, SELL when it crosses below.',
  lines: (series, { shortPeriod, longPeriod }) => ({
    short: sma(series, shortPeriod),
    long: sma(series, longPeriod),
  }),
};

const emaCrossoverStrategy: CrossoverStrategy = {
  id: 'emaCrossover',
  name: 'EMA Crossover',
  description: 'BUY when the short EMA crosses above the long EMA, SELL when it crosses below.',
  lines: (series, { shortPeriod, longPeriod }) => ({
    short: ema(series, shortPeriod),
    long: ema(series, longPeriod),
  }),
};

const strategies: Record<StrategyId, CrossoverStrategy> = {
  smaCrossover: smaCrossoverStrategy,
  emaCrossover: emaCrossoverStrategy,
};

export const isStrategyId = (value: string): value is StrategyId =>
  STRATEGY_IDS.some(id => id === value);

export const getStrategy = (strategyId: string): CrossoverStrategy => {
  if (!isStrategyId(strategyId)) {
    throw new InvalidParameterError(
      `Strategy '${strategyId}' not found. Available: ${STRATEGY_IDS.join(', ')}`,
      { strategyId }
    );
  }
  return strategies[strategyId];
};

export const getAvailableStrategies = (): CrossoverStrategy[] =>
  STRATEGY_IDS.map(id => strategies[id]);
