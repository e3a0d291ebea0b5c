export { PriceSeries, MAX_SERIES_LENGTH, type PriceObservation } from './series/price-series.js';

export {
  availableValues,
  firstAvailableIndex,
  isAvailable,
  type AdxPoint,
  type BollingerPoint,
  type DonchianPoint,
  type FibonacciLevel,
  type IndicatorSeries,
  type IndicatorValue,
  type MacdPoint,
  type PivotLevels,
  type StochasticPoint,
} from './indicators/types.js';
export { ema, emaOfValues, hma, sma, wma } from './indicators/moving-averages.js';
export { adx, macd, momentum, roc, rsi, stochastic } from './indicators/momentum.js';
export {
  atr,
  bollingerBands,
  donchianChannel,
  fibonacciRetracements,
  pivotPoints,
  trueRange,
} from './indicators/volatility.js';

export {
  computeIndicatorSet,
  minimumSeriesLength,
  snapshotAt,
  warmUpIndex,
  type IndicatorSet,
} from './signals/indicator-set.js';
export { SignalEvaluator, evaluateLatest, generateSignals } from './signals/signal-evaluator.js';
export { classifyTrend, summarizeSnapshot } from './signals/trend.js';
export type { IndicatorSnapshot, IndicatorVote, Signal, SignalType, Trend } from './signals/types.js';

export { detectCrossovers, runBacktest } from './backtest/backtester.js';
export { getAvailableStrategies, getStrategy } from './backtest/strategy-factory.js';
export type {
  BacktestResult,
  ClosedTrade,
  OpenPosition,
  StrategyId,
  StrategyParams,
  TradeEvent,
} from './backtest/types.js';

export {
  buildDailySummary,
  getOpportunities,
  scanPairs,
  type DailySummary,
  type PairInput,
  type ScanResult,
} from './services/pair-scanner.js';

export {
  getDefaultConfig,
  loadConfig,
  parseEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
} from './utils/config.js';
export { loadPriceSeries, pairFromFileName, parsePriceCsv } from './utils/csv-loader.js';
export { pipSize, priceDecimals } from './utils/calculations.js';
export { formatSignalMessage } from './utils/output.js';
export {
  IndicatorUnavailableError,
  InsufficientDataError,
  InvalidParameterError,
  InvalidSeriesError,
  SignalEngineError,
} from './utils/errors.js';
