import chalk from 'chalk';

import type { BacktestResult, StrategyId } from '../backtest/types.js';
import type { DailySummary, ScanResult } from '../services/pair-scanner.js';
import { rsiState, summarizeSnapshot } from '../signals/trend.js';
import type { IndicatorSnapshot, Signal, SignalType } from '../signals/types.js';

import {
  calculateMeanReturn,
  formatPercent,
  formatPrice,
  formatSigned,
  formatTimestamp,
  priceDecimals,
} from './calculations.js';

const SEPARATOR = '═══════════════════════════════════════════════════════════════════════';

const SIGNAL_EMOJI: Record<SignalType, string> = {
  BUY: '🟢',
  SELL: '🔴',
  HOLD: '⚪',
};

const colorForType = (type: SignalType) => {
  switch (type) {
    case 'BUY':
      return chalk.green;
    case 'SELL':
      return chalk.red;
    default:
      return chalk.yellow;
  }
};

const formatOptional = (value: number | undefined, decimals = 5): string =>
  value === undefined ? 'N/A' : value.toFixed(decimals);

/**
 * Plain-text notification for a signal, suitable for a chat message or an email body.
 */
export const formatSignalMessage = (signal: Signal, snapshot: IndicatorSnapshot): string => {
  const decimals = priceDecimals(signal.pair);
  const lines = [
    `${SIGNAL_EMOJI[signal.type]} ${signal.pair} ${signal.type} SIGNAL`,
    '',
    `📊 Confidence: ${signal.confidence.toFixed(0)}% (strength ${signal.strength.toFixed(0)}%)`,
    `💰 Entry: ${formatPrice(signal.entryPrice, decimals)}`,
    `🛑 Stop Loss: ${formatPrice(signal.stopLoss, decimals)}`,
    `🎯 Take Profit: ${formatPrice(signal.takeProfit, decimals)}`,
    '',
    '📈 Indicators:',
    `• RSI: ${formatOptional(snapshot.rsi, 2)}`,
    `• SMA short: ${formatOptional(snapshot.smaShort, decimals)}`,
    `• SMA long: ${formatOptional(snapshot.smaLong, decimals)}`,
    `• MACD: ${formatOptional(snapshot.macd?.macd)}`,
    '',
    `📝 Reason: ${signal.rationale.length > 0 ? signal.rationale.join('; ') : 'No indicator agreement'}`,
    '',
    `⏰ Time: ${formatTimestamp(signal.timestamp)}`,
    '',
    '⚠️ Educational only, not financial advice',
  ];
  return lines.join('\n');
};

export const printHeader = (title: string, subtitle?: string) => {
  console.log(chalk.bold(`\n${title}`));
  if (subtitle) {
    console.log(chalk.dim(subtitle));
  }
  console.log(chalk.gray(SEPARATOR));
};

export const printAnalysis = (signal: Signal, snapshot: IndicatorSnapshot) => {
  printHeader(`${signal.pair} Analysis`, `As of ${formatTimestamp(signal.timestamp)}`);
  const decimals = priceDecimals(signal.pair);

  console.log(`Price: ${formatPrice(snapshot.price, decimals)}`);
  console.log(
    `RSI: ${formatOptional(snapshot.rsi, 2)} (${rsiState(snapshot.rsi)}) | SMA short: ${formatOptional(snapshot.smaShort, decimals)} | SMA long: ${formatOptional(snapshot.smaLong, decimals)}`
  );
  if (snapshot.macd) {
    console.log(
      `MACD: ${formatPrice(snapshot.macd.macd)} | Signal: ${formatPrice(snapshot.macd.signal)} | Histogram: ${formatSigned(snapshot.macd.histogram)}`
    );
  }
  if (snapshot.bollinger) {
    console.log(
      `Bollinger: ${formatPrice(snapshot.bollinger.lower, decimals)} / ${formatPrice(snapshot.bollinger.middle, decimals)} / ${formatPrice(snapshot.bollinger.upper, decimals)}`
    );
  }
  console.log(`ATR: ${formatOptional(snapshot.atr, decimals)}`);
  console.log(chalk.dim(summarizeSnapshot(snapshot, signal)));
  console.log('');
  printSignal(signal);
};

export const printSignal = (signal: Signal) => {
  const color = colorForType(signal.type);
  const decimals = priceDecimals(signal.pair);
  console.log(
    color(
      `${SIGNAL_EMOJI[signal.type]} ${signal.type} ${signal.pair} @ ${formatPrice(signal.entryPrice, decimals)} (confidence ${signal.confidence.toFixed(0)}%, strength ${signal.strength.toFixed(0)}%)`
    )
  );
  if (signal.type !== 'HOLD') {
    console.log(
      chalk.dim(
        `SL: ${formatPrice(signal.stopLoss, decimals)} | TP: ${formatPrice(signal.takeProfit, decimals)} [${signal.riskSource}]`
      )
    );
  }
  for (const reason of signal.rationale) {
    console.log(chalk.dim(`• ${reason}`));
  }
};

export const printBacktestSummary = (pair: string, result: BacktestResult) => {
  printHeader(
    `${pair} Backtest: ${result.strategy}`,
    `Short ${result.params.shortPeriod} / Long ${result.params.longPeriod}`
  );
  const decimals = priceDecimals(pair);

  for (const event of result.events) {
    const color = event.side === 'BUY' ? chalk.green : chalk.red;
    console.log(
      `${formatTimestamp(event.timestamp)} ${color(event.side.padEnd(4))} @ ${formatPrice(event.price, decimals)}`
    );
  }
  if (result.events.length === 0) {
    console.log(chalk.gray('No crossovers in this series.'));
  }

  console.log('');
  console.log(chalk.bold('Summary:'));
  console.log(
    `Events: ${result.events.length} (${result.buyCount} buy, ${result.sellCount} sell) | Closed trades: ${result.trades.length}`
  );

  const returns = result.trades.map(trade => trade.returnPct);
  const netColor = result.netReturn >= 0 ? chalk.green : chalk.red;
  console.log(
    `Net: ${netColor(formatSigned(result.netReturn, decimals))} (${netColor(formatPercent(result.netReturnPct))}) | Win rate: ${formatPercent(result.winRate)}`
  );
  console.log(
    `Mean return: ${formatPercent(calculateMeanReturn(returns))} | Median return: ${formatPercent(result.medianReturnPct)}`
  );

  const open = result.openPosition;
  if (open) {
    console.log(
      chalk.dim(
        `Open ${open.direction} since ${formatTimestamp(open.entryTimestamp)} @ ${formatPrice(open.entryPrice, decimals)}, marked ${formatPrice(open.markPrice, decimals)} (${formatSigned(open.unrealizedPnl, decimals)})`
      )
    );
  }
};

export const printScanReport = (
  result: ScanResult,
  opportunities: ReadonlyArray<Signal>,
  summary: DailySummary
) => {
  printHeader('Forex Scan', `Generated ${formatTimestamp(summary.date)}`);

  for (const analysis of result.analyses) {
    console.log(
      `${analysis.pair.padEnd(8)} ${colorForType(analysis.signal.type)(analysis.signal.type.padEnd(4))} ${analysis.trend.padEnd(8)} strength ${analysis.signal.strength.toFixed(0)}%`
    );
  }
  for (const skipped of result.skipped) {
    console.warn(chalk.yellow(`${skipped.pair.padEnd(8)} skipped: ${skipped.reason}`));
  }

  console.log('');
  console.log(chalk.bold(`Opportunities (${opportunities.length}):`));
  if (opportunities.length === 0) {
    console.log(chalk.gray('None above the strength threshold.'));
  }
  opportunities.forEach(printSignal);

  console.log('');
  console.log(
    chalk.cyan(
      `Pairs checked: ${summary.pairsChecked} | Signals: ${summary.totalSignals} (${summary.buySignals} buy, ${summary.sellSignals} sell)`
    )
  );
  if (summary.topOpportunity) {
    console.log(
      chalk.cyan(
        `Top opportunity: ${summary.topOpportunity.type} ${summary.topOpportunity.pair} (${summary.topOpportunity.strength.toFixed(0)}%)`
      )
    );
  }
};

export const printStrategies = (
  strategies: ReadonlyArray<{ id: StrategyId; name: string; description: string }>
) => {
  console.log(chalk.bold('\nAvailable strategies:'));
  for (const strategy of strategies) {
    console.log(`- ${chalk.cyan(strategy.id)}: ${strategy.description}`);
  }
};
