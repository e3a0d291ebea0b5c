#!/usr/bin/env node

import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';

import { runBacktest } from './backtest/backtester.js';
import { getAvailableStrategies } from './backtest/strategy-factory.js';
import {
  buildDailySummary,
  getOpportunities,
  scanPairs,
  type PairInput,
  type SkippedPair,
} from './services/pair-scanner.js';
import { SignalEvaluator, evaluateLatest } from './signals/signal-evaluator.js';
import { classifyTrend } from './signals/trend.js';
import {
  createDefaultConfigFile,
  loadConfig,
  mergeConfigWithCliOptions,
  type CliOverrides,
  type EngineConfig,
} from './utils/config.js';
import { loadPriceSeries, pairFromFileName } from './utils/csv-loader.js';
import { SignalEngineError, describeError } from './utils/errors.js';
import {
  printAnalysis,
  printBacktestSummary,
  printScanReport,
  printStrategies,
} from './utils/output.js';

interface ConfigOption {
  config?: string;
}

interface AnalyzeOptions extends ConfigOption {
  pair?: string;
  json?: boolean;
}

interface BacktestOptions extends ConfigOption {
  pair?: string;
  strategy?: string;
  short?: number;
  long?: number;
  json?: boolean;
}

interface ScanOptions extends ConfigOption {
  minStrength?: number;
  pairs?: string[];
  json?: boolean;
}

const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
};

const parseStrength = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new InvalidArgumentError('Expected a number between 0 and 100.');
  }
  return parsed;
};

const parsePairList = (value: string): string[] =>
  value
    .split(',')
    .map(pair => pair.trim().toUpperCase())
    .filter(pair => pair.length > 0);

const resolveConfig = (options: ConfigOption, overrides: CliOverrides = {}): EngineConfig =>
  mergeConfigWithCliOptions(loadConfig(options.config), overrides);

const printJson = (value: unknown) => {
  console.log(JSON.stringify(value, null, 2));
};

// Reports a failed command in red and marks the process as failed.
const withErrorHandling =
  <A extends unknown[]>(action: (...args: A) => void) =>
  (...args: A): void => {
    try {
      action(...args);
    } catch (error) {
      console.error(chalk.red(`Error: ${describeError(error)}`));
      process.exitCode = 1;
    }
  };

const analyze = (csvPath: string, options: AnalyzeOptions) => {
  const config = resolveConfig(options);
  const pair = options.pair ?? pairFromFileName(csvPath);
  const series = loadPriceSeries(csvPath);
  const { signal, snapshot } = evaluateLatest(series, pair, new SignalEvaluator(config));

  if (options.json) {
    printJson({ signal, snapshot, trend: classifyTrend(snapshot) });
    return;
  }
  printAnalysis(signal, snapshot);
};

const backtest = (csvPath: string, options: BacktestOptions) => {
  const config = resolveConfig(options, {
    strategy: options.strategy,
    short: options.short,
    long: options.long,
  });
  const pair = options.pair ?? pairFromFileName(csvPath);
  const { strategy, shortPeriod, longPeriod } = config.backtest;
  const result = runBacktest(loadPriceSeries(csvPath), strategy, { shortPeriod, longPeriod });

  if (options.json) {
    printJson({ pair, ...result });
    return;
  }
  printBacktestSummary(pair, result);
};

const scan = (directory: string, options: ScanOptions) => {
  const config = resolveConfig(options, {
    pairs: options.pairs,
    minConfidence: options.minStrength,
  });
  const files = fs
    .readdirSync(directory)
    .filter(file => file.toLowerCase().endsWith('.csv'))
    .sort();

  const inputs: PairInput[] = [];
  const unreadable: SkippedPair[] = [];
  for (const file of files) {
    try {
      const pair = pairFromFileName(file);
      if (!config.pairs.includes(pair)) {
        continue;
      }
      inputs.push({ pair, series: loadPriceSeries(path.join(directory, file)) });
    } catch (error) {
      if (!(error instanceof SignalEngineError)) {
        throw error;
      }
      unreadable.push({ pair: file, reason: error.message });
    }
  }

  const scanned = scanPairs(inputs, new SignalEvaluator(config));
  const result = { ...scanned, skipped: [...unreadable, ...scanned.skipped] };
  const opportunities = getOpportunities(result, config.minConfidenceThreshold);
  const summary = buildDailySummary(result, config.minConfidenceThreshold);

  if (options.json) {
    printJson({ summary, opportunities, skipped: result.skipped });
    return;
  }
  printScanReport(result, opportunities, summary);
};

export const buildProgram = (): Command => {
  const program = new Command();

  program
    .name('forex-signal')
    .description('Technical-indicator signals and crossover backtests for forex pairs')
    .version('1.0.0');

  program
    .command('analyze')
    .description('Evaluate the latest observation of a CSV price series')
    .argument('<csv>', 'Path to an OHLC CSV file')
    .option('--pair <pair>', 'Currency pair (default: derived from the file name)')
    .option('-c, --config <path>', 'Path to configuration file')
    .option('--json', 'Print machine-readable JSON')
    .action(withErrorHandling(analyze));

  program
    .command('backtest')
    .description('Replay a CSV price series through a crossover strategy')
    .argument('<csv>', 'Path to an OHLC CSV file')
    .option('--pair <pair>', 'Currency pair (default: derived from the file name)')
    .option('--strategy <id>', 'Strategy id (see list-strategies)')
    .option('--short <period>', 'Short moving-average period', parseInteger)
    .option('--long <period>', 'Long moving-average period', parseInteger)
    .option('-c, --config <path>', 'Path to configuration file')
    .option('--json', 'Print machine-readable JSON')
    .action(withErrorHandling(backtest));

  program
    .command('scan')
    .description('Evaluate every <PAIR>.csv file in a directory')
    .argument('<dir>', 'Directory holding one CSV file per pair')
    .option('--min-strength <value>', 'Minimum signal strength (0-100)', parseStrength)
    .option('--pairs <list>', 'Comma-separated pairs to include', parsePairList)
    .option('-c, --config <path>', 'Path to configuration file')
    .option('--json', 'Print machine-readable JSON')
    .action(withErrorHandling(scan));

  program
    .command('init')
    .description('Create default configuration file')
    .option('-c, --config <path>', 'Where to write the configuration file')
    .action(
      withErrorHandling((options: ConfigOption) => {
        const { configPath, created } = createDefaultConfigFile(options.config);
        console.log(
          created
            ? `Created default configuration file: ${configPath}`
            : chalk.yellow(`Configuration file already exists: ${configPath}`)
        );
      })
    );

  program
    .command('list-strategies')
    .description('List available backtest strategies')
    .action(() => {
      printStrategies(getAvailableStrategies());
    });

  return program;
};

const main = async () => {
  dotenv.config({ path: '.env.local' });
  dotenv.config();

  await buildProgram().parseAsync(process.argv);
};

// Only run main if this script is executed directly (not imported)
const entry = process.argv[1];
if (
  entry !== undefined &&
  fs.existsSync(entry) &&
  import.meta.url === pathToFileURL(fs.realpathSync(entry)).href
) {
  main().catch(error => {
    console.error(chalk.red(`Error: ${describeError(error)}`));
    process.exitCode = 1;
  });
}
