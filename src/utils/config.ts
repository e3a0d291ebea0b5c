import fs from 'fs';
import path from 'path';

import yaml from 'js-yaml';
import { z } from 'zod';

import { STRATEGY_IDS } from '../backtest/types.js';

import { InvalidParameterError, describeError } from './errors.js';

export const CONFIG_FILE_NAME = 'forex-signal.config.yaml';
export const CONFIG_PATH_ENV_VAR = 'FOREX_SIGNAL_CONFIG';

export const DEFAULT_PAIRS = [
  'EUR/USD',
  'GBP/USD',
  'USD/JPY',
  'USD/CHF',
  'AUD/USD',
  'USD/CAD',
  'EUR/GBP',
  'USD/IDR',
];

export const MIN_CONFIDENCE_PER_VOTE = 10;

const period = (fallback: number) => z.number().int().positive().default(fallback);

const PairSchema = z.string().regex(/^[A-Z]{3}\/[A-Z]{3}$/, 'Pair must look like EUR/USD');

// Define schema for the crossover backtest
const BacktestConfigSchema = z
  .object({
    strategy: z.enum(STRATEGY_IDS).default('smaCrossover'),
    shortPeriod: period(20),
    longPeriod: period(50),
  })
  .refine(backtest => backtest.shortPeriod < backtest.longPeriod, {
    message: 'shortPeriod must be smaller than longPeriod',
    path: ['shortPeriod'],
  });

// Define the root config schema
const EngineConfigSchema = z
  .object({
    pairs: z.array(PairSchema).default(DEFAULT_PAIRS),
    minConfidenceThreshold: z.number().min(0).max(100).default(70),

    // Indicator periods
    rsiPeriod: period(14),
    smaShortPeriod: period(20),
    smaLongPeriod: period(50),
    macdFast: period(12),
    macdSlow: period(26),
    macdSignal: period(9),
    bollingerPeriod: period(20),
    bollingerMultiplier: z.number().positive().default(2),
    atrPeriod: period(14),

    // Vote classification and confidence scale
    rsiOversold: z.number().min(0).max(100).default(30),
    rsiOverbought: z.number().min(0).max(100).default(70),
    // Three unanimous votes must reach 80 (or 20 when bearish)
    confidencePerVote: z
      .number()
      .min(MIN_CONFIDENCE_PER_VOTE)
      .default(50 / 3),

    // Stop-loss / take-profit placement
    useAtr: z.boolean().default(true),
    stopLossAtrMultiplier: z.number().positive().default(2),
    takeProfitAtrMultiplier: z.number().positive().default(3),
    stopLossPercent: z.number().positive().default(1),
    takeProfitPercent: z.number().positive().default(2),

    allowPartialEvaluation: z.boolean().default(false),

    backtest: BacktestConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.smaShortPeriod >= config.smaLongPeriod) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'smaShortPeriod must be smaller than smaLongPeriod',
        path: ['smaShortPeriod'],
      });
    }
    if (config.macdFast >= config.macdSlow) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'macdFast must be smaller than macdSlow',
        path: ['macdFast'],
      });
    }
    if (config.rsiOversold >= config.rsiOverbought) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'rsiOversold must be smaller than rsiOverbought',
        path: ['rsiOversold'],
      });
    }
  });

// Type for the validated config
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type BacktestConfig = z.infer<typeof BacktestConfigSchema>;

/**
 * Validate a raw configuration value once, filling in defaults.
 * Every zod issue is reported in the thrown error.
 */
export const parseEngineConfig = (input: unknown = {}): EngineConfig => {
  const result = EngineConfigSchema.safeParse(input ?? {});
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  throw new InvalidParameterError(
    `Invalid configuration: ${issues.map(issue => `${issue.path || '(root)'}: ${issue.message}`).join('; ')}`,
    { issues }
  );
};

export const getDefaultConfig = (): EngineConfig => parseEngineConfig({});

export const resolveConfigPath = (configPath?: string): string =>
  configPath || process.env[CONFIG_PATH_ENV_VAR] || path.join(process.cwd(), CONFIG_FILE_NAME);

/**
 * Load configuration from a YAML file
 *
 * A missing file yields the defaults. A file that cannot be parsed or validated
 * throws `InvalidParameterError`.
 */
export const loadConfig = (configPath?: string): EngineConfig => {
  const configFilePath = resolveConfigPath(configPath);

  if (!fs.existsSync(configFilePath)) {
    return getDefaultConfig();
  }

  let configData: unknown;
  try {
    configData = yaml.load(fs.readFileSync(configFilePath, 'utf8'));
  } catch (error) {
    throw new InvalidParameterError(
      `Could not read config file ${configFilePath}: ${describeError(error)}`,
      { configFilePath }
    );
  }

  return parseEngineConfig(configData);
};

/**
 * Creates a default configuration file if none exists
 */
export const createDefaultConfigFile = (
  configPath?: string
): { configPath: string; created: boolean } => {
  const target = resolveConfigPath(configPath);
  if (fs.existsSync(target)) {
    return { configPath: target, created: false };
  }

  const yamlContent = yaml.dump(getDefaultConfig(), {
    indent: 2,
    lineWidth: 100,
    quotingType: '"',
  });
  fs.writeFileSync(target, yamlContent, 'utf8');
  return { configPath: target, created: true };
};

export interface CliOverrides {
  pairs?: string[];
  minConfidence?: number;
  strategy?: string;
  short?: number;
  long?: number;
}

/**
 * Merge CLI options over the loaded configuration. The result goes through the
 * schema again so overrides obey the same rules as the file.
 */
export const mergeConfigWithCliOptions = (
  loadedConfig: EngineConfig,
  cliOptions: CliOverrides
): EngineConfig => {
  return parseEngineConfig({
    ...loadedConfig,
    pairs: cliOptions.pairs ?? loadedConfig.pairs,
    minConfidenceThreshold: cliOptions.minConfidence ?? loadedConfig.minConfidenceThreshold,
    backtest: {
      strategy: cliOptions.strategy ?? loadedConfig.backtest.strategy,
      shortPeriod: cliOptions.short ?? loadedConfig.backtest.shortPeriod,
      longPeriod: cliOptions.long ?? loadedConfig.backtest.longPeriod,
    },
  });
};
