import fs from 'fs';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest';

import { buildProgram } from './cli.js';
import { BASE_TIMESTAMP, HOUR_MS, constantCloses } from './test-utils.js';

vi.mock('chalk', () => ({
  default: {
    bold: (text: string) => text,
    green: (text: string) => text,
    red: (text: string) => text,
    yellow: (text: string) => text,
    cyan: (text: string) => text,
    gray: (text: string) => text,
    dim: (text: string) => text,
  },
}));

const toCsv = (closes: ReadonlyArray<number>): string =>
  [
    'timestamp,open,high,low,close',
    ...closes.map((close, i) => `${BASE_TIMESTAMP + i * HOUR_MS},${close},${close},${close},${close}`),
  ].join('\n');

describe('forex-signal CLI', () => {
  let tempDir: string;
  let missingConfig: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const run = (...args: string[]) => buildProgram().parseAsync(args, { from: 'user' });

  const writeCsv = (fileName: string, closes: ReadonlyArray<number>): string => {
    const csvPath = path.join(tempDir, fileName);
    fs.writeFileSync(csvPath, toCsv(closes));
    return csvPath;
  };

  const jsonOutput = (): unknown => JSON.parse(String(logSpy.mock.calls[0][0]));

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'forex-signal-cli-'));
    missingConfig = path.join(tempDir, 'no-config.yaml');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it('should register every command', () => {
    expect(buildProgram().commands.map(command => command.name())).toEqual([
      'analyze',
      'backtest',
      'scan',
      'init',
      'list-strategies',
    ]);
  });

  it('should analyze the latest observation as JSON', async () => {
    const csvPath = writeCsv('EURUSD.csv', constantCloses(1.2, 60));

    await run('analyze', csvPath, '--json', '--config', missingConfig);

    expect(jsonOutput()).toMatchObject({
      signal: { pair: 'EUR/USD', type: 'HOLD', confidence: 50 },
      snapshot: { index: 59, price: 1.2 },
      trend: 'neutral',
    });
  });

  it('should use --pair over the file name', async () => {
    const csvPath = writeCsv('prices.csv', constantCloses(1.2, 60));

    await run('analyze', csvPath, '--pair', 'USD/CHF', '--json', '-c', missingConfig);

    expect(jsonOutput()).toMatchObject({ signal: { pair: 'USD/CHF' } });
  });

  it('should backtest with CLI periods', async () => {
    const csvPath = writeCsv('GBPUSD.csv', [5, 4, 3, 2, 3, 4, 5, 4, 3, 2]);

    await run('backtest', csvPath, '--short', '2', '--long', '3', '--json', '-c', missingConfig);

    expect(jsonOutput()).toMatchObject({
      pair: 'GBP/USD',
      strategy: 'smaCrossover',
      params: { shortPeriod: 2, longPeriod: 3 },
      buyCount: 1,
      sellCount: 1,
      netReturn: -1,
    });
  });

  it('should scan a directory and skip pairs with too little data', async () => {
    writeCsv('EURUSD.csv', constantCloses(1.08, 60));
    writeCsv('GBPUSD.csv', constantCloses(1.27, 10));
    writeCsv('NZDUSD.csv', constantCloses(0.61, 60));
    fs.writeFileSync(path.join(tempDir, 'notes.txt'), 'not a price file');

    await run('scan', tempDir, '--json', '-c', missingConfig);

    expect(jsonOutput()).toMatchObject({
      summary: { pairsChecked: 1, totalSignals: 0, pairs: ['EUR/USD'] },
      opportunities: [],
      skipped: [{ pair: 'GBP/USD', reason: 'RSI needs at least 15 observations, got 10' }],
    });
  });

  it('should restrict a scan to the pairs given', async () => {
    writeCsv('EURUSD.csv', constantCloses(1.08, 60));
    writeCsv('NZDUSD.csv', constantCloses(0.61, 60));

    await run('scan', tempDir, '--pairs', 'nzd/usd', '--json', '-c', missingConfig);

    expect(jsonOutput()).toMatchObject({ summary: { pairs: ['NZD/USD'] } });
  });

  it('should write the default configuration file', async () => {
    const configPath = path.join(tempDir, 'forex-signal.config.yaml');

    await run('init', '--config', configPath);

    expect(fs.existsSync(configPath)).toBe(true);
    expect(logSpy).toHaveBeenCalledWith(`Created default configuration file: ${configPath}`);
  });

  it('should list strategies', async () => {
    await run('list-strategies');

    expect(logSpy).toHaveBeenCalledWith('\nAvailable strategies:');
  });

  it('should print errors and set a failing exit code', async () => {
    await run('analyze', path.join(tempDir, 'EURUSD.csv'), '-c', missingConfig);

    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining(`Error: Could not read ${path.join(tempDir, 'EURUSD.csv')}`)
    );
    expect(process.exitCode).toBe(1);
  });

  it('should report invalid backtest periods', async () => {
    const csvPath = writeCsv('EURUSD.csv', [5, 4, 3, 2, 3, 4, 5, 4, 3, 2]);

    await run('backtest', csvPath, '--short', '5', '--long', '3', '-c', missingConfig);

    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining('shortPeriod must be smaller than longPeriod')
    );
    expect(process.exitCode).toBe(1);
  });
});
