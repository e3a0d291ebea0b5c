import fs from 'fs';
import path from 'path';

import { parse } from 'csv-parse/sync';
import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';

import { PriceSeries, type PriceObservation } from '../series/price-series.js';

import { InvalidParameterError, InvalidSeriesError, describeError } from './errors.js';

const CsvRecordsSchema = z.array(z.record(z.string()));

type CsvRecord = Record<string, string>;

const EPOCH_MS_PATTERN = /^\d+$/;

const parseDateTime = (value: string): number | undefined => {
  const parsed = parseISO(value.replace(' ', 'T'));
  return isValid(parsed) ? parsed.getTime() : undefined;
};

/**
 * Epoch milliseconds from either a bare integer or an ISO 8601 string.
 * Date-only and zone-less strings are read in local time.
 */
export const parseTimestamp = (raw: string): number | undefined => {
  const value = raw.trim();
  if (value === '') return undefined;
  if (EPOCH_MS_PATTERN.test(value)) return Number(value);
  return parseDateTime(value);
};

/**
 * A `timestamp` column may hold epoch milliseconds; `date` (plus an optional
 * `time`) is always a calendar date, including the compact `20240102` form.
 */
const readTimestamp = (record: CsvRecord, row: number): number => {
  let raw = '';
  let timestamp: number | undefined;
  if (record.timestamp !== undefined) {
    raw = record.timestamp.trim();
    timestamp = parseTimestamp(raw);
  } else if (record.date !== undefined) {
    raw = `${record.date.trim()} ${(record.time ?? '').trim()}`.trim();
    timestamp = raw === '' ? undefined : parseDateTime(raw);
  }

  if (timestamp === undefined) {
    throw new InvalidSeriesError(`Row ${row}: cannot parse timestamp '${raw}'`, { row });
  }
  return timestamp;
};

const readNumber = (record: CsvRecord, column: string, row: number): number => {
  const raw = record[column];
  if (raw === undefined) {
    throw new InvalidSeriesError(`Row ${row}: missing column '${column}'`, { row, column });
  }
  const value = raw.trim() === '' ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidSeriesError(`Row ${row}: '${raw}' is not a valid ${column}`, { row, column });
  }
  return value;
};

/**
 * Parses OHLC(V) rows into a validated series. Headers are matched
 * case-insensitively; the time column is either `timestamp` or `date` with an
 * optional `time`. Row numbers in errors count the header as row 1.
 */
export const parsePriceCsv = (content: string): PriceSeries => {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      columns: (header: string[]) => header.map(column => column.trim().toLowerCase()),
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new InvalidSeriesError(`Could not parse CSV: ${describeError(error)}`);
  }

  const records = CsvRecordsSchema.parse(parsed);
  const observations = records.map((record, i): PriceObservation => {
    const row = i + 2;
    const observation: PriceObservation = {
      timestamp: readTimestamp(record, row),
      open: readNumber(record, 'open', row),
      high: readNumber(record, 'high', row),
      low: readNumber(record, 'low', row),
      close: readNumber(record, 'close', row),
    };
    const volume = record.volume;
    if (volume !== undefined && volume.trim() !== '') {
      observation.volume = readNumber(record, 'volume', row);
    }
    return observation;
  });

  return PriceSeries.from(observations);
};

export const loadPriceSeries = (csvPath: string): PriceSeries => {
  let content: string;
  try {
    content = fs.readFileSync(csvPath, 'utf8');
  } catch (error) {
    throw new InvalidParameterError(`Could not read ${csvPath}: ${describeError(error)}`, {
      csvPath,
    });
  }
  return parsePriceCsv(content);
};

/**
 * `EURUSD.csv`, `eur_usd.csv` and `EUR-USD.csv` all name `EUR/USD`.
 */
export const pairFromFileName = (fileName: string): string => {
  const base = path.basename(fileName, path.extname(fileName));
  const letters = base.toUpperCase().replace(/[^A-Z]/g, '');
  if (letters.length !== 6) {
    throw new InvalidParameterError(`Cannot derive a currency pair from '${fileName}'`, {
      fileName,
    });
  }
  return `${letters.slice(0, 3)}/${letters.slice(3)}`;
};
