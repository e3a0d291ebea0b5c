import { InsufficientDataError, InvalidSeriesError } from '../utils/errors.js';

/**
 * One time step of market data. `timestamp` is epoch milliseconds.
 */
export interface PriceObservation {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume?: number;
}

/**
 * Upper bound on observations accepted per series.
 */
export const MAX_SERIES_LENGTH = 1_000_000;

const validateObservation = (
  observation: PriceObservation,
  index: number,
  previous: PriceObservation | undefined
): void => {
  const { timestamp, open, high, low, close, volume } = observation;

  for (const [field, value] of Object.entries({ timestamp, open, high, low, close })) {
    if (!Number.isFinite(value)) {
      throw new InvalidSeriesError(`Observation ${index} has a non-finite ${field}`, {
        index,
        field,
      });
    }
  }

  if (volume !== undefined && (!Number.isFinite(volume) || volume < 0)) {
    throw new InvalidSeriesError(`Observation ${index} has an invalid volume`, { index });
  }

  if (high < Math.max(open, close) || low > Math.min(open, close)) {
    throw new InvalidSeriesError(
      `Observation ${index} violates high >= max(open, close) and low <= min(open, close)`,
      { index, open, high, low, close }
    );
  }

  if (previous && timestamp <= previous.timestamp) {
    throw new InvalidSeriesError(`Timestamps must be strictly increasing (index ${index})`, {
      index,
      timestamp,
      previousTimestamp: previous.timestamp,
    });
  }
};

/**
 * Immutable, chronologically ordered OHLCV series.
 *
 * Observations are validated and copied on construction, so callers can keep
 * mutating their own input arrays without affecting the series.
 */
export class PriceSeries {
  readonly observations: ReadonlyArray<Readonly<PriceObservation>>;

  constructor(observations: ReadonlyArray<PriceObservation>) {
    if (observations.length > MAX_SERIES_LENGTH) {
      throw new InvalidSeriesError(
        `Series length ${observations.length} exceeds the maximum of ${MAX_SERIES_LENGTH}`,
        { length: observations.length }
      );
    }

    const copies: Readonly<PriceObservation>[] = [];
    observations.forEach((observation, index) => {
      validateObservation(observation, index, observations[index - 1]);
      copies.push(Object.freeze({ ...observation }));
    });

    this.observations = Object.freeze(copies);
    Object.freeze(this);
  }

  static from(observations: ReadonlyArray<PriceObservation>): PriceSeries {
    return new PriceSeries(observations);
  }

  get length(): number {
    return this.observations.length;
  }

  get isEmpty(): boolean {
    return this.observations.length === 0;
  }

  at(index: number): Readonly<PriceObservation> {
    const observation = this.observations[index];
    if (observation === undefined) {
      throw new InvalidSeriesError(`Index ${index} is outside the series (length ${this.length})`, {
        index,
      });
    }
    return observation;
  }

  last(): Readonly<PriceObservation> {
    return this.at(this.length - 1);
  }

  closes(): number[] {
    return this.observations.map(observation => observation.close);
  }

  highs(): number[] {
    return this.observations.map(observation => observation.high);
  }

  lows(): number[] {
    return this.observations.map(observation => observation.low);
  }

  timestamps(): number[] {
    return this.observations.map(observation => observation.timestamp);
  }

  /**
   * Sub-series over `[start, end)`. `end` defaults to the series length.
   */
  slice(start: number, end: number = this.length): PriceSeries {
    if (!Number.isInteger(start) || !Number.isInteger(end)) {
      throw new InvalidSeriesError('Slice bounds must be integers', { start, end });
    }
    if (start < 0 || end > this.length || start > end) {
      throw new InvalidSeriesError(
        `Invalid slice [${start}, ${end}) for a series of length ${this.length}`,
        { start, end }
      );
    }
    return new PriceSeries(this.observations.slice(start, end));
  }

  /**
   * Guard used by the indicators: an empty series is malformed input, a short
   * one is insufficient history for that particular call.
   */
  requireLength(minimum: number, indicator: string): void {
    if (this.isEmpty) {
      throw new InvalidSeriesError(`${indicator} cannot be computed on an empty series`, {
        indicator,
      });
    }
    if (this.length < minimum) {
      throw new InsufficientDataError(indicator, minimum, this.length);
    }
  }
}
