/**
 * Error taxonomy for the signal engine.
 *
 * Every failure raised by the core is a local computation failure (bad input or a
 * programming mistake), so nothing here is retried. Each error carries a
 * machine-readable code and the context needed to locate the problem, usually the
 * indicator name and the series index.
 */

export interface ErrorContext {
  indicator?: string;
  index?: number;
  [key: string]: unknown;
}

export class SignalEngineError extends Error {
  readonly code: string;
  readonly context: ErrorContext;

  constructor(code: string, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'SignalEngineError';
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Malformed price input: unordered timestamps, broken OHLC invariants,
 * non-finite values, or an empty series handed to a computation.
 */
export class InvalidSeriesError extends SignalEngineError {
  constructor(message: string, context: ErrorContext = {}) {
    super('INVALID_SERIES', message, context);
    this.name = 'InvalidSeriesError';
  }
}

/**
 * The requested window does not fit in the available history.
 */
export class InsufficientDataError extends SignalEngineError {
  readonly required: number;
  readonly available: number;

  constructor(
    indicator: string,
    required: number,
    available: number,
    context: ErrorContext = {}
  ) {
    super(
      'INSUFFICIENT_DATA',
      `${indicator} needs at least ${required} observations, got ${available}`,
      { indicator, required, available, ...context }
    );
    this.name = 'InsufficientDataError';
    this.required = required;
    this.available = available;
  }
}

/**
 * Evaluation was requested at an index where an indicator has not warmed up.
 */
export class IndicatorUnavailableError extends SignalEngineError {
  readonly indicator: string;
  readonly index: number;

  constructor(indicator: string, index: number) {
    super('INDICATOR_UNAVAILABLE', `${indicator} is not available at index ${index}`, {
      indicator,
      index,
    });
    this.name = 'IndicatorUnavailableError';
    this.indicator = indicator;
    this.index = index;
  }
}

/**
 * Non-positive or non-integer periods, a multiplier ≤ 0, inconsistent pairs of
 * periods, or a configuration that fails validation.
 */
export class InvalidParameterError extends SignalEngineError {
  constructor(message: string, context: ErrorContext = {}) {
    super('INVALID_PARAMETER', message, context);
    this.name = 'InvalidParameterError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
