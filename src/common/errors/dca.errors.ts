export type DcaErrorKind =
  | 'clock-skew'
  | 'insufficient-funds'
  | 'order-too-small'
  | 'submission';

export abstract class DcaError extends Error {
  abstract readonly kind: DcaErrorKind;
}

export class ClockSkewError extends DcaError {
  readonly kind = 'clock-skew';
  readonly driftMs: number;

  constructor(
    readonly exchangeTime: Date,
    readonly systemTime: Date,
    readonly toleranceMs: number,
  ) {
    const driftMs = Math.abs(systemTime.getTime() - exchangeTime.getTime());
    super(
      `Too much lag: exchange time ${exchangeTime.toISOString()}, system time ${systemTime.toISOString()} (drift ${driftMs} ms, tolerance ${toleranceMs} ms). Check your internet connection speed or synchronize your system time.`,
    );
    this.name = 'ClockSkewError';
    this.driftMs = driftMs;
  }
}

export class InsufficientFundsError extends DcaError {
  readonly kind = 'insufficient-funds';

  constructor(
    readonly currency: string,
    readonly required: number,
    readonly available: number,
  ) {
    super(
      `Insufficient funds: ${required} ${currency} required, ${available} ${currency} available`,
    );
    this.name = 'InsufficientFundsError';
  }
}

export class OrderTooSmallError extends DcaError {
  readonly kind = 'order-too-small';

  constructor(
    readonly pair: string,
    readonly volume: number,
    readonly minimum: number,
  ) {
    super(
      `Too low volume to buy ${pair}: current ${volume}, minimum ${minimum}`,
    );
    this.name = 'OrderTooSmallError';
  }
}

export class SubmissionError extends DcaError {
  readonly kind = 'submission';

  constructor(
    readonly pair: string,
    readonly cause: unknown,
  ) {
    super(
      `Failed to submit buy limit order for ${pair}: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = 'SubmissionError';
  }
}

export type AnyDcaError =
  | ClockSkewError
  | InsufficientFundsError
  | OrderTooSmallError
  | SubmissionError;

export function isDcaError(error: unknown): error is AnyDcaError {
  return (
    error instanceof ClockSkewError ||
    error instanceof InsufficientFundsError ||
    error instanceof OrderTooSmallError ||
    error instanceof SubmissionError
  );
}
