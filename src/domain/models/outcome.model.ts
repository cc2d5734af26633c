/**
 * Structured result returned by every engine operation.
 *
 * Callers distinguish "fully succeeded", "succeeded with N skipped" and
 * "failed" by `status`; nothing is thrown across the engine boundary.
 */
import { classifyError, type ErrorKind } from '../errors/gateway-error';

export interface OutcomeError {
  kind: ErrorKind;
  message: string;
}

export interface Succeeded<T> {
  status: 'succeeded';
  value: T;
  skipped: 0;
}

export interface SucceededWithSkips<T> {
  status: 'succeeded_with_skips';
  value: T;
  skipped: number;
}

export interface Failed<T> {
  status: 'failed';
  error: OutcomeError;
  /** Whatever was applied before the failure, when there is something to report. */
  value?: T;
}

export type Outcome<T> = Succeeded<T> | SucceededWithSkips<T> | Failed<T>;

export function succeeded<T>(value: T, skipped = 0): Outcome<T> {
  if (skipped > 0) {
    return { status: 'succeeded_with_skips', value, skipped };
  }
  return { status: 'succeeded', value, skipped: 0 };
}

export function failed<T>(kind: ErrorKind, message: string, value?: T): Failed<T> {
  const outcome: Failed<T> = { status: 'failed', error: { kind, message } };
  if (value !== undefined) {
    outcome.value = value;
  }
  return outcome;
}

/** Build a failed outcome from a caught gateway error. */
export function failedFrom<T>(error: unknown, value?: T): Failed<T> {
  const { kind, message } = classifyError(error);
  return failed(kind, message, value);
}

export function isSuccess<T>(outcome: Outcome<T>): outcome is Succeeded<T> | SucceededWithSkips<T> {
  return outcome.status !== 'failed';
}
