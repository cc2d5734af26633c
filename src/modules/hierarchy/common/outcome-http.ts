import { HttpException, HttpStatus } from '@nestjs/common';

import type { ErrorKind } from '../../../domain/errors/gateway-error';
import type { Outcome } from '../../../domain/models/outcome.model';

export const STATUS_BY_KIND: Record<ErrorKind, HttpStatus> = {
  NotFound: HttpStatus.NOT_FOUND,
  AlreadyExists: HttpStatus.CONFLICT,
  PartialFailure: HttpStatus.BAD_GATEWAY,
  InvalidName: HttpStatus.BAD_REQUEST,
  GatewayUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
};

export interface OutcomeErrorBody {
  kind: ErrorKind;
  detail: string;
  details?: unknown;
}

/** Carries a failed outcome to the exception filter. */
export class OutcomeHttpException extends HttpException {
  constructor(
    readonly kind: ErrorKind,
    detail: string,
    details?: unknown,
  ) {
    const body: OutcomeErrorBody = { kind, detail };
    if (details !== undefined) {
      body.details = details;
    }
    super(body, STATUS_BY_KIND[kind]);
  }
}

export interface OutcomeResponse<T> {
  status: 'succeeded' | 'succeeded_with_skips';
  skipped: number;
  result: T;
}

/**
 * Turn an engine outcome into a response body, or throw so the filter
 * renders the failure with its mapped status.
 */
export function unwrapOutcome<T>(outcome: Outcome<T>): OutcomeResponse<T> {
  if (outcome.status === 'failed') {
    throw new OutcomeHttpException(outcome.error.kind, outcome.error.message, outcome.value);
  }
  return { status: outcome.status, skipped: outcome.skipped, result: outcome.value };
}
