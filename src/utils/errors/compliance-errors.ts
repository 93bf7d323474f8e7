import {
  ConflictException,
  ForbiddenException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

/**
 * Stable error codes surfaced to callers in the response body (`code`)
 * and used by the autocheck summary for per-record failures.
 */
export enum ComplianceErrorCode {
  NOT_FOUND = 'NotFound',
  DUPLICATE_REQUEST = 'DuplicateRequest',
  ILLEGAL_TRANSITION = 'IllegalTransition',
  UNAUTHORIZED = 'Unauthorized',
  EVALUATION_ERROR = 'EvaluationError',
}

export interface ComplianceErrorBody {
  code: ComplianceErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Referenced entity is absent. HTTP 404.
 */
export class EntityNotFoundError extends NotFoundException {
  readonly code = ComplianceErrorCode.NOT_FOUND;

  constructor(
    readonly entityType: string,
    readonly entityId: number | string,
  ) {
    super({
      code: ComplianceErrorCode.NOT_FOUND,
      message: `${entityType} ${entityId} not found`,
      details: { entityType, entityId },
    } satisfies ComplianceErrorBody);
  }
}

/**
 * A uniqueness rule would be violated (open authorization per pair,
 * requirement per facility/course, ...). HTTP 409.
 */
export class DuplicateRequestError extends ConflictException {
  readonly code = ComplianceErrorCode.DUPLICATE_REQUEST;

  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: ComplianceErrorCode.DUPLICATE_REQUEST,
      message,
      details,
    } satisfies ComplianceErrorBody);
  }
}

/**
 * Authorization state transition not permitted by the state machine. HTTP 409.
 */
export class IllegalTransitionError extends ConflictException {
  readonly code = ComplianceErrorCode.ILLEGAL_TRANSITION;

  constructor(
    readonly from: string,
    readonly to: string,
    message?: string,
  ) {
    super({
      code: ComplianceErrorCode.ILLEGAL_TRANSITION,
      message: message ?? `Invalid state transition: ${from} → ${to}`,
      details: { from, to },
    } satisfies ComplianceErrorBody);
  }
}

/**
 * Actor lacks the role for the requested decision. HTTP 403.
 */
export class UnauthorizedActionError extends ForbiddenException {
  readonly code = ComplianceErrorCode.UNAUTHORIZED;

  constructor(message: string) {
    super({
      code: ComplianceErrorCode.UNAUTHORIZED,
      message,
    } satisfies ComplianceErrorBody);
  }
}

/**
 * Data inconsistency found while evaluating a record, e.g. a requirement
 * pointing at a deleted course. HTTP 422 when it reaches a controller;
 * captured per record inside an autocheck run.
 */
export class EvaluationError extends UnprocessableEntityException {
  readonly code = ComplianceErrorCode.EVALUATION_ERROR;

  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: ComplianceErrorCode.EVALUATION_ERROR,
      message,
      details,
    } satisfies ComplianceErrorBody);
  }
}

export type ComplianceError =
  | EntityNotFoundError
  | DuplicateRequestError
  | IllegalTransitionError
  | UnauthorizedActionError
  | EvaluationError;

export function isComplianceError(error: unknown): error is ComplianceError {
  return (
    error instanceof EntityNotFoundError ||
    error instanceof DuplicateRequestError ||
    error instanceof IllegalTransitionError ||
    error instanceof UnauthorizedActionError ||
    error instanceof EvaluationError
  );
}
