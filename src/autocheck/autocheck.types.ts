import { AuthorizationState } from '../authorizations/domain/enums/authorization-state.enum';
import { ComplianceErrorCode } from '../utils/errors/compliance-errors';
import { CalendarDay } from '../compliance/domain/utils/calendar-day.util';

export interface AutocheckTransition {
  authorizationId: number;
  personId: number;
  facilityId: number;
  from: AuthorizationState;
  to: AuthorizationState;
  // Deficiency string for revocations and denials
  reason: string | null;
}

export interface AutocheckFailure {
  authorizationId: number;
  code: ComplianceErrorCode;
  message: string;
}

export interface AutocheckSummary {
  runId: string;
  asOf: CalendarDay;
  startedAt: Date;
  finishedAt: Date;
  examined: number;
  granted: AutocheckTransition[];
  revoked: AutocheckTransition[];
  denied: AutocheckTransition[];
  unchanged: number[];
  errors: AutocheckFailure[];
  // Records skipped because the run was cancelled before reaching them
  cancelled: number[];
  // False when the autocheck_completed entry could not be appended
  runAudited: boolean;
}

export interface AutocheckOptions {
  signal?: AbortSignal;
  concurrency?: number;
}
