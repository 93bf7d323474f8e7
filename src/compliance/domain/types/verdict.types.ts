import { CalendarDay } from '../utils/calendar-day.util';

export interface CourseRef {
  courseId: number;
  code: string;
}

export interface DocumentRef {
  documentId: number;
  title: string;
}

export interface NoTrainingDeficiency {
  kind: 'NoTraining';
  course: CourseRef;
}

export interface TrainingExpiredDeficiency {
  kind: 'TrainingExpired';
  course: CourseRef;
  expiredOn: CalendarDay;
}

export interface DocumentNotAcknowledgedDeficiency {
  kind: 'DocumentNotAcknowledged';
  document: DocumentRef;
  requiredVersion: number;
  acknowledgedVersion: number | null;
}

export type Deficiency =
  | NoTrainingDeficiency
  | TrainingExpiredDeficiency
  | DocumentNotAcknowledgedDeficiency;

export type DeficiencyKind = Deficiency['kind'];

/**
 * Training past its expiry but inside the grace window. Informational only;
 * never part of `reasons`.
 */
export interface GraceNotice {
  course: CourseRef;
  expiredOn: CalendarDay;
  graceEndsOn: CalendarDay;
}

export interface Verdict {
  qualified: boolean;
  asOf: CalendarDay;
  reasons: readonly Deficiency[];
  graceInEffect: readonly GraceNotice[];
}
