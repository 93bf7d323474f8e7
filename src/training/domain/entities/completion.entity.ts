import { CalendarDay } from '../../../compliance/domain/utils/calendar-day.util';

export interface Completion {
  id: number;
  personId: number;
  courseId: number;
  completedOn: CalendarDay;
  // Opaque key into the artifact store; the certificate itself lives elsewhere
  certificateKey: string | null;
  recordedAt: Date;
}
