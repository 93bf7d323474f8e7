import { CalendarDay } from '../../../compliance/domain/utils/calendar-day.util';

/**
 * Daily operating snapshot of a facility. One row per (facility, asOf);
 * every score is a percentage in 0..100.
 */
export interface FacilityMetrics {
  id: number;
  facilityId: number;
  asOf: CalendarDay;
  utilization: number;
  condition: number;
  activity: number;
  recordedAt: Date;
}

export type FacilityMetricsInput = Omit<FacilityMetrics, 'id'>;
