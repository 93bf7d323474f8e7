/**
 * Domain entity for Requirement
 *
 * A course a person must hold current training in before entering the
 * facility. Null overrides fall back to the course defaults.
 */
export interface Requirement {
  id: number;
  facilityId: number;
  courseId: number;
  validityDays: number | null;
  graceDays: number | null;
}
