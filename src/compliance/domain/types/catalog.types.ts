import { CourseRef } from './verdict.types';

/**
 * A facility requirement with its course defaults and overrides already
 * folded into effective values.
 */
export interface ResolvedRequirement {
  readonly requirementId: number;
  readonly course: Readonly<CourseRef>;
  readonly validityDays: number;
  readonly graceDays: number;
}

export interface FacilityCatalog {
  readonly facilityId: number;
  readonly requirements: readonly ResolvedRequirement[];
}
