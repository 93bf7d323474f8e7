/**
 * Domain entity for Course
 *
 * Default validity and grace, in whole days. A Requirement may override both.
 */
export interface Course {
  id: number;
  code: string;
  name: string;
  validityDays: number;
  graceDays: number;
  createdAt: Date;
}
