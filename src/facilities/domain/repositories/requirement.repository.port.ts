import { NullableType } from '../../../utils/types/nullable.type';
import { Requirement } from '../entities/requirement.entity';

export abstract class RequirementRepositoryPort {
  /**
   * Requirements of a facility in declaration order (ascending id)
   */
  abstract findByFacility(facilityId: number): Promise<Requirement[]>;

  abstract findByFacilityAndCourse(
    facilityId: number,
    courseId: number,
  ): Promise<NullableType<Requirement>>;

  abstract create(data: Omit<Requirement, 'id'>): Promise<Requirement>;
}
