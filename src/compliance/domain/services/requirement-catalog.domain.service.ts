import { Injectable } from '@nestjs/common';
import { FacilityRepositoryPort } from '../../../facilities/domain/repositories/facility.repository.port';
import { RequirementRepositoryPort } from '../../../facilities/domain/repositories/requirement.repository.port';
import { CourseRepositoryPort } from '../../../training/domain/repositories/course.repository.port';
import { FacilityCatalog, ResolvedRequirement } from '../types/catalog.types';
import {
  EntityNotFoundError,
  EvaluationError,
} from '../../../utils/errors/compliance-errors';

/**
 * Requirement Catalog
 *
 * Read-only view of what a facility demands. Every call returns a frozen
 * snapshot with overrides already applied, so one evaluation never observes
 * a catalogue edit halfway through.
 */
@Injectable()
export class RequirementCatalogService {
  constructor(
    private readonly facilityRepository: FacilityRepositoryPort,
    private readonly requirementRepository: RequirementRepositoryPort,
    private readonly courseRepository: CourseRepositoryPort,
  ) {}

  async getCatalog(facilityId: number): Promise<FacilityCatalog> {
    const facility = await this.facilityRepository.findById(facilityId);
    if (!facility) {
      throw new EntityNotFoundError('Facility', facilityId);
    }

    const requirements = await this.requirementRepository.findByFacility(
      facilityId,
    );
    const courses = await this.courseRepository.findByIds(
      Array.from(new Set(requirements.map((r) => r.courseId))),
    );
    const coursesById = new Map(courses.map((course) => [course.id, course]));

    const resolved = [...requirements]
      .sort((a, b) => a.id - b.id)
      .map((requirement): ResolvedRequirement => {
        const course = coursesById.get(requirement.courseId);
        if (!course) {
          throw new EvaluationError(
            `Requirement ${requirement.id} of facility ${facilityId} references missing course ${requirement.courseId}`,
            {
              facilityId,
              requirementId: requirement.id,
              courseId: requirement.courseId,
            },
          );
        }
        return Object.freeze({
          requirementId: requirement.id,
          course: Object.freeze({ courseId: course.id, code: course.code }),
          validityDays: requirement.validityDays ?? course.validityDays,
          graceDays: requirement.graceDays ?? course.graceDays,
        });
      });

    return Object.freeze({
      facilityId,
      requirements: Object.freeze(resolved),
    });
  }
}
