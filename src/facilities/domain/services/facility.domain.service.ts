import { Injectable } from '@nestjs/common';
import { FacilityRepositoryPort } from '../repositories/facility.repository.port';
import { RequirementRepositoryPort } from '../repositories/requirement.repository.port';
import { FacilityMetricsRepositoryPort } from '../repositories/facility-metrics.repository.port';
import { CourseRepositoryPort } from '../../../training/domain/repositories/course.repository.port';
import { Facility } from '../entities/facility.entity';
import { Requirement } from '../entities/requirement.entity';
import { FacilityMetrics } from '../entities/facility-metrics.entity';
import { toCalendarDay } from '../../../compliance/domain/utils/calendar-day.util';
import { Clock } from '../../../clock/clock';
import { Actor } from '../../../auth/domain/actor';
import {
  AuditAction,
  AuditEntityType,
  AuditService,
} from '../../../audit/audit.service';
import {
  DuplicateRequestError,
  EntityNotFoundError,
} from '../../../utils/errors/compliance-errors';

export interface AddRequirementInput {
  courseId: number;
  validityDays?: number | null;
  graceDays?: number | null;
}

export interface SaveMetricsInput {
  utilization: number;
  condition: number;
  activity: number;
  // Defaults to today
  asOf?: string;
}

const DEFAULT_METRICS_HISTORY = 30;

const clampPercent = (value: number): number =>
  Math.max(0, Math.min(100, Math.round(value)));

@Injectable()
export class FacilityDomainService {
  constructor(
    private readonly facilityRepository: FacilityRepositoryPort,
    private readonly requirementRepository: RequirementRepositoryPort,
    private readonly courseRepository: CourseRepositoryPort,
    private readonly metricsRepository: FacilityMetricsRepositoryPort,
    private readonly auditService: AuditService,
    private readonly clock: Clock,
  ) {}

  async createFacility(
    input: { code: string; name: string },
    actor: Actor,
  ): Promise<Facility> {
    if (await this.facilityRepository.findByCode(input.code)) {
      throw new DuplicateRequestError(`Facility ${input.code} already exists`, {
        code: input.code,
      });
    }

    const facility = await this.facilityRepository.create({
      code: input.code,
      name: input.name,
    });
    await this.auditService.record({
      actor,
      entityType: AuditEntityType.FACILITY,
      entityId: facility.id,
      action: AuditAction.FACILITY_CREATED,
      metadata: { code: facility.code },
    });
    return facility;
  }

  async getFacility(id: number): Promise<Facility> {
    const facility = await this.facilityRepository.findById(id);
    if (!facility) {
      throw new EntityNotFoundError('Facility', id);
    }
    return facility;
  }

  async listFacilities(): Promise<Facility[]> {
    return this.facilityRepository.findAll();
  }

  /**
   * One requirement per (facility, course). Overrides replace the course
   * defaults for this facility only.
   */
  async addRequirement(
    facilityId: number,
    input: AddRequirementInput,
    actor: Actor,
  ): Promise<Requirement> {
    await this.getFacility(facilityId);
    const course = await this.courseRepository.findById(input.courseId);
    if (!course) {
      throw new EntityNotFoundError('Course', input.courseId);
    }

    const existing = await this.requirementRepository.findByFacilityAndCourse(
      facilityId,
      input.courseId,
    );
    if (existing) {
      throw new DuplicateRequestError(
        `Facility ${facilityId} already requires course ${course.code}`,
        { facilityId, courseId: input.courseId, requirementId: existing.id },
      );
    }

    const requirement = await this.requirementRepository.create({
      facilityId,
      courseId: input.courseId,
      validityDays: input.validityDays ?? null,
      graceDays: input.graceDays ?? null,
    });
    await this.auditService.record({
      actor,
      entityType: AuditEntityType.REQUIREMENT,
      entityId: requirement.id,
      action: AuditAction.REQUIREMENT_ADDED,
      metadata: {
        facilityId,
        courseId: requirement.courseId,
        validityDays: requirement.validityDays,
        graceDays: requirement.graceDays,
      },
    });
    return requirement;
  }

  async listRequirements(facilityId: number): Promise<Requirement[]> {
    await this.getFacility(facilityId);
    return this.requirementRepository.findByFacility(facilityId);
  }

  /**
   * Record the day's metrics for a facility. Scores are clamped to 0..100;
   * saving the same day again overwrites it.
   */
  async saveMetrics(
    facilityId: number,
    input: SaveMetricsInput,
    actor: Actor,
  ): Promise<FacilityMetrics> {
    await this.getFacility(facilityId);
    const asOf = toCalendarDay(input.asOf ?? this.clock.now());

    const metrics = await this.metricsRepository.upsert({
      facilityId,
      asOf,
      utilization: clampPercent(input.utilization),
      condition: clampPercent(input.condition),
      activity: clampPercent(input.activity),
      recordedAt: this.clock.now(),
    });
    await this.auditService.record({
      actor,
      entityType: AuditEntityType.FACILITY_METRICS,
      entityId: `${facilityId}:${asOf}`,
      action: AuditAction.FACILITY_METRICS_SAVED,
      metadata: {
        utilization: metrics.utilization,
        condition: metrics.condition,
        activity: metrics.activity,
      },
    });
    return metrics;
  }

  async latestMetrics(facilityId: number): Promise<FacilityMetrics | null> {
    await this.getFacility(facilityId);
    return this.metricsRepository.findLatest(facilityId);
  }

  async metricsHistory(
    facilityId: number,
    limit: number = DEFAULT_METRICS_HISTORY,
  ): Promise<FacilityMetrics[]> {
    await this.getFacility(facilityId);
    return this.metricsRepository.findByFacility(facilityId, limit);
  }
}
