import { Injectable, Logger } from '@nestjs/common';
import { CourseRepositoryPort } from '../repositories/course.repository.port';
import { CompletionRepositoryPort } from '../repositories/completion.repository.port';
import { PersonRepositoryPort } from '../../../people/domain/repositories/person.repository.port';
import { Course } from '../entities/course.entity';
import { Completion } from '../entities/completion.entity';
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
import {
  CalendarDay,
  toCalendarDay,
} from '../../../compliance/domain/utils/calendar-day.util';

export interface CreateCourseInput {
  code: string;
  name: string;
  validityDays: number;
  graceDays?: number;
}

export interface RecordCompletionInput {
  personId: number;
  courseId: number;
  completedOn: CalendarDay;
  certificateKey?: string | null;
}

export interface RecordCompletionResult {
  completion: Completion;
  created: boolean;
}

/**
 * Training Domain Service
 *
 * Owns the course catalogue and the completion history that the evaluator
 * reads. Completions are append-only and unique per (person, course, day).
 */
@Injectable()
export class TrainingDomainService {
  private readonly logger = new Logger(TrainingDomainService.name);

  constructor(
    private readonly courseRepository: CourseRepositoryPort,
    private readonly completionRepository: CompletionRepositoryPort,
    private readonly personRepository: PersonRepositoryPort,
    private readonly auditService: AuditService,
  ) {}

  async createCourse(input: CreateCourseInput, actor: Actor): Promise<Course> {
    if (await this.courseRepository.findByCode(input.code)) {
      throw new DuplicateRequestError(`Course ${input.code} already exists`, {
        code: input.code,
      });
    }

    const course = await this.courseRepository.create({
      code: input.code,
      name: input.name,
      validityDays: input.validityDays,
      graceDays: input.graceDays ?? 0,
    });

    await this.auditService.record({
      actor,
      entityType: AuditEntityType.COURSE,
      entityId: course.id,
      action: AuditAction.COURSE_CREATED,
      metadata: {
        code: course.code,
        validityDays: course.validityDays,
        graceDays: course.graceDays,
      },
    });

    return course;
  }

  async listCourses(): Promise<Course[]> {
    return this.courseRepository.findAll();
  }

  async getCourse(id: number): Promise<Course> {
    const course = await this.courseRepository.findById(id);
    if (!course) {
      throw new EntityNotFoundError('Course', id);
    }
    return course;
  }

  /**
   * Record a completion. A second record for the same (person, course, day)
   * returns the existing completion with `created: false`.
   */
  async recordCompletion(
    input: RecordCompletionInput,
    actor: Actor,
  ): Promise<RecordCompletionResult> {
    const person = await this.personRepository.findById(input.personId);
    if (!person) {
      throw new EntityNotFoundError('Person', input.personId);
    }
    await this.getCourse(input.courseId);

    const completedOn = toCalendarDay(input.completedOn);
    const existing = await this.completionRepository.findOne(
      input.personId,
      input.courseId,
      completedOn,
    );
    if (existing) {
      return { completion: existing, created: false };
    }

    const completion = await this.completionRepository.create({
      personId: input.personId,
      courseId: input.courseId,
      completedOn,
      certificateKey: input.certificateKey ?? null,
    });

    await this.auditService.record({
      actor,
      entityType: AuditEntityType.COMPLETION,
      entityId: completion.id,
      action: AuditAction.COMPLETION_RECORDED,
      metadata: {
        personId: completion.personId,
        courseId: completion.courseId,
        completedOn,
      },
    });
    this.logger.log(
      `Completion recorded: person ${completion.personId}, course ${completion.courseId}, ${completedOn}`,
    );

    return { completion, created: true };
  }

  async listCompletions(personId: number): Promise<Completion[]> {
    const person = await this.personRepository.findById(personId);
    if (!person) {
      throw new EntityNotFoundError('Person', personId);
    }
    return this.completionRepository.findByPerson(personId);
  }
}
