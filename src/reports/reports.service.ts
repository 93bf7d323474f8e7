import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { AuthorizationRepositoryPort } from '../authorizations/domain/repositories/authorization.repository.port';
import { AuthorizationState } from '../authorizations/domain/enums/authorization-state.enum';
import { ComplianceEvaluationService } from '../compliance/domain/services/compliance-evaluation.domain.service';
import { formatDeficiency } from '../compliance/domain/utils/deficiency-formatter.util';
import {
  CalendarDay,
  addDays,
  daysBetween,
  toCalendarDay,
} from '../compliance/domain/utils/calendar-day.util';
import { CompletionRepositoryPort } from '../training/domain/repositories/completion.repository.port';
import { CourseRepositoryPort } from '../training/domain/repositories/course.repository.port';
import { Completion } from '../training/domain/entities/completion.entity';
import { AcknowledgmentRepositoryPort } from '../documents/domain/repositories/acknowledgment.repository.port';
import { ProceduralDocumentRepositoryPort } from '../documents/domain/repositories/procedural-document.repository.port';
import { ProceduralDocument } from '../documents/domain/entities/procedural-document.entity';
import { PersonRepositoryPort } from '../people/domain/repositories/person.repository.port';
import { Person } from '../people/domain/entities/person.entity';
import {
  AcknowledgmentReportDto,
  AcknowledgmentRowDto,
  ComplianceStatusReportDto,
  ComplianceStatusRowDto,
  ExpiringTrainingReportDto,
  ExpiringTrainingRowDto,
} from './dto/report-response.dto';

const DEFAULT_EXPIRING_WINDOW_DAYS = 30;

/**
 * JSON reports for approvers. Read-only; nothing here changes state.
 */
@Injectable()
export class ReportsService {
  constructor(
    private readonly authorizationRepository: AuthorizationRepositoryPort,
    private readonly evaluationService: ComplianceEvaluationService,
    private readonly completionRepository: CompletionRepositoryPort,
    private readonly courseRepository: CourseRepositoryPort,
    private readonly acknowledgmentRepository: AcknowledgmentRepositoryPort,
    private readonly documentRepository: ProceduralDocumentRepositoryPort,
    private readonly personRepository: PersonRepositoryPort,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  /**
   * Every pending or active authorization with its verdict as of `asOf`.
   */
  async complianceStatus(
    asOf: Date | CalendarDay,
    facilityId?: number,
  ): Promise<ComplianceStatusReportDto> {
    const day = toCalendarDay(asOf);
    const records = await this.authorizationRepository.findByStates([
      AuthorizationState.PENDING,
      AuthorizationState.ACTIVE,
    ]);

    const rows: ComplianceStatusRowDto[] = [];
    for (const record of records) {
      if (facilityId !== undefined && record.facilityId !== facilityId) {
        continue;
      }
      const row: ComplianceStatusRowDto = {
        authorizationId: record.id,
        personId: record.personId,
        facilityId: record.facilityId,
        state: record.state,
        compliantNow: false,
        reasons: [],
        graceInEffect: [],
        error: null,
      };
      try {
        const verdict = await this.evaluationService.evaluate(
          record.personId,
          record.facilityId,
          day,
        );
        row.compliantNow = verdict.qualified;
        row.reasons = verdict.reasons.map(formatDeficiency);
        row.graceInEffect = verdict.graceInEffect.map((n) => n.course.code);
      } catch (error) {
        row.error = error instanceof Error ? error.message : String(error);
      }
      rows.push(row);
    }

    return { asOf: day, rows };
  }

  /**
   * Latest completion per (person, course) whose default expiry falls within
   * `windowDays` of `asOf`, already-expired ones included. Soonest first.
   */
  async expiringTraining(
    asOf: Date | CalendarDay,
    windowDays?: number,
  ): Promise<ExpiringTrainingReportDto> {
    const day = toCalendarDay(asOf);
    const window =
      windowDays ??
      this.configService.get('compliance.expiringWindowDays', { infer: true }) ??
      DEFAULT_EXPIRING_WINDOW_DAYS;

    const latest = new Map<string, Completion>();
    for (const completion of await this.completionRepository.findAll()) {
      if (completion.completedOn > day) continue;
      const key = `${completion.personId}:${completion.courseId}`;
      const seen = latest.get(key);
      if (!seen || completion.completedOn > seen.completedOn) {
        latest.set(key, completion);
      }
    }

    const courses = await this.courseRepository.findByIds(
      Array.from(new Set(Array.from(latest.values(), (c) => c.courseId))),
    );
    const coursesById = new Map(courses.map((course) => [course.id, course]));

    const rows: ExpiringTrainingRowDto[] = [];
    for (const completion of latest.values()) {
      const course = coursesById.get(completion.courseId);
      if (!course) continue;
      const expiresOn = addDays(completion.completedOn, course.validityDays);
      const daysLeft = daysBetween(day, expiresOn);
      if (daysLeft > window) continue;
      rows.push({
        personId: completion.personId,
        courseId: course.id,
        courseCode: course.code,
        completedOn: completion.completedOn,
        expiresOn,
        graceEndsOn: addDays(expiresOn, course.graceDays),
        daysLeft,
      });
    }

    rows.sort(
      (a, b) =>
        a.daysLeft - b.daysLeft ||
        a.personId - b.personId ||
        a.courseId - b.courseId,
    );
    return { asOf: day, windowDays: window, rows };
  }

  /**
   * Every document acknowledgment with the person and document it refers
   * to, newest first. Rows whose person or document is gone keep empty
   * names and a null facility.
   */
  async acknowledgments(facilityId?: number): Promise<AcknowledgmentReportDto> {
    const people = new Map<number, Person | null>();
    const documents = new Map<number, ProceduralDocument | null>();

    const rows: AcknowledgmentRowDto[] = [];
    for (const ack of await this.acknowledgmentRepository.findAll()) {
      if (!documents.has(ack.documentId)) {
        documents.set(
          ack.documentId,
          await this.documentRepository.findById(ack.documentId),
        );
      }
      const document = documents.get(ack.documentId) ?? null;
      if (facilityId !== undefined && document?.facilityId !== facilityId) {
        continue;
      }
      if (!people.has(ack.personId)) {
        people.set(ack.personId, await this.personRepository.findById(ack.personId));
      }
      const person = people.get(ack.personId) ?? null;

      rows.push({
        personId: ack.personId,
        personName: person?.name ?? '',
        documentId: ack.documentId,
        title: document?.title ?? '',
        facilityId: document?.facilityId ?? null,
        version: ack.version,
        acknowledgedAt: ack.acknowledgedAt,
      });
    }

    return { rows };
  }
}
