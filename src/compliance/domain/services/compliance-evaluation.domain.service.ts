import { Injectable } from '@nestjs/common';
import { RequirementCatalogService } from './requirement-catalog.domain.service';
import {
  MandatoryDocumentInput,
  QualificationEvaluator,
} from './qualification-evaluator';
import { Verdict } from '../types/verdict.types';
import { CalendarDay } from '../utils/calendar-day.util';
import { PersonRepositoryPort } from '../../../people/domain/repositories/person.repository.port';
import { CompletionRepositoryPort } from '../../../training/domain/repositories/completion.repository.port';
import { ProceduralDocumentRepositoryPort } from '../../../documents/domain/repositories/procedural-document.repository.port';
import { AcknowledgmentRepositoryPort } from '../../../documents/domain/repositories/acknowledgment.repository.port';
import { EntityNotFoundError } from '../../../utils/errors/compliance-errors';

/**
 * Loads the inputs for one (person, facility) pair and hands them to the
 * pure evaluator. Holds no locks and writes nothing.
 */
@Injectable()
export class ComplianceEvaluationService {
  constructor(
    private readonly catalog: RequirementCatalogService,
    private readonly evaluator: QualificationEvaluator,
    private readonly personRepository: PersonRepositoryPort,
    private readonly completionRepository: CompletionRepositoryPort,
    private readonly documentRepository: ProceduralDocumentRepositoryPort,
    private readonly acknowledgmentRepository: AcknowledgmentRepositoryPort,
  ) {}

  async evaluate(
    personId: number,
    facilityId: number,
    asOf: Date | CalendarDay,
  ): Promise<Verdict> {
    const person = await this.personRepository.findById(personId);
    if (!person) {
      throw new EntityNotFoundError('Person', personId);
    }

    const { requirements } = await this.catalog.getCatalog(facilityId);
    const completions = await this.completionRepository.findByPersonAndCourses(
      personId,
      requirements.map((r) => r.course.courseId),
    );

    const mandatory = await this.documentRepository.findByFacility(facilityId, {
      mandatoryOnly: true,
    });
    const documents: MandatoryDocumentInput[] = await Promise.all(
      mandatory.map(async (document) => ({
        document,
        acknowledgments:
          await this.acknowledgmentRepository.findByPersonAndDocument(
            personId,
            document.id,
          ),
      })),
    );

    return this.evaluator.evaluate(
      { requirements, completions, documents },
      asOf,
    );
  }
}
