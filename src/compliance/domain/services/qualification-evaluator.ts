import { Injectable } from '@nestjs/common';
import { ResolvedRequirement } from '../types/catalog.types';
import {
  Deficiency,
  GraceNotice,
  Verdict,
} from '../types/verdict.types';
import {
  CalendarDay,
  addDays,
  toCalendarDay,
} from '../utils/calendar-day.util';
import { resolveCurrency } from '../../../documents/domain/utils/document-currency.util';
import { ProceduralDocument } from '../../../documents/domain/entities/procedural-document.entity';
import { Acknowledgment } from '../../../documents/domain/entities/acknowledgment.entity';
import { Completion } from '../../../training/domain/entities/completion.entity';

export interface MandatoryDocumentInput {
  document: Pick<ProceduralDocument, 'id' | 'title' | 'currentVersion'>;
  acknowledgments: ReadonlyArray<Pick<Acknowledgment, 'documentId' | 'version'>>;
}

/**
 * Everything a verdict depends on. Loaded once by the caller; the evaluator
 * itself never reads a repository or the clock.
 */
export interface EvaluationInput {
  requirements: readonly ResolvedRequirement[];
  completions: ReadonlyArray<Pick<Completion, 'courseId' | 'completedOn'>>;
  documents: readonly MandatoryDocumentInput[];
}

function latestCompletionOn(
  completions: EvaluationInput['completions'],
  courseId: number,
  asOf: CalendarDay,
): CalendarDay | null {
  let latest: CalendarDay | null = null;
  for (const completion of completions) {
    if (completion.courseId !== courseId) continue;
    const day = toCalendarDay(completion.completedOn);
    // future-dated completions do not count yet
    if (day > asOf) continue;
    if (latest === null || day > latest) {
      latest = day;
    }
  }
  return latest;
}

/**
 * Decide whether the inputs satisfy every requirement as of `asOf`.
 *
 * Course deficiencies come first in requirement declaration order, then
 * document deficiencies by ascending document id. Output depends only on
 * the arguments.
 */
export function evaluateQualification(
  input: EvaluationInput,
  asOfInstant: Date | CalendarDay,
): Verdict {
  const asOf = toCalendarDay(asOfInstant);
  const reasons: Deficiency[] = [];
  const graceInEffect: GraceNotice[] = [];

  const requirements = [...input.requirements].sort(
    (a, b) => a.requirementId - b.requirementId,
  );
  for (const requirement of requirements) {
    const course = { ...requirement.course };
    const completedOn = latestCompletionOn(
      input.completions,
      course.courseId,
      asOf,
    );

    if (completedOn === null) {
      reasons.push({ kind: 'NoTraining', course });
      continue;
    }

    const expiry = addDays(completedOn, requirement.validityDays);
    const hardDeadline = addDays(expiry, requirement.graceDays);

    if (asOf > hardDeadline) {
      reasons.push({ kind: 'TrainingExpired', course, expiredOn: expiry });
    } else if (asOf > expiry) {
      graceInEffect.push({
        course,
        expiredOn: expiry,
        graceEndsOn: hardDeadline,
      });
    }
  }

  const documents = [...input.documents].sort(
    (a, b) => a.document.id - b.document.id,
  );
  for (const { document, acknowledgments } of documents) {
    const currency = resolveCurrency(document, acknowledgments);
    if (!currency.current) {
      reasons.push({
        kind: 'DocumentNotAcknowledged',
        document: { documentId: document.id, title: document.title },
        requiredVersion: currency.requiredVersion,
        acknowledgedVersion: currency.acknowledgedVersion,
      });
    }
  }

  return {
    qualified: reasons.length === 0,
    asOf,
    reasons,
    graceInEffect,
  };
}

/**
 * Injectable wrapper so services can depend on the evaluator through DI.
 */
@Injectable()
export class QualificationEvaluator {
  evaluate(input: EvaluationInput, asOf: Date | CalendarDay): Verdict {
    return evaluateQualification(input, asOf);
  }
}
