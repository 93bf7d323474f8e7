import { Deficiency } from '../types/verdict.types';

export function formatDeficiency(deficiency: Deficiency): string {
  switch (deficiency.kind) {
    case 'NoTraining':
      return `NoTraining(${deficiency.course.code})`;
    case 'TrainingExpired':
      return `TrainingExpired(${deficiency.course.code}, expiredOn=${deficiency.expiredOn})`;
    case 'DocumentNotAcknowledged':
      return `DocumentNotAcknowledged(${deficiency.document.title}, requiredVersion=${deficiency.requiredVersion})`;
  }
}

/**
 * Reason string recorded on revocations and returned for denials, e.g.
 * `TrainingExpired(C1, expiredOn=2024-06-29); NoTraining(C2)`.
 */
export function formatDeficiencies(deficiencies: readonly Deficiency[]): string {
  return deficiencies.map(formatDeficiency).join('; ');
}
