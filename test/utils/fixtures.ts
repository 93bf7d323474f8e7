import { RoleEnum } from '../../src/roles/roles.enum';
import { Person } from '../../src/people/domain/entities/person.entity';
import { Course } from '../../src/training/domain/entities/course.entity';
import { Facility } from '../../src/facilities/domain/entities/facility.entity';
import { Requirement } from '../../src/facilities/domain/entities/requirement.entity';
import { Completion } from '../../src/training/domain/entities/completion.entity';
import { ProceduralDocument } from '../../src/documents/domain/entities/procedural-document.entity';
import { Authorization } from '../../src/authorizations/domain/entities/authorization.entity';
import { AuthorizationState } from '../../src/authorizations/domain/enums/authorization-state.enum';
import { PersonActor } from '../../src/auth/domain/actor';
import { ComplianceTestContext } from './compliance-testing-module';

/**
 * Seed helpers write straight to the in-memory repositories, so they leave
 * no audit entries behind.
 */

export async function seedPerson(
  context: ComplianceTestContext,
  employeeNo: string,
  role: RoleEnum = RoleEnum.member,
): Promise<Person> {
  return context.repositories.people.create({
    employeeNo,
    name: `Person ${employeeNo}`,
    email: `${employeeNo.toLowerCase()}@example.com`,
    role,
  });
}

export function actorFor(person: Person): PersonActor {
  return { type: 'person', id: person.id, role: person.role };
}

export async function seedCourse(
  context: ComplianceTestContext,
  code: string,
  validityDays: number,
  graceDays = 0,
): Promise<Course> {
  return context.repositories.courses.create({
    code,
    name: `Course ${code}`,
    validityDays,
    graceDays,
  });
}

export async function seedFacility(
  context: ComplianceTestContext,
  code: string,
): Promise<Facility> {
  return context.repositories.facilities.create({
    code,
    name: `Facility ${code}`,
  });
}

export async function seedRequirement(
  context: ComplianceTestContext,
  facility: Facility,
  course: Course,
  overrides: { validityDays?: number; graceDays?: number } = {},
): Promise<Requirement> {
  return context.repositories.requirements.create({
    facilityId: facility.id,
    courseId: course.id,
    validityDays: overrides.validityDays ?? null,
    graceDays: overrides.graceDays ?? null,
  });
}

export async function seedCompletion(
  context: ComplianceTestContext,
  person: Person,
  course: Course,
  completedOn: string,
): Promise<Completion> {
  return context.repositories.completions.create({
    personId: person.id,
    courseId: course.id,
    completedOn,
    certificateKey: null,
  });
}

export async function seedDocument(
  context: ComplianceTestContext,
  facility: Facility,
  title: string,
  currentVersion = 1,
): Promise<ProceduralDocument> {
  return context.repositories.documents.create({
    facilityId: facility.id,
    title,
    mandatory: true,
    currentVersion,
  });
}

export async function seedAcknowledgment(
  context: ComplianceTestContext,
  person: Person,
  document: ProceduralDocument,
  version: number,
): Promise<void> {
  await context.repositories.acknowledgments.create({
    personId: person.id,
    documentId: document.id,
    version,
    acknowledgedAt: new Date('2024-01-01T00:00:00.000Z'),
  });
}

/**
 * Insert an authorization directly in the given state.
 */
export async function seedAuthorization(
  context: ComplianceTestContext,
  person: Person,
  facility: Facility,
  state: AuthorizationState = AuthorizationState.PENDING,
): Promise<Authorization> {
  const repository = context.repositories.authorizations;
  const created = await repository.create({
    personId: person.id,
    facilityId: facility.id,
    requestedAt: new Date('2024-01-02T00:00:00.000Z'),
    requestedById: person.id,
    previousAuthorizationId: null,
  });
  if (state === AuthorizationState.PENDING) {
    return created;
  }

  const at = new Date('2024-01-02T00:00:00.000Z');
  const updated = await repository.transition(
    created.id,
    created.version,
    state === AuthorizationState.ACTIVE
      ? {
          state,
          activatedAt: at,
          activatedByType: 'system',
          activatedById: null,
        }
      : {
          state,
          revokedAt: at,
          revokedByType: 'person',
          revokedById: person.id,
          revocationReason: 'seeded',
        },
  );
  if (!updated) {
    throw new Error(`could not seed authorization ${created.id}`);
  }
  return updated;
}
