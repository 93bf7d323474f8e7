import { AuthorizationDomainService } from '../../src/authorizations/domain/services/authorization.domain.service';
import { AuthorizationState } from '../../src/authorizations/domain/enums/authorization-state.enum';
import { AutocheckService } from '../../src/autocheck/autocheck.service';
import { FacilityDomainService } from '../../src/facilities/domain/services/facility.domain.service';
import { TrainingDomainService } from '../../src/training/domain/services/training.domain.service';
import { ComplianceEvaluationService } from '../../src/compliance/domain/services/compliance-evaluation.domain.service';
import { RoleEnum } from '../../src/roles/roles.enum';
import { DuplicateRequestError } from '../../src/utils/errors/compliance-errors';
import {
  ComplianceTestContext,
  createComplianceTestingModule,
} from '../utils/compliance-testing-module';
import { actorFor, seedPerson } from '../utils/fixtures';

describe('Lab access lifecycle', () => {
  let context: ComplianceTestContext;

  beforeEach(async () => {
    context = await createComplianceTestingModule({
      now: '2024-01-01T10:00:00.000Z',
    });
  });

  it('takes a request from pending to active to revoked as training lapses', async () => {
    const training = context.module.get(TrainingDomainService);
    const facilities = context.module.get(FacilityDomainService);
    const authorizations = context.module.get(AuthorizationDomainService);
    const autocheck = context.module.get(AutocheckService);
    const evaluation = context.module.get(ComplianceEvaluationService);

    const admin = actorFor(
      await seedPerson(context, 'E-ADMIN', RoleEnum.administrator),
    );
    const person = await seedPerson(context, 'E-1');

    const course = await training.createCourse(
      { code: 'C1', name: 'Laser Safety', validityDays: 180, graceDays: 0 },
      admin,
    );
    const facility = await facilities.createFacility(
      { code: 'L1', name: 'Laser Lab' },
      admin,
    );
    await facilities.addRequirement(facility.id, { courseId: course.id }, admin);
    await training.recordCompletion(
      { personId: person.id, courseId: course.id, completedOn: '2024-01-01' },
      admin,
    );

    context.clock.set('2024-01-02T09:00:00.000Z');
    const requested = await authorizations.requestAccess(
      person.id,
      facility.id,
      actorFor(person),
    );
    expect(requested.state).toBe(AuthorizationState.PENDING);

    await expect(
      authorizations.requestAccess(person.id, facility.id, actorFor(person)),
    ).rejects.toBeInstanceOf(DuplicateRequestError);

    const first = await autocheck.runAutocheck(
      new Date('2024-01-02T09:00:00.000Z'),
    );
    expect(first.granted.map((t) => t.authorizationId)).toEqual([requested.id]);
    expect(
      (await authorizations.getAuthorization(requested.id)).state,
    ).toBe(AuthorizationState.ACTIVE);

    const lapsed = await evaluation.evaluate(
      person.id,
      facility.id,
      new Date('2024-07-05T00:00:00.000Z'),
    );
    expect(lapsed.qualified).toBe(false);

    context.clock.set('2024-07-05T02:00:00.000Z');
    const second = await autocheck.runAutocheck(
      new Date('2024-07-05T02:00:00.000Z'),
    );
    expect(second.revoked).toEqual([
      {
        authorizationId: requested.id,
        personId: person.id,
        facilityId: facility.id,
        from: AuthorizationState.ACTIVE,
        to: AuthorizationState.REVOKED,
        reason: 'TrainingExpired(C1, expiredOn=2024-06-29)',
      },
    ]);

    const revoked = await authorizations.getAuthorization(requested.id);
    expect(revoked.state).toBe(AuthorizationState.REVOKED);
    expect(revoked.revocationReason).toBe(
      'TrainingExpired(C1, expiredOn=2024-06-29)',
    );

    const history = await authorizations.getHistory(requested.id);
    expect(
      history.map((e) => [e.action, e.priorState, e.newState, e.actorType]),
    ).toEqual([
      ['request_access', null, 'pending', 'person'],
      ['auto_activate', 'pending', 'active', 'system'],
      ['auto_revoke', 'active', 'revoked', 'system'],
    ]);
  });

  it('links a fresh request to the revoked record it follows', async () => {
    const authorizations = context.module.get(AuthorizationDomainService);
    const admin = actorFor(
      await seedPerson(context, 'E-ADMIN', RoleEnum.administrator),
    );
    const person = await seedPerson(context, 'E-1');
    const facility = await context.module
      .get(FacilityDomainService)
      .createFacility({ code: 'L1', name: 'Laser Lab' }, admin);

    const original = await authorizations.requestAccess(
      person.id,
      facility.id,
      actorFor(person),
    );
    await authorizations.cancelRequest(original.id, actorFor(person));
    const renewed = await authorizations.requestAccess(
      person.id,
      facility.id,
      actorFor(person),
    );

    expect(renewed.state).toBe(AuthorizationState.PENDING);
    expect(renewed.previousAuthorizationId).toBe(original.id);
    const [requestEntry] = await authorizations.getHistory(renewed.id);
    expect(requestEntry).toMatchObject({
      action: 'request_access',
      priorState: 'revoked',
      newState: 'pending',
    });
  });
});
