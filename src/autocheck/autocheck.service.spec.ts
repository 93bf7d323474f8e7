import { AutocheckService } from './autocheck.service';
import { ComplianceEvaluationService } from '../compliance/domain/services/compliance-evaluation.domain.service';
import { AuthorizationState } from '../authorizations/domain/enums/authorization-state.enum';
import { Person } from '../people/domain/entities/person.entity';
import { Facility } from '../facilities/domain/entities/facility.entity';
import { Course } from '../training/domain/entities/course.entity';
import {
  ComplianceTestContext,
  createComplianceTestingModule,
} from '../../test/utils/compliance-testing-module';
import {
  seedAuthorization,
  seedCompletion,
  seedCourse,
  seedFacility,
  seedPerson,
  seedRequirement,
} from '../../test/utils/fixtures';

describe('AutocheckService', () => {
  let context: ComplianceTestContext;
  let autocheck: AutocheckService;
  let course: Course;
  let facility: Facility;
  let alice: Person;
  let bob: Person;
  let carol: Person;

  async function setUp(autoDenyOnAutocheck = false): Promise<void> {
    context = await createComplianceTestingModule({
      now: '2024-01-02T02:00:00.000Z',
      compliance: { autoDenyOnAutocheck },
    });
    autocheck = context.module.get(AutocheckService);

    course = await seedCourse(context, 'C1', 180);
    facility = await seedFacility(context, 'L1');
    await seedRequirement(context, facility, course);

    alice = await seedPerson(context, 'E-1');
    bob = await seedPerson(context, 'E-2');
    carol = await seedPerson(context, 'E-3');
    await seedCompletion(context, alice, course, '2024-01-01');
    await seedCompletion(context, carol, course, '2024-01-01');

    await seedAuthorization(context, alice, facility); // 1: pending, qualified
    await seedAuthorization(context, bob, facility); // 2: pending, untrained
    await seedAuthorization(context, carol, facility, AuthorizationState.ACTIVE); // 3
  }

  const authorizationAudits = (): number =>
    context.repositories.audit.rows.filter(
      (e) => e.entityType === 'authorization',
    ).length;

  const actions = (action: string): string[] =>
    context.repositories.audit.rows
      .filter((e) => e.entityType === 'authorization' && e.action === action)
      .map((e) => e.entityId);

  it('grants qualified pending records and leaves the rest', async () => {
    await setUp();

    const summary = await autocheck.runAutocheck(
      new Date('2024-01-02T02:00:00.000Z'),
    );

    expect(summary.asOf).toBe('2024-01-02');
    expect(summary.examined).toBe(3);
    expect(summary.granted).toEqual([
      {
        authorizationId: 1,
        personId: alice.id,
        facilityId: facility.id,
        from: AuthorizationState.PENDING,
        to: AuthorizationState.ACTIVE,
        reason: null,
      },
    ]);
    expect(summary.revoked).toEqual([]);
    expect(summary.denied).toEqual([]);
    expect(summary.unchanged).toEqual([2, 3]);
    expect(summary.errors).toEqual([]);
    expect(summary.cancelled).toEqual([]);
  });

  it('changes nothing when run twice over the same data', async () => {
    await setUp();
    const asOf = new Date('2024-01-02T02:00:00.000Z');

    await autocheck.runAutocheck(asOf);
    const auditsAfterFirst = authorizationAudits();
    const second = await autocheck.runAutocheck(asOf);

    expect(second.granted).toEqual([]);
    expect(second.revoked).toEqual([]);
    expect(second.denied).toEqual([]);
    expect(second.unchanged).toEqual([1, 2, 3]);
    expect(authorizationAudits()).toBe(auditsAfterFirst);
  });

  it('revokes active records whose training has expired', async () => {
    await setUp();
    await autocheck.runAutocheck(new Date('2024-01-02T02:00:00.000Z'));

    const summary = await autocheck.runAutocheck(
      new Date('2024-07-05T02:00:00.000Z'),
    );

    expect(summary.revoked.map((t) => [t.authorizationId, t.from, t.reason])).toEqual([
      [1, AuthorizationState.ACTIVE, 'TrainingExpired(C1, expiredOn=2024-06-29)'],
      [3, AuthorizationState.ACTIVE, 'TrainingExpired(C1, expiredOn=2024-06-29)'],
    ]);
    expect(summary.unchanged).toEqual([2]);
  });

  it('denies unqualified pending records when auto-deny is configured', async () => {
    await setUp(true);

    const summary = await autocheck.runAutocheck(
      new Date('2024-01-02T02:00:00.000Z'),
    );

    expect(summary.denied).toEqual([
      {
        authorizationId: 2,
        personId: bob.id,
        facilityId: facility.id,
        from: AuthorizationState.PENDING,
        to: AuthorizationState.REVOKED,
        reason: 'NoTraining(C1)',
      },
    ]);
  });

  it('isolates a failing record and finishes the rest', async () => {
    await setUp();
    const broken = await seedFacility(context, 'L2');
    const retired = await seedCourse(context, 'OLD', 30);
    await seedRequirement(context, broken, retired);
    await seedAuthorization(context, alice, broken); // 4
    context.repositories.courses.remove(retired.id);

    const summary = await autocheck.runAutocheck(
      new Date('2024-01-02T02:00:00.000Z'),
    );

    expect(summary.examined).toBe(4);
    expect(summary.granted.map((t) => t.authorizationId)).toEqual([1]);
    expect(summary.errors).toEqual([
      {
        authorizationId: 4,
        code: 'EvaluationError',
        message: `Requirement 2 of facility ${broken.id} references missing course ${retired.id}`,
      },
    ]);
    expect(
      context.repositories.authorizations.rows.find((a) => a.id === 4)?.state,
    ).toBe(AuthorizationState.PENDING);
  });

  it('reports unexpected failures as evaluation errors', async () => {
    await setUp();
    const evaluation = context.module.get(ComplianceEvaluationService);
    const original = evaluation.evaluate.bind(evaluation);
    jest
      .spyOn(evaluation, 'evaluate')
      .mockImplementation(async (personId, facilityId, asOf) => {
        if (personId === bob.id) {
          throw new Error('connection reset');
        }
        return original(personId, facilityId, asOf);
      });

    const summary = await autocheck.runAutocheck(
      new Date('2024-01-02T02:00:00.000Z'),
    );

    expect(summary.errors).toEqual([
      { authorizationId: 2, code: 'EvaluationError', message: 'connection reset' },
    ]);
    expect(summary.granted.map((t) => t.authorizationId)).toEqual([1]);
    expect(summary.unchanged).toEqual([3]);
  });

  it('leaves a record untouched when its audit entry cannot be written', async () => {
    await setUp();
    jest
      .spyOn(context.repositories.audit, 'append')
      .mockRejectedValue(new Error('audit store down'));

    const summary = await autocheck.runAutocheck(
      new Date('2024-01-02T02:00:00.000Z'),
    );

    expect(summary.granted).toEqual([]);
    expect(summary.errors).toEqual([
      { authorizationId: 1, code: 'EvaluationError', message: 'audit store down' },
    ]);
    expect(summary.unchanged).toEqual([2, 3]);
    expect(summary.runAudited).toBe(false);
    expect(
      context.repositories.authorizations.rows.find((a) => a.id === 1),
    ).toMatchObject({ state: AuthorizationState.PENDING, version: 1 });
    expect(context.repositories.audit.rows).toHaveLength(0);
  });

  it('applies each transition once when two runs overlap', async () => {
    await setUp();
    const asOf = new Date('2024-01-02T02:00:00.000Z');

    const [first, second] = await Promise.all([
      autocheck.runAutocheck(asOf),
      autocheck.runAutocheck(asOf),
    ]);

    expect(
      [...first.granted, ...second.granted].map((t) => t.authorizationId),
    ).toEqual([1]);
    expect([...first.errors, ...second.errors]).toEqual([]);
    expect(actions('auto_activate')).toEqual(['1']);
    expect(authorizationAudits()).toBe(1);
  });

  it('revokes each expired record once when two runs overlap', async () => {
    await setUp();
    await autocheck.runAutocheck(new Date('2024-01-02T02:00:00.000Z'));
    const asOf = new Date('2024-07-05T02:00:00.000Z');

    const [first, second] = await Promise.all([
      autocheck.runAutocheck(asOf),
      autocheck.runAutocheck(asOf),
    ]);

    expect(
      [...first.revoked, ...second.revoked]
        .map((t) => t.authorizationId)
        .sort((a, b) => a - b),
    ).toEqual([1, 3]);
    expect([...first.errors, ...second.errors]).toEqual([]);
    expect(actions('auto_revoke').sort()).toEqual(['1', '3']);
  });

  it('reports every record as cancelled when the signal is already aborted', async () => {
    await setUp();
    const controller = new AbortController();
    controller.abort();

    const summary = await autocheck.runAutocheck(
      new Date('2024-01-02T02:00:00.000Z'),
      { signal: controller.signal },
    );

    expect(summary.examined).toBe(0);
    expect(summary.cancelled).toEqual([1, 2, 3]);
    expect(authorizationAudits()).toBe(0);
  });

  it('stops picking up records once cancelled mid-run', async () => {
    await setUp();
    const controller = new AbortController();
    const evaluation = context.module.get(ComplianceEvaluationService);
    const original = evaluation.evaluate.bind(evaluation);
    jest
      .spyOn(evaluation, 'evaluate')
      .mockImplementation(async (personId, facilityId, asOf) => {
        controller.abort();
        return original(personId, facilityId, asOf);
      });

    const summary = await autocheck.runAutocheck(
      new Date('2024-01-02T02:00:00.000Z'),
      { signal: controller.signal, concurrency: 1 },
    );

    expect(summary.granted.map((t) => t.authorizationId)).toEqual([1]);
    expect(summary.cancelled).toEqual([2, 3]);
    expect(summary.examined).toBe(1);
  });

  it('never runs more evaluations at once than the concurrency limit', async () => {
    await setUp();
    for (const employeeNo of ['E-4', 'E-5', 'E-6']) {
      const person = await seedPerson(context, employeeNo);
      await seedAuthorization(context, person, facility);
    }
    const evaluation = context.module.get(ComplianceEvaluationService);
    const original = evaluation.evaluate.bind(evaluation);
    let inFlight = 0;
    let peak = 0;
    jest
      .spyOn(evaluation, 'evaluate')
      .mockImplementation(async (personId, facilityId, asOf) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setImmediate(resolve));
        inFlight -= 1;
        return original(personId, facilityId, asOf);
      });

    const summary = await autocheck.runAutocheck(
      new Date('2024-01-02T02:00:00.000Z'),
      { concurrency: 2 },
    );

    expect(summary.examined).toBe(6);
    expect(peak).toBe(2);
  });

  it('records the run in the audit trail', async () => {
    await setUp();

    const summary = await autocheck.runAutocheck(
      new Date('2024-01-02T02:00:00.000Z'),
    );

    const runEntry = context.repositories.audit.rows.find(
      (e) => e.entityType === 'autocheck_run',
    );
    expect(runEntry).toMatchObject({
      entityId: summary.runId,
      action: 'autocheck_completed',
      actorType: 'system',
      actorId: null,
      metadata: {
        asOf: '2024-01-02',
        examined: 3,
        granted: 1,
        revoked: 0,
        denied: 0,
        unchanged: 2,
        errors: 0,
        cancelled: 0,
        autoDenyOnAutocheck: false,
      },
    });
    expect(summary.runAudited).toBe(true);
  });
});
