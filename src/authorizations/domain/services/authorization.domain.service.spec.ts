import { AuthorizationDomainService } from './authorization.domain.service';
import { AuthorizationState } from '../enums/authorization-state.enum';
import { ComplianceEvaluationService } from '../../../compliance/domain/services/compliance-evaluation.domain.service';
import { Verdict } from '../../../compliance/domain/types/verdict.types';
import { AUTOCHECK_ACTOR, PersonActor } from '../../../auth/domain/actor';
import { RoleEnum } from '../../../roles/roles.enum';
import { Person } from '../../../people/domain/entities/person.entity';
import { Facility } from '../../../facilities/domain/entities/facility.entity';
import {
  DuplicateRequestError,
  EntityNotFoundError,
  IllegalTransitionError,
  UnauthorizedActionError,
} from '../../../utils/errors/compliance-errors';
import {
  ComplianceTestContext,
  createComplianceTestingModule,
} from '../../../../test/utils/compliance-testing-module';
import {
  actorFor,
  seedAuthorization,
  seedCompletion,
  seedCourse,
  seedDocument,
  seedFacility,
  seedPerson,
  seedRequirement,
} from '../../../../test/utils/fixtures';

const QUALIFIED: Verdict = {
  qualified: true,
  asOf: '2024-01-02',
  reasons: [],
  graceInEffect: [],
};

const EXPIRED: Verdict = {
  qualified: false,
  asOf: '2024-07-05',
  reasons: [
    {
      kind: 'TrainingExpired',
      course: { courseId: 1, code: 'C1' },
      expiredOn: '2024-06-29',
    },
  ],
  graceInEffect: [],
};

describe('AuthorizationDomainService', () => {
  let context: ComplianceTestContext;
  let service: AuthorizationDomainService;
  let trained: Person;
  let untrained: Person;
  let approver: PersonActor;
  let facility: Facility;

  beforeEach(async () => {
    context = await createComplianceTestingModule({
      now: '2024-01-02T09:00:00.000Z',
    });
    service = context.module.get(AuthorizationDomainService);

    trained = await seedPerson(context, 'E-100');
    untrained = await seedPerson(context, 'E-200');
    approver = actorFor(await seedPerson(context, 'E-900', RoleEnum.approver));
    facility = await seedFacility(context, 'L1');
    const course = await seedCourse(context, 'C1', 180);
    await seedRequirement(context, facility, course);
    await seedCompletion(context, trained, course, '2024-01-01');
  });

  const auditActions = (authorizationId: number): string[] =>
    context.repositories.audit.rows
      .filter(
        (e) =>
          e.entityType === 'authorization' &&
          e.entityId === String(authorizationId),
      )
      .map((e) => e.action);

  describe('requestAccess', () => {
    it('opens a pending record and audits it', async () => {
      const authorization = await service.requestAccess(
        trained.id,
        facility.id,
        actorFor(trained),
      );

      expect(authorization).toMatchObject({
        personId: trained.id,
        facilityId: facility.id,
        state: AuthorizationState.PENDING,
        requestedById: trained.id,
        requestedAt: new Date('2024-01-02T09:00:00.000Z'),
        previousAuthorizationId: null,
      });
      expect(context.repositories.audit.rows).toHaveLength(1);
      expect(context.repositories.audit.rows[0]).toMatchObject({
        action: 'request_access',
        actorType: 'person',
        actorId: trained.id,
        priorState: null,
        newState: 'pending',
      });
    });

    it('rejects a second request while one is open', async () => {
      await service.requestAccess(trained.id, facility.id, actorFor(trained));

      await expect(
        service.requestAccess(trained.id, facility.id, actorFor(trained)),
      ).rejects.toThrow(
        `Person ${trained.id} already has a pending authorization for facility ${facility.id}`,
      );
    });

    it('lets exactly one of many concurrent requests through', async () => {
      const results = await Promise.allSettled(
        Array.from({ length: 5 }, () =>
          service.requestAccess(trained.id, facility.id, actorFor(trained)),
        ),
      );

      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.filter(
        (r): r is PromiseRejectedResult => r.status === 'rejected',
      );
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(4);
      for (const result of rejected) {
        expect(result.reason).toBeInstanceOf(DuplicateRequestError);
      }
      expect(context.repositories.authorizations.rows).toHaveLength(1);
    });

    it('links a new request to the revoked record it replaces', async () => {
      const revoked = await seedAuthorization(
        context,
        trained,
        facility,
        AuthorizationState.REVOKED,
      );

      const renewed = await service.requestAccess(
        trained.id,
        facility.id,
        actorFor(trained),
      );

      expect(renewed.id).not.toBe(revoked.id);
      expect(renewed.previousAuthorizationId).toBe(revoked.id);
      expect(context.repositories.audit.rows[0]).toMatchObject({
        priorState: 'revoked',
        newState: 'pending',
      });
    });

    it('keeps no record when the audit entry cannot be written', async () => {
      jest
        .spyOn(context.repositories.audit, 'append')
        .mockRejectedValueOnce(new Error('audit store down'));

      await expect(
        service.requestAccess(trained.id, facility.id, actorFor(trained)),
      ).rejects.toThrow('audit store down');
      expect(context.repositories.authorizations.rows).toHaveLength(0);

      const retried = await service.requestAccess(
        trained.id,
        facility.id,
        actorFor(trained),
      );
      expect(retried.previousAuthorizationId).toBeNull();
      expect(auditActions(retried.id)).toEqual(['request_access']);
    });

    it('refuses requests from the system actor', async () => {
      await expect(
        service.requestAccess(trained.id, facility.id, AUTOCHECK_ACTOR),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
    });

    it('refuses unknown facilities', async () => {
      await expect(
        service.requestAccess(trained.id, 99, actorFor(trained)),
      ).rejects.toBeInstanceOf(EntityNotFoundError);
    });
  });

  describe('applyVerdict', () => {
    it('activates a pending record on a qualifying verdict', async () => {
      const pending = await seedAuthorization(context, trained, facility);

      const outcome = await service.applyVerdict(
        pending.id,
        QUALIFIED,
        AUTOCHECK_ACTOR,
      );

      expect(outcome.changed).toBe(true);
      expect(outcome.action).toBe('auto_activate');
      expect(outcome.authorization).toMatchObject({
        state: AuthorizationState.ACTIVE,
        activatedAt: new Date('2024-01-02T09:00:00.000Z'),
        activatedByType: 'system',
        activatedById: null,
        manualOverride: false,
        version: pending.version + 1,
      });
    });

    it('names a person-driven activation differently', async () => {
      const pending = await seedAuthorization(context, trained, facility);

      const outcome = await service.applyVerdict(pending.id, QUALIFIED, approver);

      expect(outcome.action).toBe('activate');
      expect(outcome.authorization.activatedById).toBe(approver.id);
    });

    it('revokes an active record with the deficiencies as reason', async () => {
      const active = await seedAuthorization(
        context,
        trained,
        facility,
        AuthorizationState.ACTIVE,
      );

      const outcome = await service.applyVerdict(
        active.id,
        EXPIRED,
        AUTOCHECK_ACTOR,
        new Date('2024-07-05T02:00:00.000Z'),
      );

      expect(outcome.action).toBe('auto_revoke');
      expect(outcome.authorization).toMatchObject({
        state: AuthorizationState.REVOKED,
        revokedAt: new Date('2024-07-05T02:00:00.000Z'),
        revokedByType: 'system',
        revocationReason: 'TrainingExpired(C1, expiredOn=2024-06-29)',
      });
      expect(context.repositories.audit.rows[0]).toMatchObject({
        action: 'auto_revoke',
        priorState: 'active',
        newState: 'revoked',
        detail: 'TrainingExpired(C1, expiredOn=2024-06-29)',
      });
    });

    it('leaves an active record alone on a qualifying verdict', async () => {
      const active = await seedAuthorization(
        context,
        trained,
        facility,
        AuthorizationState.ACTIVE,
      );

      const outcome = await service.applyVerdict(
        active.id,
        QUALIFIED,
        AUTOCHECK_ACTOR,
      );

      expect(outcome).toEqual({
        authorization: active,
        changed: false,
        action: null,
      });
      expect(context.repositories.audit.rows).toHaveLength(0);
    });

    it('leaves a pending record pending unless auto-deny is on', async () => {
      const pending = await seedAuthorization(context, untrained, facility);

      const leftPending = await service.applyVerdict(
        pending.id,
        EXPIRED,
        AUTOCHECK_ACTOR,
        undefined,
        { autoDenyOnAutocheck: false },
      );
      expect(leftPending.changed).toBe(false);

      const denied = await service.applyVerdict(
        pending.id,
        EXPIRED,
        AUTOCHECK_ACTOR,
        undefined,
        { autoDenyOnAutocheck: true },
      );
      expect(denied.action).toBe('auto_deny');
      expect(denied.authorization.state).toBe(AuthorizationState.REVOKED);
    });

    it('never auto-denies on behalf of a person', async () => {
      const pending = await seedAuthorization(context, untrained, facility);

      const outcome = await service.applyVerdict(
        pending.id,
        EXPIRED,
        approver,
        undefined,
        { autoDenyOnAutocheck: true },
      );

      expect(outcome.changed).toBe(false);
    });

    it('will not reopen a revoked record', async () => {
      const revoked = await seedAuthorization(
        context,
        trained,
        facility,
        AuthorizationState.REVOKED,
      );

      await expect(
        service.applyVerdict(revoked.id, QUALIFIED, AUTOCHECK_ACTOR),
      ).rejects.toBeInstanceOf(IllegalTransitionError);
      const unchanged = await service.applyVerdict(
        revoked.id,
        EXPIRED,
        AUTOCHECK_ACTOR,
      );
      expect(unchanged.changed).toBe(false);
    });

    it('fails on a concurrent write and records nothing', async () => {
      const pending = await seedAuthorization(context, trained, facility);
      jest
        .spyOn(context.repositories.authorizations, 'transition')
        .mockResolvedValueOnce(null);

      await expect(
        service.applyVerdict(pending.id, QUALIFIED, AUTOCHECK_ACTOR),
      ).rejects.toThrow(
        `Authorization ${pending.id} was modified concurrently; reload and retry`,
      );
      expect(context.repositories.audit.rows).toHaveLength(0);
    });

    it('rolls the transition back when the audit entry cannot be written', async () => {
      const pending = await seedAuthorization(context, trained, facility);
      jest
        .spyOn(context.repositories.audit, 'append')
        .mockRejectedValueOnce(new Error('audit store down'));

      await expect(
        service.applyVerdict(pending.id, QUALIFIED, AUTOCHECK_ACTOR),
      ).rejects.toThrow('audit store down');

      expect(await context.repositories.authorizations.findById(pending.id)).toEqual(
        pending,
      );
      expect(context.repositories.audit.rows).toHaveLength(0);

      const retried = await service.applyVerdict(
        pending.id,
        QUALIFIED,
        AUTOCHECK_ACTOR,
      );
      expect(retried.authorization.state).toBe(AuthorizationState.ACTIVE);
      expect(auditActions(pending.id)).toEqual(['auto_activate']);
    });

    it('stores the revocation reason verbatim as the audit detail', async () => {
      await seedDocument(context, facility, 'Token handling SOP');
      const active = await seedAuthorization(
        context,
        trained,
        facility,
        AuthorizationState.ACTIVE,
      );
      const verdict = await context.module
        .get(ComplianceEvaluationService)
        .evaluate(trained.id, facility.id, new Date('2024-01-02T09:00:00.000Z'));

      const outcome = await service.applyVerdict(
        active.id,
        verdict,
        AUTOCHECK_ACTOR,
      );

      expect(outcome.authorization.revocationReason).toBe(
        'DocumentNotAcknowledged(Token handling SOP, requiredVersion=1)',
      );
      expect(context.repositories.audit.rows[0].detail).toBe(
        outcome.authorization.revocationReason,
      );
    });
  });

  describe('manualDecision', () => {
    it('approves a qualified request', async () => {
      const pending = await seedAuthorization(context, trained, facility);

      const outcome = await service.manualDecision(
        pending.id,
        true,
        approver,
        undefined,
        'looks good',
      );

      expect(outcome.action).toBe('manual_approve');
      expect(outcome.authorization).toMatchObject({
        state: AuthorizationState.ACTIVE,
        manualOverride: false,
        decisionNotes: 'looks good',
        activatedByType: 'person',
        activatedById: approver.id,
      });
      expect(outcome.reason).toBeNull();
    });

    it('flags approval against a failing verdict as an override', async () => {
      const pending = await seedAuthorization(context, untrained, facility);

      const outcome = await service.manualDecision(pending.id, true, approver);

      expect(outcome.action).toBe('manual_override');
      expect(outcome.verdict?.qualified).toBe(false);
      expect(outcome.authorization.manualOverride).toBe(true);
      expect(context.repositories.audit.rows[0]).toMatchObject({
        action: 'manual_override',
        detail: 'NoTraining(C1)',
      });
    });

    it('records the deficiencies when denying', async () => {
      const pending = await seedAuthorization(context, untrained, facility);

      const outcome = await service.manualDecision(pending.id, false, approver);

      expect(outcome.action).toBe('manual_deny');
      expect(outcome.reason).toBe('NoTraining(C1)');
      expect(outcome.authorization.revocationReason).toBe('NoTraining(C1)');
    });

    it('uses manual_deny as the reason when the person qualifies', async () => {
      const pending = await seedAuthorization(context, trained, facility);

      const outcome = await service.manualDecision(
        pending.id,
        false,
        approver,
        undefined,
        'lab closed',
      );

      expect(outcome.reason).toBe('manual_deny');
      expect(outcome.authorization.decisionNotes).toBe('lab closed');
    });

    it('redacts contact details in reviewer notes', async () => {
      const pending = await seedAuthorization(context, trained, facility);

      await service.manualDecision(
        pending.id,
        true,
        approver,
        undefined,
        'confirmed with pi@example.com',
      );

      expect(context.repositories.audit.rows[0]).toMatchObject({
        action: 'manual_approve',
        detail: null,
        metadata: { notes: 'confirmed with [EMAIL_REDACTED]' },
      });
    });

    describe('when the requirements cannot be evaluated', () => {
      let broken: Facility;
      let message: string;

      beforeEach(async () => {
        broken = await seedFacility(context, 'L2');
        const retired = await seedCourse(context, 'OLD', 30);
        const requirement = await seedRequirement(context, broken, retired);
        context.repositories.courses.remove(retired.id);
        message = `Requirement ${requirement.id} of facility ${broken.id} references missing course ${retired.id}`;
      });

      it('records the evaluation error as the denial reason', async () => {
        const pending = await seedAuthorization(context, trained, broken);

        const outcome = await service.manualDecision(pending.id, false, approver);

        expect(outcome.action).toBe('manual_deny');
        expect(outcome.verdict).toBeNull();
        expect(outcome.evaluationError).toBe(message);
        expect(outcome.reason).toBe(message);
        expect(outcome.authorization).toMatchObject({
          state: AuthorizationState.REVOKED,
          revocationReason: message,
        });
        expect(context.repositories.audit.rows[0]).toMatchObject({
          action: 'manual_deny',
          detail: message,
          metadata: {
            verdictAsOf: '2024-01-02',
            qualified: null,
            evaluationError: message,
          },
        });
      });

      it('flags an approval as an override', async () => {
        const pending = await seedAuthorization(context, trained, broken);

        const outcome = await service.manualDecision(pending.id, true, approver);

        expect(outcome.action).toBe('manual_override');
        expect(outcome.verdict).toBeNull();
        expect(outcome.reason).toBeNull();
        expect(outcome.authorization).toMatchObject({
          state: AuthorizationState.ACTIVE,
          manualOverride: true,
        });
        expect(context.repositories.audit.rows[0]).toMatchObject({
          action: 'manual_override',
          detail: message,
        });
      });
    });

    it('only decides pending records', async () => {
      const active = await seedAuthorization(
        context,
        trained,
        facility,
        AuthorizationState.ACTIVE,
      );

      await expect(
        service.manualDecision(active.id, false, approver),
      ).rejects.toBeInstanceOf(IllegalTransitionError);
    });
  });

  describe('cancelRequest', () => {
    it('revokes a pending request with user_cancelled', async () => {
      const pending = await seedAuthorization(context, trained, facility);

      const outcome = await service.cancelRequest(pending.id, actorFor(trained));

      expect(outcome.action).toBe('cancel_request');
      expect(outcome.authorization.revocationReason).toBe('user_cancelled');
    });

    it('does not cancel an active record', async () => {
      const active = await seedAuthorization(
        context,
        trained,
        facility,
        AuthorizationState.ACTIVE,
      );

      await expect(
        service.cancelRequest(active.id, actorFor(trained)),
      ).rejects.toBeInstanceOf(IllegalTransitionError);
    });
  });

  describe('revokeAccess', () => {
    it('revokes an active record with manual_revoke', async () => {
      const active = await seedAuthorization(
        context,
        trained,
        facility,
        AuthorizationState.ACTIVE,
      );

      const outcome = await service.revokeAccess(
        active.id,
        approver,
        undefined,
        'left the group',
      );

      expect(outcome.authorization).toMatchObject({
        state: AuthorizationState.REVOKED,
        revocationReason: 'manual_revoke',
        decisionNotes: 'left the group',
        revokedById: approver.id,
      });
      expect(context.repositories.audit.rows[0].detail).toBe('manual_revoke');
      expect(context.repositories.audit.rows[0].metadata).toMatchObject({
        notes: 'left the group',
      });
    });

    it('is a no-op on a revoked record', async () => {
      const revoked = await seedAuthorization(
        context,
        trained,
        facility,
        AuthorizationState.REVOKED,
      );

      const outcome = await service.revokeAccess(revoked.id, approver);

      expect(outcome.changed).toBe(false);
      expect(context.repositories.audit.rows).toHaveLength(0);
    });

    it('refuses to revoke a pending record', async () => {
      const pending = await seedAuthorization(context, trained, facility);

      await expect(
        service.revokeAccess(pending.id, approver),
      ).rejects.toBeInstanceOf(IllegalTransitionError);
    });
  });

  it('writes exactly one audit entry per transition', async () => {
    const requested = await service.requestAccess(
      trained.id,
      facility.id,
      actorFor(trained),
    );
    await service.applyVerdict(requested.id, QUALIFIED, AUTOCHECK_ACTOR);
    await service.applyVerdict(requested.id, QUALIFIED, AUTOCHECK_ACTOR);
    await service.applyVerdict(requested.id, EXPIRED, AUTOCHECK_ACTOR);

    expect(auditActions(requested.id)).toEqual([
      'request_access',
      'auto_activate',
      'auto_revoke',
    ]);
    expect(
      (await service.getHistory(requested.id)).map((e) => e.newState),
    ).toEqual(['pending', 'active', 'revoked']);
  });
});
