import { AuthorizationsService } from './authorizations.service';
import { AuthorizationState } from './domain/enums/authorization-state.enum';
import { RoleEnum } from '../roles/roles.enum';
import { PersonActor } from '../auth/domain/actor';
import { Person } from '../people/domain/entities/person.entity';
import { Facility } from '../facilities/domain/entities/facility.entity';
import { UnauthorizedActionError } from '../utils/errors/compliance-errors';
import {
  ComplianceTestContext,
  createComplianceTestingModule,
} from '../../test/utils/compliance-testing-module';
import {
  actorFor,
  seedAuthorization,
  seedFacility,
  seedPerson,
} from '../../test/utils/fixtures';

describe('AuthorizationsService', () => {
  let context: ComplianceTestContext;
  let service: AuthorizationsService;
  let member: Person;
  let otherMember: Person;
  let approver: PersonActor;
  let facility: Facility;

  beforeEach(async () => {
    context = await createComplianceTestingModule();
    service = context.module.get(AuthorizationsService);

    member = await seedPerson(context, 'E-1');
    otherMember = await seedPerson(context, 'E-2');
    approver = actorFor(await seedPerson(context, 'E-9', RoleEnum.approver));
    facility = await seedFacility(context, 'L1');
  });

  describe('requestAccess', () => {
    it('defaults the subject to the caller', async () => {
      const response = await service.requestAccess(
        { facilityId: facility.id },
        actorFor(member),
      );

      expect(response.personId).toBe(member.id);
      expect(response.state).toBe(AuthorizationState.PENDING);
    });

    it('stops members requesting for someone else', async () => {
      await expect(
        service.requestAccess(
          { facilityId: facility.id, personId: otherMember.id },
          actorFor(member),
        ),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
    });

    it('lets approvers request on behalf of a member', async () => {
      const response = await service.requestAccess(
        { facilityId: facility.id, personId: member.id },
        approver,
      );

      expect(response.personId).toBe(member.id);
      expect(response.requestedById).toBe(approver.id);
    });
  });

  describe('decide and revoke', () => {
    it('are refused for members', async () => {
      const pending = await seedAuthorization(context, member, facility);
      const active = await seedAuthorization(
        context,
        otherMember,
        facility,
        AuthorizationState.ACTIVE,
      );

      await expect(
        service.decide(pending.id, { approve: true }, actorFor(member)),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
      await expect(
        service.revoke(active.id, actorFor(member)),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
      expect(context.repositories.audit.rows).toHaveLength(0);
    });

    it('returns the verdict with a manual decision', async () => {
      const pending = await seedAuthorization(context, member, facility);

      const response = await service.decide(
        pending.id,
        { approve: false, notes: 'incomplete paperwork' },
        approver,
      );

      // L1 has no requirements, so the member qualifies
      expect(response.qualified).toBe(true);
      expect(response.deficiencies).toEqual([]);
      expect(response.reason).toBe('manual_deny');
      expect(response.evaluationError).toBeNull();
      expect(response.authorization.state).toBe(AuthorizationState.REVOKED);
    });
  });

  describe('cancelRequest', () => {
    it('lets the subject cancel their own request', async () => {
      const pending = await seedAuthorization(context, member, facility);

      const response = await service.cancelRequest(pending.id, actorFor(member));

      expect(response.revocationReason).toBe('user_cancelled');
    });

    it('stops another member cancelling it', async () => {
      const pending = await seedAuthorization(context, member, facility);

      await expect(
        service.cancelRequest(pending.id, actorFor(otherMember)),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
    });
  });

  describe('reads', () => {
    it('hides records of other people from members', async () => {
      const theirs = await seedAuthorization(context, otherMember, facility);

      await expect(
        service.get(theirs.id, actorFor(member)),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
      await expect(
        service.history(theirs.id, actorFor(member)),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
    });

    it('scopes member listings to their own records', async () => {
      await seedAuthorization(context, member, facility);
      await seedAuthorization(context, otherMember, facility);

      const own = await service.list({ personId: otherMember.id }, actorFor(member));
      const all = await service.list({}, approver);

      expect(own.data.map((a) => a.personId)).toEqual([member.id]);
      expect(all.data.map((a) => a.id)).toEqual([2, 1]);
      expect(all.hasNextPage).toBe(false);
    });

    it('pages listings', async () => {
      await seedAuthorization(context, member, facility);
      await seedAuthorization(context, otherMember, facility);

      const page = await service.list({ page: 1, limit: 1 }, approver);

      expect(page.data.map((a) => a.id)).toEqual([2]);
      expect(page.hasNextPage).toBe(true);
    });
  });
});
