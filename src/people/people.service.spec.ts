import { PeopleService } from './people.service';
import { RoleEnum } from '../roles/roles.enum';
import { PersonActor } from '../auth/domain/actor';
import {
  DuplicateRequestError,
  EntityNotFoundError,
} from '../utils/errors/compliance-errors';
import {
  ComplianceTestContext,
  createComplianceTestingModule,
} from '../../test/utils/compliance-testing-module';
import { actorFor, seedPerson } from '../../test/utils/fixtures';

describe('PeopleService', () => {
  let context: ComplianceTestContext;
  let service: PeopleService;
  let admin: PersonActor;

  beforeEach(async () => {
    context = await createComplianceTestingModule();
    service = context.module.get(PeopleService);
    admin = actorFor(await seedPerson(context, 'E-ADMIN', RoleEnum.administrator));
  });

  it('provisions a member by default', async () => {
    const person = await service.create(
      { employeeNo: 'E-1', name: 'Ada', email: 'ada@example.com' },
      admin,
    );

    expect(person).toMatchObject({
      employeeNo: 'E-1',
      email: 'ada@example.com',
      role: RoleEnum.member,
    });
    expect(context.repositories.audit.rows[0]).toMatchObject({
      action: 'person_created',
      metadata: { employeeNo: 'E-1', role: 'member' },
    });
  });

  it('rejects duplicate employee numbers and emails', async () => {
    await service.create(
      { employeeNo: 'E-1', name: 'Ada', email: 'ada@example.com' },
      admin,
    );

    await expect(
      service.create(
        { employeeNo: 'E-1', name: 'Other', email: 'other@example.com' },
        admin,
      ),
    ).rejects.toBeInstanceOf(DuplicateRequestError);
    await expect(
      service.create(
        { employeeNo: 'E-2', name: 'Other', email: 'ada@example.com' },
        admin,
      ),
    ).rejects.toBeInstanceOf(DuplicateRequestError);
  });

  it('audits role changes and ignores no-op ones', async () => {
    const person = await seedPerson(context, 'E-1');

    await service.changeRole(person.id, RoleEnum.member, admin);
    const updated = await service.changeRole(person.id, RoleEnum.approver, admin);

    expect(updated.role).toBe(RoleEnum.approver);
    expect(context.repositories.audit.rows.map((e) => e.action)).toEqual([
      'person_role_changed',
    ]);
    expect(context.repositories.audit.rows[0].metadata).toEqual({
      from: 'member',
      to: 'approver',
    });
  });

  it('throws NotFound for unknown people', async () => {
    await expect(service.getById(404)).rejects.toBeInstanceOf(EntityNotFoundError);
  });
});
