import { ProceduralDocumentDomainService } from './procedural-document.domain.service';
import { DocumentCurrencyService } from './document-currency.domain.service';
import { RoleEnum } from '../../../roles/roles.enum';
import { PersonActor } from '../../../auth/domain/actor';
import {
  DuplicateRequestError,
  EntityNotFoundError,
} from '../../../utils/errors/compliance-errors';
import {
  ComplianceTestContext,
  createComplianceTestingModule,
} from '../../../../test/utils/compliance-testing-module';
import { seedFacility, seedPerson } from '../../../../test/utils/fixtures';

describe('ProceduralDocumentDomainService', () => {
  let context: ComplianceTestContext;
  let service: ProceduralDocumentDomainService;
  let currency: DocumentCurrencyService;
  let admin: PersonActor;
  let memberId: number;
  let facilityId: number;

  beforeEach(async () => {
    context = await createComplianceTestingModule();
    service = context.module.get(ProceduralDocumentDomainService);
    currency = context.module.get(DocumentCurrencyService);

    const adminPerson = await seedPerson(context, 'E-ADMIN', RoleEnum.administrator);
    admin = { type: 'person', id: adminPerson.id, role: RoleEnum.administrator };
    memberId = (await seedPerson(context, 'E-100')).id;
    facilityId = (await seedFacility(context, 'L1')).id;
  });

  it('creates a document at version 1 with its first version record', async () => {
    const document = await service.createDocument(
      facilityId,
      { title: 'Laser SOP', artifactKey: 'sop/laser-v1.pdf' },
      admin,
    );

    expect(document).toMatchObject({
      facilityId,
      title: 'Laser SOP',
      mandatory: true,
      currentVersion: 1,
    });
    const versions = await service.listVersions(document.id);
    expect(versions.map((v) => [v.version, v.artifactKey, v.uploadedById])).toEqual([
      [1, 'sop/laser-v1.pdf', admin.id],
    ]);
  });

  it('rejects documents for unknown facilities', async () => {
    await expect(
      service.createDocument(99, { title: 'Orphan' }, admin),
    ).rejects.toBeInstanceOf(EntityNotFoundError);
  });

  it('acknowledges the current version once', async () => {
    const document = await service.createDocument(
      facilityId,
      { title: 'Laser SOP' },
      admin,
    );

    const first = await service.acknowledge(memberId, document.id, admin);
    const second = await service.acknowledge(memberId, document.id, admin);

    expect(first.created).toBe(true);
    expect(first.acknowledgment.version).toBe(1);
    expect(second.created).toBe(false);
    expect(second.acknowledgment.id).toBe(first.acknowledgment.id);
    expect(context.repositories.acknowledgments.rows).toHaveLength(1);
    expect(await currency.isCurrent(memberId, document.id)).toBe(true);
  });

  it('invalidates earlier acknowledgments when a new version is uploaded', async () => {
    const document = await service.createDocument(
      facilityId,
      { title: 'Laser SOP' },
      admin,
    );
    await service.acknowledge(memberId, document.id, admin);

    const { document: updated, version } = await service.uploadVersion(
      document.id,
      'sop/laser-v2.pdf',
      admin,
    );

    expect(updated.currentVersion).toBe(2);
    expect(version.version).toBe(2);
    expect(await currency.resolve(memberId, document.id)).toEqual({
      documentId: document.id,
      requiredVersion: 2,
      acknowledgedVersion: 1,
      current: false,
    });

    const reacknowledged = await service.acknowledge(memberId, document.id, admin);
    expect(reacknowledged.acknowledgment.version).toBe(2);
    expect(await currency.isCurrent(memberId, document.id)).toBe(true);
  });

  it('serializes concurrent uploads into consecutive versions', async () => {
    const document = await service.createDocument(
      facilityId,
      { title: 'Laser SOP' },
      admin,
    );

    await Promise.all([
      service.uploadVersion(document.id, 'v2', admin),
      service.uploadVersion(document.id, 'v3', admin),
    ]);

    const versions = await service.listVersions(document.id);
    expect(versions.map((v) => v.version)).toEqual([1, 2, 3]);
    expect((await service.getDocument(document.id)).currentVersion).toBe(3);
  });

  it('reports a lost compare-and-swap as a duplicate request', async () => {
    const document = await service.createDocument(
      facilityId,
      { title: 'Laser SOP' },
      admin,
    );
    jest
      .spyOn(context.repositories.documents, 'bumpVersion')
      .mockResolvedValueOnce(null);

    await expect(
      service.uploadVersion(document.id, null, admin),
    ).rejects.toBeInstanceOf(DuplicateRequestError);
    expect((await service.getDocument(document.id)).currentVersion).toBe(1);
  });

  it('records one audit entry per upload', async () => {
    const document = await service.createDocument(
      facilityId,
      { title: 'Laser SOP' },
      admin,
    );
    await service.uploadVersion(document.id, null, admin);

    const actions = context.repositories.audit.rows
      .filter((e) => e.entityType === 'document')
      .map((e) => e.action);
    expect(actions).toEqual(['document_created', 'document_version_uploaded']);
  });
});
