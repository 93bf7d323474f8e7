import { ReportsService } from './reports.service';
import { AuthorizationState } from '../authorizations/domain/enums/authorization-state.enum';
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

describe('ReportsService', () => {
  let context: ComplianceTestContext;
  let reports: ReportsService;

  beforeEach(async () => {
    context = await createComplianceTestingModule({
      now: '2024-06-15T08:00:00.000Z',
      compliance: { expiringWindowDays: 30 },
    });
    reports = context.module.get(ReportsService);

    const course = await seedCourse(context, 'C1', 180, 14);
    const lab = await seedFacility(context, 'L1');
    const office = await seedFacility(context, 'L2');
    await seedRequirement(context, lab, course);

    const alice = await seedPerson(context, 'E-1');
    const bob = await seedPerson(context, 'E-2');
    const carol = await seedPerson(context, 'E-3');

    await seedCompletion(context, alice, course, '2023-06-01');
    await seedCompletion(context, alice, course, '2024-01-01');
    await seedCompletion(context, bob, course, '2023-10-01');
    await seedCompletion(context, carol, course, '2024-05-01');
    await seedCompletion(context, carol, course, '2024-07-01');

    await seedAuthorization(context, alice, lab, AuthorizationState.ACTIVE); // 1
    await seedAuthorization(context, bob, lab, AuthorizationState.ACTIVE); // 2
    await seedAuthorization(context, carol, lab, AuthorizationState.REVOKED); // 3
    await seedAuthorization(context, carol, office); // 4
  });

  describe('complianceStatus', () => {
    it('evaluates every open authorization', async () => {
      const report = await reports.complianceStatus('2024-06-15');

      expect(report.asOf).toBe('2024-06-15');
      expect(report.rows).toEqual([
        {
          authorizationId: 1,
          personId: 1,
          facilityId: 1,
          state: AuthorizationState.ACTIVE,
          compliantNow: true,
          reasons: [],
          graceInEffect: [],
          error: null,
        },
        {
          authorizationId: 2,
          personId: 2,
          facilityId: 1,
          state: AuthorizationState.ACTIVE,
          compliantNow: false,
          reasons: ['TrainingExpired(C1, expiredOn=2024-03-29)'],
          graceInEffect: [],
          error: null,
        },
        {
          authorizationId: 4,
          personId: 3,
          facilityId: 2,
          state: AuthorizationState.PENDING,
          compliantNow: true,
          reasons: [],
          graceInEffect: [],
          error: null,
        },
      ]);
    });

    it('filters by facility', async () => {
      const report = await reports.complianceStatus('2024-06-15', 2);

      expect(report.rows.map((r) => r.authorizationId)).toEqual([4]);
    });

    it('reports grace in effect', async () => {
      const report = await reports.complianceStatus('2024-07-05', 1);

      expect(report.rows[0]).toMatchObject({
        authorizationId: 1,
        compliantNow: true,
        graceInEffect: ['C1'],
      });
    });
  });

  describe('expiringTraining', () => {
    it('lists latest completions expiring within the window, soonest first', async () => {
      const report = await reports.expiringTraining('2024-06-15');

      expect(report).toEqual({
        asOf: '2024-06-15',
        windowDays: 30,
        rows: [
          {
            personId: 2,
            courseId: 1,
            courseCode: 'C1',
            completedOn: '2023-10-01',
            expiresOn: '2024-03-29',
            graceEndsOn: '2024-04-12',
            daysLeft: -78,
          },
          {
            personId: 1,
            courseId: 1,
            courseCode: 'C1',
            completedOn: '2024-01-01',
            expiresOn: '2024-06-29',
            graceEndsOn: '2024-07-13',
            daysLeft: 14,
          },
        ],
      });
    });

    it('honours an explicit window', async () => {
      const report = await reports.expiringTraining('2024-06-15', 7);

      expect(report.windowDays).toBe(7);
      expect(report.rows.map((r) => r.personId)).toEqual([2]);
    });
  });

  describe('acknowledgments', () => {
    beforeEach(async () => {
      const documents = context.repositories.documents;
      const gowning = await documents.create({
        facilityId: 1,
        title: 'Gowning SOP',
        mandatory: true,
        currentVersion: 2,
      });
      const spill = await documents.create({
        facilityId: 2,
        title: 'Spill response',
        mandatory: false,
        currentVersion: 1,
      });
      const acknowledgments = context.repositories.acknowledgments;
      await acknowledgments.create({
        personId: 1,
        documentId: gowning.id,
        version: 1,
        acknowledgedAt: new Date('2024-02-01T10:00:00.000Z'),
      });
      await acknowledgments.create({
        personId: 2,
        documentId: spill.id,
        version: 1,
        acknowledgedAt: new Date('2024-03-01T10:00:00.000Z'),
      });
      await acknowledgments.create({
        personId: 1,
        documentId: gowning.id,
        version: 2,
        acknowledgedAt: new Date('2024-05-01T10:00:00.000Z'),
      });
    });

    it('lists every acknowledgment newest first', async () => {
      const report = await reports.acknowledgments();

      expect(report.rows).toEqual([
        {
          personId: 1,
          personName: 'Person E-1',
          documentId: 1,
          title: 'Gowning SOP',
          facilityId: 1,
          version: 2,
          acknowledgedAt: new Date('2024-05-01T10:00:00.000Z'),
        },
        {
          personId: 2,
          personName: 'Person E-2',
          documentId: 2,
          title: 'Spill response',
          facilityId: 2,
          version: 1,
          acknowledgedAt: new Date('2024-03-01T10:00:00.000Z'),
        },
        {
          personId: 1,
          personName: 'Person E-1',
          documentId: 1,
          title: 'Gowning SOP',
          facilityId: 1,
          version: 1,
          acknowledgedAt: new Date('2024-02-01T10:00:00.000Z'),
        },
      ]);
    });

    it('filters by the facility owning the document', async () => {
      const report = await reports.acknowledgments(2);

      expect(report.rows.map((r) => [r.personId, r.title])).toEqual([
        [2, 'Spill response'],
      ]);
    });

    it('keeps rows whose person is gone', async () => {
      await context.repositories.acknowledgments.create({
        personId: 99,
        documentId: 2,
        version: 1,
        acknowledgedAt: new Date('2024-06-01T10:00:00.000Z'),
      });

      const report = await reports.acknowledgments(2);

      expect(report.rows[0]).toMatchObject({ personId: 99, personName: '' });
    });
  });
});
