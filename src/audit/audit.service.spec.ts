import { AuditAction, AuditEntityType, AuditService } from './audit.service';
import { AUTOCHECK_ACTOR } from '../auth/domain/actor';
import { RoleEnum } from '../roles/roles.enum';
import {
  ComplianceTestContext,
  createComplianceTestingModule,
} from '../../test/utils/compliance-testing-module';

describe('AuditService', () => {
  let context: ComplianceTestContext;
  let service: AuditService;

  beforeEach(async () => {
    context = await createComplianceTestingModule({
      now: '2024-03-01T10:00:00.000Z',
    });
    service = context.module.get(AuditService);
  });

  it('appends an entry stamped with the clock', async () => {
    const entry = await service.record({
      actor: { type: 'person', id: 5, role: RoleEnum.approver },
      entityType: AuditEntityType.AUTHORIZATION,
      entityId: 12,
      action: AuditAction.MANUAL_REVOKE,
      priorState: 'active',
      newState: 'revoked',
      detail: 'manual_revoke',
    });

    expect(entry).toEqual({
      id: 1,
      occurredAt: new Date('2024-03-01T10:00:00.000Z'),
      actorType: 'person',
      actorId: 5,
      entityType: 'authorization',
      entityId: '12',
      action: 'manual_revoke',
      priorState: 'active',
      newState: 'revoked',
      detail: 'manual_revoke',
      metadata: null,
    });
  });

  it('keeps the reason verbatim and redacts reviewer notes', async () => {
    const entry = await service.record({
      actor: AUTOCHECK_ACTOR,
      entityType: AuditEntityType.AUTHORIZATION,
      entityId: 3,
      action: AuditAction.AUTO_REVOKE,
      detail: 'DocumentNotAcknowledged(Token handling SOP, requiredVersion=1)',
      notes: 'token=test-secret from ops@example.com',
      metadata: { facilityId: 1 },
    });

    expect(entry.detail).toBe(
      'DocumentNotAcknowledged(Token handling SOP, requiredVersion=1)',
    );
    expect(entry.metadata).toEqual({
      facilityId: 1,
      notes: 'token: [REDACTED] from [EMAIL_REDACTED]',
    });
  });

  it('stores the system actor without a person id', async () => {
    const entry = await service.record({
      actor: AUTOCHECK_ACTOR,
      entityType: AuditEntityType.AUTHORIZATION,
      entityId: 1,
      action: AuditAction.AUTO_ACTIVATE,
      occurredAt: new Date('2024-01-02T02:00:00.000Z'),
    });

    expect(entry.actorType).toBe('system');
    expect(entry.actorId).toBeNull();
    expect(entry.occurredAt).toEqual(new Date('2024-01-02T02:00:00.000Z'));
  });

  it('returns frozen entries', async () => {
    const entry = await service.record({
      actor: AUTOCHECK_ACTOR,
      entityType: AuditEntityType.AUTOCHECK_RUN,
      entityId: 'run-1',
      action: AuditAction.AUTOCHECK_COMPLETED,
      metadata: { examined: 3 },
    });

    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.metadata)).toBe(true);
  });

  it('returns the history of one entity oldest first', async () => {
    const actor = AUTOCHECK_ACTOR;
    await service.record({
      actor,
      entityType: AuditEntityType.AUTHORIZATION,
      entityId: 1,
      action: AuditAction.AUTO_ACTIVATE,
    });
    await service.record({
      actor,
      entityType: AuditEntityType.AUTHORIZATION,
      entityId: 2,
      action: AuditAction.AUTO_ACTIVATE,
    });
    await service.record({
      actor,
      entityType: AuditEntityType.AUTHORIZATION,
      entityId: 1,
      action: AuditAction.AUTO_REVOKE,
    });

    const history = await service.history(AuditEntityType.AUTHORIZATION, 1);
    expect(history.map((e) => e.action)).toEqual(['auto_activate', 'auto_revoke']);
  });
});
