import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { Clock } from '../clock/clock';
import { Actor, actorPersonId } from '../auth/domain/actor';
import { AuditEntryRepositoryPort } from './domain/repositories/audit-entry.repository.port';
import { AuditEntry } from './domain/entities/audit-entry.entity';
import { sanitizeAuditMetadata } from './utils/audit-sanitizer.util';

export enum AuditEntityType {
  AUTHORIZATION = 'authorization',
  PERSON = 'person',
  COURSE = 'course',
  COMPLETION = 'completion',
  FACILITY = 'facility',
  FACILITY_METRICS = 'facility_metrics',
  REQUIREMENT = 'requirement',
  DOCUMENT = 'document',
  ACKNOWLEDGMENT = 'acknowledgment',
  AUTOCHECK_RUN = 'autocheck_run',
}

export enum AuditAction {
  // Authorization lifecycle
  REQUEST_ACCESS = 'request_access',
  ACTIVATE = 'activate',
  AUTO_ACTIVATE = 'auto_activate',
  MANUAL_APPROVE = 'manual_approve',
  MANUAL_OVERRIDE = 'manual_override',
  MANUAL_DENY = 'manual_deny',
  AUTO_DENY = 'auto_deny',
  REVOKE = 'revoke',
  AUTO_REVOKE = 'auto_revoke',
  MANUAL_REVOKE = 'manual_revoke',
  CANCEL_REQUEST = 'cancel_request',
  // Catalogue and records
  PERSON_CREATED = 'person_created',
  PERSON_ROLE_CHANGED = 'person_role_changed',
  COURSE_CREATED = 'course_created',
  COMPLETION_RECORDED = 'completion_recorded',
  FACILITY_CREATED = 'facility_created',
  REQUIREMENT_ADDED = 'requirement_added',
  FACILITY_METRICS_SAVED = 'facility_metrics_saved',
  DOCUMENT_CREATED = 'document_created',
  DOCUMENT_VERSION_UPLOADED = 'document_version_uploaded',
  DOCUMENT_ACKNOWLEDGED = 'document_acknowledged',
  // Batch
  AUTOCHECK_COMPLETED = 'autocheck_completed',
}

export interface AuditEventData {
  actor: Actor;
  entityType: AuditEntityType;
  entityId: number | string;
  action: AuditAction;
  priorState?: string | null;
  newState?: string | null;
  // Machine-built reason, stored verbatim so it matches the record it describes
  detail?: string | null;
  // Reviewer free text; redacted and kept under metadata.notes
  notes?: string | null;
  metadata?: Record<string, unknown>;
  occurredAt?: Date;
}

/**
 * Audit Recorder
 *
 * Appends one immutable entry per state change and mirrors it as a
 * structured JSON log line. The append is the last step of every
 * transition; callers hold the per-record lock while recording so entries
 * for one record are written in transition order.
 */
@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    private readonly auditRepository: AuditEntryRepositoryPort,
    private readonly clock: Clock,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  /**
   * Append an audit entry.
   *
   * Pass `store` to append through a repository bound to the caller's
   * unit of work.
   *
   * Security Notes:
   * - Metadata strings, reviewer notes included, are redacted and truncated
   * - `detail` is stored as given
   * - The returned entry is frozen; there is no update path
   */
  async record(
    data: AuditEventData,
    store: AuditEntryRepositoryPort = this.auditRepository,
  ): Promise<AuditEntry> {
    const metadata = data.notes
      ? { ...data.metadata, notes: data.notes }
      : data.metadata;
    const entry = await store.append({
      occurredAt: data.occurredAt ?? this.clock.now(),
      actorType: data.actor.type,
      actorId: actorPersonId(data.actor),
      entityType: data.entityType,
      entityId: String(data.entityId),
      action: data.action,
      priorState: data.priorState ?? null,
      newState: data.newState ?? null,
      detail: data.detail ?? null,
      metadata: metadata ? sanitizeAuditMetadata(metadata) : null,
    });

    this.logger.log(
      JSON.stringify({
        timestamp: entry.occurredAt.toISOString(),
        service: this.configService.get('app.name', { infer: true }),
        component: 'audit',
        environment: this.configService.get('app.nodeEnv', { infer: true }),
        auditId: entry.id,
        actor: `${entry.actorType}:${entry.actorId ?? data.actor.id}`,
        entity: `${entry.entityType}:${entry.entityId}`,
        action: entry.action,
        priorState: entry.priorState,
        newState: entry.newState,
      }),
    );

    return Object.freeze({
      ...entry,
      metadata: entry.metadata ? Object.freeze({ ...entry.metadata }) : null,
    });
  }

  /**
   * Full history of an entity, oldest first.
   */
  async history(
    entityType: AuditEntityType,
    entityId: number | string,
  ): Promise<AuditEntry[]> {
    return this.auditRepository.findByEntity(entityType, String(entityId));
  }
}
