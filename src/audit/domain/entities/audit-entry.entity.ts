import { ActorType } from '../../../auth/domain/actor';

/**
 * Domain entity for AuditEntry
 *
 * Write-once record of something that happened to a compliance entity.
 * Entries are never updated or deleted; the repository port exposes no
 * operation that could.
 */
export interface AuditEntry {
  readonly id: number;
  readonly occurredAt: Date;
  readonly actorType: ActorType;
  readonly actorId: number | null; // null for the system actor
  readonly entityType: string;
  readonly entityId: string;
  readonly action: string;
  readonly priorState: string | null;
  readonly newState: string | null;
  readonly detail: string | null;
  readonly metadata: Readonly<Record<string, unknown>> | null;
}

export type NewAuditEntry = Omit<AuditEntry, 'id'>;
