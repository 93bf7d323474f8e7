import { AuditEntry, NewAuditEntry } from '../entities/audit-entry.entity';

export interface AuditEntryFilter {
  entityType?: string;
  entityId?: string;
  action?: string;
  actorType?: AuditEntry['actorType'];
  actorId?: number;
  from?: Date;
  to?: Date;
}

/**
 * Append-only store for audit entries.
 */
export abstract class AuditEntryRepositoryPort {
  abstract append(entry: NewAuditEntry): Promise<AuditEntry>;

  /**
   * Full history of one entity, oldest first
   */
  abstract findByEntity(entityType: string, entityId: string): Promise<AuditEntry[]>;

  /**
   * Entries matching every given filter, newest first
   */
  abstract find(filter: AuditEntryFilter): Promise<AuditEntry[]>;
}
