import {
  Column,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ActorType } from '../../../../../auth/domain/actor';

/**
 * Audit Entry Entity (Database)
 *
 * Insert-only. A trigger created by the migration rejects UPDATE and
 * DELETE; the repository never issues either.
 */
@Entity({ name: 'audit_entries' })
@Index(['entityType', 'entityId'])
@Index(['action', 'occurredAt'])
export class AuditEntryEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'occurred_at', type: 'timestamptz' })
  @Index()
  occurredAt!: Date;

  @Column({ name: 'actor_type', type: 'varchar', length: 20 })
  actorType!: ActorType;

  @Column({ name: 'actor_id', type: 'integer', nullable: true })
  actorId!: number | null;

  @Column({ name: 'entity_type', type: 'varchar', length: 64 })
  entityType!: string;

  @Column({ name: 'entity_id', type: 'varchar', length: 128 })
  entityId!: string;

  @Column({ type: 'varchar', length: 64 })
  action!: string;

  @Column({ name: 'prior_state', type: 'varchar', length: 20, nullable: true })
  priorState!: string | null;

  @Column({ name: 'new_state', type: 'varchar', length: 20, nullable: true })
  newState!: string | null;

  @Column({ type: 'text', nullable: true })
  detail!: string | null;

  @Column({ type: 'jsonb', nullable: true })
  metadata!: Record<string, unknown> | null;
}
