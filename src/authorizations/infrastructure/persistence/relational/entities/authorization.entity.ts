import {
  Check,
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { AuthorizationState } from '../../../../domain/enums/authorization-state.enum';
import { ActorType } from '../../../../../auth/domain/actor';
import { PersonEntity } from '../../../../../people/infrastructure/persistence/relational/entities/person.entity';
import { FacilityEntity } from '../../../../../facilities/infrastructure/persistence/relational/entities/facility.entity';

/**
 * Authorization Entity (Database)
 *
 * The partial unique index allows any number of revoked records per pair
 * but only one pending-or-active one.
 */
@Entity({ name: 'authorizations' })
@Index('IDX_authorizations_open_pair', ['personId', 'facilityId'], {
  unique: true,
  where: `"state" <> 'revoked'`,
})
@Index(['state'])
@Check(`"state" IN ('pending', 'active', 'revoked')`)
@Check(`"state" <> 'revoked' OR "revoked_at" IS NOT NULL`)
@Check(`"state" <> 'active' OR "activated_at" IS NOT NULL`)
export class AuthorizationEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'person_id', type: 'integer' })
  personId!: number;

  @ManyToOne(() => PersonEntity, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'person_id' })
  person?: PersonEntity;

  @Column({ name: 'facility_id', type: 'integer' })
  facilityId!: number;

  @ManyToOne(() => FacilityEntity, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'facility_id' })
  facility?: FacilityEntity;

  @Column({ type: 'varchar', length: 20, default: AuthorizationState.PENDING })
  state!: AuthorizationState;

  @Column({ type: 'integer', default: 1 })
  version!: number;

  @Column({ name: 'requested_at', type: 'timestamptz' })
  requestedAt!: Date;

  @Column({ name: 'requested_by_id', type: 'integer' })
  requestedById!: number;

  @Column({ name: 'activated_at', type: 'timestamptz', nullable: true })
  activatedAt!: Date | null;

  @Column({ name: 'activated_by_type', type: 'varchar', length: 20, nullable: true })
  activatedByType!: ActorType | null;

  @Column({ name: 'activated_by_id', type: 'integer', nullable: true })
  activatedById!: number | null;

  @Column({ name: 'revoked_at', type: 'timestamptz', nullable: true })
  revokedAt!: Date | null;

  @Column({ name: 'revoked_by_type', type: 'varchar', length: 20, nullable: true })
  revokedByType!: ActorType | null;

  @Column({ name: 'revoked_by_id', type: 'integer', nullable: true })
  revokedById!: number | null;

  @Column({ name: 'revocation_reason', type: 'text', nullable: true })
  revocationReason!: string | null;

  @Column({ name: 'manual_override', type: 'boolean', default: false })
  manualOverride!: boolean;

  @Column({ name: 'decision_notes', type: 'text', nullable: true })
  decisionNotes!: string | null;

  @Column({ name: 'previous_authorization_id', type: 'integer', nullable: true })
  previousAuthorizationId!: number | null;
}
