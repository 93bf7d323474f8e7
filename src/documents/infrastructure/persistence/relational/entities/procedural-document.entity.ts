import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { FacilityEntity } from '../../../../../facilities/infrastructure/persistence/relational/entities/facility.entity';

@Entity({ name: 'procedural_documents' })
@Index(['facilityId', 'mandatory'])
@Check(`"current_version" >= 1`)
export class ProceduralDocumentEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'facility_id', type: 'integer' })
  facilityId!: number;

  @ManyToOne(() => FacilityEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'facility_id' })
  facility?: FacilityEntity;

  @Column({ type: 'varchar', length: 255 })
  title!: string;

  @Column({ type: 'boolean', default: true })
  mandatory!: boolean;

  @Column({ name: 'current_version', type: 'integer', default: 1 })
  currentVersion!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
