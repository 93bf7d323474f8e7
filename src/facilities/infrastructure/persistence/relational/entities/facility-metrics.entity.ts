import {
  Check,
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { FacilityEntity } from './facility.entity';

@Entity({ name: 'facility_metrics' })
@Index(['facilityId', 'asOf'], { unique: true })
@Check(`"utilization" BETWEEN 0 AND 100`)
@Check(`"condition" BETWEEN 0 AND 100`)
@Check(`"activity" BETWEEN 0 AND 100`)
export class FacilityMetricsEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'facility_id', type: 'integer' })
  facilityId!: number;

  @ManyToOne(() => FacilityEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'facility_id' })
  facility?: FacilityEntity;

  @Column({ name: 'as_of', type: 'date' })
  asOf!: string;

  @Column({ type: 'integer' })
  utilization!: number;

  @Column({ type: 'integer' })
  condition!: number;

  @Column({ type: 'integer' })
  activity!: number;

  @Column({ name: 'recorded_at', type: 'timestamp' })
  recordedAt!: Date;
}
