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
import { CourseEntity } from '../../../../../training/infrastructure/persistence/relational/entities/course.entity';

@Entity({ name: 'requirements' })
@Index(['facilityId', 'courseId'], { unique: true })
@Check(`"validity_days" IS NULL OR "validity_days" > 0`)
@Check(`"grace_days" IS NULL OR "grace_days" >= 0`)
export class RequirementEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'facility_id', type: 'integer' })
  facilityId!: number;

  @ManyToOne(() => FacilityEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'facility_id' })
  facility?: FacilityEntity;

  @Column({ name: 'course_id', type: 'integer' })
  courseId!: number;

  @ManyToOne(() => CourseEntity, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'course_id' })
  course?: CourseEntity;

  @Column({ name: 'validity_days', type: 'integer', nullable: true })
  validityDays!: number | null;

  @Column({ name: 'grace_days', type: 'integer', nullable: true })
  graceDays!: number | null;
}
