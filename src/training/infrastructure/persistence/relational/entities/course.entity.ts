import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';

@Entity({ name: 'courses' })
@Check(`"validity_days" > 0`)
@Check(`"grace_days" >= 0`)
export class CourseEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 64 })
  @Index({ unique: true })
  code!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ name: 'validity_days', type: 'integer' })
  validityDays!: number;

  @Column({ name: 'grace_days', type: 'integer', default: 0 })
  graceDays!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
