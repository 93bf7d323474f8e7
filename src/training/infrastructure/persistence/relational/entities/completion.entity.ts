import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { CourseEntity } from './course.entity';
import { PersonEntity } from '../../../../../people/infrastructure/persistence/relational/entities/person.entity';

@Entity({ name: 'completions' })
@Index(['personId', 'courseId', 'completedOn'], { unique: true })
export class CompletionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'person_id', type: 'integer' })
  personId!: number;

  @ManyToOne(() => PersonEntity, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'person_id' })
  person?: PersonEntity;

  @Column({ name: 'course_id', type: 'integer' })
  courseId!: number;

  @ManyToOne(() => CourseEntity, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'course_id' })
  course?: CourseEntity;

  // 'date' columns come back from pg as 'YYYY-MM-DD' strings
  @Column({ name: 'completed_on', type: 'date' })
  completedOn!: string;

  @Column({ name: 'certificate_key', type: 'varchar', length: 512, nullable: true })
  certificateKey!: string | null;

  @CreateDateColumn({ name: 'recorded_at' })
  recordedAt!: Date;
}
