import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ProceduralDocumentEntity } from './procedural-document.entity';
import { PersonEntity } from '../../../../../people/infrastructure/persistence/relational/entities/person.entity';

@Entity({ name: 'acknowledgments' })
@Index(['personId', 'documentId', 'version'], { unique: true })
export class AcknowledgmentEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'person_id', type: 'integer' })
  personId!: number;

  @ManyToOne(() => PersonEntity, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'person_id' })
  person?: PersonEntity;

  @Column({ name: 'document_id', type: 'integer' })
  documentId!: number;

  @ManyToOne(() => ProceduralDocumentEntity, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'document_id' })
  document?: ProceduralDocumentEntity;

  @Column({ type: 'integer' })
  version!: number;

  @Column({ name: 'acknowledged_at', type: 'timestamptz' })
  acknowledgedAt!: Date;
}
