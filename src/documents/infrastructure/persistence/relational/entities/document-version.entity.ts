import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ProceduralDocumentEntity } from './procedural-document.entity';

@Entity({ name: 'document_versions' })
@Index(['documentId', 'version'], { unique: true })
export class DocumentVersionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'document_id', type: 'integer' })
  documentId!: number;

  @ManyToOne(() => ProceduralDocumentEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'document_id' })
  document?: ProceduralDocumentEntity;

  @Column({ type: 'integer' })
  version!: number;

  @Column({ name: 'artifact_key', type: 'varchar', length: 512, nullable: true })
  artifactKey!: string | null;

  @Column({ name: 'uploaded_at', type: 'timestamptz' })
  uploadedAt!: Date;

  @Column({ name: 'uploaded_by_id', type: 'integer', nullable: true })
  uploadedById!: number | null;
}
