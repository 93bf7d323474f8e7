import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { DocumentVersionEntity } from '../entities/document-version.entity';
import { DocumentVersionRepositoryPort } from '../../../../domain/repositories/document-version.repository.port';
import { DocumentVersion } from '../../../../domain/entities/document-version.entity';

@Injectable()
export class DocumentVersionRelationalRepository
  implements DocumentVersionRepositoryPort
{
  constructor(
    @InjectRepository(DocumentVersionEntity)
    private readonly repository: Repository<DocumentVersionEntity>,
  ) {}

  async create(data: Omit<DocumentVersion, 'id'>): Promise<DocumentVersion> {
    const saved = await this.repository.save(this.repository.create(data));
    return this.toDomain(saved);
  }

  async findByDocument(documentId: number): Promise<DocumentVersion[]> {
    const entities = await this.repository.find({
      where: { documentId },
      order: { version: 'ASC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  private toDomain(entity: DocumentVersionEntity): DocumentVersion {
    return {
      id: entity.id,
      documentId: entity.documentId,
      version: entity.version,
      artifactKey: entity.artifactKey,
      uploadedAt: entity.uploadedAt,
      uploadedById: entity.uploadedById,
    };
  }
}
