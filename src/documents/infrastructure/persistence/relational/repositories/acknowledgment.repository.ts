import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { AcknowledgmentEntity } from '../entities/acknowledgment.entity';
import { AcknowledgmentRepositoryPort } from '../../../../domain/repositories/acknowledgment.repository.port';
import { Acknowledgment } from '../../../../domain/entities/acknowledgment.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class AcknowledgmentRelationalRepository
  implements AcknowledgmentRepositoryPort
{
  constructor(
    @InjectRepository(AcknowledgmentEntity)
    private readonly repository: Repository<AcknowledgmentEntity>,
  ) {}

  async findOne(
    personId: number,
    documentId: number,
    version: number,
  ): Promise<NullableType<Acknowledgment>> {
    const entity = await this.repository.findOne({
      where: { personId, documentId, version },
    });
    return entity ? this.toDomain(entity) : null;
  }

  async findByPersonAndDocument(
    personId: number,
    documentId: number,
  ): Promise<Acknowledgment[]> {
    const entities = await this.repository.find({
      where: { personId, documentId },
      order: { version: 'ASC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async findAll(): Promise<Acknowledgment[]> {
    const entities = await this.repository.find({
      order: { acknowledgedAt: 'DESC', id: 'DESC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async create(data: Omit<Acknowledgment, 'id'>): Promise<Acknowledgment> {
    const saved = await this.repository.save(this.repository.create(data));
    return this.toDomain(saved);
  }

  private toDomain(entity: AcknowledgmentEntity): Acknowledgment {
    return {
      id: entity.id,
      personId: entity.personId,
      documentId: entity.documentId,
      version: entity.version,
      acknowledgedAt: entity.acknowledgedAt,
    };
  }
}
