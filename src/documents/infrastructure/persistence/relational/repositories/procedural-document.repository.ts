import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { ProceduralDocumentEntity } from '../entities/procedural-document.entity';
import { ProceduralDocumentRepositoryPort } from '../../../../domain/repositories/procedural-document.repository.port';
import { ProceduralDocument } from '../../../../domain/entities/procedural-document.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class ProceduralDocumentRelationalRepository
  implements ProceduralDocumentRepositoryPort
{
  constructor(
    @InjectRepository(ProceduralDocumentEntity)
    private readonly repository: Repository<ProceduralDocumentEntity>,
  ) {}

  async findById(id: number): Promise<NullableType<ProceduralDocument>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? this.toDomain(entity) : null;
  }

  async findByFacility(
    facilityId: number,
    options?: { mandatoryOnly?: boolean },
  ): Promise<ProceduralDocument[]> {
    const where: FindOptionsWhere<ProceduralDocumentEntity> = { facilityId };
    if (options?.mandatoryOnly) {
      where.mandatory = true;
    }
    const entities = await this.repository.find({
      where,
      order: { id: 'ASC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async create(
    data: Omit<ProceduralDocument, 'id' | 'createdAt'>,
  ): Promise<ProceduralDocument> {
    const saved = await this.repository.save(this.repository.create(data));
    return this.toDomain(saved);
  }

  async bumpVersion(
    id: number,
    expected: number,
  ): Promise<NullableType<ProceduralDocument>> {
    const result = await this.repository.update(
      { id, currentVersion: expected },
      { currentVersion: expected + 1 },
    );
    if (!result.affected) {
      return null;
    }
    return this.findById(id);
  }

  private toDomain(entity: ProceduralDocumentEntity): ProceduralDocument {
    return {
      id: entity.id,
      facilityId: entity.facilityId,
      title: entity.title,
      mandatory: entity.mandatory,
      currentVersion: entity.currentVersion,
      createdAt: entity.createdAt,
    };
  }
}
