import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { FacilityEntity } from '../entities/facility.entity';
import { FacilityRepositoryPort } from '../../../../domain/repositories/facility.repository.port';
import { Facility } from '../../../../domain/entities/facility.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class FacilityRelationalRepository implements FacilityRepositoryPort {
  constructor(
    @InjectRepository(FacilityEntity)
    private readonly repository: Repository<FacilityEntity>,
  ) {}

  async findById(id: number): Promise<NullableType<Facility>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? this.toDomain(entity) : null;
  }

  async findByCode(code: string): Promise<NullableType<Facility>> {
    const entity = await this.repository.findOne({ where: { code } });
    return entity ? this.toDomain(entity) : null;
  }

  async findAll(): Promise<Facility[]> {
    const entities = await this.repository.find({ order: { id: 'ASC' } });
    return entities.map((entity) => this.toDomain(entity));
  }

  async create(data: Omit<Facility, 'id' | 'createdAt'>): Promise<Facility> {
    const saved = await this.repository.save(this.repository.create(data));
    return this.toDomain(saved);
  }

  private toDomain(entity: FacilityEntity): Facility {
    return {
      id: entity.id,
      code: entity.code,
      name: entity.name,
      createdAt: entity.createdAt,
    };
  }
}
