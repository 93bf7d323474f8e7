import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { RequirementEntity } from '../entities/requirement.entity';
import { RequirementRepositoryPort } from '../../../../domain/repositories/requirement.repository.port';
import { Requirement } from '../../../../domain/entities/requirement.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class RequirementRelationalRepository implements RequirementRepositoryPort {
  constructor(
    @InjectRepository(RequirementEntity)
    private readonly repository: Repository<RequirementEntity>,
  ) {}

  async findByFacility(facilityId: number): Promise<Requirement[]> {
    const entities = await this.repository.find({
      where: { facilityId },
      order: { id: 'ASC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async findByFacilityAndCourse(
    facilityId: number,
    courseId: number,
  ): Promise<NullableType<Requirement>> {
    const entity = await this.repository.findOne({
      where: { facilityId, courseId },
    });
    return entity ? this.toDomain(entity) : null;
  }

  async create(data: Omit<Requirement, 'id'>): Promise<Requirement> {
    const saved = await this.repository.save(this.repository.create(data));
    return this.toDomain(saved);
  }

  private toDomain(entity: RequirementEntity): Requirement {
    return {
      id: entity.id,
      facilityId: entity.facilityId,
      courseId: entity.courseId,
      validityDays: entity.validityDays,
      graceDays: entity.graceDays,
    };
  }
}
