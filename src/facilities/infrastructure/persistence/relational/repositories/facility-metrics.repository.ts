import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { FacilityMetricsEntity } from '../entities/facility-metrics.entity';
import { FacilityMetricsRepositoryPort } from '../../../../domain/repositories/facility-metrics.repository.port';
import {
  FacilityMetrics,
  FacilityMetricsInput,
} from '../../../../domain/entities/facility-metrics.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class FacilityMetricsRelationalRepository
  implements FacilityMetricsRepositoryPort
{
  constructor(
    @InjectRepository(FacilityMetricsEntity)
    private readonly repository: Repository<FacilityMetricsEntity>,
  ) {}

  async upsert(data: FacilityMetricsInput): Promise<FacilityMetrics> {
    // ON CONFLICT (facility_id, as_of) DO UPDATE
    await this.repository.upsert(data, ['facilityId', 'asOf']);
    const entity = await this.repository.findOneByOrFail({
      facilityId: data.facilityId,
      asOf: data.asOf,
    });
    return this.toDomain(entity);
  }

  async findLatest(facilityId: number): Promise<NullableType<FacilityMetrics>> {
    const entity = await this.repository.findOne({
      where: { facilityId },
      order: { asOf: 'DESC' },
    });
    return entity ? this.toDomain(entity) : null;
  }

  async findByFacility(
    facilityId: number,
    limit: number,
  ): Promise<FacilityMetrics[]> {
    const entities = await this.repository.find({
      where: { facilityId },
      order: { asOf: 'DESC' },
      take: limit,
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  private toDomain(entity: FacilityMetricsEntity): FacilityMetrics {
    return {
      id: entity.id,
      facilityId: entity.facilityId,
      asOf: entity.asOf,
      utilization: entity.utilization,
      condition: entity.condition,
      activity: entity.activity,
      recordedAt: entity.recordedAt,
    };
  }
}
