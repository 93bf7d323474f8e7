import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { FacilityEntity } from './infrastructure/persistence/relational/entities/facility.entity';
import { RequirementEntity } from './infrastructure/persistence/relational/entities/requirement.entity';
import { FacilityMetricsEntity } from './infrastructure/persistence/relational/entities/facility-metrics.entity';
import { FacilityRepositoryPort } from './domain/repositories/facility.repository.port';
import { RequirementRepositoryPort } from './domain/repositories/requirement.repository.port';
import { FacilityMetricsRepositoryPort } from './domain/repositories/facility-metrics.repository.port';
import { FacilityRelationalRepository } from './infrastructure/persistence/relational/repositories/facility.repository';
import { RequirementRelationalRepository } from './infrastructure/persistence/relational/repositories/requirement.repository';
import { FacilityMetricsRelationalRepository } from './infrastructure/persistence/relational/repositories/facility-metrics.repository';
import { FacilityDomainService } from './domain/services/facility.domain.service';
import { FacilitiesController } from './facilities.controller';
import { TrainingModule } from '../training/training.module';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      FacilityEntity,
      RequirementEntity,
      FacilityMetricsEntity,
    ]),
    TrainingModule,
    AuditModule,
  ],
  providers: [
    {
      provide: FacilityRepositoryPort,
      useClass: FacilityRelationalRepository,
    },
    {
      provide: RequirementRepositoryPort,
      useClass: RequirementRelationalRepository,
    },
    {
      provide: FacilityMetricsRepositoryPort,
      useClass: FacilityMetricsRelationalRepository,
    },
    FacilityDomainService,
  ],
  controllers: [FacilitiesController],
  exports: [FacilityRepositoryPort, RequirementRepositoryPort, FacilityDomainService],
})
export class FacilitiesModule {}
