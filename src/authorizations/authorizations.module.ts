import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthorizationEntity } from './infrastructure/persistence/relational/entities/authorization.entity';
import { AuthorizationRepositoryPort } from './domain/repositories/authorization.repository.port';
import { AuthorizationRelationalRepository } from './infrastructure/persistence/relational/repositories/authorization.repository';
import { AuthorizationUnitOfWork } from './domain/repositories/authorization-unit-of-work.port';
import { AuthorizationRelationalUnitOfWork } from './infrastructure/persistence/relational/authorization-unit-of-work';
import { AuthorizationDomainService } from './domain/services/authorization.domain.service';
import { AuthorizationsService } from './authorizations.service';
import { AuthorizationsController } from './authorizations.controller';
import { PeopleModule } from '../people/people.module';
import { FacilitiesModule } from '../facilities/facilities.module';
import { ComplianceModule } from '../compliance/compliance.module';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([AuthorizationEntity]),
    PeopleModule,
    FacilitiesModule,
    ComplianceModule,
    AuditModule,
  ],
  providers: [
    {
      provide: AuthorizationRepositoryPort,
      useClass: AuthorizationRelationalRepository,
    },
    {
      provide: AuthorizationUnitOfWork,
      useClass: AuthorizationRelationalUnitOfWork,
    },
    AuthorizationDomainService,
    AuthorizationsService,
  ],
  controllers: [AuthorizationsController],
  exports: [AuthorizationRepositoryPort, AuthorizationDomainService],
})
export class AuthorizationsModule {}
