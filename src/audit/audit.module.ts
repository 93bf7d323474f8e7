import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditEntryEntity } from './infrastructure/persistence/relational/entities/audit-entry.entity';
import { AuditEntryRepositoryPort } from './domain/repositories/audit-entry.repository.port';
import { AuditEntryRelationalRepository } from './infrastructure/persistence/relational/repositories/audit-entry.repository';
import { AuditService } from './audit.service';
import { AuditQueryService } from './audit-query.service';
import { AuditController } from './audit.controller';

@Module({
  imports: [TypeOrmModule.forFeature([AuditEntryEntity])],
  providers: [
    {
      provide: AuditEntryRepositoryPort,
      useClass: AuditEntryRelationalRepository,
    },
    AuditService,
    AuditQueryService,
  ],
  controllers: [AuditController],
  exports: [AuditService],
})
export class AuditModule {}
