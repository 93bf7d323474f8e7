import { Module } from '@nestjs/common';
import { AutocheckService } from './autocheck.service';
import { AutocheckScheduler } from './autocheck.scheduler';
import { AutocheckController } from './autocheck.controller';
import { AuthorizationsModule } from '../authorizations/authorizations.module';
import { ComplianceModule } from '../compliance/compliance.module';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [AuthorizationsModule, ComplianceModule, AuditModule],
  providers: [AutocheckService, AutocheckScheduler],
  controllers: [AutocheckController],
  exports: [AutocheckService],
})
export class AutocheckModule {}
