import { Module } from '@nestjs/common';
import { ReportsService } from './reports.service';
import { ReportsController } from './reports.controller';
import { AuthorizationsModule } from '../authorizations/authorizations.module';
import { ComplianceModule } from '../compliance/compliance.module';
import { TrainingModule } from '../training/training.module';
import { DocumentsModule } from '../documents/documents.module';
import { PeopleModule } from '../people/people.module';

@Module({
  imports: [
    AuthorizationsModule,
    ComplianceModule,
    TrainingModule,
    DocumentsModule,
    PeopleModule,
  ],
  providers: [ReportsService],
  controllers: [ReportsController],
})
export class ReportsModule {}
