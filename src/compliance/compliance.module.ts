import { Module } from '@nestjs/common';
import { RequirementCatalogService } from './domain/services/requirement-catalog.domain.service';
import { QualificationEvaluator } from './domain/services/qualification-evaluator';
import { ComplianceEvaluationService } from './domain/services/compliance-evaluation.domain.service';
import { ComplianceSettingsService } from './domain/services/compliance-settings.service';
import { ComplianceController } from './compliance.controller';
import { PeopleModule } from '../people/people.module';
import { TrainingModule } from '../training/training.module';
import { FacilitiesModule } from '../facilities/facilities.module';
import { DocumentsModule } from '../documents/documents.module';

@Module({
  imports: [PeopleModule, TrainingModule, FacilitiesModule, DocumentsModule],
  providers: [
    RequirementCatalogService,
    QualificationEvaluator,
    ComplianceEvaluationService,
    ComplianceSettingsService,
  ],
  controllers: [ComplianceController],
  exports: [
    RequirementCatalogService,
    ComplianceEvaluationService,
    ComplianceSettingsService,
  ],
})
export class ComplianceModule {}
