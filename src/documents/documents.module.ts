import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ProceduralDocumentEntity } from './infrastructure/persistence/relational/entities/procedural-document.entity';
import { DocumentVersionEntity } from './infrastructure/persistence/relational/entities/document-version.entity';
import { AcknowledgmentEntity } from './infrastructure/persistence/relational/entities/acknowledgment.entity';
import { ProceduralDocumentRepositoryPort } from './domain/repositories/procedural-document.repository.port';
import { DocumentVersionRepositoryPort } from './domain/repositories/document-version.repository.port';
import { AcknowledgmentRepositoryPort } from './domain/repositories/acknowledgment.repository.port';
import { ProceduralDocumentRelationalRepository } from './infrastructure/persistence/relational/repositories/procedural-document.repository';
import { DocumentVersionRelationalRepository } from './infrastructure/persistence/relational/repositories/document-version.repository';
import { AcknowledgmentRelationalRepository } from './infrastructure/persistence/relational/repositories/acknowledgment.repository';
import { ProceduralDocumentDomainService } from './domain/services/procedural-document.domain.service';
import { DocumentCurrencyService } from './domain/services/document-currency.domain.service';
import { DocumentsService } from './documents.service';
import { DocumentsController } from './documents.controller';
import { FacilityDocumentsController } from './facility-documents.controller';
import { FacilitiesModule } from '../facilities/facilities.module';
import { PeopleModule } from '../people/people.module';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      ProceduralDocumentEntity,
      DocumentVersionEntity,
      AcknowledgmentEntity,
    ]),
    FacilitiesModule,
    PeopleModule,
    AuditModule,
  ],
  providers: [
    {
      provide: ProceduralDocumentRepositoryPort,
      useClass: ProceduralDocumentRelationalRepository,
    },
    {
      provide: DocumentVersionRepositoryPort,
      useClass: DocumentVersionRelationalRepository,
    },
    {
      provide: AcknowledgmentRepositoryPort,
      useClass: AcknowledgmentRelationalRepository,
    },
    ProceduralDocumentDomainService,
    DocumentCurrencyService,
    DocumentsService,
  ],
  controllers: [DocumentsController, FacilityDocumentsController],
  exports: [
    ProceduralDocumentRepositoryPort,
    AcknowledgmentRepositoryPort,
    DocumentCurrencyService,
    ProceduralDocumentDomainService,
  ],
})
export class DocumentsModule {}
