import { Injectable } from '@nestjs/common';
import { ProceduralDocumentDomainService } from './domain/services/procedural-document.domain.service';
import { DocumentCurrencyService } from './domain/services/document-currency.domain.service';
import { AcknowledgmentResponseDto } from './dto/acknowledgment-response.dto';
import { DocumentCurrencyResponseDto } from './dto/document-currency-response.dto';
import { PersonActor } from '../auth/domain/actor';
import { RoleEnum } from '../roles/roles.enum';
import { UnauthorizedActionError } from '../utils/errors/compliance-errors';

/**
 * Documents Application Service
 *
 * Role rules for acting on someone else's behalf live here; the domain
 * services only know about records.
 */
@Injectable()
export class DocumentsService {
  constructor(
    private readonly documentService: ProceduralDocumentDomainService,
    private readonly currencyService: DocumentCurrencyService,
  ) {}

  async acknowledge(
    documentId: number,
    actor: PersonActor,
    personId?: number,
  ): Promise<AcknowledgmentResponseDto> {
    const subjectId = personId ?? actor.id;
    if (subjectId !== actor.id && actor.role !== RoleEnum.administrator) {
      throw new UnauthorizedActionError(
        'Only administrators may record acknowledgments for another person',
      );
    }

    const { acknowledgment, created } = await this.documentService.acknowledge(
      subjectId,
      documentId,
      actor,
    );
    return AcknowledgmentResponseDto.fromDomain(acknowledgment, created);
  }

  async currency(
    documentId: number,
    personId: number,
    actor: PersonActor,
  ): Promise<DocumentCurrencyResponseDto> {
    if (personId !== actor.id && actor.role === RoleEnum.member) {
      throw new UnauthorizedActionError(
        'Members may only check their own acknowledgments',
      );
    }
    const currency = await this.currencyService.resolve(personId, documentId);
    return DocumentCurrencyResponseDto.fromDomain(personId, currency);
  }
}
