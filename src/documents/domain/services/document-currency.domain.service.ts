import { Injectable } from '@nestjs/common';
import { ProceduralDocumentRepositoryPort } from '../repositories/procedural-document.repository.port';
import { AcknowledgmentRepositoryPort } from '../repositories/acknowledgment.repository.port';
import { ProceduralDocument } from '../entities/procedural-document.entity';
import {
  DocumentCurrency,
  resolveCurrency,
} from '../utils/document-currency.util';
import { EntityNotFoundError } from '../../../utils/errors/compliance-errors';

/**
 * Document Currency Resolver
 *
 * Read-only. Answers whether a person's acknowledgment of a document covers
 * the version that is current right now.
 */
@Injectable()
export class DocumentCurrencyService {
  constructor(
    private readonly documentRepository: ProceduralDocumentRepositoryPort,
    private readonly acknowledgmentRepository: AcknowledgmentRepositoryPort,
  ) {}

  async isCurrent(personId: number, documentId: number): Promise<boolean> {
    return (await this.resolve(personId, documentId)).current;
  }

  async resolve(personId: number, documentId: number): Promise<DocumentCurrency> {
    const document = await this.documentRepository.findById(documentId);
    if (!document) {
      throw new EntityNotFoundError('Document', documentId);
    }
    return this.resolveFor(personId, document);
  }

  /**
   * Same as resolve() for a document the caller already loaded.
   */
  async resolveFor(
    personId: number,
    document: ProceduralDocument,
  ): Promise<DocumentCurrency> {
    const acknowledgments =
      await this.acknowledgmentRepository.findByPersonAndDocument(
        personId,
        document.id,
      );
    return resolveCurrency(document, acknowledgments);
  }
}
