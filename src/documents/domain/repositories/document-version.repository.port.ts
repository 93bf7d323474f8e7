import { DocumentVersion } from '../entities/document-version.entity';

export abstract class DocumentVersionRepositoryPort {
  abstract create(data: Omit<DocumentVersion, 'id'>): Promise<DocumentVersion>;

  /**
   * Ascending version
   */
  abstract findByDocument(documentId: number): Promise<DocumentVersion[]>;
}
