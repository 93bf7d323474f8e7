import { NullableType } from '../../../utils/types/nullable.type';
import { Acknowledgment } from '../entities/acknowledgment.entity';

export abstract class AcknowledgmentRepositoryPort {
  abstract findOne(
    personId: number,
    documentId: number,
    version: number,
  ): Promise<NullableType<Acknowledgment>>;

  /**
   * Every acknowledgment by the person of the document, ascending version
   */
  abstract findByPersonAndDocument(
    personId: number,
    documentId: number,
  ): Promise<Acknowledgment[]>;

  /**
   * Every acknowledgment, newest first
   */
  abstract findAll(): Promise<Acknowledgment[]>;

  abstract create(data: Omit<Acknowledgment, 'id'>): Promise<Acknowledgment>;
}
