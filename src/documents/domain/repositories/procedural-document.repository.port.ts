import { NullableType } from '../../../utils/types/nullable.type';
import { ProceduralDocument } from '../entities/procedural-document.entity';

export abstract class ProceduralDocumentRepositoryPort {
  abstract findById(id: number): Promise<NullableType<ProceduralDocument>>;

  /**
   * Documents of a facility, ascending id
   */
  abstract findByFacility(
    facilityId: number,
    options?: { mandatoryOnly?: boolean },
  ): Promise<ProceduralDocument[]>;

  abstract create(
    data: Omit<ProceduralDocument, 'id' | 'createdAt'>,
  ): Promise<ProceduralDocument>;

  /**
   * Raise currentVersion from `expected` to `expected + 1`. Returns null when
   * another upload won the race.
   */
  abstract bumpVersion(
    id: number,
    expected: number,
  ): Promise<NullableType<ProceduralDocument>>;
}
