import { ProceduralDocument } from '../entities/procedural-document.entity';
import { Acknowledgment } from '../entities/acknowledgment.entity';

export interface DocumentCurrency {
  documentId: number;
  requiredVersion: number;
  acknowledgedVersion: number | null;
  current: boolean;
}

/**
 * Currency is computed, never stored: a person is current on a document iff
 * their latest acknowledged version equals the document's current version.
 */
export function resolveCurrency(
  document: Pick<ProceduralDocument, 'id' | 'currentVersion'>,
  acknowledgments: ReadonlyArray<Pick<Acknowledgment, 'documentId' | 'version'>>,
): DocumentCurrency {
  let acknowledgedVersion: number | null = null;
  for (const ack of acknowledgments) {
    if (ack.documentId !== document.id) continue;
    if (acknowledgedVersion === null || ack.version > acknowledgedVersion) {
      acknowledgedVersion = ack.version;
    }
  }

  return {
    documentId: document.id,
    requiredVersion: document.currentVersion,
    acknowledgedVersion,
    current: acknowledgedVersion === document.currentVersion,
  };
}
