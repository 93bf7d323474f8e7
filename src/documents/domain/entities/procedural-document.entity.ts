/**
 * Domain entity for ProceduralDocument
 *
 * `currentVersion` only ever increases. Publishing a new version makes every
 * earlier acknowledgment insufficient without touching the acknowledgments.
 */
export interface ProceduralDocument {
  id: number;
  facilityId: number;
  title: string;
  mandatory: boolean;
  currentVersion: number;
  createdAt: Date;
}
