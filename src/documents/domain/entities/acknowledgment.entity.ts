export interface Acknowledgment {
  id: number;
  personId: number;
  documentId: number;
  version: number;
  acknowledgedAt: Date;
}
