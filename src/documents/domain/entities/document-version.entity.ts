export interface DocumentVersion {
  id: number;
  documentId: number;
  version: number;
  artifactKey: string | null;
  uploadedAt: Date;
  uploadedById: number | null;
}
