export type StatementFormat = 'pdf' | 'csv' | 'spreadsheet';

export interface StatementUpload {
  id: string;
  accountId: string;
  /** Format as declared by the uploader; only checked when a job extracts it. */
  format: string;
  byteSize: number;
  uploadedAt: string; // ISO timestamp
  fileName?: string;
}
