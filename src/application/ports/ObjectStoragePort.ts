import { StatementUpload } from '../../domain/entities/StatementUpload.js';

export interface ObjectStoragePort {
  fetchFile(uploadId: string): Promise<Buffer>;
  describeUpload(uploadId: string): Promise<StatementUpload | null>;
}
