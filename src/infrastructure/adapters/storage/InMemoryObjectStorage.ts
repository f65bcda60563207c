import { ObjectStoragePort } from '../../../application/ports/ObjectStoragePort.js';
import { StatementUpload } from '../../../domain/entities/StatementUpload.js';

interface StoredObject {
  upload: StatementUpload;
  bytes: Buffer;
}

export class InMemoryObjectStorage implements ObjectStoragePort {
  private readonly objects = new Map<string, StoredObject>();

  async putFile(upload: StatementUpload, bytes: Buffer): Promise<void> {
    this.objects.set(upload.id, { upload: { ...upload, byteSize: bytes.length }, bytes: Buffer.from(bytes) });
  }

  async fetchFile(uploadId: string): Promise<Buffer> {
    const stored = this.objects.get(uploadId);
    if (!stored) {
      throw new Error(`Upload ${uploadId} not found`);
    }
    return Buffer.from(stored.bytes);
  }

  async describeUpload(uploadId: string): Promise<StatementUpload | null> {
    const stored = this.objects.get(uploadId);
    return stored ? { ...stored.upload } : null;
  }
}
