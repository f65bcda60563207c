import { RawRecord } from '../../domain/entities/RawRecord.js';
import { StatementFormat } from '../../domain/entities/StatementUpload.js';

export interface ExtractionOptions {
  headerScanWindow: number;
  signal?: AbortSignal;
}

export interface FormatExtractorPort {
  readonly format: StatementFormat;
  extract(fileBytes: Buffer, options: ExtractionOptions): Promise<RawRecord[]>;
}
