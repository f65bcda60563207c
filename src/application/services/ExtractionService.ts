import { RawRecord } from '../../domain/entities/RawRecord.js';
import { StatementFormat } from '../../domain/entities/StatementUpload.js';
import { UnsupportedFormatError } from '../../domain/errors/AnalysisErrors.js';
import { Logger, componentLogger } from '../../infrastructure/logging/Logger.js';
import { FormatExtractorPort } from '../ports/FormatExtractorPort.js';

const FORMAT_ALIASES: ReadonlyMap<string, StatementFormat> = new Map<string, StatementFormat>([
  ['pdf', 'pdf'],
  ['csv', 'csv'],
  ['spreadsheet', 'spreadsheet'],
  ['xlsx', 'spreadsheet'],
  ['xls', 'spreadsheet'],
]);

export const parseStatementFormat = (declaredFormat: string): StatementFormat => {
  const format = FORMAT_ALIASES.get(declaredFormat.trim().toLowerCase());
  if (!format) {
    throw new UnsupportedFormatError(declaredFormat);
  }
  return format;
};

export interface ExtractOptions {
  headerScanWindow: number;
  signal?: AbortSignal;
}

/**
 * Dispatches to the extractor registered for the declared format. Every format must have a
 * strategy; registering two for the same format is a wiring error.
 */
export class ExtractionService {
  private readonly extractors: Record<StatementFormat, FormatExtractorPort>;

  constructor(
    extractors: readonly FormatExtractorPort[],
    private readonly logger: Logger = componentLogger('ExtractionService'),
  ) {
    const byFormat = new Map<StatementFormat, FormatExtractorPort>();
    for (const extractor of extractors) {
      if (byFormat.has(extractor.format)) {
        throw new Error(`Duplicate extractor registered for format "${extractor.format}"`);
      }
      byFormat.set(extractor.format, extractor);
    }

    const lookup = (format: StatementFormat): FormatExtractorPort => {
      const extractor = byFormat.get(format);
      if (!extractor) {
        throw new Error(`No extractor registered for format "${format}"`);
      }
      return extractor;
    };

    this.extractors = { pdf: lookup('pdf'), csv: lookup('csv'), spreadsheet: lookup('spreadsheet') };
  }

  async extract(fileBytes: Buffer, declaredFormat: string, options: ExtractOptions): Promise<RawRecord[]> {
    const format = parseStatementFormat(declaredFormat);
    const records = await this.extractors[format].extract(fileBytes, options);

    this.logger.debug({ format, byteSize: fileBytes.length, records: records.length }, 'statement extracted');
    return records;
  }
}
