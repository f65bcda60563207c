import Papa from 'papaparse';
import { ExtractionOptions, FormatExtractorPort } from '../../../application/ports/FormatExtractorPort.js';
import { RawRecord } from '../../../domain/entities/RawRecord.js';
import { CorruptInputError, SchemaNotFoundError } from '../../../domain/errors/AnalysisErrors.js';
import { isBlankRow, isRepeatedHeader, locateHeader, recordFromCells } from './TableHeaderLocator.js';

const decodeUtf8 = (fileBytes: Buffer): string => {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(fileBytes);
  } catch (error) {
    throw new CorruptInputError('CSV file is not valid UTF-8 text', {}, { cause: error });
  }
};

export class CsvFormatExtractor implements FormatExtractorPort {
  readonly format = 'csv' as const;

  async extract(fileBytes: Buffer, options: ExtractionOptions): Promise<RawRecord[]> {
    const text = decodeUtf8(fileBytes);
    const parsed = Papa.parse<string[]>(text, { skipEmptyLines: 'greedy' });

    // Delimiter and field-count warnings are tolerated; an unbalanced quote means the
    // rows after it can no longer be trusted.
    const quoteError = parsed.errors.find((error) => error.type === 'Quotes');
    if (quoteError) {
      throw new CorruptInputError(`Malformed CSV: ${quoteError.message}`, { row: quoteError.row });
    }

    const rows = parsed.data.map((row) => row.map((cell) => String(cell)));
    const header = locateHeader(rows, options.headerScanWindow);
    if (!header) {
      throw new SchemaNotFoundError(
        `No header row with date, description and amount columns in the first ${options.headerScanWindow} rows`,
        { scannedRows: Math.min(rows.length, options.headerScanWindow) },
      );
    }

    const records: RawRecord[] = [];
    for (let index = header.rowIndex + 1; index < rows.length; index += 1) {
      const cells = rows[index];
      if (isBlankRow(cells) || isRepeatedHeader(cells)) {
        continue;
      }
      records.push(recordFromCells(cells, header.layout, records.length));
    }

    return records;
  }
}
