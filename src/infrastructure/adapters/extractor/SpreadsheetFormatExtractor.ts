import * as XLSX from 'xlsx';
import { ExtractionOptions, FormatExtractorPort } from '../../../application/ports/FormatExtractorPort.js';
import { RawRecord } from '../../../domain/entities/RawRecord.js';
import { CorruptInputError, SchemaNotFoundError } from '../../../domain/errors/AnalysisErrors.js';
import { isBlankRow, isRepeatedHeader, locateHeader, recordFromCells } from './TableHeaderLocator.js';

// .xlsx is a zip container, legacy .xls an OLE compound document.
const WORKBOOK_SIGNATURES: readonly Buffer[] = [
  Buffer.from([0x50, 0x4b, 0x03, 0x04]),
  Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]),
];

const hasWorkbookSignature = (fileBytes: Buffer): boolean =>
  WORKBOOK_SIGNATURES.some((signature) => fileBytes.subarray(0, signature.length).equals(signature));

const readWorkbook = (fileBytes: Buffer): XLSX.WorkBook => {
  if (!hasWorkbookSignature(fileBytes)) {
    throw new CorruptInputError('File is not an Excel workbook', { byteSize: fileBytes.length });
  }

  try {
    return XLSX.read(fileBytes, { type: 'buffer', cellDates: false });
  } catch (error) {
    throw new CorruptInputError('Workbook could not be opened', { byteSize: fileBytes.length }, { cause: error });
  }
};

/**
 * Reads every sheet in workbook order. Each sheet gets its own header scan; sheets without a
 * recognisable header (cover pages, summaries) are skipped.
 */
export class SpreadsheetFormatExtractor implements FormatExtractorPort {
  readonly format = 'spreadsheet' as const;

  async extract(fileBytes: Buffer, options: ExtractionOptions): Promise<RawRecord[]> {
    const workbook = readWorkbook(fileBytes);
    const records: RawRecord[] = [];
    let headerFound = false;

    for (const [sheetIndex, sheetName] of workbook.SheetNames.entries()) {
      const sheet = workbook.Sheets[sheetName];
      if (!sheet) {
        continue;
      }

      const rows = XLSX.utils
        .sheet_to_json<unknown[]>(sheet, { header: 1, raw: false, defval: '', blankrows: false, dateNF: 'yyyy-mm-dd' })
        .map((row) => row.map((cell) => (cell === null || cell === undefined ? '' : String(cell))));

      const header = locateHeader(rows, options.headerScanWindow);
      if (!header) {
        continue;
      }
      headerFound = true;

      for (let index = header.rowIndex + 1; index < rows.length; index += 1) {
        const cells = rows[index];
        if (isBlankRow(cells) || isRepeatedHeader(cells)) {
          continue;
        }
        records.push(recordFromCells(cells, header.layout, records.length, sheetIndex + 1));
      }
    }

    if (!headerFound) {
      throw new SchemaNotFoundError(
        `No sheet has a header row with date, description and amount columns in its first ${options.headerScanWindow} rows`,
        { sheets: workbook.SheetNames },
      );
    }

    return records;
  }
}
