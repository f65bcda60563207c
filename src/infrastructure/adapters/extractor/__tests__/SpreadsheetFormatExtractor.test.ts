import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import * as XLSX from 'xlsx';

import { CorruptInputError, SchemaNotFoundError } from '../../../../domain/errors/AnalysisErrors.js';
import { SpreadsheetFormatExtractor } from '../SpreadsheetFormatExtractor.js';

const extractor = new SpreadsheetFormatExtractor();
const options = { headerScanWindow: 25 };

const workbookBytes = (sheets: Record<string, string[][]>): Buffer => {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  return Buffer.from(XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));
};

describe('SpreadsheetFormatExtractor', () => {
  it('skips sheets without a header and numbers rows across the workbook', async () => {
    const bytes = workbookBytes({
      Summary: [
        ['Account summary'],
        ['Closing balance', '100.00'],
      ],
      Transactions: [
        ['Statement', '', ''],
        ['Date', 'Description', 'Amount'],
        ['2024-02-01', 'TRAIN TICKET', '-12.30'],
        ['2024-02-02', 'SALARY', '2500.00'],
      ],
    });

    const records = await extractor.extract(bytes, options);

    assert.deepEqual(
      records.map((record) => ({ rowIndex: record.rowIndex, page: record.page, fields: record.fields })),
      [
        { rowIndex: 0, page: 2, fields: { date: '2024-02-01', description: 'TRAIN TICKET', amount: '-12.30' } },
        { rowIndex: 1, page: 2, fields: { date: '2024-02-02', description: 'SALARY', amount: '2500.00' } },
      ],
    );
  });

  it('fails with SchemaNotFoundError when no sheet has a header', async () => {
    const bytes = workbookBytes({ Sheet1: [['Name', 'Value'], ['a', '1']] });
    await assert.rejects(extractor.extract(bytes, options), SchemaNotFoundError);
  });

  it('rejects files that are not workbooks', async () => {
    await assert.rejects(extractor.extract(Buffer.from('Date,Description,Amount\n'), options), CorruptInputError);
  });
});
