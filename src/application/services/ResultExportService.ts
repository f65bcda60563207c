import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { AnalysisResult } from '../../domain/entities/AnalysisResult.js';
import { AnalysisError } from '../../domain/errors/AnalysisErrors.js';
import { formatMinor } from '../../domain/services/AmountParser.js';

export type ExportFormat = 'csv' | 'xlsx' | 'json';

export interface ExportedFile {
  fileName: string;
  contentType: string;
  body: Buffer;
}

export class UnsupportedExportFormatError extends AnalysisError {
  readonly kind = 'UnsupportedFormatError';

  constructor(readonly requested: string) {
    super(`Unsupported export format "${requested}"`, { requested });
  }
}

const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'xlsx', 'json'];

export const parseExportFormat = (value: string): ExportFormat => {
  const normalized = value.trim().toLowerCase();
  const format = EXPORT_FORMATS.find((candidate) => candidate === normalized);
  if (!format) {
    throw new UnsupportedExportFormatError(value);
  }
  return format;
};

const TRANSACTION_COLUMNS = [
  'date',
  'description',
  'merchant',
  'amount',
  'currency',
  'category',
  'confidence',
  'source',
  'anomaly',
] as const;

type TransactionRow = Record<(typeof TRANSACTION_COLUMNS)[number], string>;

const transactionRows = (result: AnalysisResult): TransactionRow[] =>
  result.transactions.map((txn) => ({
    date: txn.postedDate,
    description: txn.description,
    merchant: txn.merchant,
    amount: formatMinor(txn.amount),
    currency: txn.currency,
    category: txn.category ?? '',
    confidence: txn.categoryConfidence.toFixed(2),
    source: txn.categorySource ?? '',
    anomaly: txn.isAnomaly ? 'yes' : 'no',
  }));

export class ResultExportService {
  exportResult(result: AnalysisResult, format: ExportFormat): ExportedFile {
    const baseName = `statement-${result.statementId}-${result.jobId}`;

    switch (format) {
      case 'csv':
        return { fileName: `${baseName}.csv`, contentType: 'text/csv; charset=utf-8', body: this.toCsv(result) };
      case 'xlsx':
        return {
          fileName: `${baseName}.xlsx`,
          contentType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
          body: this.toWorkbook(result),
        };
      case 'json':
        return {
          fileName: `${baseName}.json`,
          contentType: 'application/json; charset=utf-8',
          body: Buffer.from(JSON.stringify(result, null, 2), 'utf-8'),
        };
    }
  }

  private toCsv(result: AnalysisResult): Buffer {
    const rows = transactionRows(result);
    const csv = Papa.unparse({
      fields: [...TRANSACTION_COLUMNS],
      data: rows.map((row) => TRANSACTION_COLUMNS.map((column) => row[column])),
    });
    return Buffer.from(csv, 'utf-8');
  }

  /** Transactions, per-category totals and the headline figures, one sheet each. */
  private toWorkbook(result: AnalysisResult): Buffer {
    const { summary } = result;
    const workbook = XLSX.utils.book_new();

    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.json_to_sheet(transactionRows(result), { header: [...TRANSACTION_COLUMNS] }),
      'Transactions',
    );
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.json_to_sheet(
        summary.categories.map((entry) => ({
          category: entry.category,
          total: formatMinor(entry.total),
          spend: formatMinor(entry.spend),
          count: entry.count,
        })),
      ),
      'Categories',
    );
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ['metric', 'value'],
        ['currency', summary.currency],
        ['period start', summary.periodStart ?? ''],
        ['period end', summary.periodEnd ?? ''],
        ['transactions', summary.transactionCount],
        ['total income', formatMinor(summary.totalIncome)],
        ['total expenses', formatMinor(summary.totalExpenses)],
        ['net cashflow', formatMinor(summary.netCashflow)],
        ['opening balance', summary.openingBalance === null ? '' : formatMinor(summary.openingBalance)],
        ['closing balance', summary.closingBalance === null ? '' : formatMinor(summary.closingBalance)],
        ['savings rate %', summary.savingsRate],
        ['expense ratio %', summary.expenseRatio],
        ['top categories', summary.topCategories.join(', ')],
        ['anomalies', result.anomalies.length],
        ['unparsable records', result.unparsableRecords],
      ]),
      'Summary',
    );

    const written: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    return written;
  }
}
