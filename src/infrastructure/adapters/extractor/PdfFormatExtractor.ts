import { PDFParse } from 'pdf-parse';
import { ExtractionOptions, FormatExtractorPort } from '../../../application/ports/FormatExtractorPort.js';
import { ColumnRole, RawFields, RawRecord } from '../../../domain/entities/RawRecord.js';
import { CorruptInputError, SchemaNotFoundError } from '../../../domain/errors/AnalysisErrors.js';
import { parseAmount } from '../../../domain/services/AmountParser.js';
import { ColumnLayout, MONEY_ROLES, isRepeatedHeader, matchHeaderRow, tokenizeHeaderText } from './TableHeaderLocator.js';

/** Text of each page, in page order. */
export interface PdfTextSource {
  readPages(fileBytes: Buffer): Promise<string[]>;
}

export const pdfParseTextSource: PdfTextSource = {
  async readPages(fileBytes) {
    const parser = new PDFParse({ data: fileBytes });
    try {
      const result = await parser.getText();
      return result.pages.map((page) => page.text);
    } finally {
      await parser.destroy();
    }
  },
};

const PDF_MAGIC = '%PDF-';

const MONTH_NAME = '(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\\.?';
const LEADING_DATE = new RegExp(
  [
    '^(\\d{4}-\\d{2}-\\d{2}',
    `|\\d{1,2}[/.-]\\d{1,2}(?:[/.-]\\d{2,4})?`,
    `|\\d{1,2}[ -]${MONTH_NAME}(?:[ -]\\d{2,4})?`,
    `|${MONTH_NAME} \\d{1,2}(?:, ?\\d{4})?)`,
    '\\s+(.+)$',
  ].join(''),
  'i',
);

// Money in statement text always carries two decimals, which keeps reference numbers and
// store ids at the end of a description from being read as amounts.
const TRAILING_MONEY = /\s+(\(?[-+]?[$£€]?(?:\d{1,3}(?:[,.']\d{3})+|\d+)[.,]\d{2}\)?-?(?:\s?(?:CR|DR))?)$/i;

const PAGE_FURNITURE: readonly RegExp[] = [
  /^page\s+\d+(\s+of\s+\d+)?$/i,
  /^\d+\s+of\s+\d+$/i,
  /^(opening|closing|previous|new|beginning|ending)\s+balance\b/i,
  /^balance\s+(brought|carried)\s+forward\b/i,
  /^(total|subtotal|totals)\b/i,
  /^statement\s+(period|date)\b/i,
  /^account\s+(number|summary|statement)\b/i,
  /^continued\s+(on|from)\b/i,
];

const isPageFurniture = (line: string): boolean => PAGE_FURNITURE.some((pattern) => pattern.test(line));

interface ParsedLine {
  date: string;
  description: string;
  moneyTokens: string[];
}

const splitTransactionLine = (line: string): ParsedLine | null => {
  const dateMatch = line.match(LEADING_DATE);
  if (!dateMatch) {
    return null;
  }

  let rest = dateMatch[2];
  const moneyTokens: string[] = [];
  for (let moneyMatch = rest.match(TRAILING_MONEY); moneyMatch; moneyMatch = rest.match(TRAILING_MONEY)) {
    moneyTokens.unshift(moneyMatch[1]);
    rest = rest.slice(0, moneyMatch.index);
  }

  const description = rest.trim();
  if (!moneyTokens.length || !description) {
    return null;
  }

  return { date: dateMatch[1], description, moneyTokens };
};

const carriesSign = (token: string): boolean => /^\(|^[-+]|-$|\b(CR|DR)$/i.test(token.trim());

/**
 * Decides which money columns a line's amounts belong to. Text extraction drops empty cells,
 * so a debit/credit/balance table usually yields two amounts per line; the movement side is
 * then read from the explicit sign, or from the running balance when there is none.
 */
const assignMoneyColumns = (
  tokens: readonly string[],
  moneyRoles: readonly ColumnRole[],
  previousBalance: number | null,
): RawFields => {
  const fields: RawFields = {};

  if (tokens.length >= moneyRoles.length) {
    const offset = tokens.length - moneyRoles.length;
    moneyRoles.forEach((role, index) => {
      fields[role] = tokens[offset + index];
    });
    return fields;
  }

  let movements = [...tokens];
  if (moneyRoles.includes('balance') && tokens.length >= 2) {
    fields.balance = tokens[tokens.length - 1];
    movements = tokens.slice(0, -1);
  }

  const [movement] = movements;
  if (movement === undefined) {
    return fields;
  }

  if (moneyRoles.includes('amount') || carriesSign(movement)) {
    fields.amount = movement;
    return fields;
  }

  const balance = fields.balance === undefined ? null : parseAmount(fields.balance);
  const isCredit = balance !== null && previousBalance !== null && balance.minor > previousBalance;
  fields[isCredit ? 'credit' : 'debit'] = movement;
  return fields;
};

export class PdfFormatExtractor implements FormatExtractorPort {
  readonly format = 'pdf' as const;

  constructor(private readonly textSource: PdfTextSource = pdfParseTextSource) {}

  async extract(fileBytes: Buffer, options: ExtractionOptions): Promise<RawRecord[]> {
    if (!fileBytes.subarray(0, 1024).includes(PDF_MAGIC)) {
      throw new CorruptInputError('File is not a PDF document', { byteSize: fileBytes.length });
    }

    let pages: string[];
    try {
      pages = await this.textSource.readPages(fileBytes);
    } catch (error) {
      throw new CorruptInputError(
        `Failed to read PDF text: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { byteSize: fileBytes.length },
        { cause: error },
      );
    }

    return this.parsePages(pages, options.headerScanWindow);
  }

  parsePages(pages: readonly string[], headerScanWindow: number): RawRecord[] {
    const records: RawRecord[] = [];
    let layout: ColumnLayout | null = null;
    let previousBalance: number | null = null;

    for (const [pageIndex, pageText] of pages.entries()) {
      const lines = pageText
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter(Boolean);
      // Page headers above the table never continue the last row of the previous page.
      let current: RawRecord | null = null;

      for (const [lineIndex, line] of lines.entries()) {
        if (!layout) {
          if (lineIndex < headerScanWindow) {
            layout = matchHeaderRow(tokenizeHeaderText(line));
          }
          continue;
        }

        if (isRepeatedHeader(tokenizeHeaderText(line)) || isPageFurniture(line)) {
          current = null;
          continue;
        }

        const parsed = splitTransactionLine(line);
        if (!parsed) {
          if (current) {
            current.fields.description = `${current.fields.description ?? ''} ${line}`.trim();
            current.cells.push(line);
          }
          continue;
        }

        const moneyRoles = layout.order.filter((role) => MONEY_ROLES.includes(role));
        const fields: RawFields = {
          date: parsed.date,
          description: parsed.description,
          ...assignMoneyColumns(parsed.moneyTokens, moneyRoles, previousBalance),
        };

        if (fields.balance !== undefined) {
          previousBalance = parseAmount(fields.balance)?.minor ?? previousBalance;
        }

        current = {
          rowIndex: records.length,
          page: pageIndex + 1,
          fields,
          cells: [parsed.date, parsed.description, ...parsed.moneyTokens],
        };
        records.push(current);
      }
    }

    if (!layout) {
      throw new SchemaNotFoundError(
        `No transaction table header found in the first ${headerScanWindow} lines of any page`,
        { pages: pages.length },
      );
    }

    return records;
  }
}
