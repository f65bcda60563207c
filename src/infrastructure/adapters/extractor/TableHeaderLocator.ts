import { ColumnRole, RawFields, RawRecord } from '../../../domain/entities/RawRecord.js';

const COLUMN_SYNONYMS: Record<ColumnRole, string[]> = {
  date: ['date', 'transaction date', 'trans date', 'posting date', 'posted date', 'post date', 'value date', 'booking date'],
  description: [
    'description',
    'transaction description',
    'details',
    'transaction details',
    'memo',
    'payee',
    'merchant',
    'narrative',
    'narration',
    'particulars',
    'name',
  ],
  amount: ['amount', 'transaction amount', 'amt', 'net amount'],
  debit: ['debit', 'debits', 'debit amount', 'withdrawal', 'withdrawals', 'money out', 'paid out', 'outflow'],
  credit: ['credit', 'credits', 'credit amount', 'deposit', 'deposits', 'money in', 'paid in', 'inflow'],
  balance: ['balance', 'running balance', 'closing balance', 'available balance'],
  currency: ['currency', 'ccy', 'currency code'],
  type: ['type', 'transaction type', 'dr/cr', 'cr/dr', 'debit/credit', 'credit/debit'],
};

const COLUMN_ROLES: readonly ColumnRole[] = ['date', 'description', 'amount', 'debit', 'credit', 'balance', 'currency', 'type'];

const ROLE_BY_SYNONYM = new Map<string, ColumnRole>(
  COLUMN_ROLES.flatMap((role) => COLUMN_SYNONYMS[role].map((synonym): [string, ColumnRole] => [synonym, role])),
);

const MAX_SYNONYM_WORDS = Math.max(...[...ROLE_BY_SYNONYM.keys()].map((synonym) => synonym.split(' ').length));

export const MONEY_ROLES: readonly ColumnRole[] = ['amount', 'debit', 'credit', 'balance'];

export interface ColumnLayout {
  /** Cell index of each recognised role. */
  columns: Partial<Record<ColumnRole, number>>;
  /** Recognised roles in the order they appear left to right. */
  order: ColumnRole[];
}

export const normalizeHeaderCell = (cell: string): string =>
  cell
    .toLowerCase()
    .replace(/\(.*?\)/g, ' ')
    .replace(/[^a-z0-9/ ]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

export const roleForHeader = (cell: string): ColumnRole | undefined => ROLE_BY_SYNONYM.get(normalizeHeaderCell(cell));

/**
 * A row is a header when it names a date, a description and either an amount column or a
 * debit/credit pair. The first cell claiming a role keeps it.
 */
export const matchHeaderRow = (cells: readonly string[]): ColumnLayout | null => {
  const columns: Partial<Record<ColumnRole, number>> = {};
  const order: ColumnRole[] = [];

  cells.forEach((cell, index) => {
    const role = roleForHeader(cell);
    if (role && columns[role] === undefined) {
      columns[role] = index;
      order.push(role);
    }
  });

  const hasAmount = columns.amount !== undefined || (columns.debit !== undefined && columns.credit !== undefined);
  if (columns.date === undefined || columns.description === undefined || !hasAmount) {
    return null;
  }

  return { columns, order };
};

/**
 * Splits a free-text header line (as found in PDF text) into cells, grouping words that form
 * a known multi-word column name.
 */
export const tokenizeHeaderText = (line: string): string[] => {
  const words = line.trim().split(/\s+/).filter(Boolean);
  const cells: string[] = [];

  for (let position = 0; position < words.length; ) {
    let matched = 1;
    for (let size = Math.min(MAX_SYNONYM_WORDS, words.length - position); size > 1; size -= 1) {
      const phrase = words.slice(position, position + size).join(' ');
      if (roleForHeader(phrase)) {
        matched = size;
        break;
      }
    }
    cells.push(words.slice(position, position + matched).join(' '));
    position += matched;
  }

  return cells;
};

export interface LocatedHeader {
  rowIndex: number;
  layout: ColumnLayout;
}

export const locateHeader = (rows: readonly string[][], scanWindow: number): LocatedHeader | null => {
  const limit = Math.min(rows.length, scanWindow);
  for (let rowIndex = 0; rowIndex < limit; rowIndex += 1) {
    const layout = matchHeaderRow(rows[rowIndex]);
    if (layout) {
      return { rowIndex, layout };
    }
  }
  return null;
};

export const isBlankRow = (cells: readonly string[]): boolean => cells.every((cell) => !cell.trim());

// Multi-page exports repeat the header on every page.
export const isRepeatedHeader = (cells: readonly string[]): boolean => matchHeaderRow(cells) !== null;

export const recordFromCells = (
  cells: readonly string[],
  layout: ColumnLayout,
  rowIndex: number,
  page?: number,
): RawRecord => {
  const fields: RawFields = {};
  for (const role of layout.order) {
    const index = layout.columns[role];
    const value = index === undefined ? undefined : cells[index]?.trim();
    if (value) {
      fields[role] = value;
    }
  }

  return { rowIndex, page, fields, cells: cells.map((cell) => cell.trim()) };
};
