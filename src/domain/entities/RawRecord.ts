export type ColumnRole = 'date' | 'description' | 'amount' | 'debit' | 'credit' | 'balance' | 'currency' | 'type';

export type RawFields = Partial<Record<ColumnRole, string>>;

/**
 * A table row exactly as the extractor found it. `fields` holds the verbatim text of every
 * recognised column; `cells` keeps the whole row for diagnostics.
 */
export interface RawRecord {
  rowIndex: number;
  page?: number;
  fields: RawFields;
  cells: string[];
}
