import crypto from 'node:crypto';

export interface TransactionHashInput {
  statementId: string;
  rowIndex: number;
  postedDate: string;
  amount: number;
  currency: string;
  description: string;
}

// Row index is part of the key: two identical coffee purchases on one day are still two rows.
export const buildTransactionId = (input: TransactionHashInput): string => {
  const serialized = [
    input.statementId,
    String(input.rowIndex),
    input.postedDate,
    String(input.amount),
    input.currency.toUpperCase(),
    input.description.trim().toLowerCase(),
  ].join('|');

  return crypto.createHash('sha256').update(serialized).digest('hex').slice(0, 32);
};
