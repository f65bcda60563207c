export interface Transaction {
  id: string;
  statementId: string;
  accountId: string;
  postedDate: string; // ISO date
  amount: number; // signed minor units, debit negative
  currency: string;
  merchant: string;
  description: string;
  rowIndex: number;
  balance: number | null; // running balance after this row, when the statement prints one
  category: string | null;
  categoryConfidence: number;
  categorySource: string | null;
  isAnomaly: boolean | null;
}
