import { CategoryCatalog } from '../domain/entities/Category.js';
import { Transaction } from '../domain/entities/Transaction.js';

export const makeTransaction = (overrides: Partial<Transaction> = {}): Transaction => ({
  id: 'txn-1',
  statementId: 'stmt-1',
  accountId: 'acct-1',
  postedDate: '2024-01-01',
  amount: -1000,
  currency: 'USD',
  merchant: 'TEST MERCHANT',
  description: 'TEST MERCHANT',
  rowIndex: 0,
  balance: null,
  category: null,
  categoryConfidence: 0,
  categorySource: null,
  isAnomaly: null,
  ...overrides,
});

export const testCatalog = (): CategoryCatalog =>
  new CategoryCatalog([
    { label: 'Food & Dining', merchantPatterns: [/\bstarbucks\b/i], keywordPatterns: [/\bcoffee\b/i] },
    { label: 'Shopping', merchantPatterns: [/\bamazon\b/i], keywordPatterns: [/\bstore\b/i] },
    { label: 'Transportation', merchantPatterns: [/\buber\b/i], keywordPatterns: [/\bparking\b/i] },
  ]);
