import { Transaction } from './Transaction.js';

export interface CategoryTotal {
  category: string;
  total: number; // signed minor units
  spend: number; // sum of |debits|
  count: number;
}

export interface MonthlyCashflow {
  month: string; // YYYY-MM
  inflows: number;
  outflows: number;
  net: number;
}

export interface CategoryTrend {
  category: string;
  current: number;
  previous: number;
  delta: number;
}

export interface StatementSummary {
  currency: string;
  periodStart: string | null;
  periodEnd: string | null;
  transactionCount: number;
  totalIncome: number;
  totalExpenses: number;
  netCashflow: number;
  openingBalance: number | null;
  closingBalance: number | null;
  savingsRate: number; // net cashflow as a percentage of income
  expenseRatio: number; // expenses as a percentage of income
  categories: CategoryTotal[];
  topCategories: string[];
  monthly: MonthlyCashflow[];
  trends: CategoryTrend[];
}

export type AnomalyReason = 'STATISTICAL_OUTLIER' | 'NEW_MERCHANT';

export interface AnomalyFinding {
  transactionId: string;
  category: string;
  reason: AnomalyReason;
  amount: number;
  threshold: number;
}

export interface AnalysisResult {
  jobId: string;
  statementId: string;
  accountId: string;
  transactions: Transaction[];
  summary: StatementSummary;
  anomalies: string[];
  anomalyFindings: AnomalyFinding[];
  unparsableRecords: number;
  processingTimeMs: number;
  createdAt: string;
}
