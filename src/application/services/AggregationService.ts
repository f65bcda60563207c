import dayjs from 'dayjs';
import {
  CategoryTotal,
  CategoryTrend,
  MonthlyCashflow,
  StatementSummary,
} from '../../domain/entities/AnalysisResult.js';
import { UNCATEGORIZED } from '../../domain/entities/Category.js';
import { Transaction } from '../../domain/entities/Transaction.js';

const TOP_CATEGORY_COUNT = 3;

const byLabel = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const dominantCurrency = (transactions: readonly Transaction[], fallback: string): string => {
  const counts = new Map<string, number>();
  transactions.forEach((txn) => counts.set(txn.currency, (counts.get(txn.currency) ?? 0) + 1));

  let best = fallback;
  let bestCount = 0;
  for (const [currency, count] of [...counts.entries()].sort(([a], [b]) => byLabel(a, b))) {
    if (count > bestCount) {
      best = currency;
      bestCount = count;
    }
  }
  return best;
};

const byPosition = (a: Transaction, b: Transaction): number =>
  byLabel(a.postedDate, b.postedDate) || a.rowIndex - b.rowIndex || byLabel(a.id, b.id);

// Two decimals, computed on integers so 91.2 stays 91.2.
const percentOf = (part: number, whole: number): number =>
  whole > 0 ? Math.round((part * 10000) / whole) / 100 : 0;

/** Opening balance is the first printed balance with its own movement backed out. */
const balanceRange = (
  transactions: readonly Transaction[],
): { openingBalance: number | null; closingBalance: number | null } => {
  const withBalance = transactions.filter((txn) => txn.balance !== null).sort(byPosition);
  const first = withBalance[0];
  const last = withBalance[withBalance.length - 1];
  if (!first || first.balance === null || !last) {
    return { openingBalance: null, closingBalance: null };
  }
  return { openingBalance: first.balance - first.amount, closingBalance: last.balance };
};

/**
 * Folds categorized transactions into a statement summary. The result depends only on the set
 * of transactions, never their order, and the input is left untouched.
 */
export class AggregationService {
  constructor(private readonly defaultCurrency = 'USD') {}

  aggregate(transactions: readonly Transaction[], previous?: StatementSummary | null): StatementSummary {
    const totals = new Map<string, CategoryTotal>();
    const monthlyBuckets = new Map<string, { inflows: number; outflows: number }>();
    let totalIncome = 0;
    let totalExpenses = 0;
    let periodStart: string | null = null;
    let periodEnd: string | null = null;

    for (const txn of transactions) {
      const label = txn.category ?? UNCATEGORIZED;
      const total = totals.get(label) ?? { category: label, total: 0, spend: 0, count: 0 };
      total.total += txn.amount;
      total.count += 1;

      const monthKey = dayjs(txn.postedDate).format('YYYY-MM');
      const bucket = monthlyBuckets.get(monthKey) ?? { inflows: 0, outflows: 0 };

      if (txn.amount >= 0) {
        totalIncome += txn.amount;
        bucket.inflows += txn.amount;
      } else {
        total.spend += Math.abs(txn.amount);
        totalExpenses += Math.abs(txn.amount);
        bucket.outflows += Math.abs(txn.amount);
      }

      totals.set(label, total);
      monthlyBuckets.set(monthKey, bucket);

      if (periodStart === null || txn.postedDate < periodStart) {
        periodStart = txn.postedDate;
      }
      if (periodEnd === null || txn.postedDate > periodEnd) {
        periodEnd = txn.postedDate;
      }
    }

    const categories = [...totals.values()].sort((a, b) => byLabel(a.category, b.category));

    const topCategories = categories
      .filter((entry) => entry.spend > 0)
      .sort((a, b) => b.spend - a.spend || byLabel(a.category, b.category))
      .slice(0, TOP_CATEGORY_COUNT)
      .map((entry) => entry.category);

    const monthly: MonthlyCashflow[] = [...monthlyBuckets.entries()]
      .sort(([a], [b]) => byLabel(a, b))
      .map(([month, bucket]) => ({
        month,
        inflows: bucket.inflows,
        outflows: bucket.outflows,
        net: bucket.inflows - bucket.outflows,
      }));

    return {
      currency: dominantCurrency(transactions, previous?.currency ?? this.defaultCurrency),
      periodStart,
      periodEnd,
      transactionCount: transactions.length,
      totalIncome,
      totalExpenses,
      netCashflow: totalIncome - totalExpenses,
      ...balanceRange(transactions),
      savingsRate: percentOf(totalIncome - totalExpenses, totalIncome),
      expenseRatio: percentOf(totalExpenses, totalIncome),
      categories,
      topCategories,
      monthly,
      trends: previous ? this.buildTrends(categories, previous) : [],
    };
  }

  // Spend per category against the previous statement; categories present on either side appear.
  private buildTrends(current: readonly CategoryTotal[], previous: StatementSummary): CategoryTrend[] {
    const currentSpend = new Map(current.map((entry): [string, number] => [entry.category, entry.spend]));
    const previousSpend = new Map(
      previous.categories.map((entry): [string, number] => [entry.category, entry.spend]),
    );
    const labels = [...new Set([...currentSpend.keys(), ...previousSpend.keys()])].sort(byLabel);

    return labels.map((category) => {
      const now = currentSpend.get(category) ?? 0;
      const before = previousSpend.get(category) ?? 0;
      return { category, current: now, previous: before, delta: now - before };
    });
  }
}
