import { AnomalyFinding } from '../../domain/entities/AnalysisResult.js';
import { UNCATEGORIZED } from '../../domain/entities/Category.js';
import { Transaction } from '../../domain/entities/Transaction.js';

export interface AnomalySettings {
  /** Flag when |amount| > mean + multiplier * stddev. */
  stddevMultiplier: number;
  /** Minor units a never-seen merchant must exceed on its first appearance. */
  newMerchantThreshold: number;
  /** Categories with fewer baseline samples are never flagged. */
  minimumSamples: number;
}

export const DEFAULT_ANOMALY_SETTINGS: AnomalySettings = {
  stddevMultiplier: 3,
  newMerchantThreshold: 100_000,
  minimumSamples: 3,
};

interface CategoryStats {
  count: number;
  mean: number;
  stddev: number;
}

const categoryOf = (transaction: Transaction): string => transaction.category ?? UNCATEGORIZED;

const buildStats = (baseline: readonly Transaction[]): Map<string, CategoryStats> => {
  const samples = new Map<string, number[]>();
  for (const transaction of baseline) {
    const key = categoryOf(transaction);
    const values = samples.get(key) ?? [];
    values.push(Math.abs(transaction.amount));
    samples.set(key, values);
  }

  const stats = new Map<string, CategoryStats>();
  for (const [category, values] of samples) {
    const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
    const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
    stats.set(category, { count: values.length, mean, stddev: Math.sqrt(variance) });
  }
  return stats;
};

export class AnomalyDetectionService {
  constructor(private readonly settings: AnomalySettings = DEFAULT_ANOMALY_SETTINGS) {}

  /**
   * The baseline is the account's history, or the batch itself for a first statement. The
   * new-merchant rule needs a history to compare against.
   */
  detect(transactions: readonly Transaction[], history: readonly Transaction[]): AnomalyFinding[] {
    const baseline = history.length ? history : transactions;
    const stats = buildStats(baseline);
    const knownMerchants = new Set(history.map((transaction) => transaction.merchant));
    const seenInBatch = new Set<string>();
    const findings: AnomalyFinding[] = [];

    for (const transaction of transactions) {
      const firstNewOccurrence =
        history.length > 0 && !knownMerchants.has(transaction.merchant) && !seenInBatch.has(transaction.merchant);
      seenInBatch.add(transaction.merchant);

      const category = categoryOf(transaction);
      const categoryStats = stats.get(category);
      if (!categoryStats || categoryStats.count < this.settings.minimumSamples) {
        continue;
      }

      const magnitude = Math.abs(transaction.amount);
      const outlierThreshold = categoryStats.mean + this.settings.stddevMultiplier * categoryStats.stddev;

      if (magnitude > outlierThreshold) {
        findings.push({
          transactionId: transaction.id,
          category,
          reason: 'STATISTICAL_OUTLIER',
          amount: transaction.amount,
          threshold: outlierThreshold,
        });
      } else if (firstNewOccurrence && magnitude > this.settings.newMerchantThreshold) {
        findings.push({
          transactionId: transaction.id,
          category,
          reason: 'NEW_MERCHANT',
          amount: transaction.amount,
          threshold: this.settings.newMerchantThreshold,
        });
      }
    }

    return findings;
  }

  detectAnomalies(transactions: readonly Transaction[], history: readonly Transaction[]): Set<string> {
    return new Set(this.detect(transactions, history).map((finding) => finding.transactionId));
  }

  /** Copies of `transactions` with the anomaly flag set on every one of them. */
  markAnomalies(transactions: readonly Transaction[], findings: readonly AnomalyFinding[]): Transaction[] {
    const flagged = new Set(findings.map((finding) => finding.transactionId));
    return transactions.map((transaction) => ({ ...transaction, isAnomaly: flagged.has(transaction.id) }));
  }
}
