import { Categorization, CategoryCatalog, UNCATEGORIZED } from '../../domain/entities/Category.js';
import { Transaction } from '../../domain/entities/Transaction.js';
import { Logger, componentLogger } from '../../infrastructure/logging/Logger.js';
import { CategoryProviderPort } from '../ports/CategoryProviderPort.js';
import { mapWithConcurrency } from '../support/concurrency.js';

export interface CategorizationSettings {
  /** A suggestion at or above this confidence ends the provider chain. */
  confidenceThreshold: number;
  /** Concurrent `categorize` calls per job. */
  concurrency: number;
  /** Merchants remembered at once; the least recently used one goes first. */
  cacheSize: number;
}

export const DEFAULT_CATEGORIZATION_SETTINGS: CategorizationSettings = {
  confidenceThreshold: 0.9,
  concurrency: 4,
  cacheSize: 5000,
};

const UNCATEGORIZED_RESULT: Categorization = { category: UNCATEGORIZED, confidence: 0, source: 'default' };

// The normalizer's placeholder for blank descriptions says nothing about the merchant.
const UNCACHEABLE_MERCHANTS: ReadonlySet<string> = new Set(['UNKNOWN']);

interface Decision {
  result: Categorization;
  reusable: boolean;
}

const clampConfidence = (value: number): number => Math.min(1, Math.max(0, value));

export class CategorizationEngine {
  private readonly cache = new Map<string, Categorization>();

  constructor(
    private readonly providers: readonly CategoryProviderPort[],
    private readonly catalog: CategoryCatalog,
    private readonly settings: CategorizationSettings = DEFAULT_CATEGORIZATION_SETTINGS,
    private readonly logger: Logger = componentLogger('CategorizationEngine'),
  ) {}

  /**
   * Queries providers in order. The first confident suggestion wins; otherwise the last valid
   * suggestion seen, and `Uncategorized` when nobody answered. Labels outside the catalog are
   * ignored. Provider errors are not caught here.
   */
  async categorize(transaction: Transaction, context: { signal?: AbortSignal } = {}): Promise<Categorization> {
    const cacheKey = transaction.merchant;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      this.cache.delete(cacheKey);
      this.cache.set(cacheKey, cached);
      return cached;
    }

    let decided: Decision | null = null;
    let fallback: Decision | null = null;

    for (const provider of this.providers) {
      context.signal?.throwIfAborted();
      const suggestion = await provider.suggest(transaction, context);
      if (!suggestion) {
        continue;
      }

      if (!this.catalog.has(suggestion.category)) {
        this.logger.debug(
          { provider: provider.name, category: suggestion.category, merchant: transaction.merchant },
          'ignoring suggestion outside the category catalog',
        );
        continue;
      }

      const candidate: Decision = {
        result: {
          category: suggestion.category,
          confidence: clampConfidence(suggestion.confidence),
          source: provider.name,
        },
        reusable: suggestion.basis !== 'description',
      };

      if (candidate.result.confidence >= this.settings.confidenceThreshold) {
        decided = candidate;
        break;
      }
      fallback = candidate;
    }

    const decision = decided ?? fallback;
    if (!decision) {
      return UNCATEGORIZED_RESULT;
    }
    if (decision.reusable && !UNCACHEABLE_MERCHANTS.has(cacheKey)) {
      this.remember(cacheKey, decision.result);
    }
    return decision.result;
  }

  // Map iteration order is insertion order, so the first key is the least recently used.
  private remember(key: string, result: Categorization): void {
    this.cache.set(key, result);
    if (this.cache.size <= this.settings.cacheSize) {
      return;
    }
    const oldest = this.cache.keys().next();
    if (!oldest.done) {
      this.cache.delete(oldest.value);
    }
  }

  /** Categorizes a batch with bounded parallelism; output keeps input order. */
  async categorizeAll(transactions: readonly Transaction[], context: { signal?: AbortSignal } = {}): Promise<Transaction[]> {
    return mapWithConcurrency(transactions, this.settings.concurrency, async (transaction) => {
      context.signal?.throwIfAborted();
      const result = await this.categorize(transaction, context);
      context.signal?.throwIfAborted();

      return {
        ...transaction,
        category: result.category,
        categoryConfidence: result.confidence,
        categorySource: result.source,
      };
    });
  }
}
