import { CategoryProviderPort, CategorySuggestion } from '../../../application/ports/CategoryProviderPort.js';
import { CategoryCatalog } from '../../../domain/entities/Category.js';
import { Transaction } from '../../../domain/entities/Transaction.js';

export interface RuleConfidence {
  merchant: number;
  keyword: number;
}

const DEFAULT_CONFIDENCE: RuleConfidence = { merchant: 0.95, keyword: 0.75 };

/**
 * Matches the catalog's hints: merchant patterns against the normalized merchant name, keyword
 * patterns against the raw description. A merchant hit in any category beats a keyword hit.
 */
export class RuleBasedCategorizer implements CategoryProviderPort {
  readonly name = 'rules';

  constructor(
    private readonly catalog: CategoryCatalog,
    private readonly confidence: RuleConfidence = DEFAULT_CONFIDENCE,
  ) {}

  async suggest(transaction: Transaction): Promise<CategorySuggestion | null> {
    const byMerchant = this.catalog.categories.find((category) =>
      category.merchantPatterns.some((pattern) => pattern.test(transaction.merchant)),
    );
    if (byMerchant) {
      return { category: byMerchant.label, confidence: this.confidence.merchant, basis: 'merchant' };
    }

    const byKeyword = this.catalog.categories.find((category) =>
      category.keywordPatterns.some((pattern) => pattern.test(transaction.description)),
    );
    if (byKeyword) {
      return { category: byKeyword.label, confidence: this.confidence.keyword, basis: 'description' };
    }

    return null;
  }
}
