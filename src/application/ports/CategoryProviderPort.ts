import { Transaction } from '../../domain/entities/Transaction.js';

export interface CategorySuggestion {
  category: string;
  confidence: number;
  /** What the suggestion was read from. Description-based answers are not reused across transactions. */
  basis?: 'merchant' | 'description';
}

export interface CategoryProviderPort {
  readonly name: string;
  suggest(transaction: Transaction, context: { signal?: AbortSignal }): Promise<CategorySuggestion | null>;
}
