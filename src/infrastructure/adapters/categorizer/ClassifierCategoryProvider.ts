import { CategoryProviderPort, CategorySuggestion } from '../../../application/ports/CategoryProviderPort.js';
import { ClassifierBackendPort } from '../../../application/ports/ClassifierBackendPort.js';
import { Transaction } from '../../../domain/entities/Transaction.js';

/** Adapts a learned classifier backend to the provider chain. Backend failures propagate. */
export class ClassifierCategoryProvider implements CategoryProviderPort {
  readonly name = 'classifier';

  constructor(private readonly backend: ClassifierBackendPort) {}

  async suggest(transaction: Transaction, context: { signal?: AbortSignal } = {}): Promise<CategorySuggestion | null> {
    const reply = await this.backend.classify(transaction.merchant, transaction.description, { signal: context.signal });
    return { category: reply.categoryLabel, confidence: reply.confidence };
  }
}
