export const UNCATEGORIZED = 'Uncategorized';

export interface Category {
  label: string;
  merchantPatterns: RegExp[];
  keywordPatterns: RegExp[];
}

export interface Categorization {
  category: string;
  confidence: number;
  source: string;
}

/** Read-only category reference data. `Uncategorized` is always present. */
export class CategoryCatalog {
  readonly categories: readonly Category[];
  private readonly labels: ReadonlySet<string>;

  constructor(categories: readonly Category[]) {
    this.categories = categories.some((category) => category.label === UNCATEGORIZED)
      ? [...categories]
      : [...categories, { label: UNCATEGORIZED, merchantPatterns: [], keywordPatterns: [] }];
    this.labels = new Set(this.categories.map((category) => category.label));
  }

  has(label: string): boolean {
    return this.labels.has(label);
  }

  get size(): number {
    return this.categories.length;
  }
}
