import fs from 'node:fs';
import { CategoryCatalogDTO, CategoryCatalogSchema } from '../../../application/dto/CategoryCatalogDTO.js';
import { CategoryCatalog } from '../../../domain/entities/Category.js';

export const DEFAULT_CATALOG_PATH = new URL('../../../../data/categories.json', import.meta.url);

export const buildCategoryCatalog = (dto: CategoryCatalogDTO): CategoryCatalog =>
  new CategoryCatalog(
    dto.categories.map((definition) => ({
      label: definition.label,
      merchantPatterns: definition.merchantPatterns.map((pattern) => new RegExp(pattern, 'i')),
      keywordPatterns: definition.keywordPatterns.map((pattern) => new RegExp(pattern, 'i')),
    })),
  );

export const loadCategoryCatalog = (path: string | URL = DEFAULT_CATALOG_PATH): CategoryCatalog => {
  const raw: unknown = JSON.parse(fs.readFileSync(path, 'utf8'));
  const parsed = CategoryCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid category catalog at ${String(path)}: ${parsed.error.message}`);
  }
  return buildCategoryCatalog(parsed.data);
};
