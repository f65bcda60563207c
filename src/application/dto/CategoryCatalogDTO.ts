import { z } from 'zod';

const isValidPattern = (pattern: string): boolean => {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
};

const PatternSchema = z.string().min(1).refine(isValidPattern, { message: 'Invalid regular expression' });

export const CategoryDefinitionSchema = z.object({
  label: z.string().min(1),
  merchantPatterns: z.array(PatternSchema).default([]),
  keywordPatterns: z.array(PatternSchema).default([]),
});

export const CategoryCatalogSchema = z.object({
  version: z.number().int().positive(),
  categories: z
    .array(CategoryDefinitionSchema)
    .min(1)
    .refine((categories) => new Set(categories.map((category) => category.label)).size === categories.length, {
      message: 'Category labels must be unique',
    }),
});

export type CategoryDefinitionDTO = z.infer<typeof CategoryDefinitionSchema>;
export type CategoryCatalogDTO = z.infer<typeof CategoryCatalogSchema>;
