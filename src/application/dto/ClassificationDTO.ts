import { z } from 'zod';

export const ClassificationSchema = z.object({
  categoryLabel: z.string().min(1),
  confidence: z.number().min(0).max(1),
});

export type ClassificationDTO = z.infer<typeof ClassificationSchema>;
