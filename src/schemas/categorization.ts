import { z } from 'zod';

const patternList = z.array(z.string().trim().min(1)).default([]);

export const categoryPatternsSchema = z.object({
  keywords: patternList,
  domains: patternList,
  subjects: patternList
});

export const taxonomySchema = z
  .record(z.string().trim().min(1), categoryPatternsSchema)
  .refine(categories => Object.keys(categories).length > 0, {
    message: 'Taxonomy must define at least one category'
  });

export type TaxonomyFile = z.infer<typeof taxonomySchema>;
