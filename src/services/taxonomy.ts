import { readFileSync } from 'fs';
import path from 'path';
import { taxonomySchema, TaxonomyFile } from '../schemas/categorization';
import { CategoryTag, MatchRule, Taxonomy } from '../types/categorization';
import { PersistenceError, ValidationError } from '../types/errors';

export const DEFAULT_TAXONOMY_PATH = path.resolve(__dirname, '../../config/taxonomy.json');

export function compileTaxonomy(file: TaxonomyFile): Taxonomy {
  const taxonomy = new Map<CategoryTag, readonly MatchRule[]>();

  for (const [category, patterns] of Object.entries(file)) {
    const rules: MatchRule[] = [
      ...patterns.keywords.map(value => ({ kind: 'keyword' as const, value: value.toLowerCase() })),
      ...patterns.domains.map(value => ({ kind: 'domain' as const, value: value.toLowerCase() })),
      ...patterns.subjects.map(value => ({ kind: 'subject' as const, value: value.toLowerCase() }))
    ];
    taxonomy.set(category, Object.freeze(rules));
  }

  return taxonomy;
}

export function parseTaxonomy(input: unknown): Taxonomy {
  const result = taxonomySchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid taxonomy', result.error.errors);
  }
  return compileTaxonomy(result.data);
}

export function loadTaxonomy(filePath: string = DEFAULT_TAXONOMY_PATH): Taxonomy {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new PersistenceError(`cannot read taxonomy ${filePath}`, error instanceof Error ? error.message : error);
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Taxonomy ${filePath} is not valid JSON`, error instanceof Error ? error.message : error);
  }
  return parseTaxonomy(json);
}
