import { z } from 'zod';

const affirmative = z
  .string()
  .default('')
  .transform(value => value.trim().toLowerCase() === 'yes');

export const selectionRowSchema = z
  .object({
    'Domain': z.string().trim().min(1, 'Domain is empty'),
    'Token': z.string().trim().default(''),
    'Unsubscribe URL': z.string().trim().default(''),
    'Delete': affirmative,
    'List-Unsubscribe': affirmative
  })
  .refine(row => !(row['Delete'] && row['List-Unsubscribe']) || row['Token'].length > 0, {
    message: 'Token is required for rows selected for unsubscribe',
    path: ['Token']
  });

export const REQUIRED_SELECTION_COLUMNS = ['Domain', 'Token', 'Delete', 'List-Unsubscribe'] as const;

export const MAX_SELECTION_CSV_LENGTH = 5_000_000;

// A JSON string spends at most six bytes per character (`\u0000` escapes)
export const UNSUBSCRIBE_BODY_LIMIT = MAX_SELECTION_CSV_LENGTH * 6 + 1024;

export const unsubscribeRequestSchema = z.object({
  csv: z.string().min(1).max(MAX_SELECTION_CSV_LENGTH)
});
