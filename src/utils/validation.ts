import { z } from 'zod';
import { NameMatchPolicy } from '../types/categorization';
import { UnsubscribeExecutorConfig } from '../types/unsubscribe';

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(val => val === 'true' || val === '1' || val === 'yes');

// Environment variables validation schema
export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.string().transform(val => parseInt(val, 10)).default('3000'),

    // Logging
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

    // Mailbox
    IMAP_HOST: z.string().min(1).default('imap.gmail.com'),
    IMAP_PORT: z.coerce.number().int().min(1).max(65535).default(993),
    IMAP_TLS: booleanString.default('true'),
    IMAP_USER: z.string().min(1),
    IMAP_PASSWORD: z.string().min(1),

    // Scan
    SCAN_NAME: z.string().default(''),
    NAME_MATCH: z.enum(['substring', 'word']).default('substring'),
    SCAN_MONTHS: z.coerce.number().int().min(1).max(120).default(12),
    TAXONOMY_PATH: z.string().min(1).optional(),

    // Unsubscribe
    UNSUBSCRIBE_LOOKBACK_DAYS: z.coerce.number().int().min(1).max(365).default(30),
    UNSUBSCRIBE_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(15000),
    UNSUBSCRIBE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    UNSUBSCRIBE_BACKOFF_MS: z.coerce.number().int().min(0).max(60000).default(1000),

    // Deduplication store
    DEDUP_BACKEND: z.enum(['file', 'redis']).default('file'),
    SCANNED_IDS_PATH: z.string().min(1).default('previously_scanned.txt'),
    DEDUP_PERSIST_BATCH_SIZE: z.coerce.number().int().min(0).default(0),
    REDIS_URL: z.string().url().optional(),

    OUTPUT_DIR: z.string().min(1).default('output')
  })
  .refine(env => env.DEDUP_BACKEND !== 'redis' || env.REDIS_URL !== undefined, {
    message: 'REDIS_URL is required when DEDUP_BACKEND is redis',
    path: ['REDIS_URL']
  });

export type Environment = z.infer<typeof envSchema>;

export interface ImapSettings {
  readonly host: string;
  readonly port: number;
  readonly tls: boolean;
  readonly user: string;
  readonly password: string;
}

export interface ScanSettings {
  readonly name: string;
  readonly nameMatch: NameMatchPolicy;
  readonly months: number;
  readonly persistBatchSize: number;
  readonly taxonomyPath?: string;
}

export type DedupSettings =
  | { readonly backend: 'file'; readonly path: string }
  | { readonly backend: 'redis'; readonly redisUrl: string };

export interface SweeperConfig {
  readonly env: Environment['NODE_ENV'];
  readonly port: number;
  readonly imap: ImapSettings;
  readonly scan: ScanSettings;
  readonly unsubscribe: UnsubscribeExecutorConfig;
  readonly dedup: DedupSettings;
  readonly outputDir: string;
}

/**
 * Validates the environment and freezes it into the configuration value that
 * is passed to every component.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): SweeperConfig {
  const env = envSchema.parse(source);

  const dedup: DedupSettings =
    env.DEDUP_BACKEND === 'redis' && env.REDIS_URL
      ? { backend: 'redis', redisUrl: env.REDIS_URL }
      : { backend: 'file', path: env.SCANNED_IDS_PATH };

  return Object.freeze({
    env: env.NODE_ENV,
    port: env.PORT,
    imap: Object.freeze({
      host: env.IMAP_HOST,
      port: env.IMAP_PORT,
      tls: env.IMAP_TLS,
      user: env.IMAP_USER,
      password: env.IMAP_PASSWORD
    }),
    scan: Object.freeze({
      name: env.SCAN_NAME.trim(),
      nameMatch: env.NAME_MATCH,
      months: env.SCAN_MONTHS,
      persistBatchSize: env.DEDUP_PERSIST_BATCH_SIZE,
      taxonomyPath: env.TAXONOMY_PATH
    }),
    unsubscribe: Object.freeze({
      lookbackDays: env.UNSUBSCRIBE_LOOKBACK_DAYS,
      timeoutMs: env.UNSUBSCRIBE_TIMEOUT_MS,
      maxAttempts: env.UNSUBSCRIBE_MAX_ATTEMPTS,
      backoffMs: env.UNSUBSCRIBE_BACKOFF_MS
    }),
    dedup: Object.freeze(dedup),
    outputDir: env.OUTPUT_DIR
  });
}
