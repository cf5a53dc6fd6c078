import { ScannedIdStore } from '../db/scanned-ids';
import { DecodeErrorEntry, DecodeResult, Mailbox, RawMessage } from '../types/email';
import { AppError, ConnectionError } from '../types/errors';
import { ScanResult } from '../types/reports';
import { DomainAggregator } from './aggregator';
import { EmailCategorizationService } from './email-categorization';
import { decodeMessage } from './message-decoder';
import { moduleLogger } from '../utils/logger';

const logger = moduleLogger('InboxScanner');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface InboxScannerConfig {
  readonly months: number;
  // 0 persists once at the end of the run; N > 0 also after every N processed messages
  readonly persistBatchSize: number;
}

export interface ScanOptions {
  now?: Date;
  /** Runs after the scan and before the final persist; a failure here leaves the last batch unmarked. */
  beforeCommit?: (result: ScanResult) => Promise<void>;
}

export type Decoder = (raw: RawMessage) => Promise<DecodeResult>;

export function scanSince(now: Date, months: number): Date {
  return new Date(now.getTime() - months * 30 * DAY_MS);
}

function asConnectionError(error: unknown, action: string): AppError {
  if (error instanceof AppError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectionError(`${action}: ${message}`);
}

export class InboxScanner {
  constructor(
    private readonly config: InboxScannerConfig,
    private readonly classifier: EmailCategorizationService,
    private readonly store: ScannedIdStore,
    private readonly decode: Decoder = decodeMessage
  ) {}

  /**
   * fetch → decode → dedup gate → classify → aggregate, one message at a
   * time. Identifiers are only marked scanned once processing succeeded.
   */
  async scan(mailbox: Mailbox, options: ScanOptions = {}): Promise<ScanResult> {
    const startedAt = options.now ?? new Date();
    const since = scanSince(startedAt, this.config.months);

    await this.store.load();

    let listed: number[];
    try {
      listed = await mailbox.listCandidateUids(since);
    } catch (error) {
      throw asConnectionError(error, 'listing candidate messages failed');
    }
    const uids = [...new Set(listed)];

    logger.info({ since: since.toISOString(), candidates: uids.length }, 'Starting scan');

    const aggregator = new DomainAggregator();
    const decodeErrors: DecodeErrorEntry[] = [];
    const seenThisRun = new Set<string>();
    const processedIds: string[] = [];
    let unflushed: string[] = [];
    let skipped = 0;
    let duplicates = 0;

    for (const [index, uid] of uids.entries()) {
      let raw: RawMessage;
      try {
        raw = await mailbox.fetch(uid);
      } catch (error) {
        throw asConnectionError(error, `fetching UID ${uid} failed`);
      }

      const decoded = await this.decode(raw);
      if (decoded.kind === 'failed') {
        logger.warn({ uid, reason: decoded.reason }, 'Skipping undecodable message');
        decodeErrors.push({ uid, reason: decoded.reason });
        continue;
      }

      const { message } = decoded;
      if (seenThisRun.has(message.messageId)) {
        duplicates++;
        continue;
      }
      if (this.store.contains(message.messageId)) {
        skipped++;
        continue;
      }
      seenThisRun.add(message.messageId);

      aggregator.add(message, this.classifier.classify(message));
      processedIds.push(message.messageId);
      unflushed.push(message.messageId);

      if (this.config.persistBatchSize > 0 && unflushed.length >= this.config.persistBatchSize) {
        await this.commit(unflushed);
        unflushed = [];
      }

      if ((index + 1) % 100 === 0) {
        logger.info({ scanned: index + 1, total: uids.length }, 'Scan progress');
      }
    }

    const result: ScanResult = {
      startedAt,
      completedAt: new Date(),
      candidates: uids.length,
      processed: processedIds.length,
      skipped,
      duplicates,
      decodeErrors,
      processedIds,
      domains: aggregator.domains(),
      personalized: aggregator.personalized(),
      potentialAccounts: aggregator.potentialAccounts()
    };

    if (options.beforeCommit) {
      await options.beforeCommit(result);
    }
    await this.commit(unflushed);

    logger.info({
      candidates: result.candidates,
      processed: result.processed,
      skipped,
      duplicates,
      decodeErrors: decodeErrors.length,
      domains: result.domains.length
    }, 'Scan complete');

    return result;
  }

  private async commit(ids: readonly string[]): Promise<void> {
    if (ids.length === 0) return;
    this.store.merge(ids);
    await this.store.persist();
  }
}
