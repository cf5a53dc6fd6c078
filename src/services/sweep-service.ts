import path from 'path';
import { ScannedIdStore } from '../db/scanned-ids';
import { Taxonomy } from '../types/categorization';
import { DecodeErrorEntry, Mailbox, MailboxFactory } from '../types/email';
import { AppError, ConflictError, ConnectionError } from '../types/errors';
import { OutcomeSink, UnsubscribeRunResult } from '../types/unsubscribe';
import { SweeperConfig } from '../utils/validation';
import { EmailCategorizationService } from './email-categorization';
import { InboxScanner } from './inbox-scanner';
import { buildDomainAnalysisRows, DomainAnalysisRow, FileOutcomeSink, ReportFiles, writeReports } from './report-builder';
import { parseSelection } from './selection-parser';
import { UnsubscribeExecutor, UnsubscribeRunOptions } from './unsubscribe-executor';
import { moduleLogger } from '../utils/logger';

const logger = moduleLogger('SweepService');

export const OUTCOME_LOG_FILE = 'unsubscribe_log.txt';

export type RunKind = 'scan' | 'unsubscribe';

export interface SweepServiceDeps {
  mailboxFactory: MailboxFactory;
  store: ScannedIdStore;
  taxonomy: Taxonomy;
  outcomeSink?: OutcomeSink;
}

export interface ScanSummary {
  startedAt: string;
  completedAt: string;
  candidates: number;
  processed: number;
  skipped: number;
  duplicates: number;
  decodeErrors: DecodeErrorEntry[];
  personalizedCount: number;
  potentialAccounts: string[];
  domains: DomainAnalysisRow[];
  files: ReportFiles;
}

/**
 * Owns one scan or unsubscribe run at a time: opens the mailbox, runs the
 * pipeline and writes its files.
 */
export class SweepService {
  private readonly scanner: InboxScanner;
  private readonly executor: UnsubscribeExecutor;
  private running: RunKind | null = null;
  private latestScan: ScanSummary | undefined;
  private abortController: AbortController | null = null;

  constructor(
    private readonly config: SweeperConfig,
    private readonly deps: SweepServiceDeps
  ) {
    const classifier = new EmailCategorizationService({
      taxonomy: deps.taxonomy,
      scanName: config.scan.name,
      nameMatch: config.scan.nameMatch
    });

    this.scanner = new InboxScanner(
      { months: config.scan.months, persistBatchSize: config.scan.persistBatchSize },
      classifier,
      deps.store
    );
    this.executor = new UnsubscribeExecutor(
      config.unsubscribe,
      deps.outcomeSink ?? new FileOutcomeSink(path.join(config.outputDir, OUTCOME_LOG_FILE))
    );
  }

  get activeRun(): RunKind | null {
    return this.running;
  }

  latest(): ScanSummary | undefined {
    return this.latestScan;
  }

  async healthCheck(): Promise<{ store: boolean }> {
    return { store: await this.deps.store.healthCheck() };
  }

  async runScan(now: Date = new Date()): Promise<ScanSummary> {
    return this.exclusive('scan', () =>
      this.withMailbox(async mailbox => {
        let files: ReportFiles | undefined;
        const result = await this.scanner.scan(mailbox, {
          now,
          beforeCommit: async scanned => {
            files = await writeReports(this.config.outputDir, scanned);
          }
        });

        if (!files) {
          throw new AppError('Reports were not written', 'INTERNAL_SERVER_ERROR');
        }

        const summary: ScanSummary = {
          startedAt: result.startedAt.toISOString(),
          completedAt: result.completedAt.toISOString(),
          candidates: result.candidates,
          processed: result.processed,
          skipped: result.skipped,
          duplicates: result.duplicates,
          decodeErrors: result.decodeErrors,
          personalizedCount: result.personalized.length,
          potentialAccounts: result.potentialAccounts,
          domains: buildDomainAnalysisRows(result.domains),
          files
        };
        this.latestScan = summary;
        return summary;
      })
    );
  }

  async runUnsubscribe(csv: string, options: UnsubscribeRunOptions = {}): Promise<UnsubscribeRunResult> {
    const rows = parseSelection(csv);
    if (!rows.some(UnsubscribeExecutor.isSelected)) {
      logger.info({ rows: rows.length }, 'No rows selected for unsubscribe');
      return { outcomes: [], skipped: rows.length, cancelled: false };
    }

    return this.exclusive('unsubscribe', async () => {
      const controller = new AbortController();
      const forward = () => controller.abort();
      if (options.signal?.aborted) controller.abort();
      options.signal?.addEventListener('abort', forward, { once: true });
      this.abortController = controller;

      try {
        return await this.withMailbox(mailbox =>
          this.executor.run(rows, mailbox, { ...options, signal: controller.signal })
        );
      } finally {
        options.signal?.removeEventListener('abort', forward);
        this.abortController = null;
      }
    });
  }

  /** Stops an unsubscribe run before its next row or retry; outcomes already logged stay. */
  cancel(): void {
    this.abortController?.abort();
  }

  private async exclusive<T>(kind: RunKind, fn: () => Promise<T>): Promise<T> {
    if (this.running) {
      throw new ConflictError(`A ${this.running} run is already in progress`);
    }

    this.running = kind;
    const startTime = Date.now();
    try {
      return await fn();
    } catch (error) {
      logger.error({ error, kind }, 'Run failed');
      throw error;
    } finally {
      this.running = null;
      logger.info({ kind, duration: Date.now() - startTime }, 'Run finished');
    }
  }

  private async withMailbox<T>(fn: (mailbox: Mailbox) => Promise<T>): Promise<T> {
    let mailbox: Mailbox;
    try {
      mailbox = await this.deps.mailboxFactory();
    } catch (error) {
      throw error instanceof AppError ? error : new ConnectionError(error instanceof Error ? error.message : String(error));
    }

    try {
      return await fn(mailbox);
    } finally {
      await mailbox.close().catch((error: unknown) => {
        logger.warn({ error }, 'Closing the mailbox failed');
      });
    }
  }
}
