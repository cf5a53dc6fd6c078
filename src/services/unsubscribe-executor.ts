import { setTimeout as delay } from 'timers/promises';
import { DecodeResult, Mailbox, NormalizedMessage, UnsubscribeInfo } from '../types/email';
import { AppError, ConnectionError, NetworkError, UnsubscribeFailure } from '../types/errors';
import {
  OutcomeSink,
  UnsubscribeExecutorConfig,
  UnsubscribeOutcome,
  UnsubscribeResult,
  UnsubscribeRunResult,
  UnsubscribeSelection,
  UnsubscribeState
} from '../types/unsubscribe';
import { Decoder } from './inbox-scanner';
import { decodeMessage } from './message-decoder';
import { extractUnsubscribe } from './unsubscribe-links';
import { moduleLogger } from '../utils/logger';

const logger = moduleLogger('UnsubscribeExecutor');

const DAY_MS = 24 * 60 * 60 * 1000;

export type UnsubscribeExtractor = (message: NormalizedMessage) => UnsubscribeInfo | undefined;

export interface UnsubscribeRunOptions {
  signal?: AbortSignal;
  now?: () => Date;
}

interface HttpAttempt {
  result: UnsubscribeResult;
  detail: string;
  attempts: number;
}

/**
 * Walks the inbox newest-first, indexing the unsubscribe token of every
 * message it decodes. Each lookup resumes the walk where the previous one
 * stopped, so no message is fetched twice in a run.
 */
export class MessageLocator {
  private readonly index = new Map<string, UnsubscribeInfo>();
  private queue: number[] | null = null;

  constructor(
    private readonly mailbox: Mailbox,
    private readonly since: Date,
    private readonly decode: Decoder = decodeMessage,
    private readonly extract: UnsubscribeExtractor = extractUnsubscribe
  ) {}

  private async pendingUids(): Promise<number[]> {
    if (!this.queue) {
      try {
        const uids = await this.mailbox.listCandidateUids(this.since);
        this.queue = [...new Set(uids)].sort((a, b) => b - a);
      } catch (error) {
        throw error instanceof AppError ? error : new ConnectionError(String(error));
      }
    }
    return this.queue;
  }

  async locate(token: string): Promise<UnsubscribeInfo | undefined> {
    const cached = this.index.get(token);
    if (cached) return cached;

    const queue = await this.pendingUids();
    while (queue.length > 0) {
      const uid = queue.shift();
      if (uid === undefined) break;

      let decoded: DecodeResult;
      try {
        decoded = await this.decode(await this.mailbox.fetch(uid));
      } catch (error) {
        throw error instanceof AppError ? error : new ConnectionError(`fetching UID ${uid} failed: ${String(error)}`);
      }
      if (decoded.kind === 'failed') continue;

      const info = this.extract(decoded.message);
      if (!info) continue;
      if (!this.index.has(info.token)) {
        this.index.set(info.token, info);
      }
      if (info.token === token) return info;
    }
    return undefined;
  }
}

export class UnsubscribeExecutor {
  private readonly config: UnsubscribeExecutorConfig;
  private readonly sink: OutcomeSink;
  private readonly decode: Decoder;

  constructor(config: UnsubscribeExecutorConfig, sink: OutcomeSink, decode: Decoder = decodeMessage) {
    this.config = config;
    this.sink = sink;
    this.decode = decode;
  }

  static isSelected(row: UnsubscribeSelection): boolean {
    return row.delete && row.unsubscribeAvailable;
  }

  async run(
    rows: readonly UnsubscribeSelection[],
    mailbox: Mailbox,
    options: UnsubscribeRunOptions = {}
  ): Promise<UnsubscribeRunResult> {
    const now = options.now ?? (() => new Date());
    const since = new Date(now().getTime() - this.config.lookbackDays * DAY_MS);
    const locator = new MessageLocator(mailbox, since, this.decode);
    const succeeded = new Set<string>();
    const outcomes: UnsubscribeOutcome[] = [];
    let skipped = 0;
    let cancelled = false;

    for (const row of rows) {
      if (options.signal?.aborted) {
        cancelled = true;
        break;
      }

      if (!UnsubscribeExecutor.isSelected(row) || succeeded.has(row.domain)) {
        skipped++;
        continue;
      }

      const attemptedAt = now();
      this.transition(row, 'Locating');
      const info = await locator.locate(row.token);

      let attempt: HttpAttempt;
      if (!info) {
        attempt = {
          result: 'ManualRequired',
          detail: `no message within ${this.config.lookbackDays} days carries token ${row.token}`,
          attempts: 0
        };
      } else if (info.method === 'mailto') {
        attempt = {
          result: 'ManualRequired',
          detail: `mailto unsubscribe requires manual action: ${info.url}`,
          attempts: 0
        };
      } else {
        this.transition(row, 'Executing');
        attempt = await this.requestWithRetry(row.domain, info.url, options.signal);
      }

      const outcome: UnsubscribeOutcome = {
        domain: row.domain,
        token: row.token,
        attemptedAt,
        result: attempt.result,
        detail: attempt.detail,
        attempts: attempt.attempts
      };
      await this.sink.append(outcome);
      outcomes.push(outcome);
      this.transition(row, outcome.result);

      if (outcome.result === 'Success') {
        succeeded.add(row.domain);
      }
    }

    logger.info({
      attempted: outcomes.length,
      succeeded: outcomes.filter(outcome => outcome.result === 'Success').length,
      skipped,
      cancelled
    }, 'Unsubscribe run finished');

    return { outcomes, skipped, cancelled };
  }

  private transition(row: UnsubscribeSelection, state: UnsubscribeState): void {
    logger.debug({ domain: row.domain, row: row.row, state }, 'Unsubscribe state');
  }

  private async requestOnce(domain: string, url: string, signal?: AbortSignal): Promise<number> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        redirect: 'manual',
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
        headers: { 'User-Agent': 'inbox-sweeper/1.0' }
      });
    } catch (error) {
      const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      throw new NetworkError(message);
    }

    // Only the status matters; release the connection
    await response.body?.cancel();

    if (response.status >= 500) {
      throw new NetworkError(`HTTP ${response.status}`);
    }
    if (response.status >= 400) {
      throw new UnsubscribeFailure(domain, `HTTP ${response.status}`);
    }
    return response.status;
  }

  /**
   * 2xx/3xx succeed; 5xx and network errors are retried with exponential backoff; 4xx fails at once.
   * Once `signal` aborts no further request is sent, including one already waiting out its backoff.
   */
  async requestWithRetry(domain: string, url: string, signal?: AbortSignal): Promise<HttpAttempt> {
    let lastError = '';
    const cancelled = (attempts: number): HttpAttempt => ({
      result: 'Failed',
      detail: `cancelled after ${attempts} attempt(s)${lastError ? `: ${lastError}` : ''}`,
      attempts
    });

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      if (signal?.aborted) return cancelled(attempt - 1);

      try {
        const status = await this.requestOnce(domain, url, signal);
        return { result: 'Success', detail: `HTTP ${status} after ${attempt} attempt(s)`, attempts: attempt };
      } catch (error) {
        if (error instanceof UnsubscribeFailure) {
          return { result: 'Failed', detail: error.message, attempts: attempt };
        }
        if (!(error instanceof NetworkError)) throw error;
        lastError = error.message;
        if (signal?.aborted) return cancelled(attempt);
        logger.warn({ domain, attempt, error: error.message }, 'Unsubscribe request failed');
      }

      if (attempt < this.config.maxAttempts) {
        try {
          await delay(this.config.backoffMs * 2 ** (attempt - 1), undefined, { signal });
        } catch (error) {
          if (!signal?.aborted) throw error;
        }
      }
    }

    return {
      result: 'Failed',
      detail: `${lastError} after ${this.config.maxAttempts} attempt(s)`,
      attempts: this.config.maxAttempts
    };
  }
}
