import Imap from 'imap';
import { Mailbox, RawMessage } from '../types/email';
import { ConnectionError } from '../types/errors';
import { ImapSettings } from '../utils/validation';
import { moduleLogger } from '../utils/logger';

const logger = moduleLogger('ImapMailbox');

const INBOX = 'INBOX';

/**
 * Read-only view of the inbox over one IMAP connection. Calls are expected
 * one at a time; the pipeline never issues concurrent fetches.
 */
export class ImapMailbox implements Mailbox {
  private lastError: Error | null = null;

  private constructor(private readonly imap: Imap) {
    this.imap.on('error', (err: Error) => {
      this.lastError = err;
      logger.error({ error: err }, 'IMAP connection error');
    });
  }

  static async connect(settings: ImapSettings): Promise<ImapMailbox> {
    const imap = new Imap({
      host: settings.host,
      port: settings.port,
      tls: settings.tls,
      authTimeout: 10000,
      connTimeout: 15000,
      user: settings.user,
      password: settings.password
    });

    await new Promise<void>((resolve, reject) => {
      let settled = false;

      // Stays attached after a failed attempt so late socket errors are logged, not thrown
      const onError = (err: Error) => {
        if (settled) {
          logger.warn({ error: err }, 'IMAP error after failed connect');
          return;
        }
        fail(new ConnectionError(err.message, { host: settings.host }));
      };

      const fail = (error: ConnectionError) => {
        settled = true;
        reject(error);
        try {
          imap.end();
        } catch (endError) {
          logger.debug({ error: endError }, 'IMAP connection already gone');
        }
      };

      imap.on('error', onError);
      imap.once('ready', () => {
        imap.openBox(INBOX, true, (err: Error | null, box: Imap.Box) => {
          if (err) {
            fail(new ConnectionError(`cannot open ${INBOX}: ${err.message}`));
            return;
          }

          settled = true;
          imap.removeListener('error', onError);
          logger.info({ host: settings.host, totalMessages: box.messages.total }, `Connected to IMAP for ${settings.user}`);
          resolve();
        });
      });

      imap.connect();
    });

    return new ImapMailbox(imap);
  }

  private assertUsable(): void {
    if (this.lastError) {
      throw new ConnectionError(this.lastError.message);
    }
  }

  async listCandidateUids(since: Date): Promise<number[]> {
    this.assertUsable();

    const uids = await new Promise<number[]>((resolve, reject) => {
      this.imap.search([['SINCE', since]], (err: Error | null, found: number[]) => {
        if (err) {
          reject(new ConnectionError(`search failed: ${err.message}`));
          return;
        }
        resolve(found);
      });
    });

    logger.info({ since: since.toISOString(), count: uids.length }, 'Listed candidate messages');
    return uids;
  }

  async fetch(uid: number): Promise<RawMessage> {
    this.assertUsable();

    return new Promise<RawMessage>((resolve, reject) => {
      const chunks: Buffer[] = [];
      let arrivalDate: Date | undefined;
      let seen = false;

      const fetchRequest = this.imap.fetch(uid, { bodies: '', struct: false });

      fetchRequest.on('message', (msg: Imap.ImapMessage) => {
        seen = true;

        msg.on('body', (stream: NodeJS.ReadableStream) => {
          stream.on('data', (chunk: Buffer | string) => {
            chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'binary') : chunk);
          });
        });

        msg.once('attributes', (attrs: Imap.ImapMessageAttributes) => {
          arrivalDate = attrs.date;
        });
      });

      fetchRequest.once('error', (err: Error) => {
        reject(new ConnectionError(`fetch of UID ${uid} failed: ${err.message}`));
      });

      fetchRequest.once('end', () => {
        if (!seen) {
          reject(new ConnectionError(`UID ${uid} not found in ${INBOX}`));
          return;
        }
        resolve({ uid, arrivalDate: arrivalDate ?? new Date(0), raw: Buffer.concat(chunks) });
      });
    });
  }

  async close(): Promise<void> {
    await new Promise<void>((resolve) => {
      if (this.imap.state === 'disconnected') {
        resolve();
        return;
      }
      this.imap.once('end', () => resolve());
      this.imap.end();
    });
    logger.info('IMAP connection closed');
  }
}
