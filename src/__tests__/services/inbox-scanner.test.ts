import { EmailCategorizationService } from '../../services/email-categorization';
import { InboxScanner, scanSince } from '../../services/inbox-scanner';
import { loadTaxonomy } from '../../services/taxonomy';
import { RawMessage } from '../../types/email';
import { ConnectionError } from '../../types/errors';
import { InMemoryMailbox, MemoryScannedIdStore } from '../fixtures/in-memory';
import { newsletter, rawMessage } from '../fixtures/raw-emails';

const NOW = new Date('2024-03-10T00:00:00.000Z');

function bankMessage(uid: number, from: string): RawMessage {
  return rawMessage(uid, { from, subject: 'Account notice', messageId: `b${uid}@bank.com`, text: 'Hello' });
}

function inbox(): RawMessage[] {
  return [
    newsletter(1, 'news.example'),
    newsletter(2, 'news.example'),
    bankMessage(3, 'alerts@bank.com'),
    bankMessage(4, 'alerts@bank.com'),
    bankMessage(5, 'promo@bank.com')
  ];
}

describe('InboxScanner', () => {
  const classifier = new EmailCategorizationService({
    taxonomy: loadTaxonomy(),
    scanName: 'Jane Doe',
    nameMatch: 'substring'
  });

  function scanner(store: MemoryScannedIdStore, persistBatchSize = 0): InboxScanner {
    return new InboxScanner({ months: 12, persistBatchSize }, classifier, store);
  }

  describe('scanSince', () => {
    it('should count a month as 30 days', () => {
      expect(scanSince(NOW, 1).toISOString()).toBe('2024-02-09T00:00:00.000Z');
    });
  });

  describe('scan', () => {
    it('should aggregate every new message and mark it scanned', async () => {
      const store = new MemoryScannedIdStore();

      const result = await scanner(store).scan(new InMemoryMailbox(inbox()), { now: NOW });

      expect(result.candidates).toBe(5);
      expect(result.processed).toBe(5);
      expect(result.skipped).toBe(0);
      expect(result.startedAt).toEqual(NOW);
      expect([...store.durable].sort()).toEqual([
        'b3@bank.com',
        'b4@bank.com',
        'b5@bank.com',
        'issue-1@news.example',
        'issue-2@news.example'
      ]);

      const bank = result.domains.find(record => record.domain === 'bank.com');
      expect(bank?.totalEmails).toBe(3);
      expect(bank?.uniqueSenders.size).toBe(2);
      expect([...(bank?.categories ?? [])]).toEqual(['Finance']);

      const news = result.domains.find(record => record.domain === 'news.example');
      expect(news?.unsubscribe?.token).toBe('tok-2');
    });

    it('should find nothing new when run twice against the same mailbox', async () => {
      const firstStore = new MemoryScannedIdStore();
      await scanner(firstStore).scan(new InMemoryMailbox(inbox()), { now: NOW });

      const secondStore = new MemoryScannedIdStore(firstStore.durable);
      const result = await scanner(secondStore).scan(new InMemoryMailbox(inbox()), { now: NOW });

      expect(result.processed).toBe(0);
      expect(result.skipped).toBe(5);
      expect(result.domains).toEqual([]);
      expect(secondStore.durable.size).toBe(5);
    });

    it('should only ever add identifiers across runs', async () => {
      const store = new MemoryScannedIdStore(['kept-from-an-old-run@x.example']);
      await scanner(store).scan(new InMemoryMailbox(inbox()), { now: NOW });
      const afterFirst = new Set(store.durable);

      const next = [...inbox(), newsletter(6, 'news.example')];
      const result = await scanner(store).scan(new InMemoryMailbox(next), { now: NOW });

      expect(result.processed).toBe(1);
      expect(afterFirst.size).toBe(6);
      for (const id of afterFirst) {
        expect(store.durable.has(id)).toBe(true);
      }
      expect(store.durable.size).toBe(7);
    });

    it('should skip undecodable messages without marking them', async () => {
      const broken: RawMessage = { uid: 9, arrivalDate: NOW, raw: Buffer.from('garbage without headers') };
      const store = new MemoryScannedIdStore();

      const result = await scanner(store).scan(new InMemoryMailbox([...inbox(), broken]), { now: NOW });

      expect(result.processed).toBe(5);
      expect(result.decodeErrors).toEqual([{ uid: 9, reason: 'no parseable headers' }]);
      expect(store.durable.size).toBe(5);
    });

    it('should count a repeated Message-ID once', async () => {
      const copy = rawMessage(10, { from: 'alerts@bank.com', subject: 'Account notice', messageId: 'b3@bank.com', text: 'Hello' });
      const store = new MemoryScannedIdStore();

      const result = await scanner(store, 1).scan(new InMemoryMailbox([...inbox(), copy]), { now: NOW });

      expect(result.processed).toBe(5);
      expect(result.duplicates).toBe(1);
      expect(result.skipped).toBe(0);
    });

    it('should ignore messages older than the scan window', async () => {
      const old = newsletter(11, 'old.example', new Date('2022-01-01T00:00:00.000Z'));
      const mailbox = new InMemoryMailbox([...inbox(), old]);

      const result = await scanner(new MemoryScannedIdStore()).scan(mailbox, { now: NOW });

      expect(result.candidates).toBe(5);
      expect(mailbox.fetched).not.toContain(11);
    });

    it('should list personalized messages', async () => {
      const personal = rawMessage(12, {
        from: 'Pat Friend <pat@pals.example>',
        subject: 'Dinner',
        messageId: 'p12@pals.example',
        text: 'Hi Jane Doe, are you free on Friday?'
      });

      const result = await scanner(new MemoryScannedIdStore()).scan(new InMemoryMailbox([personal]), { now: NOW });

      expect(result.personalized).toHaveLength(1);
      expect(result.personalized[0].senderName).toBe('Pat Friend');
      expect(result.personalized[0].senderAddress).toBe('pat@pals.example');
      expect(result.personalized[0].rawHeaderBlock).toContain('Subject: Dinner');
    });
  });

  describe('persistence policy', () => {
    it('should persist once, after the reports, by default', async () => {
      const store = new MemoryScannedIdStore();
      let durableAtReportTime = -1;

      await scanner(store).scan(new InMemoryMailbox(inbox()), {
        now: NOW,
        beforeCommit: async () => {
          durableAtReportTime = store.durable.size;
        }
      });

      expect(durableAtReportTime).toBe(0);
      expect(store.persistCalls).toBe(1);
      expect(store.durable.size).toBe(5);
    });

    it('should also persist every N messages when a batch size is set', async () => {
      const store = new MemoryScannedIdStore();
      let durableAtReportTime = -1;

      await scanner(store, 2).scan(new InMemoryMailbox(inbox()), {
        now: NOW,
        beforeCommit: async () => {
          durableAtReportTime = store.durable.size;
        }
      });

      expect(durableAtReportTime).toBe(4);
      expect(store.persistCalls).toBe(3);
      expect(store.durable.size).toBe(5);
    });

    it('should leave the store untouched when writing reports fails', async () => {
      const store = new MemoryScannedIdStore();

      await expect(scanner(store).scan(new InMemoryMailbox(inbox()), {
        now: NOW,
        beforeCommit: async () => {
          throw new Error('disk full');
        }
      })).rejects.toThrow('disk full');

      expect(store.persistCalls).toBe(0);
      expect(store.durable.size).toBe(0);
    });
  });

  describe('connection failures', () => {
    it('should abort with ConnectionError and persist nothing', async () => {
      const store = new MemoryScannedIdStore();
      const mailbox = new InMemoryMailbox(inbox());
      mailbox.failOnUid = 3;

      const run = scanner(store).scan(mailbox, { now: NOW });

      await expect(run).rejects.toThrow(ConnectionError);
      await expect(run).rejects.toThrow('Mailbox connection error: fetching UID 3 failed: connection reset');
      expect(store.persistCalls).toBe(0);
      expect(store.durable.size).toBe(0);
    });

    it('should abort when the mailbox cannot be listed', async () => {
      const mailbox = new InMemoryMailbox(inbox());
      mailbox.failListing = true;

      await expect(scanner(new MemoryScannedIdStore()).scan(mailbox, { now: NOW }))
        .rejects.toThrow('Mailbox connection error: listing candidate messages failed: connection reset');
    });
  });
});
