import { MessageLocator, UnsubscribeExecutor } from '../../services/unsubscribe-executor';
import { UnsubscribeExecutorConfig, UnsubscribeOutcome, UnsubscribeSelection } from '../../types/unsubscribe';
import { InMemoryMailbox, MemoryOutcomeSink } from '../fixtures/in-memory';
import { newsletter, rawMessage } from '../fixtures/raw-emails';

const NOW = new Date('2024-03-10T00:00:00.000Z');

const config: UnsubscribeExecutorConfig = {
  lookbackDays: 30,
  timeoutMs: 1000,
  maxAttempts: 3,
  backoffMs: 0
};

function selection(row: number, domain: string, token: string, remove = true, available = true): UnsubscribeSelection {
  return { row, domain, token, unsubscribeUrl: '', delete: remove, unsubscribeAvailable: available };
}

function mailbox(): InMemoryMailbox {
  return new InMemoryMailbox([
    newsletter(1, 'news.example'),
    newsletter(2, 'shop.example'),
    rawMessage(3, {
      from: 'list@lists.example',
      subject: 'Digest',
      messageId: 'm3@lists.example',
      headers: { 'List-Unsubscribe': '<mailto:leave@lists.example>' },
      text: 'Digest body'
    })
  ]);
}

describe('UnsubscribeExecutor', () => {
  let sink: MemoryOutcomeSink;
  let executor: UnsubscribeExecutor;
  let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  beforeEach(() => {
    sink = new MemoryOutcomeSink();
    executor = new UnsubscribeExecutor(config, sink);
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  describe('isSelected', () => {
    it('should act only when both Delete and List-Unsubscribe are yes', () => {
      expect(UnsubscribeExecutor.isSelected(selection(2, 'a.example', 't', true, true))).toBe(true);
      expect(UnsubscribeExecutor.isSelected(selection(2, 'a.example', 't', true, false))).toBe(false);
      expect(UnsubscribeExecutor.isSelected(selection(2, 'a.example', 't', false, true))).toBe(false);
      expect(UnsubscribeExecutor.isSelected(selection(2, 'a.example', 't', false, false))).toBe(false);
    });
  });

  describe('run', () => {
    it('should succeed on the third attempt after two 503 answers', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response(null, { status: 503 }))
        .mockResolvedValueOnce(new Response(null, { status: 503 }))
        .mockResolvedValueOnce(new Response(null, { status: 200 }));

      const result = await executor.run([selection(2, 'news.example', 'tok-1')], mailbox(), { now: () => NOW });

      const expected: UnsubscribeOutcome = {
        domain: 'news.example',
        token: 'tok-1',
        attemptedAt: NOW,
        result: 'Success',
        detail: 'HTTP 200 after 3 attempt(s)',
        attempts: 3
      };
      expect(result).toEqual({ outcomes: [expected], skipped: 0, cancelled: false });
      expect(sink.outcomes).toEqual([expected]);
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(fetchMock.mock.calls[0][0]).toBe('https://news.example/u?t=tok-1');
    });

    it('should skip rows not marked for unsubscribe without logging them', async () => {
      const box = mailbox();

      const result = await executor.run([selection(2, 'news.example', 'tok-1', true, false)], box, { now: () => NOW });

      expect(result).toEqual({ outcomes: [], skipped: 1, cancelled: false });
      expect(sink.outcomes).toEqual([]);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(box.fetched).toEqual([]);
    });

    it('should treat redirects as success', async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 302 }));

      const result = await executor.run([selection(2, 'news.example', 'tok-1')], mailbox(), { now: () => NOW });

      expect(result.outcomes[0].result).toBe('Success');
      expect(result.outcomes[0].detail).toBe('HTTP 302 after 1 attempt(s)');
    });

    it('should fail at once on a 4xx answer', async () => {
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 404 }));

      const result = await executor.run([selection(2, 'news.example', 'tok-1')], mailbox(), { now: () => NOW });

      expect(result.outcomes[0]).toMatchObject({
        result: 'Failed',
        detail: 'Unsubscribe failed for news.example: HTTP 404',
        attempts: 1
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should fail after the retry budget is spent', async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 500 }));

      const result = await executor.run([selection(2, 'news.example', 'tok-1')], mailbox(), { now: () => NOW });

      expect(result.outcomes[0]).toMatchObject({ result: 'Failed', detail: 'HTTP 500 after 3 attempt(s)', attempts: 3 });
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('should retry network errors', async () => {
      fetchMock
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockRejectedValueOnce(new TypeError('fetch failed'));

      const result = await executor.run([selection(2, 'news.example', 'tok-1')], mailbox(), { now: () => NOW });

      expect(result.outcomes[0]).toMatchObject({
        result: 'Failed',
        detail: 'TypeError: fetch failed after 3 attempt(s)',
        attempts: 3
      });
    });

    it('should leave mailto mechanisms to the user', async () => {
      const result = await executor.run(
        [selection(2, 'lists.example', 'mailto:leave@lists.example')],
        mailbox(),
        { now: () => NOW }
      );

      expect(result.outcomes[0]).toMatchObject({
        result: 'ManualRequired',
        detail: 'mailto unsubscribe requires manual action: mailto:leave@lists.example',
        attempts: 0
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should report tokens no recent message carries', async () => {
      const result = await executor.run([selection(2, 'gone.example', 'nope')], mailbox(), { now: () => NOW });

      expect(result.outcomes[0]).toMatchObject({
        result: 'ManualRequired',
        detail: 'no message within 30 days carries token nope',
        attempts: 0
      });
    });

    it('should not act twice on a domain that already succeeded', async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 200 }));

      const result = await executor.run(
        [selection(2, 'news.example', 'tok-1'), selection(3, 'news.example', 'tok-1')],
        mailbox(),
        { now: () => NOW }
      );

      expect(result.outcomes).toHaveLength(1);
      expect(result.skipped).toBe(1);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should fetch each message at most once per run', async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 200 }));
      const box = mailbox();

      await executor.run(
        [selection(2, 'news.example', 'tok-1'), selection(3, 'shop.example', 'tok-2')],
        box,
        { now: () => NOW }
      );

      expect(box.fetched).toEqual([3, 2, 1]);
    });

    it('should stop before the next row once cancelled', async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 200 }));
      const controller = new AbortController();
      const abortingSink = new MemoryOutcomeSink();
      const append = abortingSink.append.bind(abortingSink);
      jest.spyOn(abortingSink, 'append').mockImplementation(async outcome => {
        await append(outcome);
        controller.abort();
      });
      const cancellable = new UnsubscribeExecutor(config, abortingSink);

      const result = await cancellable.run(
        [selection(2, 'news.example', 'tok-1'), selection(3, 'shop.example', 'tok-2')],
        mailbox(),
        { now: () => NOW, signal: controller.signal }
      );

      expect(result.cancelled).toBe(true);
      expect(result.outcomes.map(outcome => outcome.domain)).toEqual(['news.example']);
      expect(abortingSink.outcomes).toHaveLength(1);
    });
  });

  describe('requestWithRetry', () => {
    it('should send no further request once cancelled during the backoff', async () => {
      fetchMock.mockImplementation(async () => new Response(null, { status: 503 }));
      const slow = new UnsubscribeExecutor({ ...config, backoffMs: 100 }, sink);
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      const attempt = await slow.requestWithRetry('news.example', 'https://news.example/u?t=tok-1', controller.signal);

      expect(attempt).toEqual({ result: 'Failed', detail: 'cancelled after 1 attempt(s): HTTP 503', attempts: 1 });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should not start when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      const attempt = await executor.requestWithRetry('news.example', 'https://news.example/u', controller.signal);

      expect(attempt).toEqual({ result: 'Failed', detail: 'cancelled after 0 attempt(s)', attempts: 0 });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should release the response body after reading the status', async () => {
      const response = new Response('unsubscribed', { status: 200 });
      fetchMock.mockResolvedValueOnce(response);

      await executor.requestWithRetry('news.example', 'https://news.example/u');

      expect(response.bodyUsed).toBe(true);
    });
  });

  describe('MessageLocator', () => {
    it('should only look at messages inside the lookback window', async () => {
      const box = new InMemoryMailbox([
        newsletter(1, 'news.example', new Date('2023-01-01T00:00:00.000Z')),
        newsletter(2, 'shop.example')
      ]);
      const locator = new MessageLocator(box, new Date('2024-02-09T00:00:00.000Z'));

      expect(await locator.locate('tok-1')).toBeUndefined();
      expect((await locator.locate('tok-2'))?.url).toBe('https://shop.example/u?t=tok-2');
      expect(box.fetched).toEqual([2]);
    });
  });
});
