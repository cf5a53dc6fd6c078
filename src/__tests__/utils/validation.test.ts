import { ZodError } from 'zod';
import { loadConfig } from '../../utils/validation';

const required = {
  IMAP_USER: 'jane@example.org',
  IMAP_PASSWORD: 'test-secret'
};

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig(required);

    expect(config).toEqual({
      env: 'development',
      port: 3000,
      imap: { host: 'imap.gmail.com', port: 993, tls: true, user: 'jane@example.org', password: 'test-secret' },
      scan: { name: '', nameMatch: 'substring', months: 12, persistBatchSize: 0, taxonomyPath: undefined },
      unsubscribe: { lookbackDays: 30, timeoutMs: 15000, maxAttempts: 3, backoffMs: 1000 },
      dedup: { backend: 'file', path: 'previously_scanned.txt' },
      outputDir: 'output'
    });
  });

  it('should freeze the configuration', () => {
    const config = loadConfig(required);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.imap)).toBe(true);
    expect(Object.isFrozen(config.unsubscribe)).toBe(true);
  });

  it('should parse overrides from strings', () => {
    const config = loadConfig({
      ...required,
      PORT: '8080',
      IMAP_TLS: 'false',
      IMAP_PORT: '143',
      SCAN_NAME: '  Jane Doe ',
      NAME_MATCH: 'word',
      SCAN_MONTHS: '6',
      DEDUP_PERSIST_BATCH_SIZE: '50',
      UNSUBSCRIBE_BACKOFF_MS: '0'
    });

    expect(config.port).toBe(8080);
    expect(config.imap.tls).toBe(false);
    expect(config.imap.port).toBe(143);
    expect(config.scan).toMatchObject({ name: 'Jane Doe', nameMatch: 'word', months: 6, persistBatchSize: 50 });
    expect(config.unsubscribe.backoffMs).toBe(0);
  });

  it('should select the redis backend when configured', () => {
    const config = loadConfig({ ...required, DEDUP_BACKEND: 'redis', REDIS_URL: 'redis://localhost:6379' });

    expect(config.dedup).toEqual({ backend: 'redis', redisUrl: 'redis://localhost:6379' });
  });

  it('should require REDIS_URL for the redis backend', () => {
    expect(() => loadConfig({ ...required, DEDUP_BACKEND: 'redis' })).toThrow('REDIS_URL is required when DEDUP_BACKEND is redis');
  });

  it('should reject missing credentials and out-of-range values', () => {
    expect(() => loadConfig({ IMAP_PASSWORD: 'test-secret' })).toThrow(ZodError);
    expect(() => loadConfig({ ...required, UNSUBSCRIBE_TIMEOUT_MS: '500' })).toThrow(ZodError);
    expect(() => loadConfig({ ...required, NAME_MATCH: 'fuzzy' })).toThrow(ZodError);
  });
});
