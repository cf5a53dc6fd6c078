import Redis from 'ioredis';
import { PersistenceError } from '../types/errors';
import { BaseScannedIdStore } from './scanned-ids';
import { moduleLogger } from '../utils/logger';

const logger = moduleLogger('RedisService');

export const DEFAULT_SCANNED_IDS_KEY = 'inbox-sweeper:scanned-ids';

export class RedisService {
  public client: Redis;

  constructor(url: string) {
    this.client = new Redis(url, {
      enableReadyCheck: false,
      maxRetriesPerRequest: 3,
      lazyConnect: true,
    });

    this.client.on('connect', () => {
      logger.info('✅ Connected to Redis');
    });

    this.client.on('error', (err) => {
      logger.error({ error: err }, '❌ Redis connection error');
    });

    this.client.on('ready', () => {
      logger.info('🔄 Redis is ready');
    });
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
    } catch (error) {
      logger.error({ error }, 'Failed to connect to Redis');
      throw new PersistenceError('cannot connect to Redis', error instanceof Error ? error.message : error);
    }
  }

  async disconnect(): Promise<void> {
    try {
      await this.client.quit();
      logger.info('📴 Disconnected from Redis');
    } catch (error) {
      logger.error({ error }, '❌ Error disconnecting from Redis');
      throw error;
    }
  }
}

/** Scanned ids as a Redis set: SMEMBERS on load, SADD of the pending ids on persist. */
export class RedisScannedIdStore extends BaseScannedIdStore {
  constructor(
    private readonly client: Redis,
    private readonly key: string = DEFAULT_SCANNED_IDS_KEY
  ) {
    super();
  }

  async load(): Promise<ReadonlySet<string>> {
    let members: string[];
    try {
      members = await this.client.smembers(this.key);
    } catch (error) {
      throw new PersistenceError(`cannot read ${this.key}`, error instanceof Error ? error.message : error);
    }

    for (const member of members) {
      this.ids.add(member);
    }
    logger.info({ key: this.key, count: this.ids.size }, 'Loaded scanned ids');
    return this.ids;
  }

  async persist(): Promise<void> {
    if (this.pending.size === 0) return;

    try {
      await this.client.sadd(this.key, ...this.pending);
    } catch (error) {
      throw new PersistenceError(`cannot write ${this.key}`, error instanceof Error ? error.message : error);
    }

    logger.info({ key: this.key, added: this.pending.size, total: this.ids.size }, 'Persisted scanned ids');
    this.pending = new Set();
  }

  async healthCheck(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      logger.error({ error }, 'Redis scanned-id store health check failed');
      return false;
    }
  }
}
