import { access, mkdir, readFile, rename, writeFile } from 'fs/promises';
import { constants } from 'fs';
import path from 'path';
import { PersistenceError } from '../types/errors';
import { moduleLogger } from '../utils/logger';

const logger = moduleLogger('ScannedIdStore');

/**
 * Set of message identifiers processed by earlier runs. It only grows:
 * there is no operation that removes an identifier.
 */
export interface ScannedIdStore {
  load(): Promise<ReadonlySet<string>>;
  contains(id: string): boolean;
  merge(ids: Iterable<string>): void;
  persist(): Promise<void>;
  healthCheck(): Promise<boolean>;
}

/** Keeps the loaded set and the ids merged since the last persist. */
export abstract class BaseScannedIdStore implements ScannedIdStore {
  protected readonly ids = new Set<string>();
  protected pending = new Set<string>();

  abstract load(): Promise<ReadonlySet<string>>;
  abstract persist(): Promise<void>;
  abstract healthCheck(): Promise<boolean>;

  contains(id: string): boolean {
    return this.ids.has(id);
  }

  merge(ids: Iterable<string>): void {
    for (const id of ids) {
      if (!this.ids.has(id)) {
        this.ids.add(id);
        this.pending.add(id);
      }
    }
  }

  get size(): number {
    return this.ids.size;
  }

  get pendingCount(): number {
    return this.pending.size;
  }
}

/** One identifier per line. Persisting rewrites the whole union through a temp file. */
export class FileScannedIdStore extends BaseScannedIdStore {
  constructor(private readonly filePath: string) {
    super();
  }

  async load(): Promise<ReadonlySet<string>> {
    let content = '';
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw new PersistenceError(`cannot read ${this.filePath}`, error instanceof Error ? error.message : error);
      }
      logger.info({ path: this.filePath }, 'No scanned-id file yet, starting empty');
    }

    for (const line of content.split(/\r?\n/)) {
      const id = line.trim();
      if (id) this.ids.add(id);
    }

    logger.info({ path: this.filePath, count: this.ids.size }, 'Loaded scanned ids');
    return this.ids;
  }

  async persist(): Promise<void> {
    if (this.pending.size === 0) return;

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    const body = [...this.ids].sort().join('\n') + '\n';
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, body, 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      throw new PersistenceError(`cannot write ${this.filePath}`, error instanceof Error ? error.message : error);
    }

    logger.info({ path: this.filePath, added: this.pending.size, total: this.ids.size }, 'Persisted scanned ids');
    this.pending = new Set();
  }

  async healthCheck(): Promise<boolean> {
    try {
      await access(path.dirname(path.resolve(this.filePath)), constants.W_OK);
      return true;
    } catch (error) {
      logger.error({ error }, 'Scanned-id store health check failed');
      return false;
    }
  }
}
