import { promises as fs } from 'fs';
import * as path from 'path';
import { createHash, randomUUID } from 'crypto';
import { CacheStore } from '../../domain/contracts';
import { componentLogger, Logger } from '../../logging/logger';

export interface FileCacheStoreOptions {
  baseDir?: string;
  now?: () => number;
  logger?: Logger;
}

const HOUR_MS = 3_600_000;

/**
 * Flat directory of JSON blobs. The file name is the MD5 of the logical key and
 * the file's mtime is the write time; there is no metadata file.
 */
export class FileCacheStore implements CacheStore {
  private readonly baseDir: string;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options?: FileCacheStoreOptions) {
    this.baseDir = options?.baseDir ?? path.join(process.cwd(), '.cache');
    this.now = options?.now ?? Date.now;
    this.logger = componentLogger(options?.logger, 'file-cache');
  }

  getBaseDir(): string {
    return this.baseDir;
  }

  async get<T>(key: string, maxAgeHours: number): Promise<T | null> {
    const filePath = this.filePath(key);
    const modified = await this.statMtime(filePath);
    if (!modified) {
      return null;
    }
    if (this.now() - modified.getTime() > maxAgeHours * HOUR_MS) {
      return null;
    }

    try {
      const raw = await fs.readFile(filePath, 'utf-8');
      return JSON.parse(raw) as T;
    } catch (error) {
      // Unreadable or corrupt entries count as misses.
      this.logger.debug({ key, err: error }, 'discarding unreadable cache entry');
      return null;
    }
  }

  async put<T>(key: string, payload: T): Promise<void> {
    await fs.mkdir(this.baseDir, { recursive: true });
    const target = this.filePath(key);
    const staging = `${target}.${randomUUID()}.tmp`;
    await fs.writeFile(staging, JSON.stringify(payload), 'utf-8');
    await fs.rename(staging, target);
  }

  async lastModified(key: string): Promise<Date | null> {
    return this.statMtime(this.filePath(key));
  }

  filePath(key: string): string {
    const digest = createHash('md5').update(key).digest('hex');
    return path.join(this.baseDir, `${digest}.json`);
  }

  private async statMtime(filePath: string): Promise<Date | null> {
    try {
      const stats = await fs.stat(filePath);
      return stats.mtime;
    } catch (error) {
      if ((error as { code?: string }).code !== 'ENOENT') {
        this.logger.debug({ filePath, err: error }, 'cache entry unreadable, treating as miss');
      }
      return null;
    }
  }
}
