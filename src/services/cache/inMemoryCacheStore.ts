import { CacheStore } from '../../domain/contracts';

interface MemoryEntry {
  serialized: string;
  writtenAt: number;
}

export interface InMemoryCacheStoreOptions {
  now?: () => number;
}

export class InMemoryCacheStore implements CacheStore {
  private readonly store = new Map<string, MemoryEntry>();
  private readonly now: () => number;

  constructor(options?: InMemoryCacheStoreOptions) {
    this.now = options?.now ?? Date.now;
  }

  async get<T>(key: string, maxAgeHours: number): Promise<T | null> {
    const cached = this.store.get(key);
    if (!cached) {
      return null;
    }

    if (this.now() - cached.writtenAt > maxAgeHours * 3_600_000) {
      return null;
    }

    try {
      return JSON.parse(cached.serialized) as T;
    } catch {
      return null;
    }
  }

  async put<T>(key: string, payload: T): Promise<void> {
    // Stored serialized so callers never share references with the cache.
    this.store.set(key, { serialized: JSON.stringify(payload), writtenAt: this.now() });
  }

  async lastModified(key: string): Promise<Date | null> {
    const cached = this.store.get(key);
    return cached ? new Date(cached.writtenAt) : null;
  }

  /** Test hook: overwrite an entry with raw text, bypassing serialization. */
  putRaw(key: string, serialized: string, writtenAt: number = this.now()): void {
    this.store.set(key, { serialized, writtenAt });
  }

  size(): number {
    return this.store.size;
  }
}
