import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { StockListing } from '../../domain/contracts';

const snapshotSchema = z.object({
  savedAt: z.string(),
  listings: z.array(z.object({ code: z.string(), name: z.string() })),
});

export type UniverseSnapshot = z.infer<typeof snapshotSchema>;

export interface UniverseSnapshotStore {
  load(): Promise<UniverseSnapshot | null>;
  save(listings: StockListing[]): Promise<void>;
}

export interface FileUniverseSnapshotStoreOptions {
  filePath?: string;
}

/** Last known good stock list, kept outside the TTL cache as a fallback. */
export class FileUniverseSnapshotStore implements UniverseSnapshotStore {
  private readonly filePath: string;

  constructor(options?: FileUniverseSnapshotStoreOptions) {
    this.filePath = options?.filePath ?? path.join(process.cwd(), '.cache', 'stock-list-snapshot.json');
  }

  async load(): Promise<UniverseSnapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as { code?: string }).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return null;
    }
    const result = snapshotSchema.safeParse(parsed);
    if (!result.success || result.data.listings.length === 0) {
      return null;
    }
    return result.data;
  }

  async save(listings: StockListing[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const snapshot: UniverseSnapshot = { savedAt: new Date().toISOString(), listings };
    await fs.writeFile(this.filePath, JSON.stringify(snapshot), 'utf-8');
  }
}

export class InMemoryUniverseSnapshotStore implements UniverseSnapshotStore {
  private snapshot: UniverseSnapshot | null;

  constructor(initial?: StockListing[]) {
    this.snapshot = initial ? { savedAt: new Date().toISOString(), listings: initial } : null;
  }

  async load(): Promise<UniverseSnapshot | null> {
    return this.snapshot;
  }

  async save(listings: StockListing[]): Promise<void> {
    this.snapshot = { savedAt: new Date().toISOString(), listings };
  }
}
