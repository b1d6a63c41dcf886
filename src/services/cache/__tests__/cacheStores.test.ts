import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { silentLogger } from '../../../__tests__/support/fakes';
import { FileCacheStore } from '../fileCacheStore';
import { InMemoryCacheStore } from '../inMemoryCacheStore';

const HOUR_MS = 3_600_000;

describe('InMemoryCacheStore', () => {
  it('serves entries up to and including the max age', async () => {
    let clock = 0;
    const cache = new InMemoryCacheStore({ now: () => clock });
    await cache.put('aktools:stock_list', [{ code: '600000' }]);

    clock = HOUR_MS;
    expect(await cache.get('aktools:stock_list', 1)).toEqual([{ code: '600000' }]);

    clock = HOUR_MS + 1;
    expect(await cache.get('aktools:stock_list', 1)).toBeNull();
  });

  it('treats corrupt entries as misses', async () => {
    const cache = new InMemoryCacheStore();
    cache.putRaw('aktools:price_600000', '{not json');
    expect(await cache.get('aktools:price_600000', 4)).toBeNull();
  });

  it('returns copies rather than shared references', async () => {
    const cache = new InMemoryCacheStore();
    const rows = [{ code: '600000' }];
    await cache.put('k', rows);
    rows.push({ code: '600001' });
    expect(await cache.get('k', 1)).toEqual([{ code: '600000' }]);
  });

  it('reports when an entry was written', async () => {
    const cache = new InMemoryCacheStore({ now: () => 1_700_000_000_000 });
    expect(await cache.lastModified('k')).toBeNull();
    await cache.put('k', []);
    expect(await cache.lastModified('k')).toEqual(new Date(1_700_000_000_000));
  });
});

describe('FileCacheStore', () => {
  let dir: string;
  let cache: FileCacheStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'screener-cache-'));
    cache = new FileCacheStore({ baseDir: dir, logger: silentLogger() });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('stores each key in an md5-named JSON file', async () => {
    await cache.put('aktools:profit_600000', [{ reportDate: '2023-12-31' }]);

    const files = await fs.readdir(dir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^[0-9a-f]{32}\.json$/);
    expect(path.basename(cache.filePath('aktools:profit_600000'))).toBe(files[0]);
    expect(await cache.get('aktools:profit_600000', 48)).toEqual([{ reportDate: '2023-12-31' }]);
  });

  it('expires entries by file modification time', async () => {
    await cache.put('aktools:price_600000', [{ price: 10 }]);
    const stale = new Date(Date.now() - 5 * HOUR_MS);
    await fs.utimes(cache.filePath('aktools:price_600000'), stale, stale);

    expect(await cache.get('aktools:price_600000', 4)).toBeNull();
    expect(await cache.get('aktools:price_600000', 6)).toEqual([{ price: 10 }]);
  });

  it('treats a corrupt file as a miss', async () => {
    await fs.writeFile(cache.filePath('aktools:stock_list'), '{"truncated', 'utf-8');
    expect(await cache.get('aktools:stock_list', 24)).toBeNull();
  });

  it('misses and reports no timestamp for unknown keys', async () => {
    expect(await cache.get('missing', 24)).toBeNull();
    expect(await cache.lastModified('missing')).toBeNull();
  });

  it('misses instead of throwing when the cache directory cannot be read', async () => {
    const notADirectory = path.join(dir, 'not-a-dir');
    await fs.writeFile(notADirectory, 'plain file', 'utf-8');
    const blocked = new FileCacheStore({ baseDir: notADirectory, logger: silentLogger() });

    expect(await blocked.get('aktools:stock_list', 24)).toBeNull();
    expect(await blocked.lastModified('aktools:stock_list')).toBeNull();
  });

  it('exposes the write time', async () => {
    await cache.put('k', []);
    const stamp = new Date('2024-01-02T03:04:05Z');
    await fs.utimes(cache.filePath('k'), stamp, stamp);
    expect((await cache.lastModified('k'))?.getTime()).toBe(stamp.getTime());
  });
});
