import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { createTestDataSource, FakeMarketDataProvider } from '../../../__tests__/support/fakes';
import { UniverseUnavailableError } from '../../../domain/errors';
import { InMemoryCacheStore } from '../../cache/inMemoryCacheStore';
import { FileUniverseSnapshotStore, InMemoryUniverseSnapshotStore } from '../universeSnapshotStore';

const listings = [
  { code: '600000', name: '浦发银行' },
  { code: '000001', name: '平安银行' },
];

describe('ScreeningDataSource', () => {
  it('persists a snapshot of every fresh stock list', async () => {
    const snapshots = new InMemoryUniverseSnapshotStore();
    const source = createTestDataSource(new FakeMarketDataProvider({ listings }), { snapshots });

    expect(await source.getStockList()).toEqual(listings);
    expect((await snapshots.load())?.listings).toEqual(listings);
  });

  it('serves the stock list from cache on the second call', async () => {
    const provider = new FakeMarketDataProvider({ listings });
    const source = createTestDataSource(provider);

    await source.getStockList();
    await source.getStockList();
    expect(provider.callsTo('listStocks')).toBe(1);
  });

  it('falls back to the snapshot when upstream is exhausted', async () => {
    const provider = new FakeMarketDataProvider();
    provider.failing.add('listStocks');
    const snapshots = new InMemoryUniverseSnapshotStore([{ code: '600519', name: '贵州茅台' }]);
    const source = createTestDataSource(provider, { snapshots });

    expect(await source.getStockList()).toEqual([{ code: '600519', name: '贵州茅台' }]);
    expect(provider.callsTo('listStocks')).toBe(3);
  });

  it('raises when neither upstream nor a snapshot can supply the stock list', async () => {
    const source = createTestDataSource(new FakeMarketDataProvider({ listings: [] }), {
      snapshots: new InMemoryUniverseSnapshotStore(),
    });

    const error = await source.getStockList().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(UniverseUnavailableError);
    expect(error).toMatchObject({
      message:
        'Stock list unavailable: stock_list unavailable after 3 attempts (fake:stock_list): ' +
        'stock_list returned no rows; no cached copy or snapshot',
    });
  });

  it('degrades other datasets to empty tables', async () => {
    const provider = new FakeMarketDataProvider({ pledges: [{ code: '600000', pledgeRatio: 12 }] });
    provider.failing.add('getPledges');
    provider.failing.add('getIncomeStatements:600000');
    const source = createTestDataSource(provider);

    expect(await source.getPledges()).toEqual([]);
    expect(await source.getIncomeStatements('600000')).toEqual([]);
    expect(provider.callsTo('getPledges')).toBe(3);
  });

  it('caches per-entity datasets under provider-scoped keys', async () => {
    const cache = new InMemoryCacheStore();
    const income = [{ reportDate: '2023-12-31', totalRevenue: 10, netProfit: 1 }];
    const source = createTestDataSource(new FakeMarketDataProvider({ income: { '600000': income } }), { cache });

    await source.getIncomeStatements('600000');
    expect(await cache.get('fake:profit_600000', 48)).toEqual(income);
    expect(await source.quoteUpdatedAt('600000')).toBeNull();
  });
});

describe('FileUniverseSnapshotStore', () => {
  it('round-trips listings and ignores unusable files', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'screener-snapshot-'));
    try {
      const filePath = path.join(dir, 'nested', 'snapshot.json');
      const store = new FileUniverseSnapshotStore({ filePath });

      expect(await store.load()).toBeNull();
      await store.save(listings);
      expect((await store.load())?.listings).toEqual(listings);

      await fs.writeFile(filePath, JSON.stringify({ savedAt: 'x', listings: [] }), 'utf-8');
      expect(await store.load()).toBeNull();

      await fs.writeFile(filePath, 'not json', 'utf-8');
      expect(await store.load()).toBeNull();
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
