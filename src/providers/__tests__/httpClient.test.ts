import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi } from 'vitest';
import { UpstreamRequestError } from '../../domain/errors';
import { buildUrl, FetchHttpClient, FetchLike } from '../httpClient';
import { LocalFixtureHttpClient } from '../localFixtureHttpClient';

describe('buildUrl', () => {
  it('appends params in key order and encodes values', () => {
    expect(buildUrl('http://gateway.test/fn', { symbol: '利润表', stock: 'sh600000' })).toBe(
      'http://gateway.test/fn?stock=sh600000&symbol=%E5%88%A9%E6%B6%A6%E8%A1%A8',
    );
  });

  it('leaves the URL bare when no params remain', () => {
    expect(buildUrl('http://gateway.test/fn', { symbol: undefined })).toBe('http://gateway.test/fn');
    expect(buildUrl('http://gateway.test/fn')).toBe('http://gateway.test/fn');
  });
});

describe('FetchHttpClient', () => {
  it('returns the decoded body of a successful response', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => ({
      ok: true,
      status: 200,
      statusText: 'OK',
      json: async () => [{ code: '600000' }],
    }));
    const client = new FetchHttpClient(fetchImpl);

    expect(await client.getJson('http://gateway.test/fn', { symbol: '600000' })).toEqual([{ code: '600000' }]);
    expect(fetchImpl.mock.calls[0][0]).toBe('http://gateway.test/fn?symbol=600000');
  });

  it('turns an error status into an UpstreamRequestError', async () => {
    const client = new FetchHttpClient(async () => ({
      ok: false,
      status: 503,
      statusText: 'Service Unavailable',
      json: async () => null,
    }));

    const error = await client.getJson('http://gateway.test/fn').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(UpstreamRequestError);
    expect(error).toMatchObject({
      status: 503,
      message: 'Request failed (503 Service Unavailable) for http://gateway.test/fn',
    });
  });

  it('wraps transport failures', async () => {
    const client = new FetchHttpClient(async () => {
      throw new Error('ECONNREFUSED');
    });

    await expect(client.getJson('http://gateway.test/fn')).rejects.toThrow(
      'Request failed (ECONNREFUSED) for http://gateway.test/fn',
    );
  });
});

describe('LocalFixtureHttpClient', () => {
  it('serves fixtures by full URL, then bare URL, and fails unknown URLs like a 404', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'screener-fixtures-'));
    try {
      await fs.writeFile(path.join(dir, 'income.json'), '[{"报告日":"20231231"}]', 'utf-8');
      await fs.writeFile(path.join(dir, 'list.json'), '[]', 'utf-8');
      const client = new LocalFixtureHttpClient({
        rootDir: dir,
        fixtures: {
          [buildUrl('http://gateway.test/report', { stock: 'sh600000', symbol: '利润表' })]: 'income.json',
          'http://gateway.test/list': 'list.json',
        },
      });

      expect(await client.getJson('http://gateway.test/report', { symbol: '利润表', stock: 'sh600000' })).toEqual([
        { 报告日: '20231231' },
      ]);
      expect(await client.getJson('http://gateway.test/list', { page: 1 })).toEqual([]);

      const error = await client.getJson('http://gateway.test/other').catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(UpstreamRequestError);
      expect(error).toMatchObject({ status: 404 });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
