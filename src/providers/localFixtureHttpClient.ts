import { promises as fs } from 'fs';
import * as path from 'path';
import { UpstreamRequestError } from '../domain/errors';
import { buildUrl, HttpClient, QueryParams } from './httpClient';

export interface FixtureHttpClientOptions {
  fixtures: Record<string, string>;
  defaultFixture?: string;
  rootDir?: string;
}

/**
 * Serves JSON fixture files in place of upstream. Lookup tries the full URL with
 * its sorted query string first, then the bare URL. Unregistered URLs fail like
 * a 404 so callers exercise their degraded paths.
 */
export class LocalFixtureHttpClient implements HttpClient {
  private readonly fixtures: Map<string, string>;
  private readonly defaultFixture?: string;
  private readonly rootDir: string;

  constructor(options: FixtureHttpClientOptions) {
    this.fixtures = new Map(Object.entries(options.fixtures));
    this.defaultFixture = options.defaultFixture;
    this.rootDir = options.rootDir ?? process.cwd();
  }

  async getJson(url: string, params?: QueryParams): Promise<unknown> {
    const key = buildUrl(url, params);
    const filePath = this.fixtures.get(key) ?? this.fixtures.get(url) ?? this.defaultFixture;
    if (!filePath) {
      throw new UpstreamRequestError(`No fixture registered for ${key}`, key, 404);
    }

    const resolved = path.isAbsolute(filePath) ? filePath : path.join(this.rootDir, filePath);
    const contents = await fs.readFile(resolved, 'utf-8');
    return JSON.parse(contents);
  }
}
