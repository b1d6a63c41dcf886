import { UpstreamRequestError } from '../domain/errors';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface ResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export interface RequestInitLike {
  headers?: Record<string, string>;
  method?: string;
  signal?: AbortSignal;
}

export type FetchLike = (url: string, init?: RequestInitLike) => Promise<ResponseLike>;

export interface HttpClient {
  getJson(url: string, params?: QueryParams): Promise<unknown>;
}

export interface FetchHttpClientOptions {
  timeoutMs?: number;
}

export class FetchHttpClient implements HttpClient {
  private readonly timeoutMs: number;

  constructor(
    private readonly fetchImpl: FetchLike,
    options?: FetchHttpClientOptions,
  ) {
    this.timeoutMs = options?.timeoutMs ?? 30_000;
  }

  async getJson(url: string, params?: QueryParams): Promise<unknown> {
    const requestUrl = buildUrl(url, params);
    let response: ResponseLike;
    try {
      response = await this.fetchImpl(requestUrl, {
        method: 'GET',
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new UpstreamRequestError(`Request failed (${reason}) for ${requestUrl}`, requestUrl);
    }

    if (!response.ok) {
      throw new UpstreamRequestError(
        `Request failed (${response.status} ${response.statusText}) for ${requestUrl}`,
        requestUrl,
        response.status,
      );
    }

    return response.json();
  }
}

/** Appends params in key order so the same request always yields the same URL. */
export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) {
    return url;
  }

  const search = Object.entries(params)
    .filter(([, value]) => value !== undefined && value !== null)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
    .join('&');

  return search ? `${url}?${search}` : url;
}
