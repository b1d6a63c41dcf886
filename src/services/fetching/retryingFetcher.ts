import { CacheStore, RateLimiter } from '../../domain/contracts';
import { describeError } from '../../domain/errors';
import { componentLogger, Logger } from '../../logging/logger';
import { RetryPolicy, withRetry } from './retryPolicy';

export type ExhaustedBehavior = 'empty' | 'raise';

export interface DatasetDefinition<TArgs extends unknown[], TRow> {
  name: string;
  ttlHours: number;
  cacheKey(...args: TArgs): string;
  load(...args: TArgs): Promise<TRow[]>;
  /** Upstream returned a result that should be retried rather than cached. */
  rejectEmpty?: boolean;
  onExhausted: ExhaustedBehavior;
}

export interface RetryingFetcherDeps {
  cache: CacheStore;
  limiter: RateLimiter;
  retry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export class DatasetExhaustedError extends Error {
  constructor(
    readonly dataset: string,
    readonly key: string,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(`${dataset} unavailable after ${attempts} attempts (${key}): ${describeError(cause)}`, { cause });
    this.name = 'DatasetExhaustedError';
  }
}

/**
 * Cache-first, rate-limited, retrying access to one logical dataset. Holds no
 * mutable state of its own, so concurrent `fetch` calls are safe.
 */
export class RetryingFetcher<TArgs extends unknown[], TRow> {
  private readonly logger: Logger;

  constructor(
    private readonly definition: DatasetDefinition<TArgs, TRow>,
    private readonly deps: RetryingFetcherDeps,
  ) {
    this.logger = componentLogger(deps.logger, 'fetcher').child({ dataset: definition.name });
  }

  async fetch(...args: TArgs): Promise<TRow[]> {
    const key = this.definition.cacheKey(...args);
    const cached = await this.deps.cache.get<unknown>(key, this.definition.ttlHours);
    if (Array.isArray(cached)) {
      this.logger.debug({ key }, 'cache hit');
      return cached;
    }
    if (cached !== null) {
      this.logger.debug({ key }, 'cached value is not a table, refetching');
    }

    const outcome = await withRetry(
      this.deps.retry,
      async () => {
        await this.deps.limiter.acquire();
        const rows = await this.definition.load(...args);
        if (this.definition.rejectEmpty && rows.length === 0) {
          throw new Error(`${this.definition.name} returned no rows`);
        }
        return rows;
      },
      {
        sleep: this.deps.sleep,
        onRetry: (attempt, error) => {
          this.logger.warn({ key, attempt, err: describeError(error) }, 'upstream call failed, retrying');
        },
      },
    );

    if (outcome.ok) {
      await this.store(key, outcome.value);
      return outcome.value;
    }

    if (this.definition.onExhausted === 'raise') {
      this.logger.error({ key, attempts: outcome.attempts, err: describeError(outcome.error) }, 'retries exhausted');
      throw new DatasetExhaustedError(this.definition.name, key, outcome.attempts, outcome.error);
    }

    this.logger.warn(
      { key, attempts: outcome.attempts, err: describeError(outcome.error) },
      'retries exhausted, treating as no data',
    );
    return [];
  }

  lastModified(...args: TArgs): Promise<Date | null> {
    return this.deps.cache.lastModified(this.definition.cacheKey(...args));
  }

  private async store(key: string, rows: TRow[]): Promise<void> {
    try {
      await this.deps.cache.put(key, rows);
    } catch (error) {
      this.logger.warn({ key, err: describeError(error) }, 'cache write failed');
    }
  }
}
