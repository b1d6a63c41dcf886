import {
  BalanceSheetRow,
  BuybackRecord,
  CacheStore,
  ControllerRecord,
  DividendRecord,
  FinancingEvent,
  IncomeStatementRow,
  MarketDataProvider,
  PledgeRecord,
  QuoteRecord,
  RateLimiter,
  StockListing,
} from '../../domain/contracts';
import { describeError, UniverseUnavailableError } from '../../domain/errors';
import { componentLogger, Logger } from '../../logging/logger';
import { RetryingFetcher, RetryingFetcherDeps } from './retryingFetcher';
import { RetryPolicy } from './retryPolicy';
import { UniverseSnapshot, UniverseSnapshotStore } from './universeSnapshotStore';

export type DatasetName =
  | 'stockList'
  | 'incomeStatements'
  | 'balanceSheets'
  | 'dividends'
  | 'quotes'
  | 'controllers'
  | 'additionalIssuances'
  | 'convertibleBonds'
  | 'buybacks'
  | 'pledges';

export type DatasetTtlHours = Record<DatasetName, number>;

export const DEFAULT_TTL_HOURS: DatasetTtlHours = {
  stockList: 24,
  incomeStatements: 48,
  balanceSheets: 48,
  dividends: 24,
  quotes: 4,
  controllers: 24,
  additionalIssuances: 24,
  convertibleBonds: 24,
  buybacks: 12,
  pledges: 24,
};

export interface ScreeningDataSourceConfig {
  provider: MarketDataProvider;
  cache: CacheStore;
  limiter: RateLimiter;
  retry: RetryPolicy;
  snapshots?: UniverseSnapshotStore;
  ttlHours?: Partial<DatasetTtlHours>;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

type Fetcher<TArgs extends unknown[], TRow> = RetryingFetcher<TArgs, TRow>;

/**
 * One retrying fetcher per upstream dataset, sharing a cache and a rate limiter.
 * Only the stock list raises when upstream is exhausted; every other dataset
 * degrades to an empty table.
 */
export class ScreeningDataSource {
  private readonly logger: Logger;
  private readonly stockListFetcher: Fetcher<[], StockListing>;
  private readonly incomeFetcher: Fetcher<[string], IncomeStatementRow>;
  private readonly balanceFetcher: Fetcher<[string], BalanceSheetRow>;
  private readonly dividendFetcher: Fetcher<[string], DividendRecord>;
  private readonly quoteFetcher: Fetcher<[string], QuoteRecord>;
  private readonly controllerFetcher: Fetcher<[], ControllerRecord>;
  private readonly issuanceFetcher: Fetcher<[], FinancingEvent>;
  private readonly bondFetcher: Fetcher<[], FinancingEvent>;
  private readonly buybackFetcher: Fetcher<[], BuybackRecord>;
  private readonly pledgeFetcher: Fetcher<[], PledgeRecord>;

  constructor(private readonly config: ScreeningDataSourceConfig) {
    this.logger = componentLogger(config.logger, 'data-source');
    const provider = config.provider;
    const ttl: DatasetTtlHours = { ...DEFAULT_TTL_HOURS, ...config.ttlHours };
    const deps: RetryingFetcherDeps = {
      cache: config.cache,
      limiter: config.limiter,
      retry: config.retry,
      sleep: config.sleep,
      logger: config.logger,
    };
    const scoped = (name: string, code?: string): string =>
      code ? `${provider.id}:${name}_${code}` : `${provider.id}:${name}`;

    this.stockListFetcher = new RetryingFetcher(
      {
        name: 'stock_list',
        ttlHours: ttl.stockList,
        cacheKey: () => scoped('stock_list'),
        load: () => provider.listStocks(),
        rejectEmpty: true,
        onExhausted: 'raise',
      },
      deps,
    );
    this.incomeFetcher = new RetryingFetcher(
      {
        name: 'income_statements',
        ttlHours: ttl.incomeStatements,
        cacheKey: (code: string) => scoped('profit', code),
        load: (code: string) => provider.getIncomeStatements(code),
        onExhausted: 'empty',
      },
      deps,
    );
    this.balanceFetcher = new RetryingFetcher(
      {
        name: 'balance_sheets',
        ttlHours: ttl.balanceSheets,
        cacheKey: (code: string) => scoped('balance', code),
        load: (code: string) => provider.getBalanceSheets(code),
        onExhausted: 'empty',
      },
      deps,
    );
    this.dividendFetcher = new RetryingFetcher(
      {
        name: 'dividends',
        ttlHours: ttl.dividends,
        cacheKey: (code: string) => scoped('dividend', code),
        load: (code: string) => provider.getDividendHistory(code),
        onExhausted: 'empty',
      },
      deps,
    );
    this.quoteFetcher = new RetryingFetcher(
      {
        name: 'quotes',
        ttlHours: ttl.quotes,
        cacheKey: (code: string) => scoped('price', code),
        load: (code: string) => provider.getQuote(code),
        onExhausted: 'empty',
      },
      deps,
    );
    this.controllerFetcher = new RetryingFetcher(
      {
        name: 'controllers',
        ttlHours: ttl.controllers,
        cacheKey: () => scoped('controller_info'),
        load: () => provider.getControllers(),
        onExhausted: 'empty',
      },
      deps,
    );
    this.issuanceFetcher = new RetryingFetcher(
      {
        name: 'additional_issuances',
        ttlHours: ttl.additionalIssuances,
        cacheKey: () => scoped('additional_issuance'),
        load: () => provider.getAdditionalIssuances(),
        onExhausted: 'empty',
      },
      deps,
    );
    this.bondFetcher = new RetryingFetcher(
      {
        name: 'convertible_bonds',
        ttlHours: ttl.convertibleBonds,
        cacheKey: () => scoped('conv_bonds'),
        load: () => provider.getConvertibleBonds(),
        onExhausted: 'empty',
      },
      deps,
    );
    this.buybackFetcher = new RetryingFetcher(
      {
        name: 'buybacks',
        ttlHours: ttl.buybacks,
        cacheKey: () => scoped('buyback_data'),
        load: () => provider.getBuybacks(),
        onExhausted: 'empty',
      },
      deps,
    );
    this.pledgeFetcher = new RetryingFetcher(
      {
        name: 'pledges',
        ttlHours: ttl.pledges,
        cacheKey: () => scoped('pledge_data'),
        load: () => provider.getPledges(),
        onExhausted: 'empty',
      },
      deps,
    );
  }

  /**
   * The foundational dataset. Falls back to the last persisted snapshot when
   * upstream is exhausted and raises {@link UniverseUnavailableError} when there
   * is none, so a run never screens an empty universe down to zero.
   */
  async getStockList(): Promise<StockListing[]> {
    let upstreamError: unknown;
    try {
      const listings = await this.stockListFetcher.fetch();
      await this.saveSnapshot(listings);
      return listings;
    } catch (error) {
      upstreamError = error;
    }

    const snapshot = await this.loadSnapshot();
    if (snapshot) {
      this.logger.warn(
        { savedAt: snapshot.savedAt, count: snapshot.listings.length, err: describeError(upstreamError) },
        'stock list unavailable upstream, using snapshot',
      );
      return snapshot.listings;
    }

    throw new UniverseUnavailableError(
      `Stock list unavailable: ${describeError(upstreamError)}; no cached copy or snapshot`,
      upstreamError,
    );
  }

  getIncomeStatements(code: string): Promise<IncomeStatementRow[]> {
    return this.incomeFetcher.fetch(code);
  }

  getBalanceSheets(code: string): Promise<BalanceSheetRow[]> {
    return this.balanceFetcher.fetch(code);
  }

  getDividendHistory(code: string): Promise<DividendRecord[]> {
    return this.dividendFetcher.fetch(code);
  }

  getQuote(code: string): Promise<QuoteRecord[]> {
    return this.quoteFetcher.fetch(code);
  }

  getControllers(): Promise<ControllerRecord[]> {
    return this.controllerFetcher.fetch();
  }

  getAdditionalIssuances(): Promise<FinancingEvent[]> {
    return this.issuanceFetcher.fetch();
  }

  getConvertibleBonds(): Promise<FinancingEvent[]> {
    return this.bondFetcher.fetch();
  }

  getBuybacks(): Promise<BuybackRecord[]> {
    return this.buybackFetcher.fetch();
  }

  getPledges(): Promise<PledgeRecord[]> {
    return this.pledgeFetcher.fetch();
  }

  stockListUpdatedAt(): Promise<Date | null> {
    return this.stockListFetcher.lastModified();
  }

  quoteUpdatedAt(code: string): Promise<Date | null> {
    return this.quoteFetcher.lastModified(code);
  }

  private async saveSnapshot(listings: StockListing[]): Promise<void> {
    if (!this.config.snapshots) {
      return;
    }
    try {
      await this.config.snapshots.save(listings);
    } catch (error) {
      this.logger.warn({ err: describeError(error) }, 'failed to persist stock list snapshot');
    }
  }

  private async loadSnapshot(): Promise<UniverseSnapshot | null> {
    if (!this.config.snapshots) {
      return null;
    }
    try {
      return await this.config.snapshots.load();
    } catch (error) {
      this.logger.warn({ err: describeError(error) }, 'failed to read stock list snapshot');
      return null;
    }
  }
}
