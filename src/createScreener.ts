import { CacheStore, MarketDataProvider } from './domain/contracts';
import { createLogger, Logger } from './logging/logger';
import { AktoolsProvider } from './providers/aktoolsProvider';
import { FetchHttpClient, HttpClient } from './providers/httpClient';
import { FileCacheStore } from './services/cache/fileCacheStore';
import { fixedDelayPolicy } from './services/fetching/retryPolicy';
import { ScreeningDataSource } from './services/fetching/screeningDataSource';
import { FileUniverseSnapshotStore, UniverseSnapshotStore } from './services/fetching/universeSnapshotStore';
import { SlidingWindowRateLimiter } from './services/rateLimit/slidingWindowRateLimiter';
import { ScreeningPipeline } from './services/screening/screeningPipeline';
import { ScreeningSessionCoordinator } from './services/session/screeningSessionCoordinator';
import { ScreenerSettings } from './services/settings/fileSettingsStore';

export interface ScreenerOverrides {
  client?: HttpClient;
  provider?: MarketDataProvider;
  cache?: CacheStore;
  snapshots?: UniverseSnapshotStore;
  logger?: Logger;
}

export interface Screener {
  coordinator: ScreeningSessionCoordinator;
  pipeline: ScreeningPipeline;
  dataSource: ScreeningDataSource;
  logger: Logger;
}

/** Wires the default stack from settings; any collaborator can be swapped. */
export function createScreener(settings: ScreenerSettings, overrides?: ScreenerOverrides): Screener {
  const logger = overrides?.logger ?? createLogger({ level: settings.logLevel });
  const client =
    overrides?.client ??
    new FetchHttpClient((url, init) => fetch(url, init), { timeoutMs: settings.provider.timeoutMs });
  const provider = overrides?.provider ?? new AktoolsProvider({ client, baseUrl: settings.provider.baseUrl });

  const dataSource = new ScreeningDataSource({
    provider,
    cache: overrides?.cache ?? new FileCacheStore({ baseDir: settings.cache.dir, logger }),
    limiter: new SlidingWindowRateLimiter({
      maxCalls: settings.rateLimit.maxCalls,
      windowMs: settings.rateLimit.windowMs,
      logger,
    }),
    retry: fixedDelayPolicy(settings.retry.maxAttempts, settings.retry.delayMs),
    snapshots: overrides?.snapshots ?? new FileUniverseSnapshotStore({ filePath: settings.universe.snapshotPath }),
    ttlHours: settings.cache.ttlHours,
    logger,
  });

  const pipeline = new ScreeningPipeline({
    source: dataSource,
    maxWorkers: settings.pipeline.maxWorkers,
    progressEvery: settings.pipeline.progressEvery,
    logger,
  });

  const coordinator = new ScreeningSessionCoordinator({
    runner: (criteria, onProgress) => pipeline.run(criteria, onProgress),
    logger,
  });

  return { coordinator, pipeline, dataSource, logger };
}
