export * from './domain/contracts';
export * from './domain/errors';
export { createLogger } from './logging/logger';
export type { Logger, LoggerOptions } from './logging/logger';
export { AktoolsProvider } from './providers/aktoolsProvider';
export type { AktoolsProviderConfig } from './providers/aktoolsProvider';
export { FetchHttpClient } from './providers/httpClient';
export type { HttpClient } from './providers/httpClient';
export { LocalFixtureHttpClient } from './providers/localFixtureHttpClient';
export { FileCacheStore } from './services/cache/fileCacheStore';
export type { FileCacheStoreOptions } from './services/cache/fileCacheStore';
export { InMemoryCacheStore } from './services/cache/inMemoryCacheStore';
export { SlidingWindowRateLimiter } from './services/rateLimit/slidingWindowRateLimiter';
export { fixedDelayPolicy, withRetry } from './services/fetching/retryPolicy';
export type { RetryPolicy } from './services/fetching/retryPolicy';
export { RetryingFetcher } from './services/fetching/retryingFetcher';
export type { DatasetDefinition } from './services/fetching/retryingFetcher';
export { ScreeningDataSource } from './services/fetching/screeningDataSource';
export type { ScreeningDataSourceConfig } from './services/fetching/screeningDataSource';
export { FileUniverseSnapshotStore, InMemoryUniverseSnapshotStore } from './services/fetching/universeSnapshotStore';
export type { UniverseSnapshotStore } from './services/fetching/universeSnapshotStore';
export { CRITERIA, resolveCriteria } from './services/screening/criteria';
export { ScreeningPipeline } from './services/screening/screeningPipeline';
export type { ScreeningPipelineConfig } from './services/screening/screeningPipeline';
export { ScreeningSessionCoordinator } from './services/session/screeningSessionCoordinator';
export type { ScreeningSessionCoordinatorConfig } from './services/session/screeningSessionCoordinator';
export { FileSettingsStore, defaultSettings } from './services/settings/fileSettingsStore';
export type { ScreenerSettings } from './services/settings/fileSettingsStore';
export { createScreener } from './createScreener';
export type { Screener } from './createScreener';
