import * as path from 'path';
import { createLogger } from '../src/logging/logger';
import { AktoolsProvider, DEFAULT_AKTOOLS_URL } from '../src/providers/aktoolsProvider';
import { buildUrl } from '../src/providers/httpClient';
import { LocalFixtureHttpClient } from '../src/providers/localFixtureHttpClient';
import { InMemoryCacheStore } from '../src/services/cache/inMemoryCacheStore';
import { fixedDelayPolicy } from '../src/services/fetching/retryPolicy';
import { ScreeningDataSource } from '../src/services/fetching/screeningDataSource';
import { InMemoryUniverseSnapshotStore } from '../src/services/fetching/universeSnapshotStore';
import { SlidingWindowRateLimiter } from '../src/services/rateLimit/slidingWindowRateLimiter';
import { ScreeningPipeline } from '../src/services/screening/screeningPipeline';
import { ScreeningSessionCoordinator } from '../src/services/session/screeningSessionCoordinator';

// Fixture dates are fixed, so the screen runs as of this day.
const FIXTURE_AS_OF = new Date('2024-06-30T00:00:00Z');

async function main(): Promise<void> {
  const fixturesRoot = path.join(__dirname, '..', 'fixtures', 'aktools');
  const fixture = (file: string) => path.join(fixturesRoot, file);
  const endpoint = (fn: string) => `${DEFAULT_AKTOOLS_URL}/${fn}`;
  const report = (symbol: string, statement: string) =>
    buildUrl(endpoint('stock_financial_report_sina'), { stock: symbol, symbol: statement });

  const httpClient = new LocalFixtureHttpClient({
    fixtures: {
      [endpoint('stock_info_a_code_name')]: fixture('stock-list.json'),
      [buildUrl(endpoint('stock_hold_control_cninfo'), { symbol: '全部' })]: fixture('controllers.json'),
      [endpoint('stock_qbzf_em')]: fixture('additional-issuances.json'),
      [endpoint('bond_cov_stock_issue_cninfo')]: fixture('convertible-bonds.json'),
      [endpoint('stock_repurchase_em')]: fixture('buybacks.json'),
      [endpoint('stock_gpzy_pledge_ratio_detail_em')]: fixture('pledges.json'),
      [buildUrl(endpoint('stock_fhps_detail_em'), { symbol: '600001' })]: fixture('dividends-600001.json'),
      [buildUrl(endpoint('stock_fhps_detail_em'), { symbol: '600002' })]: fixture('dividends-600002.json'),
      [report('sh600001', '利润表')]: fixture('income-600001.json'),
      [report('sh600001', '资产负债表')]: fixture('balance-600001.json'),
      [buildUrl(endpoint('stock_individual_info_em'), { symbol: '600001' })]: fixture('quote-600001.json'),
    },
  });

  const logger = createLogger({ level: 'info' });
  const source = new ScreeningDataSource({
    provider: new AktoolsProvider({ client: httpClient }),
    cache: new InMemoryCacheStore(),
    limiter: new SlidingWindowRateLimiter({ maxCalls: 200, logger }),
    // Unregistered fixtures fail like a 404; there is nothing to wait for.
    retry: fixedDelayPolicy(1, 0),
    snapshots: new InMemoryUniverseSnapshotStore(),
    logger,
  });
  const pipeline = new ScreeningPipeline({ source, now: () => FIXTURE_AS_OF, logger });
  const coordinator = new ScreeningSessionCoordinator({
    runner: (criteria, onProgress) => pipeline.run(criteria, onProgress),
    logger,
  });

  const args = process.argv.slice(2);
  const sessionId = coordinator.startSession(args.length > 0 ? args.map(Number) : undefined);
  await coordinator.whenSettled(sessionId);

  const progress = coordinator.getProgress();
  const result = coordinator.getResult(sessionId);
  if (!result) {
    console.error(`Session ${sessionId} ended as ${progress.status}: ${progress.error ?? 'no result'}`);
    process.exitCode = 1;
    return;
  }

  console.log(`Session ${sessionId} screened ${result.totalInitial} stocks:`);
  for (const stage of result.stages) {
    console.log(`  [${stage.criterionId}] ${stage.criterion}: ${stage.before} → ${stage.after}`);
  }
  console.log('\nPassed:');
  for (const code of result.passed) {
    console.log(`  ${code} ${result.stockNames[code] ?? ''}`);
  }
  console.log('\nData dates:', JSON.stringify(result.dataDates, null, 2));
}

main().catch((error) => {
  console.error('Fixture screener run failed:', error);
  process.exitCode = 1;
});
