import {
  BalanceSheetRow,
  BuybackRecord,
  ControllerRecord,
  DividendRecord,
  FilterOutcome,
  FinancingEvent,
  IncomeStatementRow,
} from '../../domain/contracts';
import { fail, indeterminate, pass } from './filterOutcome';

export const DIVIDEND_YIELD_THRESHOLD = 4.0;
export const MAX_PLEDGE_RATIO = 30;
export const DIVIDEND_STREAK_YEARS = 5;
export const FINANCING_LOOKBACK_YEARS = 5;

const STATE_OWNERSHIP_KEYWORDS = [
  '国有', '国资', '财政局', '财政厅', '国投', '中央', '省人民政府',
  '市人民政府', '国家', '央企', '国企', '人民政府', '管理委员会',
  '国有资产', 'SASAC', '财政部', '国务院', '中国人民', '省国资',
  '市国资', '区国资', '县国资', '经济开发区', '高新区管委会',
];

const byDateDesc = <T>(dateOf: (row: T) => string) => (a: T, b: T): number =>
  dateOf(b).localeCompare(dateOf(a));

function yearsBefore(asOf: Date, years: number): string {
  const cutoff = new Date(asOf.getTime());
  cutoff.setUTCFullYear(cutoff.getUTCFullYear() - years);
  return cutoff.toISOString().slice(0, 10);
}

/**
 * Four most recent fiscal year-ends; each of the three year-pairs must grow in
 * both revenue and net profit from a strictly positive base. Short history is a
 * failure, not an unknown.
 */
export function evaluateAnnualGrowth(statements: IncomeStatementRow[]): FilterOutcome {
  const annual = statements
    .filter((row) => row.reportDate.endsWith('-12-31'))
    .sort(byDateDesc((row) => row.reportDate))
    .slice(0, 4);

  if (annual.length < 4) {
    return fail(`only ${annual.length} annual reports`);
  }

  for (let i = 0; i < 3; i++) {
    const current = annual[i];
    const previous = annual[i + 1];
    if (previous.totalRevenue <= 0 || previous.netProfit <= 0) {
      return fail(`non-positive base in ${previous.reportDate}`);
    }
    if (current.totalRevenue <= previous.totalRevenue || current.netProfit <= previous.netProfit) {
      return fail(`no growth from ${previous.reportDate} to ${current.reportDate}`);
    }
  }

  return pass();
}

/** Latest quarter against the previous one and against the same quarter a year earlier. */
export function evaluateQuarterlyGrowth(statements: IncomeStatementRow[]): FilterOutcome {
  if (statements.length < 6) {
    return indeterminate(`only ${statements.length} quarterly reports`);
  }

  const sorted = [...statements].sort(byDateDesc((row) => row.reportDate));
  const latest = sorted[0];
  const previousQuarter = sorted[1];
  const monthDay = latest.reportDate.slice(4);
  const year = latest.reportDate.slice(0, 4);
  const yearAgo = sorted
    .slice(1)
    .find((row) => row.reportDate.slice(4) === monthDay && row.reportDate.slice(0, 4) !== year);

  if (!yearAgo) {
    return fail(`no comparable quarter for ${latest.reportDate}`);
  }

  for (const base of [yearAgo, previousQuarter]) {
    if (base.totalRevenue <= 0 || base.netProfit <= 0) {
      return fail(`non-positive base in ${base.reportDate}`);
    }
    if (latest.totalRevenue <= base.totalRevenue || latest.netProfit <= base.netProfit) {
      return fail(`no growth over ${base.reportDate}`);
    }
  }

  return pass();
}

/**
 * Trailing twelve months of per-share cash dividends over the latest price.
 * A missing price is unknown; no dividend history is a failure.
 */
export function evaluateDividendYield(
  price: number | undefined,
  dividends: DividendRecord[],
  asOf: Date,
  threshold: number = DIVIDEND_YIELD_THRESHOLD,
): FilterOutcome {
  if (price === undefined || !(price > 0)) {
    return indeterminate('no valid price');
  }
  if (dividends.length === 0) {
    return fail('no dividend records');
  }

  const windowStart = yearsBefore(asOf, 1);
  const today = asOf.toISOString().slice(0, 10);
  const total = dividends
    .filter((record) => record.reportPeriod >= windowStart && record.reportPeriod <= today)
    .reduce((sum, record) => (record.cashPerShare > 0 ? sum + record.cashPerShare : sum), 0);

  if (total <= 0) {
    return fail('no cash dividend in the trailing twelve months');
  }

  const yieldPct = (total / price) * 100;
  return yieldPct >= threshold ? pass() : fail(`yield ${yieldPct.toFixed(2)}% below ${threshold}%`);
}

/**
 * `records` are the controller rows for one code. An unavailable dataset is
 * unknown; a code with no rows is stable.
 */
export function evaluateControllerStability(
  records: ControllerRecord[] | undefined,
  datasetAvailable: boolean,
): FilterOutcome {
  if (!datasetAvailable) {
    return indeterminate('controller dataset unavailable');
  }
  if (!records || records.length === 0) {
    return pass();
  }

  const controllers = new Set(
    records.map((record) => record.controllerName.trim()).filter((name) => name.length > 0),
  );
  return controllers.size <= 1 ? pass() : fail(`${controllers.size} distinct controllers`);
}

export function evaluateCashCoverage(
  balanceSheets: BalanceSheetRow[],
  pledgeRatio: number | undefined,
  maxPledgeRatio: number = MAX_PLEDGE_RATIO,
): FilterOutcome {
  if (balanceSheets.length === 0) {
    return indeterminate('no balance sheet');
  }
  if (pledgeRatio !== undefined && pledgeRatio > maxPledgeRatio) {
    return fail(`pledge ratio ${pledgeRatio}% above ${maxPledgeRatio}%`);
  }

  const latest = [...balanceSheets].sort(byDateDesc((row) => row.reportDate))[0];
  const debt = latest.shortTermBorrowings + latest.longTermBorrowings + latest.bondsPayable;
  return latest.cashEquivalents > debt ? pass() : fail(`cash ${latest.cashEquivalents} not above debt ${debt}`);
}

export function isStateOwned(record: ControllerRecord): boolean {
  return (
    STATE_OWNERSHIP_KEYWORDS.some((keyword) => record.controllerName.includes(keyword)) ||
    record.controlType.includes('国有')
  );
}

/** Cash dividends paid for each of the `years` calendar years before `asOf`. */
export function hasDividendStreak(
  dividends: DividendRecord[],
  asOf: Date,
  years: number = DIVIDEND_STREAK_YEARS,
): boolean {
  const paidYears = new Set(
    dividends
      .filter((record) => record.cashPerShare > 0)
      .map((record) => Number(record.reportPeriod.slice(0, 4))),
  );
  const currentYear = asOf.getUTCFullYear();
  for (let year = currentYear - years; year < currentYear; year++) {
    if (!paidYears.has(year)) {
      return false;
    }
  }
  return true;
}

export function recentFinancers(
  events: FinancingEvent[],
  asOf: Date,
  years: number = FINANCING_LOOKBACK_YEARS,
): Set<string> {
  const cutoff = yearsBefore(asOf, years);
  return new Set(events.filter((event) => event.eventDate >= cutoff).map((event) => event.code));
}

export function activeBuybackCodes(records: BuybackRecord[]): Set<string> {
  return new Set(
    records
      .filter((record) => record.progress !== 'terminated' && record.progress !== 'unknown')
      .map((record) => record.code),
  );
}
