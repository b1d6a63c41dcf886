export type ProviderId = 'aktools' | string;

export type Board = 'main' | 'chinext' | 'star' | 'beijing';

export interface StockListing {
  code: string;
  name: string;
}

export interface Stock {
  code: string;
  name: string;
  board: Board;
}

export interface IncomeStatementRow {
  reportDate: string;
  totalRevenue: number;
  netProfit: number;
}

export interface BalanceSheetRow {
  reportDate: string;
  cashEquivalents: number;
  shortTermBorrowings: number;
  longTermBorrowings: number;
  bondsPayable: number;
}

export interface DividendRecord {
  reportPeriod: string;
  cashPerShare: number;
}

export interface QuoteRecord {
  code: string;
  price?: number;
}

export interface ControllerRecord {
  code: string;
  controllerName: string;
  controlType: string;
}

export interface FinancingEvent {
  code: string;
  eventDate: string;
}

export type BuybackProgress =
  | 'proposed'
  | 'approved'
  | 'in-progress'
  | 'completed'
  | 'terminated'
  | 'unknown';

export interface BuybackRecord {
  code: string;
  progress: BuybackProgress;
}

export interface PledgeRecord {
  code: string;
  pledgeRatio: number;
}

/**
 * Upstream data source. Every method returns canonical rows; an adapter owns the
 * mapping from its raw schema so predicates never see provider column names.
 */
export interface MarketDataProvider {
  id: ProviderId;
  listStocks(): Promise<StockListing[]>;
  getIncomeStatements(code: string): Promise<IncomeStatementRow[]>;
  getBalanceSheets(code: string): Promise<BalanceSheetRow[]>;
  getDividendHistory(code: string): Promise<DividendRecord[]>;
  getQuote(code: string): Promise<QuoteRecord[]>;
  getControllers(): Promise<ControllerRecord[]>;
  getAdditionalIssuances(): Promise<FinancingEvent[]>;
  getConvertibleBonds(): Promise<FinancingEvent[]>;
  getBuybacks(): Promise<BuybackRecord[]>;
  getPledges(): Promise<PledgeRecord[]>;
}

export interface CacheStore {
  get<T>(key: string, maxAgeHours: number): Promise<T | null>;
  put<T>(key: string, payload: T): Promise<void>;
  lastModified(key: string): Promise<Date | null>;
}

export interface RateLimiter {
  acquire(): Promise<void>;
}

export type CriterionId = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

export type ScreeningPhase = 'batch' | 'individual';

export interface CriterionInfo {
  id: CriterionId;
  label: string;
  phase: ScreeningPhase;
}

export type FilterOutcome =
  | { kind: 'pass' }
  | { kind: 'fail'; reason: string }
  | { kind: 'indeterminate'; reason: string };

export interface StageResult {
  criterion: string;
  criterionId: CriterionId;
  before: number;
  after: number;
  eliminated: number;
}

export interface DataDates {
  screeningTime: string;
  stockListUpdate?: string;
  latestFinancialReport?: string;
  priceDataUpdate?: string;
}

export interface ScreeningReport {
  totalInitial: number;
  stages: StageResult[];
  passed: string[];
  stockNames: Record<string, string>;
  finalCount: number;
  selectedCriteria: CriterionId[];
  dataDates: DataDates;
}

export interface ScreeningProgress {
  message: string;
  stage: string;
  remaining: number;
}

export type ProgressListener = (progress: ScreeningProgress) => void;

export type SessionStatus = 'running' | 'completed' | 'failed' | 'superseded';

export interface SessionProgressView {
  sessionId: string | null;
  status: SessionStatus | 'idle';
  running: boolean;
  stage: string;
  message: string;
  remaining: number;
  error: string | null;
}
