// Core data types

// Calendar dates are exchange-local trading dates in YYYY-MM-DD form
export type IsoDate = string;

export type Country = 'KR' | 'US';

export type Market = 'KOSPI' | 'KOSDAQ' | 'NASDAQ' | 'NYSE' | 'AMEX';

export const MARKET_COUNTRY: Record<Market, Country> = {
  KOSPI: 'KR',
  KOSDAQ: 'KR',
  NASDAQ: 'US',
  NYSE: 'US',
  AMEX: 'US',
};

export type AssetClass = 'common_stock' | 'other';

export type ListingStatus = 'active' | 'inactive';

export interface Ticker {
  symbol: string;
  name: string;
  market: Market;
  country: Country;
  assetClass: AssetClass;
  status: ListingStatus;
  sector?: string | null;
  industry?: string | null;
  isin?: string | null;         // KRX standard code, required by the KRX price endpoint
}

export interface PricePoint {
  symbol: string;
  tradeDate: IsoDate;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface MarketSnapshot {
  symbol: string;
  tradeDate: IsoDate;
  marketCap: number | null;
  sharesOutstanding: number | null;
  tradedValue: number | null;
}

export type ReportType = 'annual' | 'Q1' | 'Q2' | 'Q3';

export interface FiscalPeriod {
  fiscalYear: number;
  reportType: ReportType;
}

export interface StatementLineItems {
  revenue: number | null;
  operatingIncome: number | null;
  netIncome: number | null;
  totalAssets: number | null;
  totalLiabilities: number | null;
  totalEquity: number | null;
  operatingCashFlow: number | null;
  investingCashFlow: number | null;
  financingCashFlow: number | null;
}

export interface FinancialStatement extends FiscalPeriod, StatementLineItems {
  symbol: string;
  fiscalQuarter: 1 | 2 | 3 | null;   // null for annual
  reportDate: IsoDate | null;
  currency: string;
}

export interface FinancialRatio extends FiscalPeriod {
  symbol: string;
  fiscalDate: IsoDate;
  roe: number | null;
  roa: number | null;
  operatingMargin: number | null;
  netMargin: number | null;
  debtRatio: number | null;
  per: number | null;
  pbr: number | null;
  psr: number | null;
}

export type RatioField = Exclude<keyof FinancialRatio, 'symbol' | 'fiscalDate' | keyof FiscalPeriod>;

// Range resolution

export interface DateRange {
  from: IsoDate;   // inclusive
  to: IsoDate;     // inclusive
}

export type RangeResolution =
  | { kind: 'range'; range: DateRange }
  | { kind: 'already_current'; lastDate: IsoDate };

export type FiscalYearResolution =
  | { kind: 'years'; years: number[] }
  | { kind: 'already_current'; lastYear: number };

// Collection

export type TimeSeriesEntity = 'prices' | 'snapshots';

export type Entity = TimeSeriesEntity | 'statements';

export interface CollectionScope {
  name: string;
  markets: Market[];
  symbols?: string[];   // explicit ticker list; omitted means the whole market listing
}

export type ErrorKind =
  | 'transient'
  | 'permanent'
  | 'systemic'
  | 'persistence'
  | 'scheduler'
  | 'config'
  | 'internal';

export type TickerOutcomeStatus = 'succeeded' | 'skipped' | 'failed' | 'not_attempted';

export interface TickerFailure {
  symbol: string;
  entity: Entity;
  reason: string;
  kind: ErrorKind;
  message: string;
  provider?: string;
}

export interface ProviderFailure {
  provider: string;
  capability: string;
  reason: string;
  message: string;
  at: string;
}

export interface EntityCounts {
  pricesWritten: number;
  snapshotsWritten: number;
  statementsWritten: number;
}

export interface TickerOutcome extends EntityCounts {
  symbol: string;
  status: TickerOutcomeStatus;
  failures: TickerFailure[];
}

export interface RunSummary extends EntityCounts {
  runId: string;
  scope: string;
  incremental: boolean;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  totalTickers: number;
  succeeded: number;
  skipped: number;
  failed: number;
  notAttempted: number;
  symbolsRefreshed: number;
  failures: TickerFailure[];
  providerFailures: ProviderFailure[];
  truncatedByDeadline: boolean;
}

// Scheduler

export type SchedulerState = 'stopped' | 'running';

export interface ScheduledRunRecord {
  trigger: 'cron' | 'manual';
  startedAt: string;
  finishedAt: string | null;
  summaries: RunSummary[];
  error?: string;
}

export interface SchedulerStatus {
  scope: string;
  state: SchedulerState;
  cronExpression: string | null;
  activeRun: boolean;
  activeRunStartedAt: string | null;
  lastRun: ScheduledRunRecord | null;
}

export type RunNowResult =
  | { status: 'started'; scope: string; startedAt: string; completion: Promise<ScheduledRunRecord> }
  | { status: 'already_running'; scope: string; activeRunStartedAt: string | null };

// Analytics

export interface RatioBatchResult {
  tickers: number;
  ratiosWritten: number;
  skipped: number;
  failed: Array<{ symbol: string; message: string }>;
}

export interface PriceOutlier {
  symbol: string;
  tradeDate: IsoDate;
  previousClose: number;
  close: number;
  returnPct: number;
  sigmaMultiple: number;
}

export interface RatioAnomaly {
  symbol: string;
  fiscalYear: number;
  reportType: ReportType;
  field: RatioField | 'null_ratio';
  value: number | null;
  issue: 'out_of_range' | 'negative' | 'high_null_ratio';
  detail: string;
}

export interface EntityCompleteness {
  entity: Entity | 'ratios' | 'market_cap';
  expected: number;
  populated: number;
  rate: number;   // percentage, two decimals
}

export interface QualityReport {
  generatedAt: string;
  market: Market | null;
  activeTickers: number;
  completeness: EntityCompleteness[];
  priceOutliers: PriceOutlier[];
  ratioAnomalies: RatioAnomaly[];
  missing: {
    noStatements: string[];
    noMarketCap: string[];
  };
  qualityScore: number;
  grade: 'A' | 'B' | 'C' | 'D' | 'F';
}

export interface TickerCounts {
  market: Market;
  active: number;
  inactive: number;
}

export interface SeriesStats {
  rows: number;
  symbols: number;
  latestDate: IsoDate | null;
}

export interface StatementStats {
  reportType: ReportType;
  rows: number;
  symbols: number;
  latestFiscalYear: number | null;
}

/** Aggregate counts over everything collected so far. */
export interface CollectionStats {
  tickers: TickerCounts[];
  prices: SeriesStats;
  snapshots: SeriesStats;
  statements: StatementStats[];
  ratios: { rows: number; symbols: number };
}

// Config types
export interface ProviderQuota {
  maxRequests: number;
  windowMs: number;
  minDelayMs?: number;
}

export interface Config {
  database: {
    url: string;
  };
  app: {
    port: number;
    nodeEnv: string;
    logLevel: 'debug' | 'info' | 'warn' | 'error';
    controlApiKey: string | null;
  };
  collection: {
    defaultWindowDays: number;
    workerPoolSize: number;
    runDeadlineMs: number | null;
    usTickers: string[];
    statementStartYear: number;
  };
  scheduler: {
    enabled: boolean;
    timezone: string;
    koreaCron: string;
    usCron: string;
    recalculateRatios: boolean;
  };
  providers: {
    krx: { quota: ProviderQuota };
    finnhub: { apiKey: string | null; quota: ProviderQuota };
    twelveData: { apiKey: string | null; quota: ProviderQuota };
    dart: { apiKey: string | null; corpCodesPath: string; quota: ProviderQuota };
  };
}
