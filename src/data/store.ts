import type {
  CollectionStats,
  FinancialRatio,
  FinancialStatement,
  IsoDate,
  ListingStatus,
  Market,
  MarketSnapshot,
  PricePoint,
  ReportType,
  Ticker,
  TimeSeriesEntity,
} from '../types';

export interface TickerFilter {
  markets?: Market[];
  symbols?: string[];
  status?: ListingStatus;
  limit?: number;
}

/**
 * Persistence used by the collection path. Every write is keyed on the
 * entity's natural key: price and snapshot writes never overwrite an
 * existing row and return the number of rows actually inserted.
 */
export interface CollectionStore {
  upsertTickers(tickers: Ticker[]): Promise<number>;
  /** Marks every active ticker of `market` not in `listedSymbols` inactive. */
  markInactive(market: Market, listedSymbols: string[]): Promise<number>;
  /** Ordered by symbol. */
  listTickers(filter?: TickerFilter): Promise<Ticker[]>;

  queryLastDate(symbol: string, entity: TimeSeriesEntity): Promise<IsoDate | null>;
  queryLastFiscalYear(symbol: string, reportType: ReportType): Promise<number | null>;

  upsertPricePoints(points: PricePoint[]): Promise<number>;
  upsertSnapshots(snapshots: MarketSnapshot[]): Promise<number>;
  upsertStatement(statement: FinancialStatement): Promise<void>;
}

/** Read side consumed by ratio calculation and quality checks. */
export interface AnalyticsStore {
  listTickers(filter?: TickerFilter): Promise<Ticker[]>;
  getStatements(symbol: string): Promise<FinancialStatement[]>;
  /** Latest snapshot with a positive market cap in [notBefore, onOrBefore]. */
  findMarketCapSnapshot(symbol: string, onOrBefore: IsoDate, notBefore: IsoDate): Promise<MarketSnapshot | null>;
  upsertRatio(ratio: FinancialRatio): Promise<void>;
  getRatios(symbols: string[]): Promise<FinancialRatio[]>;
  /** Ascending by trade date. */
  getPriceSeries(symbol: string, from: IsoDate, to: IsoDate): Promise<PricePoint[]>;
  countObservations(entity: TimeSeriesEntity, symbols: string[], from: IsoDate, to: IsoDate): Promise<number>;
  countStatements(symbols: string[], fromYear: number, toYear: number, reportType: ReportType): Promise<number>;
  listSymbolsWithStatements(symbols: string[]): Promise<string[]>;
  listSymbolsWithMarketCap(symbols: string[]): Promise<string[]>;
  /** Tickers ordered by market; statements in `REPORT_TYPE_ORDER`, without empty report types. */
  collectionStats(): Promise<CollectionStats>;
}

export const REPORT_TYPE_ORDER: readonly ReportType[] = ['annual', 'Q1', 'Q2', 'Q3'];

/**
 * One row per symbol, the last occurrence winning. A multi-row upsert
 * cannot touch the same key twice.
 */
export function uniqueBySymbol(tickers: readonly Ticker[]): Ticker[] {
  const bySymbol = new Map<string, Ticker>();
  for (const t of tickers) bySymbol.set(t.symbol, t);
  return [...bySymbol.values()];
}

/** Listing refresh over a stored ticker: reference fields the source omits are kept. */
export function mergeTicker(existing: Ticker | undefined, incoming: Ticker): Ticker {
  if (!existing) return incoming;
  return {
    ...incoming,
    country: existing.country,
    sector: incoming.sector ?? existing.sector ?? null,
    industry: incoming.industry ?? existing.industry ?? null,
    isin: incoming.isin ?? existing.isin ?? null,
  };
}
