import type {
  FinancialRatio,
  FinancialStatement,
  IsoDate,
  Market,
  MarketSnapshot,
  RatioBatchResult,
  ReportType,
} from '../types';
import type { AnalyticsStore } from '../data/store';
import { logger, subDaysIso } from '../utils';

/** Oldest market cap accepted for a period, counted back from its end. */
export const SNAPSHOT_LOOKBACK_DAYS = 90;

const PERIOD_END: Record<ReportType, string> = {
  Q1: '03-31',
  Q2: '06-30',
  Q3: '09-30',
  annual: '12-31',
};

// Valuation multiples outside these bounds carry no signal
const PER_BOUNDS = { min: -1000, max: 10000 };
const PBR_BOUNDS = { min: -100, max: 1000 };
const PSR_BOUNDS = { min: -100, max: 1000 };

export function fiscalDateFor(fiscalYear: number, reportType: ReportType): IsoDate {
  return `${fiscalYear}-${PERIOD_END[reportType]}`;
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/** numerator / denominator, or null when either is absent or the denominator is not positive. */
function safeDivide(numerator: number | null, denominator: number | null): number | null {
  if (numerator === null || denominator === null || denominator <= 0) return null;
  const value = numerator / denominator;
  return Number.isFinite(value) ? value : null;
}

function percent(numerator: number | null, denominator: number | null): number | null {
  const value = safeDivide(numerator, denominator);
  return value === null ? null : round(value * 100);
}

function bounded(value: number | null, bounds: { min: number; max: number }): number | null {
  if (value === null || value < bounds.min || value > bounds.max) return null;
  return round(value);
}

/** Ratios for one statement; valuation multiples need a snapshot with a market cap. */
export function calculateRatios(statement: FinancialStatement, snapshot: MarketSnapshot | null): FinancialRatio {
  const marketCap = snapshot?.marketCap ?? null;

  return {
    symbol: statement.symbol,
    fiscalYear: statement.fiscalYear,
    reportType: statement.reportType,
    fiscalDate: fiscalDateFor(statement.fiscalYear, statement.reportType),
    roe: percent(statement.netIncome, statement.totalEquity),
    roa: percent(statement.netIncome, statement.totalAssets),
    operatingMargin: percent(statement.operatingIncome, statement.revenue),
    netMargin: percent(statement.netIncome, statement.revenue),
    debtRatio: percent(statement.totalLiabilities, statement.totalEquity),
    per: bounded(safeDivide(marketCap, statement.netIncome), PER_BOUNDS),
    pbr: bounded(safeDivide(marketCap, statement.totalEquity), PBR_BOUNDS),
    psr: bounded(safeDivide(marketCap, statement.revenue), PSR_BOUNDS),
  };
}

export interface RatioBatchScope {
  market?: Market;
  limit?: number;
}

/** Recomputes ratios for every stored statement of the tickers in scope. */
export class RatioCalculator {
  constructor(private readonly store: AnalyticsStore) {}

  async ratioFor(statement: FinancialStatement): Promise<FinancialRatio> {
    const fiscalDate = fiscalDateFor(statement.fiscalYear, statement.reportType);
    const snapshot = await this.store.findMarketCapSnapshot(
      statement.symbol,
      fiscalDate,
      subDaysIso(fiscalDate, SNAPSHOT_LOOKBACK_DAYS)
    );
    return calculateRatios(statement, snapshot);
  }

  async calculateBatch(scope: RatioBatchScope = {}): Promise<RatioBatchResult> {
    const tickers = await this.store.listTickers({
      markets: scope.market ? [scope.market] : undefined,
      status: 'active',
    });
    const withStatements = new Set(await this.store.listSymbolsWithStatements(tickers.map((t) => t.symbol)));
    const symbols = tickers
      .map((t) => t.symbol)
      .filter((s) => withStatements.has(s))
      .slice(0, scope.limit ?? Number.MAX_SAFE_INTEGER);

    const result: RatioBatchResult = {
      tickers: symbols.length,
      ratiosWritten: 0,
      skipped: tickers.length - withStatements.size,
      failed: [],
    };

    logger.info('Ratios', `Calculating ratios for ${symbols.length} tickers`, { market: scope.market ?? 'all' });

    for (const symbol of symbols) {
      try {
        const statements = await this.store.getStatements(symbol);
        for (const statement of statements) {
          await this.store.upsertRatio(await this.ratioFor(statement));
          result.ratiosWritten++;
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        result.failed.push({ symbol, message });
        logger.warn('Ratios', `Ratio calculation failed for ${symbol}`, { error: message });
      }
    }

    logger.info('Ratios', 'Ratio batch complete', {
      tickers: result.tickers,
      ratiosWritten: result.ratiosWritten,
      failed: result.failed.length,
    });
    return result;
  }
}
