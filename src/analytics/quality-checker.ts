import type {
  EntityCompleteness,
  FinancialRatio,
  IsoDate,
  Market,
  PriceOutlier,
  QualityReport,
  RatioAnomaly,
  RatioField,
} from '../types';
import type { AnalyticsStore } from '../data/store';
import { logger, subDaysIso, todayIn, weekdaysBetween } from '../utils';

export interface QualityOptions {
  lookbackDays?: number;
  volatilityWindow?: number;
  volatilityMultiple?: number;
  statementStartYear?: number;
  timezone?: string;
  clock?: () => Date;
}

export interface QualityQuery {
  market?: Market;
  lookbackDays?: number;
}

export const RATIO_THRESHOLDS: Record<RatioField, { min: number; max: number }> = {
  roe: { min: -100, max: 100 },
  roa: { min: -100, max: 100 },
  operatingMargin: { min: -100, max: 100 },
  netMargin: { min: -100, max: 100 },
  debtRatio: { min: 0, max: 1000 },
  per: { min: -100, max: 1000 },
  pbr: { min: -10, max: 100 },
  psr: { min: -10, max: 100 },
};

const RATIO_FIELDS: RatioField[] = ['roe', 'roa', 'operatingMargin', 'netMargin', 'debtRatio', 'per', 'pbr', 'psr'];
const VALUATION_FIELDS: RatioField[] = ['per', 'pbr', 'psr'];
const KEY_FIELDS: RatioField[] = ['roe', 'roa', 'per', 'pbr', 'psr', 'debtRatio'];
const HIGH_NULL_COUNT = 4;

function rate(populated: number, expected: number): number {
  return expected > 0 ? Math.round((populated / expected) * 10000) / 100 : 0;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function stddev(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Closes whose day-over-day return exceeds `multiple` standard deviations
 * of the preceding `window` returns.
 */
export function findPriceOutliers(
  symbol: string,
  series: Array<{ tradeDate: IsoDate; close: number }>,
  window: number,
  multiple: number
): PriceOutlier[] {
  const returns: number[] = [];
  const outliers: PriceOutlier[] = [];

  for (let i = 1; i < series.length; i++) {
    const previous = series[i - 1].close;
    if (previous <= 0) continue;
    const ret = series[i].close / previous - 1;

    if (returns.length >= window) {
      const sigma = stddev(returns.slice(-window));
      if (sigma > 0 && Math.abs(ret) > multiple * sigma) {
        outliers.push({
          symbol,
          tradeDate: series[i].tradeDate,
          previousClose: previous,
          close: series[i].close,
          returnPct: round2(ret * 100),
          sigmaMultiple: round2(Math.abs(ret) / sigma),
        });
      }
    }
    returns.push(ret);
  }
  return outliers;
}

/** Range, sign and sparsity checks on one ratio row. */
export function findRatioAnomalies(ratio: FinancialRatio): RatioAnomaly[] {
  const anomalies: RatioAnomaly[] = [];
  const base = { symbol: ratio.symbol, fiscalYear: ratio.fiscalYear, reportType: ratio.reportType };

  const nullCount = KEY_FIELDS.filter((f) => ratio[f] === null).length;
  if (nullCount >= HIGH_NULL_COUNT) {
    anomalies.push({
      ...base,
      field: 'null_ratio',
      value: nullCount,
      issue: 'high_null_ratio',
      detail: `${nullCount} of ${KEY_FIELDS.length} key ratios missing`,
    });
  }

  for (const field of RATIO_FIELDS) {
    const value = ratio[field];
    if (value === null) continue;

    if (VALUATION_FIELDS.includes(field) && value < 0) {
      anomalies.push({ ...base, field, value, issue: 'negative', detail: `${field} is negative` });
    }
    const { min, max } = RATIO_THRESHOLDS[field];
    if (value < min || value > max) {
      anomalies.push({ ...base, field, value, issue: 'out_of_range', detail: `${field} outside [${min}, ${max}]` });
    }
  }
  return anomalies;
}

export function gradeFor(score: number): QualityReport['grade'] {
  if (score >= 90) return 'A';
  if (score >= 80) return 'B';
  if (score >= 70) return 'C';
  if (score >= 60) return 'D';
  return 'F';
}

/** Read-only data quality report over the active universe. */
export class QualityChecker {
  private readonly lookbackDays: number;
  private readonly volatilityWindow: number;
  private readonly volatilityMultiple: number;
  private readonly statementStartYear: number;
  private readonly timezone: string;
  private readonly clock: () => Date;

  constructor(private readonly store: AnalyticsStore, options: QualityOptions = {}) {
    this.lookbackDays = options.lookbackDays ?? 90;
    this.volatilityWindow = options.volatilityWindow ?? 20;
    this.volatilityMultiple = options.volatilityMultiple ?? 5;
    this.statementStartYear = options.statementStartYear ?? 2015;
    this.timezone = options.timezone ?? 'Asia/Seoul';
    this.clock = options.clock ?? (() => new Date());
  }

  async report(query: QualityQuery = {}): Promise<QualityReport> {
    const today = todayIn(this.timezone, this.clock());
    const from = subDaysIso(today, query.lookbackDays ?? this.lookbackDays);
    const tickers = await this.store.listTickers({
      markets: query.market ? [query.market] : undefined,
      status: 'active',
    });
    const symbols = tickers.map((t) => t.symbol);

    const completeness = await this.completeness(symbols, from, today);

    const withStatements = new Set(await this.store.listSymbolsWithStatements(symbols));
    const withMarketCap = new Set(await this.store.listSymbolsWithMarketCap(symbols));
    const ratios = await this.store.getRatios(symbols);
    const latestRatios = this.latestPerSymbol(ratios);

    // Ticker coverage: share of active tickers with any market cap / any ratio row
    const ratioCoverage = rate(latestRatios.length, symbols.length);
    const coverage: EntityCompleteness[] = [
      { entity: 'market_cap', expected: symbols.length, populated: withMarketCap.size, rate: rate(withMarketCap.size, symbols.length) },
      { entity: 'ratios', expected: symbols.length, populated: latestRatios.length, rate: ratioCoverage },
    ];

    const priceOutliers: PriceOutlier[] = [];
    for (const symbol of symbols) {
      const series = await this.store.getPriceSeries(symbol, from, today);
      priceOutliers.push(...findPriceOutliers(symbol, series, this.volatilityWindow, this.volatilityMultiple));
    }

    const ratioAnomalies = latestRatios.flatMap(findRatioAnomalies);

    const noStatements = symbols.filter((s) => !withStatements.has(s));
    const noMarketCap = symbols.filter((s) => withStatements.has(s) && !withMarketCap.has(s));

    const anomalyRate = latestRatios.length > 0 ? (this.anomalyCount(ratioAnomalies) / latestRatios.length) * 100 : 0;
    const missingRate = symbols.length > 0 ? ((noStatements.length + noMarketCap.length) / symbols.length) * 100 : 0;
    const qualityScore = round2(
      ratioCoverage * 0.5 + Math.max(0, 100 - anomalyRate) * 0.3 + Math.max(0, 100 - missingRate) * 0.2
    );

    const report: QualityReport = {
      generatedAt: this.clock().toISOString(),
      market: query.market ?? null,
      activeTickers: symbols.length,
      completeness: [...completeness, ...coverage],
      priceOutliers,
      ratioAnomalies,
      missing: { noStatements, noMarketCap },
      qualityScore,
      grade: gradeFor(qualityScore),
    };

    logger.info('Quality', 'Quality report generated', {
      market: report.market ?? 'all',
      activeTickers: report.activeTickers,
      priceOutliers: priceOutliers.length,
      ratioAnomalies: ratioAnomalies.length,
      qualityScore,
      grade: report.grade,
    });
    return report;
  }

  private async completeness(symbols: string[], from: IsoDate, to: IsoDate): Promise<EntityCompleteness[]> {
    const tradingDays = weekdaysBetween(from, to).length;
    const expectedSeries = tradingDays * symbols.length;
    const endYear = Number(to.slice(0, 4)) - 1;
    const years = Math.max(0, endYear - this.statementStartYear + 1);

    const prices = await this.store.countObservations('prices', symbols, from, to);
    const snapshots = await this.store.countObservations('snapshots', symbols, from, to);
    const statements = await this.store.countStatements(symbols, this.statementStartYear, endYear, 'annual');

    return [
      { entity: 'prices', expected: expectedSeries, populated: prices, rate: rate(prices, expectedSeries) },
      { entity: 'snapshots', expected: expectedSeries, populated: snapshots, rate: rate(snapshots, expectedSeries) },
      {
        entity: 'statements',
        expected: years * symbols.length,
        populated: statements,
        rate: rate(statements, years * symbols.length),
      },
    ];
  }

  private latestPerSymbol(ratios: FinancialRatio[]): FinancialRatio[] {
    const latest = new Map<string, FinancialRatio>();
    for (const ratio of ratios) {
      const current = latest.get(ratio.symbol);
      if (!current || ratio.fiscalDate > current.fiscalDate) {
        latest.set(ratio.symbol, ratio);
      }
    }
    return [...latest.values()];
  }

  /** Out-of-range fields count once per ticker; sign and sparsity flags count individually. */
  private anomalyCount(anomalies: RatioAnomaly[]): number {
    const outOfRange = new Set(anomalies.filter((a) => a.issue === 'out_of_range').map((a) => a.symbol));
    return outOfRange.size + anomalies.filter((a) => a.issue !== 'out_of_range').length;
  }
}
