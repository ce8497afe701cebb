import type { DateRange, Market, MarketSnapshot, PricePoint, Ticker } from '../types';
import type { Capability } from './types';
import { BaseProvider, ProviderOptions } from './base-provider';
import {
  MalformedResponseError,
  SymbolNotFoundError,
  fromCompactDate,
  toCompactDate,
  logger,
} from '../utils';

const KRX_BASE_URL = 'http://data.krx.co.kr';
const JSON_ENDPOINT = '/comm/bldAttendant/getJsonData.cmd';

const BLD_LISTING = 'dbms/MDC/STAT/standard/MDCSTAT01901';
const BLD_DAILY_BY_ISSUE = 'dbms/MDC/STAT/standard/MDCSTAT01701';

const MARKET_IDS: Partial<Record<Market, string>> = {
  KOSPI: 'STK',
  KOSDAQ: 'KSQ',
};

// Prices and snapshots of one issue come from one daily response
const DAILY_TTL_MS = 5 * 60 * 1000;

// Share class label KRX uses for common stock
const COMMON_STOCK_LABEL = '보통주';

interface KrxListingRow {
  ISU_CD: string;          // ISIN
  ISU_SRT_CD: string;      // 6-digit short code
  ISU_ABBRV: string;
  ISU_NM?: string;
  KIND_STKCERT_TP_NM?: string;
}

interface KrxDailyRow {
  TRD_DD: string;          // YYYY/MM/DD
  TDD_OPNPRC: string;
  TDD_HGPRC: string;
  TDD_LWPRC: string;
  TDD_CLSPRC: string;
  ACC_TRDVOL: string;
  ACC_TRDVAL: string;
  MKTCAP: string;
  LIST_SHRS: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rowsOf(body: unknown, key: 'OutBlock_1' | 'output'): Record<string, unknown>[] {
  if (!isRecord(body)) {
    throw new MalformedResponseError('KRX response is not an object');
  }
  const rows = body[key];
  if (rows === undefined) return [];
  if (!Array.isArray(rows)) {
    throw new MalformedResponseError(`KRX response field ${key} is not a list`);
  }
  return rows.filter(isRecord);
}

function text(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  return typeof value === 'string' ? value.trim() : typeof value === 'number' ? String(value) : '';
}

/** KRX numbers come as "1,234,500"; "-" marks an empty cell. */
export function parseKrxNumber(value: string): number | null {
  const cleaned = value.replace(/,/g, '').trim();
  if (cleaned === '' || cleaned === '-') return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

function toListingRow(row: Record<string, unknown>): KrxListingRow {
  return {
    ISU_CD: text(row, 'ISU_CD'),
    ISU_SRT_CD: text(row, 'ISU_SRT_CD'),
    ISU_ABBRV: text(row, 'ISU_ABBRV'),
    ISU_NM: text(row, 'ISU_NM'),
    KIND_STKCERT_TP_NM: text(row, 'KIND_STKCERT_TP_NM'),
  };
}

function toDailyRow(row: Record<string, unknown>): KrxDailyRow {
  return {
    TRD_DD: text(row, 'TRD_DD'),
    TDD_OPNPRC: text(row, 'TDD_OPNPRC'),
    TDD_HGPRC: text(row, 'TDD_HGPRC'),
    TDD_LWPRC: text(row, 'TDD_LWPRC'),
    TDD_CLSPRC: text(row, 'TDD_CLSPRC'),
    ACC_TRDVOL: text(row, 'ACC_TRDVOL'),
    ACC_TRDVAL: text(row, 'ACC_TRDVAL'),
    MKTCAP: text(row, 'MKTCAP'),
    LIST_SHRS: text(row, 'LIST_SHRS'),
  };
}

/**
 * KRX market data service: KOSPI/KOSDAQ listings and per-issue daily
 * history. Prices and snapshots come from the same daily endpoint.
 */
export class KrxProvider extends BaseProvider {
  readonly markets: readonly Market[] = ['KOSPI', 'KOSDAQ'];
  readonly capabilities: readonly Capability[] = ['listSymbols', 'fetchOhlcv', 'fetchSnapshot'];
  readonly earliestDate = '1995-05-02';

  private readonly dailyCache = new Map<string, { fetchedAt: number; rows: Promise<KrxDailyRow[]> }>();

  constructor(options: ProviderOptions) {
    super('krx', KRX_BASE_URL, { priority: 10, ...options }, {
      'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
      Referer: 'http://data.krx.co.kr/contents/MDC/MDI/mdiLoader/index.cmd',
      'User-Agent': 'Mozilla/5.0 (compatible; equity-collector)',
    });
  }

  private post(endpoint: string, form: Record<string, string>): Promise<unknown> {
    return this.request<unknown>(endpoint, {
      method: 'POST',
      url: JSON_ENDPOINT,
      data: new URLSearchParams(form).toString(),
    });
  }

  async listSymbols(market: Market): Promise<Ticker[]> {
    const mktId = MARKET_IDS[market];
    if (!mktId) {
      throw new MalformedResponseError(`KRX does not list ${market}`);
    }

    const body = await this.post('listing', { bld: BLD_LISTING, locale: 'ko_KR', mktId, share: '1', csvxls_isNo: 'false' });
    const tickers = rowsOf(body, 'OutBlock_1')
      .map(toListingRow)
      .filter((r) => r.ISU_SRT_CD.length > 0)
      .map((r): Ticker => ({
        symbol: r.ISU_SRT_CD,
        name: r.ISU_ABBRV || r.ISU_NM || r.ISU_SRT_CD,
        market,
        country: 'KR',
        assetClass: r.KIND_STKCERT_TP_NM === COMMON_STOCK_LABEL ? 'common_stock' : 'other',
        status: 'active',
        isin: r.ISU_CD || null,
      }));

    logger.info('KRX', `Listed ${tickers.length} ${market} issues`);
    return tickers;
  }

  private async fetchDaily(ticker: Ticker, range: DateRange): Promise<KrxDailyRow[]> {
    if (!ticker.isin) {
      throw new SymbolNotFoundError(ticker.symbol, { reason: 'missing ISIN' });
    }

    const now = Date.now();
    for (const [staleKey, entry] of this.dailyCache) {
      if (now - entry.fetchedAt >= DAILY_TTL_MS) this.dailyCache.delete(staleKey);
    }

    const key = `${ticker.isin}|${range.from}|${range.to}`;
    const cached = this.dailyCache.get(key);
    if (cached) {
      return cached.rows;
    }

    const rows = this.requestDaily(ticker.isin, range);
    this.dailyCache.set(key, { fetchedAt: now, rows });
    try {
      return await rows;
    } catch (error) {
      // Failures are not cached; the next caller asks again
      this.dailyCache.delete(key);
      throw error;
    }
  }

  private async requestDaily(isin: string, range: DateRange): Promise<KrxDailyRow[]> {
    const body = await this.post('daily', {
      bld: BLD_DAILY_BY_ISSUE,
      locale: 'ko_KR',
      isuCd: isin,
      strtDd: toCompactDate(range.from),
      endDd: toCompactDate(range.to),
      adjStkPrc: '2',
      share: '1',
      money: '1',
      csvxls_isNo: 'false',
    });

    return rowsOf(body, 'output')
      .map(toDailyRow)
      .filter((r) => r.TRD_DD.length > 0);
  }

  async fetchOhlcv(ticker: Ticker, range: DateRange): Promise<PricePoint[]> {
    const rows = await this.fetchDaily(ticker, range);
    const points: PricePoint[] = [];

    for (const r of rows) {
      const close = parseKrxNumber(r.TDD_CLSPRC);
      const volume = parseKrxNumber(r.ACC_TRDVOL);
      // Suspended sessions report 0 or "-"
      if (close === null || close <= 0 || volume === null) continue;

      points.push({
        symbol: ticker.symbol,
        tradeDate: fromCompactDate(r.TRD_DD),
        open: parseKrxNumber(r.TDD_OPNPRC) ?? close,
        high: parseKrxNumber(r.TDD_HGPRC) ?? close,
        low: parseKrxNumber(r.TDD_LWPRC) ?? close,
        close,
        volume,
      });
    }

    return points;
  }

  async fetchSnapshot(ticker: Ticker, range: DateRange): Promise<MarketSnapshot[]> {
    const rows = await this.fetchDaily(ticker, range);
    return rows.map((r) => ({
      symbol: ticker.symbol,
      tradeDate: fromCompactDate(r.TRD_DD),
      marketCap: parseKrxNumber(r.MKTCAP),
      sharesOutstanding: parseKrxNumber(r.LIST_SHRS),
      tradedValue: parseKrxNumber(r.ACC_TRDVAL),
    }));
  }
}
