import { readFileSync } from 'fs';
import { resolve } from 'path';
import type {
  FinancialStatement,
  FiscalPeriod,
  Market,
  ReportType,
  StatementLineItems,
  Ticker,
} from '../types';
import type { Capability } from './types';
import { BaseProvider, ProviderOptions } from './base-provider';
import {
  AuthenticationError,
  CollectionError,
  ConfigError,
  ErrorCode,
  MalformedResponseError,
  NoDataError,
  QuotaExhaustedError,
  SymbolNotFoundError,
  UpstreamError,
  fromCompactDate,
  logger,
} from '../utils';

const DART_BASE_URL = 'https://opendart.fss.or.kr/api';

const REPORT_CODES: Record<ReportType, string> = {
  annual: '11011',
  Q1: '11013',
  Q2: '11012',
  Q3: '11014',
};

const FISCAL_QUARTER: Record<ReportType, 1 | 2 | 3 | null> = {
  annual: null,
  Q1: 1,
  Q2: 2,
  Q3: 3,
};

// OpenDART status codes
const STATUS_OK = '000';
const STATUS_NO_DATA = '013';
const AUTH_STATUSES = ['010', '011', '012', '901'];
const STATUS_QUOTA = '020';
const STATUS_BAD_FIELD = '100';

interface DartAccountRow {
  sj_div: string;         // BS | IS | CIS | CF | SCE
  account_id: string;
  account_nm: string;
  thstrm_amount: string;
  rcept_no: string;
  currency: string;
}

type LineItem = keyof StatementLineItems;

const ACCOUNT_IDS: Record<string, LineItem> = {
  'ifrs-full_Revenue': 'revenue',
  'dart_OperatingIncomeLoss': 'operatingIncome',
  'ifrs-full_ProfitLoss': 'netIncome',
  'ifrs-full_Assets': 'totalAssets',
  'ifrs-full_Liabilities': 'totalLiabilities',
  'ifrs-full_Equity': 'totalEquity',
  'ifrs-full_CashFlowsFromUsedInOperatingActivities': 'operatingCashFlow',
  'ifrs-full_CashFlowsFromUsedInInvestingActivities': 'investingCashFlow',
  'ifrs-full_CashFlowsFromUsedInFinancingActivities': 'financingCashFlow',
};

// Filers without standard taxonomy ids are matched on the Korean account name
const ACCOUNT_NAMES: Array<{ item: LineItem; sections: string[]; match: (name: string) => boolean }> = [
  { item: 'revenue', sections: ['IS', 'CIS'], match: (n) => n === '매출액' || n === '영업수익' || n === '수익(매출액)' },
  { item: 'operatingIncome', sections: ['IS', 'CIS'], match: (n) => n === '영업이익' || n === '영업이익(손실)' },
  {
    item: 'netIncome',
    sections: ['IS', 'CIS'],
    match: (n) => n === '지배기업의 소유주에게 귀속되는 당기순이익(손실)' || n.startsWith('당기순이익'),
  },
  { item: 'totalAssets', sections: ['BS'], match: (n) => n === '자산총계' },
  { item: 'totalLiabilities', sections: ['BS'], match: (n) => n === '부채총계' },
  { item: 'totalEquity', sections: ['BS'], match: (n) => n === '자본총계' },
  { item: 'operatingCashFlow', sections: ['CF'], match: (n) => n.includes('영업활동') && n.includes('현금흐름') },
  { item: 'investingCashFlow', sections: ['CF'], match: (n) => n.includes('투자활동') && n.includes('현금흐름') },
  { item: 'financingCashFlow', sections: ['CF'], match: (n) => n.includes('재무활동') && n.includes('현금흐름') },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  return typeof value === 'string' ? value.trim() : '';
}

export function parseDartAmount(value: string): number | null {
  const cleaned = value.replace(/,/g, '').trim();
  if (cleaned === '' || cleaned === '-') return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

function emptyLineItems(): StatementLineItems {
  return {
    revenue: null,
    operatingIncome: null,
    netIncome: null,
    totalAssets: null,
    totalLiabilities: null,
    totalEquity: null,
    operatingCashFlow: null,
    investingCashFlow: null,
    financingCashFlow: null,
  };
}

/** Maps DART account rows onto statement line items; taxonomy ids win over names. */
export function mapDartAccounts(rows: DartAccountRow[]): StatementLineItems {
  const items = emptyLineItems();

  for (const row of rows) {
    const item = ACCOUNT_IDS[row.account_id];
    if (item && items[item] === null) {
      items[item] = parseDartAmount(row.thstrm_amount);
    }
  }

  for (const { item, sections, match } of ACCOUNT_NAMES) {
    if (items[item] !== null) continue;
    const row = rows.find((r) => sections.includes(r.sj_div) && match(r.account_nm));
    if (row) {
      items[item] = parseDartAmount(row.thstrm_amount);
    }
  }

  return items;
}

export function loadCorpCodes(path: string): Map<string, string> {
  let raw: string;
  try {
    raw = readFileSync(resolve(path), 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read DART corp code map at ${path}`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new ConfigError(`DART corp code map at ${path} must be an object of ticker to corp code`);
  }

  const codes = new Map<string, string>();
  for (const [symbol, corpCode] of Object.entries(parsed)) {
    if (typeof corpCode === 'string') {
      codes.set(symbol, corpCode);
    }
  }
  return codes;
}

/**
 * OpenDART full financial statements for Korean filers. Consolidated
 * statements are preferred; filers without them fall back to separate ones.
 */
export class DartProvider extends BaseProvider {
  readonly markets: readonly Market[] = ['KOSPI', 'KOSDAQ'];
  readonly capabilities: readonly Capability[] = ['fetchStatement'];
  readonly earliestDate = '2015-01-01';

  constructor(
    private readonly apiKey: string,
    private readonly corpCodes: Map<string, string>,
    options: ProviderOptions
  ) {
    super('dart', DART_BASE_URL, { priority: 10, ...options });
  }

  protected inspectBody(body: unknown, endpoint: string): void {
    if (!isRecord(body)) {
      throw new MalformedResponseError('DART response is not an object', { endpoint });
    }
    const status = field(body, 'status');
    const message = field(body, 'message');
    const details = { provider: this.name, endpoint, status };

    if (status === STATUS_OK || status === STATUS_NO_DATA) return;
    if (AUTH_STATUSES.includes(status)) {
      throw new AuthenticationError(`DART: ${message}`, details);
    }
    if (status === STATUS_QUOTA) {
      throw new QuotaExhaustedError(`DART request limit exceeded: ${message}`, details);
    }
    if (status === STATUS_BAD_FIELD) {
      throw new CollectionError(ErrorCode.INVALID_SYMBOL, `DART rejected request: ${message}`, details);
    }
    // 800 maintenance, 900 undefined error
    throw new UpstreamError(Number(status) || 500, `DART: ${message}`, details);
  }

  private async fetchAccounts(
    corpCode: string,
    period: FiscalPeriod,
    fsDiv: 'CFS' | 'OFS'
  ): Promise<DartAccountRow[] | null> {
    const body = await this.request<unknown>('fnlttSinglAcntAll', {
      url: '/fnlttSinglAcntAll.json',
      params: {
        crtfc_key: this.apiKey,
        corp_code: corpCode,
        bsns_year: String(period.fiscalYear),
        reprt_code: REPORT_CODES[period.reportType],
        fs_div: fsDiv,
      },
    });

    if (!isRecord(body) || field(body, 'status') === STATUS_NO_DATA) {
      return null;
    }
    const list = body.list;
    if (!Array.isArray(list)) {
      throw new MalformedResponseError('DART statement list missing');
    }
    return list.filter(isRecord).map((row) => ({
      sj_div: field(row, 'sj_div'),
      account_id: field(row, 'account_id'),
      account_nm: field(row, 'account_nm'),
      thstrm_amount: field(row, 'thstrm_amount'),
      rcept_no: field(row, 'rcept_no'),
      currency: field(row, 'currency'),
    }));
  }

  async fetchStatement(ticker: Ticker, period: FiscalPeriod): Promise<FinancialStatement> {
    const corpCode = this.corpCodes.get(ticker.symbol);
    if (!corpCode) {
      throw new SymbolNotFoundError(ticker.symbol, { provider: this.name, reason: 'no DART corp code' });
    }

    let rows = await this.fetchAccounts(corpCode, period, 'CFS');
    if (rows === null) {
      logger.debug('DART', `No consolidated statement for ${ticker.symbol} ${period.fiscalYear}, trying separate`);
      rows = await this.fetchAccounts(corpCode, period, 'OFS');
    }
    if (rows === null || rows.length === 0) {
      throw new NoDataError(`No ${period.reportType} statement for ${ticker.symbol} ${period.fiscalYear}`, {
        symbol: ticker.symbol,
        ...period,
      });
    }

    const receipt = rows[0].rcept_no;
    return {
      symbol: ticker.symbol,
      fiscalYear: period.fiscalYear,
      reportType: period.reportType,
      fiscalQuarter: FISCAL_QUARTER[period.reportType],
      reportDate: receipt.length >= 8 ? fromCompactDate(receipt.slice(0, 8)) : null,
      currency: rows.find((r) => r.currency)?.currency ?? 'KRW',
      ...mapDartAccounts(rows),
    };
  }
}
