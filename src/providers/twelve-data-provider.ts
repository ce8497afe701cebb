import type { DateRange, Market, PricePoint, Ticker } from '../types';
import type { Capability } from './types';
import { BaseProvider, ProviderOptions } from './base-provider';
import {
  AuthenticationError,
  CollectionError,
  ErrorCode,
  MalformedResponseError,
  QuotaExhaustedError,
  RateLimitError,
  UpstreamError,
  addDaysIso,
} from '../utils';

const TWELVE_DATA_BASE_URL = 'https://api.twelvedata.com';

const NO_DATA_MESSAGE = 'No data is available';

interface TwelveDataBar {
  datetime: string;
  open: string;
  high: string;
  low: string;
  close: string;
  volume: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrorBody(body: unknown): body is { status: 'error'; code?: number; message?: string } {
  return isRecord(body) && body.status === 'error';
}

function parseBars(body: unknown): TwelveDataBar[] {
  if (!isRecord(body)) {
    throw new MalformedResponseError('Twelve Data response is not an object');
  }
  const values = body.values;
  if (values === undefined) return [];
  if (!Array.isArray(values)) {
    throw new MalformedResponseError('Twelve Data values is not a list');
  }
  return values.filter(isRecord).map((v) => ({
    datetime: String(v.datetime ?? ''),
    open: String(v.open ?? ''),
    high: String(v.high ?? ''),
    low: String(v.low ?? ''),
    close: String(v.close ?? ''),
    volume: String(v.volume ?? '0'),
  }));
}

/** Twelve Data daily time series for US tickers. */
export class TwelveDataProvider extends BaseProvider {
  readonly markets: readonly Market[] = ['NASDAQ', 'NYSE', 'AMEX'];
  readonly capabilities: readonly Capability[] = ['fetchOhlcv'];
  readonly earliestDate = '2000-01-03';

  constructor(private readonly apiKey: string, options: ProviderOptions) {
    super('twelvedata', TWELVE_DATA_BASE_URL, { priority: 10, ...options });
  }

  protected inspectBody(body: unknown, endpoint: string): void {
    if (!isErrorBody(body)) return;

    const code = typeof body.code === 'number' ? body.code : 0;
    const message = typeof body.message === 'string' ? body.message : 'unknown error';
    // "No data" is an empty result, not a failure
    if (message.includes(NO_DATA_MESSAGE)) return;

    const details = { provider: this.name, endpoint, code };
    if (code === 400 || code === 404) {
      throw new CollectionError(ErrorCode.SYMBOL_NOT_FOUND, `Twelve Data: ${message}`, details);
    }
    if (code === 401 || code === 403) {
      throw new AuthenticationError(`Twelve Data: ${message}`, details);
    }
    if (code === 429) {
      if (message.toLowerCase().includes('day')) {
        throw new QuotaExhaustedError(`Twelve Data daily credits exhausted: ${message}`, details);
      }
      throw new RateLimitError(60000, details);
    }
    if (code >= 500) {
      throw new UpstreamError(code, `Twelve Data: ${message}`, details);
    }
    throw new MalformedResponseError(`Twelve Data: ${message}`, details);
  }

  async fetchOhlcv(ticker: Ticker, range: DateRange): Promise<PricePoint[]> {
    const body = await this.request<unknown>('time_series', {
      url: '/time_series',
      params: {
        symbol: ticker.symbol,
        interval: '1day',
        outputsize: 5000,
        start_date: range.from,
        // end_date is exclusive
        end_date: addDaysIso(range.to, 1),
        order: 'ASC',
        apikey: this.apiKey,
      },
    });

    if (isErrorBody(body)) return [];

    const points: PricePoint[] = [];
    for (const bar of parseBars(body)) {
      const tradeDate = bar.datetime.slice(0, 10);
      if (tradeDate < range.from || tradeDate > range.to) continue;

      const close = Number(bar.close);
      if (!Number.isFinite(close)) continue;

      points.push({
        symbol: ticker.symbol,
        tradeDate,
        open: Number(bar.open),
        high: Number(bar.high),
        low: Number(bar.low),
        close,
        volume: Number(bar.volume) || 0,
      });
    }
    return points;
  }
}
