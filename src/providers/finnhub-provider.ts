import type { DateRange, Market, MarketSnapshot, Ticker } from '../types';
import type { Capability } from './types';
import { BaseProvider, ProviderOptions } from './base-provider';
import { MalformedResponseError, SymbolNotFoundError, logger } from '../utils';

const FINNHUB_BASE_URL = 'https://finnhub.io/api/v1';

const MIC_BY_MARKET: Partial<Record<Market, string>> = {
  NASDAQ: 'XNAS',
  NYSE: 'XNYS',
  AMEX: 'XASE',
};

const LISTING_TTL_MS = 10 * 60 * 1000;

// Finnhub reports market cap and shares in millions
const MILLION = 1e6;

interface FinnhubSymbol {
  symbol: string;
  description: string;
  mic: string;
  type: string;
}

interface FinnhubProfile {
  ticker?: string;
  name?: string;
  marketCapitalization?: number;
  shareOutstanding?: number;
  finnhubIndustry?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  return typeof value === 'string' ? value : '';
}

function num(row: Record<string, unknown>, key: string): number | undefined {
  const value = row[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function parseSymbols(body: unknown): FinnhubSymbol[] {
  if (!Array.isArray(body)) {
    throw new MalformedResponseError('Finnhub symbol listing is not a list');
  }
  return body.filter(isRecord).map((row) => ({
    symbol: str(row, 'symbol'),
    description: str(row, 'description'),
    mic: str(row, 'mic'),
    type: str(row, 'type'),
  }));
}

function parseProfile(body: unknown): FinnhubProfile {
  if (!isRecord(body)) {
    throw new MalformedResponseError('Finnhub profile is not an object');
  }
  return {
    ticker: str(body, 'ticker') || undefined,
    name: str(body, 'name') || undefined,
    marketCapitalization: num(body, 'marketCapitalization'),
    shareOutstanding: num(body, 'shareOutstanding'),
    finnhubIndustry: str(body, 'finnhubIndustry') || undefined,
  };
}

/**
 * Finnhub: US listings and the company profile, which carries the current
 * market cap and share count. The profile has no history, so a snapshot is
 * a single row dated at the end of the requested range.
 */
export class FinnhubProvider extends BaseProvider {
  readonly markets: readonly Market[] = ['NASDAQ', 'NYSE', 'AMEX'];
  readonly capabilities: readonly Capability[] = ['listSymbols', 'fetchSnapshot'];

  private listingCache: { fetchedAt: number; symbols: FinnhubSymbol[] } | null = null;

  constructor(private readonly apiKey: string, options: ProviderOptions) {
    super('finnhub', FINNHUB_BASE_URL, { priority: 10, ...options });
  }

  private async usListing(): Promise<FinnhubSymbol[]> {
    if (this.listingCache && Date.now() - this.listingCache.fetchedAt < LISTING_TTL_MS) {
      return this.listingCache.symbols;
    }

    const body = await this.request<unknown>('stock/symbol', {
      url: '/stock/symbol',
      params: { exchange: 'US', token: this.apiKey },
    });
    const symbols = parseSymbols(body);
    this.listingCache = { fetchedAt: Date.now(), symbols };
    return symbols;
  }

  async listSymbols(market: Market): Promise<Ticker[]> {
    const mic = MIC_BY_MARKET[market];
    if (!mic) {
      throw new MalformedResponseError(`Finnhub does not list ${market}`);
    }

    const tickers = (await this.usListing())
      .filter((s) => s.mic === mic && s.symbol.length > 0)
      .map((s): Ticker => ({
        symbol: s.symbol,
        name: s.description || s.symbol,
        market,
        country: 'US',
        assetClass: s.type === 'Common Stock' ? 'common_stock' : 'other',
        status: 'active',
      }));

    logger.info('Finnhub', `Listed ${tickers.length} ${market} symbols`);
    return tickers;
  }

  async fetchSnapshot(ticker: Ticker, range: DateRange): Promise<MarketSnapshot[]> {
    const body = await this.request<unknown>('stock/profile2', {
      url: '/stock/profile2',
      params: { symbol: ticker.symbol, token: this.apiKey },
    });
    const profile = parseProfile(body);

    // Unknown symbols come back as an empty object
    if (!profile.ticker && profile.marketCapitalization === undefined) {
      throw new SymbolNotFoundError(ticker.symbol, { provider: this.name });
    }

    return [
      {
        symbol: ticker.symbol,
        tradeDate: range.to,
        marketCap: profile.marketCapitalization !== undefined ? profile.marketCapitalization * MILLION : null,
        sharesOutstanding: profile.shareOutstanding !== undefined ? profile.shareOutstanding * MILLION : null,
        tradedValue: null,
      },
    ];
  }
}
