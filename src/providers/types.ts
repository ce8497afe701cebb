import type {
  DateRange,
  FinancialStatement,
  FiscalPeriod,
  IsoDate,
  Market,
  MarketSnapshot,
  PricePoint,
  Ticker,
} from '../types';

export type Capability = 'listSymbols' | 'fetchOhlcv' | 'fetchSnapshot' | 'fetchStatement';

export const CAPABILITIES: readonly Capability[] = ['listSymbols', 'fetchOhlcv', 'fetchSnapshot', 'fetchStatement'];

/**
 * A rate-limited adapter over one external source. Each adapter implements
 * the subset of capability methods it supports and lists them in
 * `capabilities`; callers select adapters by capability and market through
 * the registry, never by name.
 */
export interface DataProvider {
  readonly name: string;
  readonly markets: readonly Market[];
  readonly capabilities: readonly Capability[];
  /** Oldest date the source can serve, if it has a floor. */
  readonly earliestDate: IsoDate | null;
  /** Higher wins when several adapters serve the same capability and market. */
  readonly priority: number;

  listSymbols?(market: Market): Promise<Ticker[]>;
  fetchOhlcv?(ticker: Ticker, range: DateRange): Promise<PricePoint[]>;
  fetchSnapshot?(ticker: Ticker, range: DateRange): Promise<MarketSnapshot[]>;
  fetchStatement?(ticker: Ticker, period: FiscalPeriod): Promise<FinancialStatement>;

  getStats?(): { pending: number; requestsInWindow: number; maxRequests: number };
}

export interface SymbolLister extends DataProvider {
  listSymbols(market: Market): Promise<Ticker[]>;
}

export interface OhlcvSource extends DataProvider {
  fetchOhlcv(ticker: Ticker, range: DateRange): Promise<PricePoint[]>;
}

export interface SnapshotSource extends DataProvider {
  fetchSnapshot(ticker: Ticker, range: DateRange): Promise<MarketSnapshot[]>;
}

export interface StatementSource extends DataProvider {
  fetchStatement(ticker: Ticker, period: FiscalPeriod): Promise<FinancialStatement>;
}

export interface CapabilityMap {
  listSymbols: SymbolLister;
  fetchOhlcv: OhlcvSource;
  fetchSnapshot: SnapshotSource;
  fetchStatement: StatementSource;
}

type CapabilityGuards = { [C in Capability]: (p: DataProvider) => p is CapabilityMap[C] };

const GUARDS: CapabilityGuards = {
  listSymbols: (p): p is SymbolLister => p.capabilities.includes('listSymbols') && typeof p.listSymbols === 'function',
  fetchOhlcv: (p): p is OhlcvSource => p.capabilities.includes('fetchOhlcv') && typeof p.fetchOhlcv === 'function',
  fetchSnapshot: (p): p is SnapshotSource => p.capabilities.includes('fetchSnapshot') && typeof p.fetchSnapshot === 'function',
  fetchStatement: (p): p is StatementSource =>
    p.capabilities.includes('fetchStatement') && typeof p.fetchStatement === 'function',
};

export function supports<C extends Capability>(provider: DataProvider, capability: C): provider is CapabilityMap[C] {
  const guard: (p: DataProvider) => p is CapabilityMap[C] = GUARDS[capability];
  return guard(provider);
}
