import { describe, it, expect, beforeEach } from 'vitest';
import { CollectionOrchestrator } from '../src/collection/orchestrator';
import { ProviderRegistry } from '../src/providers/registry';
import type { CollectionScope } from '../src/types';
import { AuthenticationError, NoDataError, SymbolNotFoundError } from '../src/utils';
import { MemoryStore } from './helpers/memory-store';
import { FakeProvider, makeTicker, weekdayBars } from './helpers/fake-providers';

// 18:00 in Seoul, 05:00 in New York: 2024-06-14 in both
const clock = () => new Date('2024-06-14T09:00:00Z');

const KOSPI: CollectionScope = { name: 'kospi', markets: ['KOSPI'] };

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('CollectionOrchestrator', () => {
  let store: MemoryStore;
  let registry: ProviderRegistry;

  beforeEach(() => {
    store = new MemoryStore();
    registry = new ProviderRegistry();
  });

  function orchestrator(options: { concurrency?: number; statementStartYear?: number } = {}): CollectionOrchestrator {
    return new CollectionOrchestrator(store, registry, { clock, ...options });
  }

  describe('incremental price collection', () => {
    it('should fetch the full window for a new ticker, then skip it on a same-day rerun', async () => {
      const provider = new FakeProvider({
        name: 'fake-kr',
        markets: ['KOSPI'],
        capabilities: ['listSymbols', 'fetchOhlcv'],
        earliestDate: '1995-05-02',
        listing: [makeTicker('005930', 'KOSPI')],
      });
      registry.register(provider);

      const first = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices'] });

      expect(provider.callsFor('fetchOhlcv')).toEqual([
        { capability: 'fetchOhlcv', symbol: '005930', range: { from: '2023-06-15', to: '2024-06-14' } },
      ]);
      expect(first.pricesWritten).toBe(262);
      expect(first.succeeded).toBe(1);
      expect(store.prices.size).toBe(262);

      const second = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices'] });

      expect(second.pricesWritten).toBe(0);
      expect(second.skipped).toBe(1);
      expect(second.succeeded).toBe(0);
      expect(provider.callsFor('fetchOhlcv')).toHaveLength(1);
    });

    it('should fetch only the days after the last stored date', async () => {
      const provider = new FakeProvider({ name: 'fake-kr', markets: ['KOSPI'], capabilities: ['fetchOhlcv'] });
      registry.register(provider);
      store.addTickers(makeTicker('005930', 'KOSPI'));
      await store.upsertPricePoints(weekdayBars('005930', { from: '2024-06-03', to: '2024-06-10' }));

      const summary = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices'] });

      expect(provider.callsFor('fetchOhlcv')[0].range).toEqual({ from: '2024-06-11', to: '2024-06-14' });
      expect(summary.pricesWritten).toBe(4);
    });

    it('should refetch the window on a full run without duplicating rows', async () => {
      const provider = new FakeProvider({ name: 'fake-kr', markets: ['KOSPI'], capabilities: ['fetchOhlcv'] });
      registry.register(provider);
      store.addTickers(makeTicker('005930', 'KOSPI'));

      await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices'] });
      const full = await orchestrator().runBatch(KOSPI, { incremental: false, entities: ['prices'] });

      expect(provider.callsFor('fetchOhlcv')[1].range).toEqual({ from: '2023-06-15', to: '2024-06-14' });
      expect(full.incremental).toBe(false);
      expect(full.pricesWritten).toBe(0);
      expect(full.succeeded).toBe(1);
      expect(store.prices.size).toBe(262);
    });

    it('should drop rows outside the requested range or for another symbol', async () => {
      registry.register(
        new FakeProvider({
          name: 'fake-kr',
          markets: ['KOSPI'],
          capabilities: ['fetchOhlcv'],
          fetchOhlcv: async (ticker) => [
            { symbol: ticker.symbol, tradeDate: '2024-06-14', open: 1, high: 1, low: 1, close: 1, volume: 1 },
            { symbol: ticker.symbol, tradeDate: '2024-06-17', open: 1, high: 1, low: 1, close: 1, volume: 1 },
            { symbol: '000660', tradeDate: '2024-06-14', open: 1, high: 1, low: 1, close: 1, volume: 1 },
          ],
        })
      );
      store.addTickers(makeTicker('005930', 'KOSPI'));

      const summary = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices'] });

      expect(summary.pricesWritten).toBe(1);
      expect([...store.prices.keys()]).toEqual(['005930|2024-06-14']);
    });
  });

  describe('fault isolation', () => {
    it('should record a failing ticker and keep collecting the rest', async () => {
      registry.register(
        new FakeProvider({
          name: 'fake-kr',
          markets: ['KOSPI'],
          capabilities: ['fetchOhlcv'],
          fetchOhlcv: async (ticker, range) => {
            if (ticker.symbol === 'BBB') throw new SymbolNotFoundError('BBB');
            return weekdayBars(ticker.symbol, range);
          },
        })
      );
      store.addTickers(makeTicker('AAA', 'KOSPI'), makeTicker('BBB', 'KOSPI'), makeTicker('CCC', 'KOSPI'));

      const summary = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices'] });

      expect(summary.totalTickers).toBe(3);
      expect(summary.succeeded).toBe(2);
      expect(summary.failed).toBe(1);
      expect(summary.pricesWritten).toBe(524);
      expect(summary.failures).toEqual([
        {
          symbol: 'BBB',
          entity: 'prices',
          reason: 'symbol_not_found',
          kind: 'permanent',
          message: 'Unknown or delisted symbol: BBB',
          provider: 'fake-kr',
        },
      ]);
      expect(summary.providerFailures).toEqual([]);
    });

    it('should keep a ticker\'s other entities when one entity fails', async () => {
      registry.register(
        new FakeProvider({
          name: 'fake-kr',
          markets: ['KOSPI'],
          capabilities: ['fetchOhlcv', 'fetchSnapshot'],
          fetchOhlcv: async () => {
            throw new NoDataError('nothing');
          },
        })
      );
      store.addTickers(makeTicker('005930', 'KOSPI'));

      const summary = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices', 'snapshots'] });

      expect(summary.failed).toBe(1);
      expect(summary.snapshotsWritten).toBe(262);
      expect(summary.failures.map((f) => `${f.entity}:${f.reason}`)).toEqual(['prices:no_data']);
    });

    it('should stop calling a provider for the rest of the run after a systemic failure', async () => {
      const provider = new FakeProvider({
        name: 'fake-kr',
        markets: ['KOSPI'],
        capabilities: ['fetchOhlcv'],
        fetchOhlcv: async () => {
          throw new AuthenticationError('bad key');
        },
      });
      registry.register(provider);
      store.addTickers(makeTicker('AAA', 'KOSPI'), makeTicker('BBB', 'KOSPI'), makeTicker('CCC', 'KOSPI'));

      const summary = await orchestrator({ concurrency: 1 }).runBatch(KOSPI, { incremental: true, entities: ['prices'] });

      expect(provider.callsFor('fetchOhlcv')).toHaveLength(1);
      expect(summary.failed).toBe(3);
      expect(summary.failures.map((f) => f.reason)).toEqual(['auth_required', 'provider_unavailable', 'provider_unavailable']);
      expect(summary.failures.every((f) => f.provider === 'fake-kr')).toBe(true);
      expect(summary.providerFailures).toHaveLength(1);
      expect(summary.providerFailures[0]).toMatchObject({
        provider: 'fake-kr',
        capability: 'fetchOhlcv',
        reason: 'auth_required',
        message: 'bad key',
      });
    });

    it('should record a persistence failure against the ticker', async () => {
      registry.register(new FakeProvider({ name: 'fake-kr', markets: ['KOSPI'], capabilities: ['fetchOhlcv'] }));
      store.addTickers(makeTicker('005930', 'KOSPI'));
      store.priceWriteError = new Error('disk full');

      const summary = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices'] });

      expect(summary.failed).toBe(1);
      expect(summary.failures[0]).toMatchObject({
        reason: 'db_query_error',
        kind: 'persistence',
        message: 'Failed to persist prices for 005930: disk full',
      });
    });

    it('should fail the entity when no provider offers the capability', async () => {
      registry.register(new FakeProvider({ name: 'fake-kr', markets: ['KOSPI'], capabilities: ['fetchOhlcv'] }));
      store.addTickers(makeTicker('005930', 'KOSPI'));

      const summary = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices', 'snapshots'] });

      expect(summary.pricesWritten).toBe(262);
      expect(summary.failures).toEqual([
        {
          symbol: '005930',
          entity: 'snapshots',
          reason: 'capability_unsupported',
          kind: 'permanent',
          message: 'No provider offers fetchSnapshot for KOSPI',
        },
      ]);
    });
  });

  describe('universe', () => {
    it('should take the first tickers by symbol when maxTickers is set', async () => {
      const provider = new FakeProvider({ name: 'fake-kr', markets: ['KOSPI'], capabilities: ['fetchOhlcv'] });
      registry.register(provider);
      store.addTickers(
        makeTicker('EEE', 'KOSPI'),
        makeTicker('BBB', 'KOSPI'),
        makeTicker('DDD', 'KOSPI'),
        makeTicker('AAA', 'KOSPI'),
        makeTicker('CCC', 'KOSPI')
      );

      const summary = await orchestrator({ concurrency: 1 }).runBatch(KOSPI, {
        incremental: true,
        entities: ['prices'],
        maxTickers: 2,
      });

      expect(summary.totalTickers).toBe(2);
      expect(provider.callsFor('fetchOhlcv').map((c) => c.symbol)).toEqual(['AAA', 'BBB']);
    });

    it('should skip inactive tickers and tickers of other markets', async () => {
      const provider = new FakeProvider({
        name: 'fake-kr',
        markets: ['KOSPI', 'KOSDAQ'],
        capabilities: ['fetchOhlcv'],
      });
      registry.register(provider);
      store.addTickers(
        makeTicker('AAA', 'KOSPI'),
        makeTicker('BBB', 'KOSPI', { status: 'inactive' }),
        makeTicker('CCC', 'KOSDAQ')
      );

      const summary = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices'] });

      expect(summary.totalTickers).toBe(1);
      expect(provider.callsFor('fetchOhlcv').map((c) => c.symbol)).toEqual(['AAA']);
    });

    it('should mark tickers missing from the listing inactive', async () => {
      registry.register(
        new FakeProvider({
          name: 'fake-kr',
          markets: ['KOSPI'],
          capabilities: ['listSymbols', 'fetchOhlcv'],
          listing: [makeTicker('AAA', 'KOSPI'), makeTicker('BBB', 'KOSPI')],
        })
      );
      store.addTickers(makeTicker('ZZZ', 'KOSPI'));

      const summary = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices'] });

      expect(summary.symbolsRefreshed).toBe(2);
      expect(summary.totalTickers).toBe(2);
      expect(store.tickers.get('ZZZ')?.status).toBe('inactive');
    });

    it('should collapse repeated listing rows and keep stored reference fields', async () => {
      registry.register(
        new FakeProvider({
          name: 'fake-kr',
          markets: ['KOSPI'],
          capabilities: ['listSymbols', 'fetchOhlcv'],
          listing: [makeTicker('AAA', 'KOSPI'), makeTicker('AAA', 'KOSPI', { name: 'AAA Holdings' })],
        })
      );
      store.addTickers(makeTicker('AAA', 'KOSPI', { sector: 'Semiconductors', isin: 'KR7000000001' }));

      const summary = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices'] });

      expect(summary.symbolsRefreshed).toBe(1);
      expect(summary.totalTickers).toBe(1);
      expect(store.tickers.get('AAA')).toEqual({
        symbol: 'AAA',
        name: 'AAA Holdings',
        market: 'KOSPI',
        country: 'KR',
        assetClass: 'common_stock',
        status: 'active',
        sector: 'Semiconductors',
        industry: null,
        isin: 'KR7000000001',
      });
    });

    it('should not deactivate anything when the listing comes back empty', async () => {
      registry.register(
        new FakeProvider({
          name: 'fake-kr',
          markets: ['KOSPI'],
          capabilities: ['listSymbols', 'fetchOhlcv'],
          listing: [],
        })
      );
      store.addTickers(makeTicker('AAA', 'KOSPI'));

      const summary = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices'] });

      expect(store.markInactiveCalls).toEqual([]);
      expect(summary.totalTickers).toBe(1);
    });

    it('should keep only the listed symbols of a ticker-list scope and never deactivate', async () => {
      registry.register(
        new FakeProvider({
          name: 'fake-us',
          markets: ['NASDAQ'],
          capabilities: ['listSymbols', 'fetchOhlcv'],
          listing: [makeTicker('AAPL', 'NASDAQ'), makeTicker('MSFT', 'NASDAQ'), makeTicker('ZM', 'NASDAQ')],
        })
      );

      const summary = await orchestrator().runBatch(
        { name: 'us', markets: ['NASDAQ'], symbols: ['AAPL', 'MSFT'] },
        { incremental: true, entities: ['prices'] }
      );

      expect([...store.tickers.keys()].sort()).toEqual(['AAPL', 'MSFT']);
      expect(store.markInactiveCalls).toEqual([]);
      expect(summary.totalTickers).toBe(2);
    });

    it('should fall back to the stored universe when the listing fails', async () => {
      registry.register(
        new FakeProvider({
          name: 'lister',
          markets: ['KOSPI'],
          capabilities: ['listSymbols'],
          listSymbols: async () => {
            throw new AuthenticationError('listing refused');
          },
        })
      );
      registry.register(new FakeProvider({ name: 'prices', markets: ['KOSPI'], capabilities: ['fetchOhlcv'] }));
      store.addTickers(makeTicker('AAA', 'KOSPI'));

      const summary = await orchestrator().runBatch(KOSPI, { incremental: true, entities: ['prices'] });

      expect(summary.succeeded).toBe(1);
      expect(summary.providerFailures.map((p) => `${p.provider}:${p.capability}:${p.reason}`)).toEqual([
        'lister:listSymbols:auth_required',
      ]);
    });
  });

  describe('statements', () => {
    it('should collect missing fiscal years and skip years with no filing', async () => {
      const provider = new FakeProvider({
        name: 'filings',
        markets: ['KOSPI'],
        capabilities: ['fetchStatement'],
        fetchStatement: async (ticker, period) => {
          if (period.fiscalYear === 2022) throw new NoDataError('no 2022 filing');
          return {
            symbol: ticker.symbol,
            fiscalYear: period.fiscalYear,
            reportType: period.reportType,
            fiscalQuarter: null,
            reportDate: null,
            currency: 'KRW',
            revenue: 10,
            operatingIncome: 2,
            netIncome: 1,
            totalAssets: 20,
            totalLiabilities: 8,
            totalEquity: 12,
            operatingCashFlow: null,
            investingCashFlow: null,
            financingCashFlow: null,
          };
        },
      });
      registry.register(provider);
      store.addTickers(makeTicker('005930', 'KOSPI'));

      const first = await orchestrator({ statementStartYear: 2021 }).runBatch(KOSPI, {
        incremental: true,
        entities: ['statements'],
      });

      expect(provider.callsFor('fetchStatement').map((c) => c.period?.fiscalYear)).toEqual([2021, 2022, 2023]);
      expect(first.statementsWritten).toBe(2);
      expect(first.succeeded).toBe(1);

      const second = await orchestrator({ statementStartYear: 2021 }).runBatch(KOSPI, {
        incremental: true,
        entities: ['statements'],
      });

      expect(second.skipped).toBe(1);
      expect(provider.callsFor('fetchStatement')).toHaveLength(3);
    });
    it('should keep quarterly and annual statements of one year apart', async () => {
      const provider = new FakeProvider({ name: 'filings', markets: ['KOSPI'], capabilities: ['fetchStatement'] });
      registry.register(provider);
      store.addTickers(makeTicker('005930', 'KOSPI'));

      const first = await orchestrator({ statementStartYear: 2023 }).runBatch(KOSPI, {
        incremental: true,
        entities: ['statements'],
        reportTypes: ['annual', 'Q1'],
      });

      expect(provider.callsFor('fetchStatement').map((c) => c.period)).toEqual([
        { fiscalYear: 2023, reportType: 'annual' },
        { fiscalYear: 2023, reportType: 'Q1' },
        { fiscalYear: 2024, reportType: 'Q1' },
      ]);
      expect(first.statementsWritten).toBe(3);
      expect([...store.statements.keys()].sort()).toEqual(['005930|2023|Q1', '005930|2023|annual', '005930|2024|Q1']);

      const second = await orchestrator({ statementStartYear: 2023 }).runBatch(KOSPI, {
        incremental: true,
        entities: ['statements'],
        reportTypes: ['annual', 'Q1'],
      });

      expect(second.skipped).toBe(1);
      expect(provider.callsFor('fetchStatement')).toHaveLength(3);
    });
  });

  describe('deadline', () => {
    it('should leave tickers not started before the deadline as not attempted', async () => {
      registry.register(
        new FakeProvider({
          name: 'fake-kr',
          markets: ['KOSPI'],
          capabilities: ['fetchOhlcv'],
          fetchOhlcv: async (ticker, range) => {
            await delay(80);
            return weekdayBars(ticker.symbol, range);
          },
        })
      );
      store.addTickers(makeTicker('AAA', 'KOSPI'), makeTicker('BBB', 'KOSPI'), makeTicker('CCC', 'KOSPI'));

      const summary = await orchestrator({ concurrency: 1 }).runBatch(KOSPI, {
        incremental: true,
        entities: ['prices'],
        deadlineMs: 40,
        refreshSymbols: false,
      });

      expect(summary.totalTickers).toBe(3);
      expect(summary.succeeded).toBe(1);
      expect(summary.notAttempted).toBe(2);
      expect(summary.truncatedByDeadline).toBe(true);
    });
  });

  it('should carry the scope name in the run id and summary', async () => {
    registry.register(new FakeProvider({ name: 'fake-kr', markets: ['KOSPI'], capabilities: ['fetchOhlcv'] }));

    const summary = await orchestrator().runBatch(KOSPI, { incremental: true });

    expect(summary.scope).toBe('kospi');
    expect(summary.runId).toMatch(/^kospi-[0-9a-f]{8}$/);
    expect(summary.totalTickers).toBe(0);
  });
});
