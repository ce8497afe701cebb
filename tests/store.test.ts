import { describe, it, expect } from 'vitest';
import { mergeTicker, uniqueBySymbol } from '../src/data/store';
import { makeTicker } from './helpers/fake-providers';

describe('ticker upsert rules', () => {
  describe('uniqueBySymbol', () => {
    it('should keep the last row of a repeated symbol in first-seen position', () => {
      const rows = uniqueBySymbol([
        makeTicker('AAA', 'KOSPI', { name: 'first' }),
        makeTicker('BBB', 'KOSPI'),
        makeTicker('AAA', 'KOSPI', { name: 'second' }),
      ]);

      expect(rows.map((t) => `${t.symbol}:${t.name}`)).toEqual(['AAA:second', 'BBB:BBB Corp']);
    });
  });

  describe('mergeTicker', () => {
    it('should take a new ticker as is', () => {
      const incoming = makeTicker('AAPL', 'NASDAQ');

      expect(mergeTicker(undefined, incoming)).toBe(incoming);
    });

    it('should keep stored reference fields the listing leaves empty', () => {
      const stored = makeTicker('005930', 'KOSPI', { sector: 'Tech', industry: 'Memory', isin: 'KR7005930003' });
      const listed = makeTicker('005930', 'KOSPI', { name: 'Renamed', industry: 'Foundry', isin: null });

      expect(mergeTicker(stored, listed)).toMatchObject({
        name: 'Renamed',
        sector: 'Tech',
        industry: 'Foundry',
        isin: 'KR7005930003',
      });
    });
  });
});
