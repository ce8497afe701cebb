import type { CollectionScope, Ticker } from '../types';
import type { CollectionStore } from '../data/store';

/** Active tickers of the scope, ordered by symbol, truncated after ordering. */
export async function listUniverse(
  store: Pick<CollectionStore, 'listTickers'>,
  scope: CollectionScope,
  maxTickers?: number
): Promise<Ticker[]> {
  const tickers = await store.listTickers({
    markets: scope.markets,
    symbols: scope.symbols,
    status: 'active',
  });

  const ordered = [...tickers].sort((a, b) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0));
  return maxTickers !== undefined ? ordered.slice(0, Math.max(0, maxTickers)) : ordered;
}
