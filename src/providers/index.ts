import type { Config } from '../types';
import { logger } from '../utils';
import { DartProvider, loadCorpCodes } from './dart-provider';
import { FinnhubProvider } from './finnhub-provider';
import { KrxProvider } from './krx-provider';
import { ProviderRegistry } from './registry';
import { TwelveDataProvider } from './twelve-data-provider';

export { BaseProvider, mapAxiosError } from './base-provider';
export type { ProviderOptions } from './base-provider';
export { KrxProvider, parseKrxNumber } from './krx-provider';
export { FinnhubProvider } from './finnhub-provider';
export { TwelveDataProvider } from './twelve-data-provider';
export { DartProvider, loadCorpCodes, mapDartAccounts, parseDartAmount } from './dart-provider';
export { ProviderRegistry } from './registry';
export { supports, CAPABILITIES } from './types';
export type {
  Capability,
  CapabilityMap,
  DataProvider,
  SymbolLister,
  OhlcvSource,
  SnapshotSource,
  StatementSource,
} from './types';

/** Builds the registry from config; keyed sources are skipped without a key. */
export function createProviderRegistry(config: Config['providers']): ProviderRegistry {
  const registry = new ProviderRegistry();

  registry.register(new KrxProvider({ quota: config.krx.quota }));

  if (config.finnhub.apiKey) {
    registry.register(new FinnhubProvider(config.finnhub.apiKey, { quota: config.finnhub.quota }));
  } else {
    logger.warn('Providers', 'FINNHUB_API_KEY not set; US listings and snapshots disabled');
  }

  if (config.twelveData.apiKey) {
    registry.register(new TwelveDataProvider(config.twelveData.apiKey, { quota: config.twelveData.quota }));
  } else {
    logger.warn('Providers', 'TWELVEDATA_API_KEY not set; US prices disabled');
  }

  if (config.dart.apiKey) {
    const corpCodes = loadCorpCodes(config.dart.corpCodesPath);
    registry.register(new DartProvider(config.dart.apiKey, corpCodes, { quota: config.dart.quota }));
  } else {
    logger.warn('Providers', 'DART_API_KEY not set; Korean statements disabled');
  }

  return registry;
}
