import type { Market } from '../types';
import { CapabilityUnsupportedError, logger } from '../utils';
import { supports } from './types';
import type { CapabilityMap, Capability, DataProvider } from './types';

/** Adapters by capability and market; the highest priority match serves. */
export class ProviderRegistry {
  private providers: DataProvider[] = [];

  register(provider: DataProvider): void {
    if (this.providers.some((p) => p.name === provider.name)) {
      throw new Error(`Provider already registered: ${provider.name}`);
    }
    this.providers.push(provider);
    logger.info('Providers', `Registered ${provider.name}`, {
      markets: provider.markets,
      capabilities: provider.capabilities,
      priority: provider.priority,
    });
  }

  find<C extends Capability>(capability: C, market: Market): CapabilityMap[C] | null {
    let best: CapabilityMap[C] | null = null;
    for (const provider of this.providers) {
      if (!provider.markets.includes(market) || !supports(provider, capability)) continue;
      if (best === null || provider.priority > best.priority) {
        best = provider;
      }
    }
    return best;
  }

  select<C extends Capability>(capability: C, market: Market): CapabilityMap[C] {
    const provider = this.find(capability, market);
    if (!provider) {
      throw new CapabilityUnsupportedError(capability, market);
    }
    return provider;
  }

  list(): readonly DataProvider[] {
    return this.providers;
  }
}
