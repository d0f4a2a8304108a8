import type { GroupId } from '../types.js';
import {
  ContractsFinderProvider,
  GrantsGovProvider,
  PncpProvider,
  SamGovProvider,
} from './apiProviders.js';
import { ListingProvider } from './listingProvider.js';
import { RssProvider } from './rssProvider.js';
import { listingSources, rssSources } from './sources.js';
import type { Provider } from './types.js';

/**
 * Static table of providers keyed by group. New sources are added by
 * registering another Provider, never by branching on names.
 */
export class ProviderRegistry {
  private readonly providers: Provider[] = [];

  constructor(providers: Provider[] = []) {
    for (const provider of providers) this.register(provider);
  }

  register(provider: Provider): this {
    if (this.providers.some((existing) => existing.name === provider.name)) {
      throw new Error(`Provider already registered: ${provider.name}`);
    }
    this.providers.push(provider);
    this.providers.sort((a, b) => a.group.localeCompare(b.group) || a.name.localeCompare(b.name));
    return this;
  }

  all(): readonly Provider[] {
    return this.providers;
  }

  forGroup(group: GroupId): Provider[] {
    return this.providers.filter((provider) => provider.group === group);
  }

  find(name: string): Provider | undefined {
    return this.providers.find((provider) => provider.name === name);
  }
}

export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry([
    ...listingSources.map((source) => new ListingProvider(source)),
    ...rssSources.map((source) => new RssProvider(source)),
    new GrantsGovProvider(),
    new SamGovProvider(),
    new ContractsFinderProvider(),
    new PncpProvider(),
  ]);
}
