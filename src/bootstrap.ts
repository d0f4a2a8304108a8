import type { ApiDeps } from './api.js';
import { Collector } from './collector.js';
import type { AppEnv, RuntimeOptions } from './config.js';
import { Diagnostics } from './diagnostics.js';
import { PerplexityClient, type CompletionTransport } from './perplexityClient.js';
import { createDefaultRegistry, type ProviderRegistry } from './providers/registry.js';
import type { Stores } from './store/index.js';

export interface ServiceOverrides {
  registry?: ProviderRegistry;
  transport?: CompletionTransport;
}

/**
 * Wires the services the HTTP layer talks to around one set of stores.
 */
export function createServices(
  env: AppEnv,
  runtime: RuntimeOptions,
  stores: Stores,
  overrides: ServiceOverrides = {},
): ApiDeps {
  const registry = overrides.registry ?? createDefaultRegistry();
  const { items, config, operations, research } = stores;

  return {
    stores,
    registry,
    runtime,
    collector: new Collector({ registry, items, config, operations, runtime }),
    diagnostics: new Diagnostics({ registry, config, operations, runtime }),
    perplexity: new PerplexityClient({
      apiKey: env.PERPLEXITY_API_KEY,
      baseURL: env.PERPLEXITY_BASE_URL,
      researchLog: research,
      transport: overrides.transport,
    }),
  };
}
