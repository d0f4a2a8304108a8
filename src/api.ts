import { z } from 'zod';
import { getAppConfig, updateConfigPairs, updateGroupRegex, type AppConfig } from './appConfig.js';
import type { CancellationToken } from './cancellation.js';
import type { Collector } from './collector.js';
import { parseMinDays, type RuntimeOptions } from './config.js';
import type { Diagnostics } from './diagnostics.js';
import type { ErrorLog } from './errors.js';
import { buildItemsListing, type ItemsListing } from './itemsView.js';
import { approxTokens, type PerplexityClient, type PerplexityResult } from './perplexityClient.js';
import { buildPrompt, PROMPT_TEMPLATES } from './promptTemplates.js';
import type { ProviderRegistry } from './providers/registry.js';
import type { Stores } from './store/index.js';
import { countTokensFromUrl, type TokenCount } from './tokenCounter.js';
import type { CollectResult, DiagResult, ErrorEntry } from './types.js';

// ---------- Request bodies ----------

export const ConfigUpdateBody = z.object({
  updates: z.array(z.object({ key: z.string(), value: z.coerce.string().default('') })),
});

export const GroupRegexBody = z.object({
  group: z.string().min(1, "Field 'group' is required"),
  regex: z.string().default(''),
});

export const CollectBody = z.object({
  groups: z.array(z.string()).nullish(),
  min_days: z.number().int().nonnegative().nullish(),
});

export const ItemsQuery = z.object({
  group: z.string().min(1, "Query parameter 'group' is required"),
  status: z.string().optional(),
});

export const ItemsUpdateBody = z.object({
  updates: z.array(
    z.object({
      uid: z.string().min(1),
      seen: z.boolean().optional(),
      status: z.string().optional(),
      notes: z.string().optional(),
      do_not_show: z.boolean().optional(),
    }),
  ),
});

export const ItemsDeleteBody = z.object({
  uids: z.array(z.string()),
});

export const DiagBody = z.object({
  re_gov: z.string().default(''),
  re_phil: z.string().default(''),
  re_latam: z.string().default(''),
});

export const TokenCountBody = z.object({
  url: z.string().url(),
});

export const PerplexityBody = z.object({
  prompt: z.string().min(1),
  modelo_api: z.string().min(1),
  modo_label: z.string().default(''),
  temperature: z.number().min(0).max(2),
  max_tokens: z.number().int().positive(),
  pricing_in: z.number().nonnegative(),
  pricing_out: z.number().nonnegative(),
  usd_brl: z.number().positive(),
  save: z.boolean().default(true),
  link_tokens: z.number().int().nonnegative().nullish(),
  edital_link: z.string().nullish(),
});

export const PromptBody = z.object({
  template: z.enum(PROMPT_TEMPLATES),
  topic: z.string().default(''),
  region: z.string().default(''),
  days: z.number().int().nonnegative().nullish(),
  link: z.string().default(''),
});

// ---------- Service ----------

export interface ApiDeps {
  stores: Stores;
  registry: ProviderRegistry;
  collector: Collector;
  diagnostics: Diagnostics;
  perplexity: PerplexityClient;
  runtime: RuntimeOptions;
}

type WithErrors<T> = T & { errors: ErrorEntry[] };

function withErrors<T extends object>(payload: T, errors: ErrorLog): WithErrors<T> {
  return { ...payload, errors: errors.toJSON() };
}

/**
 * One method per endpoint. Each takes an already validated body and the
 * request's error log, and returns the JSON payload to send.
 */
export class ApiService {
  constructor(private readonly deps: ApiDeps) {}

  private baseUrls(): Map<string, string> {
    return new Map(this.deps.registry.all().map((provider) => [provider.name, provider.baseUrl]));
  }

  /** MIN_DAYS from the config sheet, or the default when it cannot be read. */
  private async configuredMinDays(errors: ErrorLog): Promise<number> {
    try {
      const config = await this.deps.stores.config.read();
      return parseMinDays(config.MIN_DAYS);
    } catch (err) {
      errors.push('config', err);
      return parseMinDays(undefined);
    }
  }

  async getConfig(errors: ErrorLog): Promise<WithErrors<{ config: AppConfig }>> {
    return withErrors({ config: await getAppConfig(this.deps.stores.config) }, errors);
  }

  async updateConfig(
    body: z.infer<typeof ConfigUpdateBody>,
    errors: ErrorLog,
  ): Promise<WithErrors<{ config: AppConfig }>> {
    const config = await updateConfigPairs(this.deps.stores.config, body.updates);
    return withErrors({ config }, errors);
  }

  async updateGroupRegex(
    body: z.infer<typeof GroupRegexBody>,
    errors: ErrorLog,
  ): Promise<WithErrors<{ config: AppConfig }>> {
    const config = await updateGroupRegex(this.deps.stores.config, body.group, body.regex);
    return withErrors({ config }, errors);
  }

  async collect(
    body: z.infer<typeof CollectBody>,
    errors: ErrorLog,
    token?: CancellationToken,
  ): Promise<WithErrors<{ result: CollectResult }>> {
    const minDays = body.min_days ?? (await this.configuredMinDays(errors));
    const { result } = await this.deps.collector.collect(body.groups ?? undefined, minDays, {
      token,
      errors,
    });
    return withErrors({ result }, errors);
  }

  async listItems(
    query: z.infer<typeof ItemsQuery>,
    errors: ErrorLog,
  ): Promise<WithErrors<{ items: ItemsListing }>> {
    const items = await this.deps.stores.items.list();
    const listing = buildItemsListing(items, query.group, query.status, this.baseUrls());
    return withErrors({ items: listing }, errors);
  }

  async updateItems(
    body: z.infer<typeof ItemsUpdateBody>,
    errors: ErrorLog,
  ): Promise<WithErrors<{ result: { updated: number } }>> {
    const updated = await this.deps.stores.items.updateMany(
      body.updates.map(({ uid, ...patch }) => ({ uid, patch })),
    );
    return withErrors({ result: { updated } }, errors);
  }

  async deleteItems(
    body: z.infer<typeof ItemsDeleteBody>,
    errors: ErrorLog,
  ): Promise<WithErrors<{ result: { deleted: number } }>> {
    const deleted = await this.deps.stores.items.delete(body.uids);
    return withErrors({ result: { deleted } }, errors);
  }

  async clearItems(errors: ErrorLog): Promise<WithErrors<{ result: { cleared: true } }>> {
    await this.deps.stores.items.clear();
    return withErrors({ result: { cleared: true as const } }, errors);
  }

  async diagnoseProviders(
    body: z.infer<typeof DiagBody>,
    errors: ErrorLog,
    signal?: AbortSignal,
  ): Promise<WithErrors<{ diag: DiagResult }>> {
    const { diag } = await this.deps.diagnostics.run(body, { signal, errors });
    return withErrors({ diag }, errors);
  }

  async diagnosticLogs(errors: ErrorLog): Promise<WithErrors<{ logs: string[][] }>> {
    return withErrors({ logs: await this.deps.stores.operations.tail() }, errors);
  }

  async countTokens(
    body: z.infer<typeof TokenCountBody>,
    errors: ErrorLog,
  ): Promise<WithErrors<TokenCount>> {
    const { runtime } = this.deps;
    const count = await countTokensFromUrl(
      body.url,
      { timeoutMs: runtime.fetchTimeoutMs, fetchImpl: runtime.fetchImpl },
      errors,
    );
    return withErrors(count, errors);
  }

  async perplexitySearch(
    body: z.infer<typeof PerplexityBody>,
    errors: ErrorLog,
  ): Promise<WithErrors<{ result: PerplexityResult }>> {
    const result = await this.deps.perplexity.search(
      {
        prompt: body.prompt,
        model: body.modelo_api,
        temperature: body.temperature,
        maxTokens: body.max_tokens,
        pricingIn: body.pricing_in,
        pricingOut: body.pricing_out,
        usdBrl: body.usd_brl,
        modeLabel: body.modo_label,
        save: body.save,
        linkTokens: body.link_tokens ?? undefined,
        editalLink: body.edital_link ?? undefined,
      },
      errors,
    );
    return withErrors({ result }, errors);
  }

  async buildPrompt(
    body: z.infer<typeof PromptBody>,
    errors: ErrorLog,
  ): Promise<WithErrors<{ prompt: string; mode_label: string; tokens: number }>> {
    const days = body.days ?? (await this.configuredMinDays(errors));
    const { prompt, modeLabel } = buildPrompt(body.template, {
      topic: body.topic,
      region: body.region,
      days,
      link: body.link,
    });
    return withErrors({ prompt, mode_label: modeLabel, tokens: approxTokens(prompt) }, errors);
  }
}
