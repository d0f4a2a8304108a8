import type { CancellationToken } from './cancellation.js';
import type { RuntimeOptions } from './config.js';
import { zonedDate } from './dates.js';
import { ErrorLog, MissingCredentialsError, ValidationError } from './errors.js';
import { effectiveRegex, findGroup, GROUPS } from './groups.js';
import type { HttpOptions } from './http.js';
import { planLinkRepairs } from './linkRepair.js';
import { normalizeBatch, type FilterCriteria } from './normalizer.js';
import type { ProviderRegistry } from './providers/registry.js';
import type { ProviderContext } from './providers/types.js';
import type { ConfigStore } from './store/configStore.js';
import type { ItemStore } from './store/itemStore.js';
import type { OperationLog } from './store/operationLog.js';
import type {
  CollectResult,
  ConfigMap,
  Group,
  GroupCollectSummary,
  Item,
  ProviderStat,
} from './types.js';

export interface CollectorDeps {
  registry: ProviderRegistry;
  items: ItemStore;
  config: ConfigStore;
  operations: OperationLog;
  runtime: RuntimeOptions;
}

export interface CollectOptions {
  token?: CancellationToken;
  errors?: ErrorLog;
}

export function buildProviderContext(
  runtime: RuntimeOptions,
  config: ConfigMap,
  regex: RegExp | null,
  signal?: AbortSignal,
): ProviderContext {
  return {
    regex,
    config,
    timeZone: runtime.timeZone,
    secrets: runtime.secrets,
    http: httpOptions(runtime, signal),
    now: runtime.now(),
  };
}

function httpOptions(runtime: RuntimeOptions, signal?: AbortSignal): HttpOptions {
  return { timeoutMs: runtime.fetchTimeoutMs, signal, fetchImpl: runtime.fetchImpl };
}

function statLine(stat: ProviderStat): string {
  const counts = `fetched=${stat.fetched} after_deadline_filter=${stat.after_deadline_filter}`;
  return `[${stat.group}] ${stat.source}: ${counts}`;
}

/**
 * Runs every provider of the requested groups, normalizes and filters what
 * they return, and appends the rows the store has not seen yet.
 */
export class Collector {
  constructor(private readonly deps: CollectorDeps) {}

  async collect(
    groupNames: string[] | undefined,
    minDays: number,
    options: CollectOptions = {},
  ): Promise<{ result: CollectResult; errors: ErrorLog }> {
    const errors = options.errors ?? new ErrorLog();
    const { token } = options;
    const names =
      groupNames && groupNames.length > 0 ? groupNames : GROUPS.map((group) => group.label);
    const result: CollectResult = {
      fixed_links: 0,
      new_items: 0,
      provider_stats: [],
      groups: [],
      cancelled: false,
    };

    console.log('\n🚀 Collection started');
    console.log(`   Groups: ${names.join(', ')} | min days: ${minDays}`);

    let config: ConfigMap = {};
    try {
      config = await this.deps.config.read();
    } catch (err) {
      errors.push('config', err);
    }

    for (const [index, name] of names.entries()) {
      if (token?.cancelled) {
        result.cancelled = true;
        console.log(`   ⏹️  Cancelled, ${names.length - index} group(s) skipped`);
        break;
      }

      const group = findGroup(name);
      if (!group) {
        errors.push('collect', new ValidationError(`Unknown group: ${name}`));
        continue;
      }

      const summary = await this.collectGroup(
        group,
        minDays,
        config,
        result.provider_stats,
        errors,
      );
      result.groups.push(summary);
      result.new_items += summary.new_items;
      result.fixed_links += summary.fixed_links;
    }

    if (result.provider_stats.length > 0) {
      try {
        await this.deps.operations.writeMany('INFO', result.provider_stats.map(statLine));
      } catch (err) {
        errors.push('operation log', err);
      }
    }

    console.log(`\n✅ Collection finished: ${result.new_items} new item(s)`);
    console.log(`   ${result.fixed_links} link(s) fixed`);
    if (errors.size > 0) {
      console.log(`   ⚠️  ${errors.size} error(s) recorded`);
    }

    return { result, errors };
  }

  private async collectGroup(
    group: Group,
    minDays: number,
    config: ConfigMap,
    stats: ProviderStat[],
    errors: ErrorLog,
  ): Promise<GroupCollectSummary> {
    const { runtime, registry } = this.deps;
    const summary: GroupCollectSummary = {
      group: group.label,
      fetched: 0,
      retained: 0,
      new_items: 0,
      fixed_links: 0,
      failed: false,
    };

    console.log(`\n📂 ${group.label}`);
    const regex = effectiveRegex(group, config, errors);
    const now = runtime.now();
    const candidates = new Map<string, Item>();

    for (const provider of registry.forGroup(group.id)) {
      const ctx = buildProviderContext(runtime, config, regex);
      const criteria: FilterCriteria = {
        regex,
        minDays,
        today: zonedDate(now, runtime.timeZone),
        timeZone: runtime.timeZone,
        now: now.toISOString(),
        baseUrl: provider.baseUrl,
      };

      try {
        const raws = await provider.fetch(ctx);
        const batch = normalizeBatch(raws, group.label, criteria);
        for (const item of batch.items) {
          if (!candidates.has(item.uid)) candidates.set(item.uid, item);
        }
        summary.fetched += raws.length;
        stats.push({
          group: group.label,
          source: provider.name,
          fetched: raws.length,
          after_deadline_filter: batch.items.length,
        });
        console.log(`   [${provider.name}] ✓ ${raws.length} fetched, ${batch.items.length} kept`);
      } catch (err) {
        if (err instanceof MissingCredentialsError) {
          console.warn(`   [${provider.name}] ⏭️  Skipped: ${err.message}`);
          stats.push({
            group: group.label,
            source: provider.name,
            fetched: 0,
            after_deadline_filter: 0,
          });
          continue;
        }
        errors.push(`provider ${provider.name}`, err);
        stats.push({
          group: group.label,
          source: provider.name,
          fetched: 'erro',
          after_deadline_filter: 'erro',
        });
      }
    }

    summary.retained = candidates.size;

    try {
      const stored = await this.deps.items.list();
      const known = new Set(stored.map((item) => item.uid));

      const baseUrls = new Map(
        registry.forGroup(group.id).map((provider) => [provider.name, provider.baseUrl]),
      );
      const fixes = await planLinkRepairs(
        stored.filter((item) => findGroup(item.group)?.id === group.id),
        { baseUrls, resolveRedirects: runtime.resolveRedirects, http: httpOptions(runtime) },
      );
      if (fixes.size > 0) {
        summary.fixed_links = await this.deps.items.updateLinks(fixes);
        console.log(`   🔗 ${summary.fixed_links} stored link(s) repaired`);
      }

      const fresh = [...candidates.values()].filter((item) => !known.has(item.uid));
      summary.new_items = await this.deps.items.append(fresh);
      console.log(`   💾 ${summary.new_items} new item(s) appended`);
    } catch (err) {
      summary.failed = true;
      errors.push(`store ${group.label}`, err);
    }

    return summary;
  }
}
