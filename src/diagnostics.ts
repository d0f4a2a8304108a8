import { buildProviderContext } from './collector.js';
import type { RuntimeOptions } from './config.js';
import { classifyError, describeError, ErrorLog, MissingCredentialsError } from './errors.js';
import { effectiveRegex, GROUPS } from './groups.js';
import type { ProviderRegistry } from './providers/registry.js';
import type { ConfigStore } from './store/configStore.js';
import type { OperationLog } from './store/operationLog.js';
import type { ConfigMap, DiagResult, DiagRow, GroupId } from './types.js';

export interface DiagnosticsDeps {
  registry: ProviderRegistry;
  config: ConfigStore;
  operations: OperationLog;
  runtime: RuntimeOptions;
  /** Milliseconds clock for row timings. */
  clock?: () => number;
}

export interface RegexOverrides {
  re_gov?: string;
  re_phil?: string;
  re_latam?: string;
}

const OVERRIDE_KEY: Record<GroupId, keyof RegexOverrides> = {
  gov: 're_gov',
  phil: 're_phil',
  latam: 're_latam',
};

/**
 * Runs each provider once, timed and guarded, and reports what came back.
 * Nothing is written to the item store.
 */
export class Diagnostics {
  private readonly clock: () => number;

  constructor(private readonly deps: DiagnosticsDeps) {
    this.clock = deps.clock ?? (() => performance.now());
  }

  async run(
    overrides: RegexOverrides = {},
    options: { signal?: AbortSignal; errors?: ErrorLog } = {},
  ): Promise<{ diag: DiagResult; errors: ErrorLog }> {
    const errors = options.errors ?? new ErrorLog();
    const { signal } = options;
    const rows: DiagRow[] = [];
    let cancelled = false;

    let config: ConfigMap = {};
    try {
      config = await this.deps.config.read();
    } catch (err) {
      errors.push('config', err);
    }

    console.log('\n🩺 Provider diagnostics');

    const regexes = new Map(
      GROUPS.map((group) => [
        group.id,
        effectiveRegex(group, config, errors, overrides[OVERRIDE_KEY[group.id]]),
      ]),
    );
    const runs = GROUPS.flatMap((group) =>
      this.deps.registry.forGroup(group.id).map((provider) => ({ group, provider })),
    );

    for (const { group, provider } of runs) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      const started = this.clock();
      const row: DiagRow = {
        group: group.label,
        source: provider.name,
        items: 0,
        elapsed_s: '',
        error: '',
        hint: '',
      };
      const regex = regexes.get(group.id) ?? null;

      try {
        const ctx = buildProviderContext(this.deps.runtime, config, regex, signal);
        const raws = await provider.fetch(ctx);
        row.items = raws.length;
      } catch (err) {
        // the run was cut short; this row never completed
        if (signal?.aborted) {
          cancelled = true;
          break;
        }
        if (!(err instanceof MissingCredentialsError)) {
          errors.push(`${provider.name} fetch (diag)`, err);
        }
        row.error = describeError(err);
        row.hint = classifyError(err) || provider.urlHint;
      }

      row.elapsed_s = ((this.clock() - started) / 1000).toFixed(2);
      rows.push(row);
      const mark = row.error ? '❌' : '✓';
      const hint = row.hint ? ` (${row.hint})` : '';
      console.log(`   ${mark} ${provider.name}: ${row.items} item(s) in ${row.elapsed_s}s${hint}`);
    }

    let logs: string[][] = [];
    try {
      logs = await this.deps.operations.tail();
    } catch (err) {
      errors.push('operation log', err);
    }

    return { diag: { rows, logs, cancelled }, errors };
  }
}
