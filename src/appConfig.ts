import { STATUS_BG, STATUS_CHOICES, STATUS_COLORS } from './config.js';
import { ValidationError } from './errors.js';
import { availableGroupLabels, DEFAULT_REGEX, findGroup, regexByGroup } from './groups.js';
import { compileGroupRegex } from './normalizer.js';
import type { ConfigStore } from './store/configStore.js';
import type { ConfigMap, RegexKey } from './types.js';

export interface AppConfig {
  config: ConfigMap;
  defaults: Record<RegexKey, string>;
  available_groups: string[];
  regex_by_group: Record<string, string>;
  status_choices: string[];
  status_bg: Record<string, string>;
  status_colors: Record<string, string>;
}

export function appConfigFrom(config: ConfigMap): AppConfig {
  return {
    config,
    defaults: { ...DEFAULT_REGEX },
    available_groups: availableGroupLabels(),
    regex_by_group: regexByGroup(config),
    status_choices: [...STATUS_CHOICES],
    status_bg: { ...STATUS_BG },
    status_colors: { ...STATUS_COLORS },
  };
}

export async function getAppConfig(store: ConfigStore): Promise<AppConfig> {
  return appConfigFrom(await store.read());
}

export async function updateConfigPairs(
  store: ConfigStore,
  updates: Array<{ key: string; value: string }>,
): Promise<AppConfig> {
  return appConfigFrom(await store.upsert(updates));
}

/**
 * Stores a group's pattern under its RE_* key. An empty pattern is stored as
 * is and the group falls back to its default.
 */
export async function updateGroupRegex(
  store: ConfigStore,
  group: string,
  regex: string,
): Promise<AppConfig> {
  const target = findGroup(group);
  if (!target) {
    throw new ValidationError(`Unknown group: ${group}`);
  }
  try {
    compileGroupRegex(regex);
  } catch (err) {
    throw new ValidationError(
      `Invalid regex for ${target.label}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return appConfigFrom(await store.upsert([{ key: target.regexKey, value: regex.trim() }]));
}
