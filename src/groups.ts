import { ValidationError, type ErrorLog } from './errors.js';
import { compileGroupRegex } from './normalizer.js';
import type { ConfigMap, Group, GroupId, RegexKey } from './types.js';

export const GROUPS: readonly Group[] = [
  {
    id: 'gov',
    label: 'Governo/Multilaterais',
    regexKey: 'RE_GOV',
    defaultRegex:
      'bioeconom(y|ia)|biodiversit(y|ade)|forest|amaz(o|ô)nia|innovation|accelerat(or|ora)|impact',
  },
  {
    id: 'phil',
    label: 'Filantropia',
    regexKey: 'RE_PHIL',
    defaultRegex: '(climate|biodiversit|health|science|equitable|innovation|impact|accelerator)',
  },
  {
    id: 'latam',
    label: 'América Latina / Brasil',
    regexKey: 'RE_LATAM',
    defaultRegex: '(bioeconom|biodivers|amaz[oô]nia|floresta|inova|acelera|impacto|tecnologia)',
  },
];

export const DEFAULT_REGEX: Record<RegexKey, string> = {
  RE_GOV: GROUPS[0].defaultRegex,
  RE_PHIL: GROUPS[1].defaultRegex,
  RE_LATAM: GROUPS[2].defaultRegex,
};

/**
 * "América Latina/Brasil", "america latina / brasil " and the like all
 * compare equal once canonicalized.
 */
export function canonGroup(value: string): string {
  if (!value) return '';
  return value
    .normalize('NFKC')
    .replace(/\s*\/\s*/g, '/')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

export function findGroup(nameOrId: string): Group | undefined {
  const canon = canonGroup(nameOrId);
  return GROUPS.find((group) => group.id === canon || canonGroup(group.label) === canon);
}

export function getGroup(id: GroupId): Group {
  const group = GROUPS.find((candidate) => candidate.id === id);
  if (!group) {
    throw new Error(`Unknown group id: ${id}`);
  }
  return group;
}

export function availableGroupLabels(): string[] {
  return GROUPS.map((group) => group.label).sort((a, b) =>
    a.toLowerCase().localeCompare(b.toLowerCase()),
  );
}

/**
 * The configured pattern for a group, or its default when the sheet holds
 * nothing for it.
 */
export function configuredRegex(group: Group, config: ConfigMap): string {
  const stored = (config[group.regexKey] ?? '').trim();
  return stored || group.defaultRegex;
}

export function regexByGroup(config: ConfigMap): Record<string, string> {
  const result: Record<string, string> = {};
  for (const group of GROUPS) {
    result[group.label] = configuredRegex(group, config);
  }
  return result;
}

/**
 * Compiles the pattern a run should use for a group: a non-empty override,
 * else the configured value, else the default. An invalid pattern is
 * reported and the default takes its place.
 */
export function effectiveRegex(
  group: Group,
  config: ConfigMap,
  errors: ErrorLog,
  override?: string,
): RegExp | null {
  const pattern = override?.trim() || configuredRegex(group, config);
  try {
    return compileGroupRegex(pattern);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    const invalid = new ValidationError(`Invalid regex for ${group.label}: ${reason}`);
    errors.push(`regex ${group.label}`, invalid);
    return compileGroupRegex(group.defaultRegex);
  }
}
