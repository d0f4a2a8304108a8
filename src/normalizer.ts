import { createHash } from 'node:crypto';
import { parseDateAny, withinMinDays } from './dates.js';
import type { Item, RawItem } from './types.js';

const MAX_TITLE_LENGTH = 180;

export interface FilterCriteria {
  /** Compiled group pattern; null keeps every title. */
  regex: RegExp | null;
  minDays: number;
  /** YYYY-MM-DD in the configured zone. */
  today: string;
  timeZone: string;
  /** ISO timestamp stamped on new rows. */
  now: string;
  /** Resolves relative links of a given source. */
  baseUrl?: string;
}

export type NormalizeOutcome =
  | { ok: true; item: Item }
  | { ok: false; reason: 'regex' | 'deadline' | 'empty'; title: string };

export function normalizeWhitespace(value: string | null | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

export function isAbsoluteHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value.trim());
}

export function absolutize(href: string, base: string | undefined): string {
  const trimmed = href.trim();
  if (!trimmed || isAbsoluteHttpUrl(trimmed)) return trimmed;
  if (trimmed.startsWith('//')) return `https:${trimmed}`;
  if (!base) return trimmed;
  try {
    return new URL(trimmed, base).toString();
  } catch {
    return trimmed;
  }
}

/**
 * Canonical form used for identity: no fragment, no trailing slash,
 * lower-cased scheme and host.
 */
export function normalizeLink(link: string): string {
  const trimmed = link.trim();
  if (!trimmed) return '';
  try {
    const url = new URL(trimmed);
    url.hash = '';
    const text = url.toString();
    return text.endsWith('/') && url.search === '' ? text.slice(0, -1) : text;
  } catch {
    return trimmed.replace(/#.*$/, '').replace(/\/+$/, '');
  }
}

export function makeUid(group: string, link: string, title: string): string {
  const normalizedLink = normalizeLink(link);
  const key = normalizedLink || normalizeWhitespace(title).toLowerCase();
  return createHash('sha256').update(`${group}|${key}`, 'utf8').digest('hex');
}

/**
 * Compiles a user pattern case-insensitively. Blank means "no filter".
 * Throws SyntaxError on an invalid pattern.
 */
export function compileGroupRegex(pattern: string | null | undefined): RegExp | null {
  const trimmed = (pattern ?? '').trim();
  if (!trimmed) return null;
  return new RegExp(trimmed, 'i');
}

export function normalizeItem(
  raw: RawItem,
  group: string,
  criteria: FilterCriteria,
): NormalizeOutcome {
  const title = normalizeWhitespace(raw.title).slice(0, MAX_TITLE_LENGTH);
  const link = absolutize(raw.link ?? '', criteria.baseUrl);

  if (!title && !link) {
    return { ok: false, reason: 'empty', title };
  }

  if (criteria.regex && !criteria.regex.test(title)) {
    return { ok: false, reason: 'regex', title };
  }

  const deadlineIso = parseDateAny(raw.deadline, criteria.timeZone);
  if (!withinMinDays(deadlineIso, criteria.minDays, criteria.today)) {
    return { ok: false, reason: 'deadline', title };
  }

  return {
    ok: true,
    item: {
      uid: makeUid(group, link, title),
      group,
      source: raw.source,
      title,
      link,
      deadline_iso: deadlineIso,
      published_iso: parseDateAny(raw.published, criteria.timeZone),
      agency: normalizeWhitespace(raw.agency),
      region: normalizeWhitespace(raw.region),
      raw_json: JSON.stringify(raw.raw ?? {}),
      created_at: criteria.now,
      seen: false,
      status: 'pendente',
      notes: '',
      do_not_show: false,
    },
  };
}

export interface NormalizeBatchResult {
  items: Item[];
  rejected: { regex: number; deadline: number; empty: number; duplicate: number };
}

/**
 * Normalizes a provider batch, keeping the first occurrence of each uid.
 */
export function normalizeBatch(
  raws: RawItem[],
  group: string,
  criteria: FilterCriteria,
): NormalizeBatchResult {
  const seen = new Set<string>();
  const items: Item[] = [];
  const rejected = { regex: 0, deadline: 0, empty: 0, duplicate: 0 };

  for (const raw of raws) {
    const outcome = normalizeItem(raw, group, criteria);
    if (!outcome.ok) {
      rejected[outcome.reason]++;
      continue;
    }
    if (seen.has(outcome.item.uid)) {
      rejected.duplicate++;
      continue;
    }
    seen.add(outcome.item.uid);
    items.push(outcome.item);
  }

  return { items, rejected };
}
