import { STATUS_CHOICES } from './config.js';
import { findGroup } from './groups.js';
import { absolutize } from './normalizer.js';
import type { Item } from './types.js';

export const ALL_STATUSES = 'Todos';
const UNKNOWN_SOURCE = '—';
const LAST_DEADLINE = '9999-12-31';

export interface SourceSection {
  source: string;
  items: Item[];
}

export interface ItemsListing {
  group: string;
  items_count: number;
  status_choices: string[];
  sources: SourceSection[];
}

/**
 * Shapes the stored rows of one group for review: hidden rows dropped,
 * optional status filter, sections per source, soonest deadline first.
 * `baseUrls` maps a source name to the URL its relative links hang off.
 */
export function buildItemsListing(
  items: Item[],
  group: string,
  status: string | undefined,
  baseUrls: Map<string, string> = new Map(),
): ItemsListing {
  const target = findGroup(group);
  const filterStatus = status && status !== ALL_STATUSES ? status : null;
  const bySource = new Map<string, Item[]>();

  for (const item of items) {
    if (!target || findGroup(item.group)?.id !== target.id) continue;
    if (item.do_not_show) continue;
    if (filterStatus && item.status !== filterStatus) continue;

    const source = item.source || UNKNOWN_SOURCE;
    const section = bySource.get(source) ?? [];
    section.push({ ...item, link: absolutize(item.link, baseUrls.get(item.source)) });
    bySource.set(source, section);
  }

  const sources = [...bySource.keys()]
    .sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()))
    .map((source) => ({
      source,
      items: (bySource.get(source) ?? []).sort((a, b) =>
        (a.deadline_iso ?? LAST_DEADLINE).localeCompare(b.deadline_iso ?? LAST_DEADLINE),
      ),
    }));

  return {
    group,
    items_count: sources.reduce((total, section) => total + section.items.length, 0),
    status_choices: [...STATUS_CHOICES],
    sources,
  };
}
