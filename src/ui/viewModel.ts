import type { AppConfig } from '../appConfig.js';
import { DEFAULT_USD_BRL, parseMinDays, parseRate } from '../config.js';
import { daysBetween } from '../dates.js';
import { findGroup } from '../groups.js';
import { ALL_STATUSES, type ItemsListing } from '../itemsView.js';
import type { ErrorEntry } from '../types.js';

export interface ItemRow {
  uid: string;
  title: string;
  link: string;
  /** "—" when the deadline is unknown. */
  deadline: string;
  daysLeft: number | null;
  agency: string;
  region: string;
  seen: boolean;
  status: string;
  statusColor: string;
  statusBg: string;
  notes: string;
}

export interface SourceBlock {
  source: string;
  rows: ItemRow[];
}

/**
 * Everything the page needs, already resolved. The renderer reads nothing
 * else, so the same struct can be checked in tests without parsing HTML.
 */
export interface PageViewModel {
  groups: Array<{ label: string; selected: boolean }>;
  selectedGroup: string;
  statusOptions: Array<{ value: string; selected: boolean }>;
  statusChoices: string[];
  regex: string;
  minDays: number;
  usdBrl: number;
  itemsCount: number;
  sources: SourceBlock[];
  errors: ErrorEntry[];
}

export interface PageQuery {
  group?: string;
  status?: string;
}

export function resolveSelectedGroup(appConfig: AppConfig, requested: string | undefined): string {
  const wanted = requested ? findGroup(requested) : undefined;
  const match = wanted
    ? appConfig.available_groups.find((label) => findGroup(label)?.id === wanted.id)
    : undefined;
  return match ?? appConfig.available_groups[0] ?? '';
}

export function buildPageViewModel(
  appConfig: AppConfig,
  listing: ItemsListing,
  query: PageQuery,
  today: string,
  errors: ErrorEntry[],
): PageViewModel {
  const selectedGroup = listing.group;
  const status = query.status && query.status !== ALL_STATUSES ? query.status : ALL_STATUSES;

  return {
    groups: appConfig.available_groups.map((label) => ({
      label,
      selected: label === selectedGroup,
    })),
    selectedGroup,
    statusOptions: [ALL_STATUSES, ...appConfig.status_choices].map((value) => ({
      value,
      selected: value === status,
    })),
    statusChoices: appConfig.status_choices,
    regex: appConfig.regex_by_group[selectedGroup] ?? '',
    minDays: parseMinDays(appConfig.config.MIN_DAYS),
    usdBrl: parseRate(appConfig.config.USD_BRL, DEFAULT_USD_BRL),
    itemsCount: listing.items_count,
    sources: listing.sources.map((section) => ({
      source: section.source,
      rows: section.items.map((item) => ({
        uid: item.uid,
        title: item.title,
        link: item.link,
        deadline: item.deadline_iso ?? '—',
        daysLeft: item.deadline_iso ? daysBetween(today, item.deadline_iso) : null,
        agency: item.agency,
        region: item.region,
        seen: item.seen,
        status: item.status,
        statusColor: appConfig.status_colors[item.status] ?? '',
        statusBg: appConfig.status_bg[item.status] ?? '',
        notes: item.notes,
      })),
    })),
    errors,
  };
}
