export type GroupId = 'gov' | 'phil' | 'latam';

export type RegexKey = 'RE_GOV' | 'RE_PHIL' | 'RE_LATAM';

export interface Group {
  id: GroupId;
  label: string;
  regexKey: RegexKey;
  defaultRegex: string;
}

/**
 * What a provider hands back before normalization. Dates are left as the
 * source printed them; the normalizer owns parsing.
 */
export interface RawItem {
  source: string;
  title: string;
  link: string;
  deadline?: string | null;
  published?: string | null;
  agency?: string;
  region?: string;
  raw?: Record<string, unknown>;
}

export interface Item {
  uid: string;
  group: string;
  source: string;
  title: string;
  link: string;
  deadline_iso: string | null;
  published_iso: string | null;
  agency: string;
  region: string;
  raw_json: string;
  created_at: string;
  seen: boolean;
  status: string;
  notes: string;
  do_not_show: boolean;
}

export type ItemPatch = Partial<Pick<Item, 'seen' | 'status' | 'notes' | 'do_not_show' | 'link'>>;

export interface ItemFilter {
  group?: string;
  uids?: string[];
}

export type ConfigMap = Record<string, string>;

export interface ErrorEntry {
  timestamp: string;
  where: string;
  message: string;
  stacktrace: string;
}

export interface ProviderStat {
  group: string;
  source: string;
  fetched: number | 'erro';
  after_deadline_filter: number | 'erro';
}

export interface CollectResult {
  fixed_links: number;
  new_items: number;
  provider_stats: ProviderStat[];
  groups: GroupCollectSummary[];
  cancelled: boolean;
}

export interface GroupCollectSummary {
  group: string;
  fetched: number;
  retained: number;
  new_items: number;
  fixed_links: number;
  failed: boolean;
}

export interface DiagRow {
  group: string;
  source: string;
  items: number;
  elapsed_s: string;
  error: string;
  hint: string;
}

export interface DiagResult {
  rows: DiagRow[];
  logs: string[][];
  cancelled: boolean;
}
