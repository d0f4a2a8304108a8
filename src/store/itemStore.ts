import { normalizeStatus } from '../config.js';
import type { Item, ItemFilter, ItemPatch } from '../types.js';
import type { CellUpdate, SheetGateway } from './sheetGateway.js';

export const ITEMS_TAB = 'items';

export const ITEMS_HEADER = [
  'uid',
  'group',
  'source',
  'title',
  'link',
  'deadline_iso',
  'published_iso',
  'agency',
  'region',
  'raw_json',
  'created_at',
  'seen',
  'status',
  'notes',
  'do_not_show',
] as const;

type Column = (typeof ITEMS_HEADER)[number];

const COLUMNS: ReadonlySet<string> = new Set(ITEMS_HEADER);

function isColumn(name: string): name is Column {
  return COLUMNS.has(name);
}

export interface ItemUpdate {
  uid: string;
  patch: ItemPatch;
}

export interface ItemStore {
  list(filter?: ItemFilter): Promise<Item[]>;
  /** Appends items whose uid is not stored yet; returns how many were written. */
  append(items: Item[]): Promise<number>;
  update(uid: string, patch: ItemPatch): Promise<boolean>;
  /** Applies several patches in one write; returns how many uids were found. */
  updateMany(updates: ItemUpdate[]): Promise<number>;
  /** Rewrites only the link column, keyed by uid. */
  updateLinks(links: Map<string, string>): Promise<number>;
  /** Missing uids are ignored; returns how many rows went away. */
  delete(uids: string[]): Promise<number>;
  clear(): Promise<void>;
}

interface Snapshot {
  header: string[];
  rows: string[][];
}

const flag = (value: boolean) => (value ? '1' : '');

export function itemToRow(item: Item, header: readonly string[]): string[] {
  const values: Record<Column, string> = {
    uid: item.uid,
    group: item.group,
    source: item.source,
    title: item.title,
    link: item.link,
    deadline_iso: item.deadline_iso ?? '',
    published_iso: item.published_iso ?? '',
    agency: item.agency,
    region: item.region,
    raw_json: item.raw_json,
    created_at: item.created_at,
    seen: flag(item.seen),
    status: item.status,
    notes: item.notes,
    do_not_show: flag(item.do_not_show),
  };
  return header.map((name) => (isColumn(name) ? values[name] : ''));
}

export function rowToItem(row: string[], header: readonly string[]): Item {
  const get = (name: Column): string => {
    const index = header.indexOf(name);
    return index >= 0 ? row[index] ?? '' : '';
  };
  return {
    uid: get('uid'),
    group: get('group'),
    source: get('source'),
    title: get('title'),
    link: get('link'),
    deadline_iso: get('deadline_iso') || null,
    published_iso: get('published_iso') || null,
    agency: get('agency'),
    region: get('region'),
    raw_json: get('raw_json'),
    created_at: get('created_at'),
    seen: get('seen') === '1',
    status: normalizeStatus(get('status')),
    notes: get('notes'),
    do_not_show: get('do_not_show') === '1',
  };
}

/**
 * Items kept in the `items` worksheet, keyed by the uid in column A.
 * Writes run one at a time per instance, and `append` re-checks uids inside
 * that critical section, so two collections in this process cannot both
 * insert the same row.
 */
export class SheetItemStore implements ItemStore {
  private snapshot: Snapshot | null = null;
  private header: string[] | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly gateway: SheetGateway) {}

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async ensureHeader(): Promise<string[]> {
    if (!this.header) {
      this.header = await this.gateway.ensureTab(ITEMS_TAB, [...ITEMS_HEADER]);
    }
    return this.header;
  }

  private invalidate(): void {
    this.snapshot = null;
  }

  private async read(): Promise<Snapshot> {
    if (this.snapshot) return this.snapshot;
    const header = await this.ensureHeader();
    const all = await this.gateway.readAll(ITEMS_TAB);
    const sheetHeader = all[0] && all[0].length > 0 ? all[0] : header;
    const rows = all.slice(1).map((row) => {
      const missing = Math.max(0, sheetHeader.length - row.length);
      return [...row, ...new Array<string>(missing).fill('')];
    });
    this.snapshot = { header: sheetHeader, rows };
    return this.snapshot;
  }

  private rowNumbers(snapshot: Snapshot): Map<string, number> {
    const uidIndex = snapshot.header.indexOf('uid');
    const numbers = new Map<string, number>();
    snapshot.rows.forEach((row, index) => {
      const uid = row[uidIndex];
      // first occurrence wins if a race ever left a duplicate behind
      if (uid && !numbers.has(uid)) numbers.set(uid, index + 2);
    });
    return numbers;
  }

  async list(filter: ItemFilter = {}): Promise<Item[]> {
    const snapshot = await this.read();
    const uids = filter.uids ? new Set(filter.uids) : null;
    return snapshot.rows
      .map((row) => rowToItem(row, snapshot.header))
      .filter((item) => item.uid)
      .filter((item) => !filter.group || item.group === filter.group)
      .filter((item) => !uids || uids.has(item.uid));
  }

  append(items: Item[]): Promise<number> {
    return this.exclusive(async () => {
      if (items.length === 0) return 0;
      this.invalidate();
      const snapshot = await this.read();
      const known = new Set(this.rowNumbers(snapshot).keys());

      const rows: string[][] = [];
      for (const item of items) {
        if (!item.uid || known.has(item.uid)) continue;
        known.add(item.uid);
        rows.push(itemToRow(item, snapshot.header));
      }

      if (rows.length > 0) {
        await this.gateway.appendRows(ITEMS_TAB, rows);
        this.invalidate();
      }
      return rows.length;
    });
  }

  async update(uid: string, patch: ItemPatch): Promise<boolean> {
    return (await this.updateMany([{ uid, patch }])) > 0;
  }

  updateMany(updates: ItemUpdate[]): Promise<number> {
    return this.exclusive(async () => {
      if (updates.length === 0) return 0;
      const snapshot = await this.read();
      const numbers = this.rowNumbers(snapshot);
      const cells: CellUpdate[] = [];
      let found = 0;

      const column = (name: Column) => snapshot.header.indexOf(name);
      for (const { uid, patch } of updates) {
        const row = numbers.get(uid);
        if (!row) continue;
        found++;
        const set = (name: Column, value: string) => {
          const col = column(name);
          if (col >= 0) cells.push({ tab: ITEMS_TAB, row, col, value });
        };
        if (patch.seen !== undefined) set('seen', flag(patch.seen));
        if (patch.status !== undefined) set('status', normalizeStatus(patch.status));
        if (patch.notes !== undefined) set('notes', patch.notes);
        if (patch.do_not_show !== undefined) set('do_not_show', flag(patch.do_not_show));
        if (patch.link !== undefined) set('link', patch.link);
      }

      if (cells.length > 0) {
        await this.gateway.updateCells(cells);
        this.invalidate();
      }
      return found;
    });
  }

  updateLinks(links: Map<string, string>): Promise<number> {
    return this.updateMany([...links].map(([uid, link]) => ({ uid, patch: { link } })));
  }

  delete(uids: string[]): Promise<number> {
    return this.exclusive(async () => {
      if (uids.length === 0) return 0;
      this.invalidate();
      const snapshot = await this.read();
      const numbers = this.rowNumbers(snapshot);
      const rows = [...new Set(uids)]
        .map((uid) => numbers.get(uid))
        .filter((row): row is number => row !== undefined);

      if (rows.length > 0) {
        await this.gateway.deleteRows(ITEMS_TAB, rows);
        this.invalidate();
      }
      return rows.length;
    });
  }

  clear(): Promise<void> {
    return this.exclusive(async () => {
      const header = await this.ensureHeader();
      await this.gateway.resetTab(ITEMS_TAB, header);
      this.invalidate();
    });
  }
}
