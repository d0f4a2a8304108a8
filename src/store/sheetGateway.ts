export interface CellUpdate {
  tab: string;
  /** 1-based sheet row, header included. */
  row: number;
  /** 0-based column index. */
  col: number;
  value: string;
}

/**
 * The handful of spreadsheet operations the stores need. Rows are plain
 * string arrays; row 1 is the header.
 */
export interface SheetGateway {
  /** Creates the tab or merges missing columns into its header; returns the header in use. */
  ensureTab(tab: string, header: string[]): Promise<string[]>;
  readAll(tab: string): Promise<string[][]>;
  appendRows(tab: string, rows: string[][]): Promise<void>;
  updateCells(updates: CellUpdate[]): Promise<void>;
  /** 1-based row numbers. */
  deleteRows(tab: string, rows: number[]): Promise<void>;
  /** Empties the tab and writes the header back. */
  resetTab(tab: string, header: string[]): Promise<void>;
}

export function mergeHeader(existing: string[], wanted: string[]): string[] {
  if (existing.length === 0) return [...wanted];
  return [...existing, ...wanted.filter((name) => !existing.includes(name))];
}

/**
 * A1 column letters for a 0-based index: 0 → A, 25 → Z, 26 → AA.
 */
export function columnLetter(index: number): string {
  let n = index;
  let letters = '';
  for (;;) {
    letters = String.fromCharCode(65 + (n % 26)) + letters;
    n = Math.floor(n / 26) - 1;
    if (n < 0) return letters;
  }
}

/**
 * Keeps the whole workbook in process memory. Backs `STORE_BACKEND=memory`
 * and the tests.
 */
export class MemorySheetGateway implements SheetGateway {
  private readonly tabs = new Map<string, string[][]>();

  async ensureTab(tab: string, header: string[]): Promise<string[]> {
    const rows = this.tabs.get(tab);
    if (!rows || rows.length === 0) {
      this.tabs.set(tab, [[...header]]);
      return [...header];
    }
    const merged = mergeHeader(rows[0], header);
    rows[0] = merged;
    return [...merged];
  }

  async readAll(tab: string): Promise<string[][]> {
    return (this.tabs.get(tab) ?? []).map((row) => [...row]);
  }

  async appendRows(tab: string, rows: string[][]): Promise<void> {
    const existing = this.tabs.get(tab) ?? [];
    existing.push(...rows.map((row) => [...row]));
    this.tabs.set(tab, existing);
  }

  async updateCells(updates: CellUpdate[]): Promise<void> {
    for (const update of updates) {
      const rows = this.tabs.get(update.tab);
      const row = rows?.[update.row - 1];
      if (!row) continue;
      while (row.length <= update.col) row.push('');
      row[update.col] = update.value;
    }
  }

  async deleteRows(tab: string, rows: number[]): Promise<void> {
    const existing = this.tabs.get(tab);
    if (!existing) return;
    for (const rowNumber of [...new Set(rows)].sort((a, b) => b - a)) {
      if (rowNumber < 2) continue;
      existing.splice(rowNumber - 1, 1);
    }
  }

  async resetTab(tab: string, header: string[]): Promise<void> {
    this.tabs.set(tab, [[...header]]);
  }
}
