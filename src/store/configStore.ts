import type { ConfigMap } from '../types.js';
import type { CellUpdate, SheetGateway } from './sheetGateway.js';

export const CONFIG_TAB = 'config';
const CONFIG_HEADER = ['key', 'value'];

export interface ConfigStore {
  read(): Promise<ConfigMap>;
  /** Inserts or overwrites each key; keys are trimmed, blank keys are skipped. */
  upsert(pairs: Array<{ key: string; value: string }>): Promise<ConfigMap>;
}

export class SheetConfigStore implements ConfigStore {
  private ready = false;

  constructor(private readonly gateway: SheetGateway) {}

  private async rows(): Promise<string[][]> {
    if (!this.ready) {
      await this.gateway.ensureTab(CONFIG_TAB, CONFIG_HEADER);
      this.ready = true;
    }
    return (await this.gateway.readAll(CONFIG_TAB)).slice(1);
  }

  async read(): Promise<ConfigMap> {
    const config: ConfigMap = {};
    for (const [key = '', value = ''] of await this.rows()) {
      const name = key.trim();
      if (name) config[name] = value;
    }
    return config;
  }

  async upsert(pairs: Array<{ key: string; value: string }>): Promise<ConfigMap> {
    const rows = await this.rows();
    // read() lets the last duplicate win, so that is the row to write
    const rowOf = new Map<string, number>();
    rows.forEach(([key = ''], index) => {
      const name = key.trim();
      if (name) rowOf.set(name, index + 2);
    });

    const updates: CellUpdate[] = [];
    const appended = new Map<string, string>();
    for (const { key, value } of pairs) {
      const name = key.trim();
      if (!name) continue;
      const row = rowOf.get(name);
      if (row) {
        updates.push({ tab: CONFIG_TAB, row, col: 1, value });
      } else {
        appended.set(name, value);
      }
    }

    await this.gateway.updateCells(updates);
    await this.gateway.appendRows(
      CONFIG_TAB,
      [...appended].map(([key, value]) => [key, value]),
    );
    return this.read();
  }
}
