import { google, type sheets_v4 } from 'googleapis';
import type { GoogleCredentials } from '../config.js';
import { columnLetter, mergeHeader, type CellUpdate, type SheetGateway } from './sheetGateway.js';

const SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
];
const MIN_ROWS = 1000;
const MIN_COLUMNS = 20;

interface TabInfo {
  sheetId: number;
  columnCount: number;
}

function toStringRows(values: unknown[][] | null | undefined): string[][] {
  return (values ?? []).map((row) =>
    row.map((cell) => (cell === null || cell === undefined ? '' : String(cell))),
  );
}

/**
 * Spreadsheet access through the Sheets v4 API, authorised with a stored
 * OAuth refresh token.
 */
export class GoogleSheetGateway implements SheetGateway {
  private readonly sheets: sheets_v4.Sheets;
  private tabInfo: Map<string, TabInfo> | null = null;

  constructor(
    private readonly spreadsheetId: string,
    credentials: GoogleCredentials,
  ) {
    const auth = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret);
    auth.setCredentials({ refresh_token: credentials.refreshToken, scope: SCOPES.join(' ') });
    this.sheets = google.sheets({ version: 'v4', auth });
  }

  private async loadTabs(force = false): Promise<Map<string, TabInfo>> {
    if (this.tabInfo && !force) return this.tabInfo;
    const res = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'sheets.properties(sheetId,title,gridProperties.columnCount)',
    });
    const info = new Map<string, TabInfo>();
    for (const sheet of res.data.sheets ?? []) {
      const props = sheet.properties;
      if (!props?.title || props.sheetId === null || props.sheetId === undefined) continue;
      info.set(props.title, {
        sheetId: props.sheetId,
        columnCount: props.gridProperties?.columnCount ?? 0,
      });
    }
    this.tabInfo = info;
    return info;
  }

  private async sheetIdOf(tab: string): Promise<number> {
    const info = (await this.loadTabs()).get(tab) ?? (await this.loadTabs(true)).get(tab);
    if (!info) {
      throw new Error(`Worksheet not found: ${tab}`);
    }
    return info.sheetId;
  }

  async ensureTab(tab: string, header: string[]): Promise<string[]> {
    const tabs = await this.loadTabs();
    const existing = tabs.get(tab);

    if (!existing) {
      await this.sheets.spreadsheets.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: {
          requests: [
            {
              addSheet: {
                properties: {
                  title: tab,
                  gridProperties: {
                    rowCount: MIN_ROWS,
                    columnCount: Math.max(MIN_COLUMNS, header.length),
                  },
                },
              },
            },
          ],
        },
      });
      await this.loadTabs(true);
      await this.writeHeader(tab, header);
      console.log(`   [sheets] ✅ Created worksheet "${tab}"`);
      return [...header];
    }

    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: `${tab}!1:1`,
    });
    const current = toStringRows(res.data.values)[0] ?? [];
    const merged = mergeHeader(current, header);
    if (merged.length !== current.length) {
      if (merged.length > existing.columnCount) {
        await this.sheets.spreadsheets.batchUpdate({
          spreadsheetId: this.spreadsheetId,
          requestBody: {
            requests: [
              {
                appendDimension: {
                  sheetId: existing.sheetId,
                  dimension: 'COLUMNS',
                  length: merged.length - existing.columnCount,
                },
              },
            ],
          },
        });
        existing.columnCount = merged.length;
      }
      await this.writeHeader(tab, merged);
      console.log(`   [sheets] 🔄 Header of "${tab}" extended to ${merged.length} columns`);
    }
    return merged;
  }

  private async writeHeader(tab: string, header: string[]): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: `${tab}!1:1`,
      valueInputOption: 'RAW',
      requestBody: { values: [header] },
    });
  }

  async readAll(tab: string): Promise<string[][]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: tab,
    });
    return toStringRows(res.data.values);
  }

  async appendRows(tab: string, rows: string[][]): Promise<void> {
    if (rows.length === 0) return;
    await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: `${tab}!A1`,
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values: rows },
    });
  }

  async updateCells(updates: CellUpdate[]): Promise<void> {
    if (updates.length === 0) return;
    await this.sheets.spreadsheets.values.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        valueInputOption: 'RAW',
        data: updates.map((update) => ({
          range: `${update.tab}!${columnLetter(update.col)}${update.row}`,
          values: [[update.value]],
        })),
      },
    });
  }

  async deleteRows(tab: string, rows: number[]): Promise<void> {
    const ordered = [...new Set(rows)].filter((row) => row >= 2).sort((a, b) => b - a);
    if (ordered.length === 0) return;
    const sheetId = await this.sheetIdOf(tab);
    // bottom-up so earlier deletions do not shift later ones
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: ordered.map((row) => ({
          deleteDimension: {
            range: { sheetId, dimension: 'ROWS', startIndex: row - 1, endIndex: row },
          },
        })),
      },
    });
  }

  async resetTab(tab: string, header: string[]): Promise<void> {
    await this.sheets.spreadsheets.values.clear({ spreadsheetId: this.spreadsheetId, range: tab });
    await this.writeHeader(tab, header);
  }
}
