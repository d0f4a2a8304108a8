import type { SheetGateway } from './sheetGateway.js';

export const LOGS_TAB = 'logs';
const LOGS_HEADER = ['ts', 'level', 'msg'];
export const LOG_TAIL_SIZE = 200;

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

/**
 * Append-only `logs` worksheet. Collection writes its provider statistics
 * here and diagnostics reads the tail back.
 */
export class OperationLog {
  private ready = false;

  constructor(
    private readonly gateway: SheetGateway,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private async ensure(): Promise<void> {
    if (this.ready) return;
    await this.gateway.ensureTab(LOGS_TAB, LOGS_HEADER);
    this.ready = true;
  }

  async write(level: LogLevel, message: string): Promise<void> {
    await this.writeMany(level, [message]);
  }

  async writeMany(level: LogLevel, messages: string[]): Promise<void> {
    if (messages.length === 0) return;
    await this.ensure();
    const ts = this.now().toISOString();
    await this.gateway.appendRows(
      LOGS_TAB,
      messages.map((msg) => [ts, level, msg]),
    );
  }

  /** Header row first, then at most `size` of the newest rows. */
  async tail(size = LOG_TAIL_SIZE): Promise<string[][]> {
    await this.ensure();
    const [header = LOGS_HEADER, ...rows] = await this.gateway.readAll(LOGS_TAB);
    return [header, ...rows.slice(Math.max(0, rows.length - size))];
  }
}
