import type { SheetGateway } from './sheetGateway.js';

export const RESEARCH_TAB = 'perplexity';

const RESEARCH_HEADER = [
  'timestamp_utc',
  'modo',
  'modelo_api',
  'prompt',
  'parametros_json',
  'tokens_in',
  'tokens_out_estimados',
  'custo_usd_estimado',
  'custo_brl_estimado',
  'resumo',
  'links_citados',
  'json_resposta',
  'erro',
];

// Sheets rejects cells over 50k characters
const MAX_JSON_CELL = 45000;
const MAX_PROMPT_CELL = 4000;
const MAX_SUMMARY_CELL = 8000;

export interface ResearchRecord {
  timestamp: Date;
  mode: string;
  model: string;
  prompt: string;
  params: Record<string, unknown>;
  tokensIn: number;
  tokensOut: number;
  costUsd: number;
  costBrl: number;
  summary: string;
  links: string[];
  response: unknown;
  error: string;
}

export class ResearchLog {
  private ready = false;

  constructor(private readonly gateway: SheetGateway) {}

  async save(record: ResearchRecord): Promise<void> {
    if (!this.ready) {
      await this.gateway.ensureTab(RESEARCH_TAB, RESEARCH_HEADER);
      this.ready = true;
    }
    await this.gateway.appendRows(RESEARCH_TAB, [
      [
        record.timestamp.toISOString(),
        record.mode,
        record.model,
        record.prompt.slice(0, MAX_PROMPT_CELL),
        JSON.stringify(record.params).slice(0, MAX_JSON_CELL),
        String(record.tokensIn),
        String(record.tokensOut),
        record.costUsd.toFixed(6),
        record.costBrl.toFixed(6),
        record.summary.slice(0, MAX_SUMMARY_CELL),
        record.links.join('\n'),
        record.response === undefined
          ? ''
          : JSON.stringify(record.response).slice(0, MAX_JSON_CELL),
        record.error,
      ],
    ]);
  }
}
