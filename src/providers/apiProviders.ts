import { z } from 'zod';
import { CONFIG_KEYS } from '../config.js';
import { MissingCredentialsError } from '../errors.js';
import { fetchJson, type RequestSpec } from '../http.js';
import { normalizeWhitespace } from '../normalizer.js';
import type { RawItem } from '../types.js';
import type { Provider, ProviderContext } from './types.js';

const MAX_TITLE_LENGTH = 180;

/**
 * Search APIs take free text, not a pattern: alternation bars are stripped
 * the way the listing pages never need to.
 */
export function keywordFromRegex(regex: RegExp | null): string {
  if (!regex) return '';
  return regex.source.replace(/^\|+|\|+$/g, '');
}

/** MM/DD/YYYY → YYYY-MM-DD; anything else passes through. */
export function usDateToIso(value: string | null | undefined): string | null {
  if (!value) return null;
  const match = value.trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (!match) return value;
  return `${match[3]}-${match[1].padStart(2, '0')}-${match[2].padStart(2, '0')}`;
}

function recordOf(value: unknown): Record<string, unknown> {
  const parsed = z.record(z.unknown()).safeParse(value);
  return parsed.success ? parsed.data : {};
}

// ---------- Grants.gov ----------

const GrantsGovHit = z
  .object({
    id: z.union([z.string(), z.number()]),
    title: z.string().default(''),
    agency: z.string().optional(),
    agencyName: z.string().optional(),
    openDate: z.string().nullish(),
    closeDate: z.string().nullish(),
  })
  .passthrough();

const GrantsGovResponse = z.object({
  oppHits: z.array(GrantsGovHit).optional(),
  data: z.object({ oppHits: z.array(GrantsGovHit).optional() }).optional(),
});

export class GrantsGovProvider implements Provider {
  readonly name = 'Grants.gov';
  readonly group = 'gov' as const;
  readonly baseUrl = 'https://www.grants.gov/';
  readonly urlHint = 'https://api.grants.gov/v1/api/search2';

  async fetch(ctx: ProviderContext): Promise<RawItem[]> {
    const payload = {
      startRecordNum: 0,
      sortBy: 'closeDate|asc',
      oppStatuses: ctx.config[CONFIG_KEYS.grantsStatus] || 'posted',
      keyword: keywordFromRegex(ctx.regex),
      rows: 100,
    };
    const init: RequestSpec = { method: 'POST', body: JSON.stringify(payload) };
    const json = await fetchJson(this.urlHint, init, ctx.http);
    const data = GrantsGovResponse.parse(json);
    const hits = data.oppHits ?? data.data?.oppHits ?? [];

    return hits.map((hit) => ({
      source: this.name,
      title: hit.title,
      link: `https://www.grants.gov/search-results-detail/${hit.id}`,
      deadline: usDateToIso(hit.closeDate),
      published: usDateToIso(hit.openDate),
      agency: hit.agencyName ?? hit.agency ?? '',
      region: 'US',
      raw: recordOf(hit),
    }));
  }
}

// ---------- SAM.gov ----------

const SamOpportunity = z
  .object({
    title: z.string().default(''),
    uiLink: z.string().nullish(),
    url: z.string().nullish(),
    responseDeadLine: z.string().nullish(),
    responseDate: z.string().nullish(),
    archiveDate: z.string().nullish(),
    postedDate: z.string().nullish(),
    department: z.string().nullish(),
    office: z.string().nullish(),
  })
  .passthrough();

const SamResponse = z.object({ opportunitiesData: z.array(SamOpportunity).default([]) });

export class SamGovProvider implements Provider {
  readonly name = 'SAM.gov (Contract Opportunities)';
  readonly group = 'gov' as const;
  readonly baseUrl = 'https://sam.gov/';
  readonly urlHint = 'https://api.sam.gov/prod/opportunities/v1/search';

  async fetch(ctx: ProviderContext): Promise<RawItem[]> {
    const apiKey = ctx.secrets.samApiKey;
    if (!apiKey) {
      throw new MissingCredentialsError('SAM_API_KEY');
    }

    const url = new URL(this.urlHint);
    url.searchParams.set('api_key', apiKey);
    url.searchParams.set('limit', '50');
    url.searchParams.set('q', keywordFromRegex(ctx.regex));
    url.searchParams.set('ptype', 'o');

    const data = SamResponse.parse(await fetchJson(url.toString(), { method: 'GET' }, ctx.http));
    return data.opportunitiesData.map((it) => ({
      source: this.name,
      title: it.title,
      link: it.uiLink || it.url || '',
      deadline: it.responseDeadLine ?? it.responseDate ?? it.archiveDate ?? null,
      published: it.postedDate ?? null,
      agency: it.department || it.office || '',
      region: 'US',
      raw: recordOf(it),
    }));
  }
}

// ---------- Contracts Finder (UK) ----------

const ContractsFinderNotice = z
  .object({
    title: z.string().default(''),
    uri: z.string().default(''),
    closingDate: z.string().nullish(),
    publishDate: z.string().nullish(),
  })
  .passthrough();

const ContractsFinderResponse = z.object({ items: z.array(ContractsFinderNotice).default([]) });

export class ContractsFinderProvider implements Provider {
  readonly name = 'Contracts Finder';
  readonly group = 'gov' as const;
  readonly baseUrl = 'https://www.contractsfinder.service.gov.uk/';
  readonly urlHint = 'https://www.contractsfinder.service.gov.uk/api/rest/2/search_notices';

  async fetch(ctx: ProviderContext): Promise<RawItem[]> {
    const apiKey = ctx.secrets.contractsFinderApiKey;
    if (!apiKey) {
      throw new MissingCredentialsError('CONTRACTS_FINDER_API_KEY');
    }

    const payload = {
      searchCriteria: {
        freeText: keywordFromRegex(ctx.regex),
        statuses: ['open'],
        types: ['Opportunity'],
      },
      pageIndex: 0,
    };
    const json = await fetchJson(
      this.urlHint,
      { method: 'POST', body: JSON.stringify(payload), headers: { apikey: apiKey } },
      ctx.http,
    );
    const data = ContractsFinderResponse.parse(json);

    return data.items
      .filter((it) => !it.title || !ctx.regex || ctx.regex.test(it.title))
      .map((it) => ({
        source: this.name,
        title: it.title,
        link: it.uri,
        deadline: it.closingDate ?? null,
        published: it.publishDate ?? null,
        agency: 'UK',
        region: 'UK',
        raw: recordOf(it),
      }));
  }
}

// ---------- PNCP (Brazil public procurement) ----------

const PncpRecord = z
  .object({
    numeroControlePNCP: z.string().nullish(),
    objetoCompra: z.string().nullish(),
    objeto: z.string().nullish(),
    dataPublicacaoPncp: z.string().nullish(),
    dataPublicacao: z.string().nullish(),
    dataEncerramentoProposta: z.string().nullish(),
    dataFimRecebimentoProposta: z.string().nullish(),
    linkSistemaOrigem: z.string().nullish(),
    orgaoEntidade: z
      .object({ razaoSocial: z.string().nullish(), nome: z.string().nullish() })
      .passthrough()
      .nullish(),
    unidadeOrgao: z.object({ ufSigla: z.string().nullish() }).passthrough().nullish(),
  })
  .passthrough();

const PncpPage = z.object({
  data: z.array(PncpRecord).nullish(),
  totalPaginas: z.coerce.number().nullish(),
});

type PncpRecordType = z.infer<typeof PncpRecord>;

const PNCP_BASE = 'https://pncp.gov.br/api/consulta/v1';
const PNCP_PAGE_SIZE = 50;
const PNCP_MAX_PAGES = 50;
// Modalities 2 and 3: competitive dialogue and contests
const PNCP_MODALITIES = [2, 3];
const PNCP_LOOKBACK_DAYS = 30;

function yyyymmdd(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

export class PncpProvider implements Provider {
  readonly name = 'PNCP — API (Licitações + Contratações)';
  readonly group = 'latam' as const;
  readonly baseUrl = 'https://pncp.gov.br/app/editais';
  readonly urlHint = `${PNCP_BASE}/contratacoes/proposta`;

  async fetch(ctx: ProviderContext): Promise<RawItem[]> {
    const end = yyyymmdd(ctx.now);
    const start = yyyymmdd(new Date(ctx.now.getTime() - PNCP_LOOKBACK_DAYS * 24 * 60 * 60 * 1000));
    const results: RawItem[] = [];
    const seenLinks = new Set<string>();

    const take = (records: PncpRecordType[]) => {
      for (const record of records) {
        const item = this.toRawItem(record);
        if (ctx.regex && !ctx.regex.test(item.title)) continue;
        if (seenLinks.has(item.link)) continue;
        seenLinks.add(item.link);
        results.push(item);
      }
    };

    for (const modality of PNCP_MODALITIES) {
      take(
        await this.paginate(
          `${PNCP_BASE}/contratacoes/publicacao`,
          { dataInicial: start, dataFinal: end, codigoModalidadeContratacao: String(modality) },
          ctx,
        ),
      );
    }
    for (const modality of PNCP_MODALITIES) {
      take(
        await this.paginate(
          `${PNCP_BASE}/contratacoes/proposta`,
          { dataFinal: end, codigoModalidadeContratacao: String(modality) },
          ctx,
        ),
      );
    }

    return results;
  }

  private async paginate(endpoint: string, params: Record<string, string>, ctx: ProviderContext) {
    const out: PncpRecordType[] = [];
    for (let page = 1; page <= PNCP_MAX_PAGES; page++) {
      const url = new URL(endpoint);
      for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value);
      url.searchParams.set('pagina', String(page));
      url.searchParams.set('tamanhoPagina', String(PNCP_PAGE_SIZE));

      const raw = await fetchJson(url.toString(), { method: 'GET' }, ctx.http);
      // 204 arrives as an empty body
      if (raw === null) break;
      const data = PncpPage.parse(raw);
      const batch = data.data ?? [];
      if (batch.length === 0) break;
      out.push(...batch);
      if (page >= (data.totalPaginas ?? 0) || batch.length < PNCP_PAGE_SIZE) break;
    }
    return out;
  }

  private toRawItem(record: PncpRecordType): RawItem {
    const numero = (record.numeroControlePNCP ?? '').trim();
    const objeto = normalizeWhitespace(record.objetoCompra ?? record.objeto ?? '');
    let title = objeto;
    if (numero && !title.includes(numero)) {
      title = title ? `${title} — ${numero}` : numero;
    }
    title = (title || 'Edital PNCP').slice(0, MAX_TITLE_LENGTH);

    const primary = (record.linkSistemaOrigem ?? '').trim();
    const search = new URL(this.baseUrl);
    search.searchParams.set('pagina', '1');
    search.searchParams.set('q', numero || objeto.slice(0, 120));
    search.searchParams.set('status', 'todos');

    return {
      source: this.name,
      title,
      link: /^https?:\/\//.test(primary) ? primary : search.toString(),
      deadline: record.dataEncerramentoProposta ?? record.dataFimRecebimentoProposta ?? null,
      published: record.dataPublicacaoPncp ?? record.dataPublicacao ?? null,
      agency: record.orgaoEntidade?.razaoSocial || record.orgaoEntidade?.nome || 'PNCP',
      region: record.unidadeOrgao?.ufSigla || 'Brasil',
      raw: recordOf(record),
    };
  }
}
