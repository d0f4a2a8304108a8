import OpenAI from 'openai';
import { z } from 'zod';
import type { ErrorLog } from './errors.js';
import type { ResearchLog } from './store/researchLog.js';

const SYSTEM_PROMPT =
  'Você é um pesquisador especializado em editais. ' +
  'Responda em português, forneça bullets claros e liste as fontes (links).';

const REQUEST_TIMEOUT_MS = 120000;
const URL_PATTERN = /https?:\/\/[^\s)>\]]+/g;

export interface PerplexityRequest {
  prompt: string;
  model: string;
  temperature: number;
  maxTokens: number;
  /** USD per million input tokens. */
  pricingIn: number;
  /** USD per million output tokens. */
  pricingOut: number;
  usdBrl: number;
  modeLabel: string;
  save: boolean;
  /** Estimated tokens of a linked document the prompt refers to. */
  linkTokens?: number;
  editalLink?: string;
}

export interface PerplexityResult {
  summary: string;
  links: string[];
  tokens_in: number;
  estimated_cost_usd: number;
  estimated_cost_brl: number;
  raw?: unknown;
  error: string | null;
}

export interface CompletionBody {
  model: string;
  temperature: number;
  max_tokens: number;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
}

/** Sends one chat completion and hands back the decoded JSON body. */
export type CompletionTransport = (body: CompletionBody) => Promise<unknown>;

const CompletionSchema = z
  .object({
    choices: z
      .array(
        z.object({ message: z.object({ content: z.string().nullish() }).partial().optional() }),
      )
      .default([]),
    citations: z.array(z.string()).optional(),
    usage: z
      .object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
      })
      .nullish(),
  })
  .passthrough();

/**
 * ~4 characters per token. Empty text is zero tokens, anything else at
 * least one.
 */
export function approxTokens(text: string): number {
  if (!text) return 0;
  return Math.max(1, Math.floor(text.length / 4));
}

export function estimateCost(
  tokensIn: number,
  tokensOut: number,
  pricing: { pricingIn: number; pricingOut: number; usdBrl: number },
): { usd: number; brl: number } {
  const usd =
    (tokensIn / 1_000_000) * pricing.pricingIn + (tokensOut / 1_000_000) * pricing.pricingOut;
  return { usd, brl: usd * pricing.usdBrl };
}

export function extractLinks(summary: string, citations: string[] = []): string[] {
  const found = summary.match(URL_PATTERN) ?? [];
  return [...new Set([...citations, ...found])].sort();
}

function openAiTransport(apiKey: string, baseURL: string): CompletionTransport {
  const client = new OpenAI({ apiKey, baseURL, maxRetries: 0, timeout: REQUEST_TIMEOUT_MS });
  return async (body) => {
    const request = { ...body, return_images: false };
    return client.chat.completions.create(request);
  };
}

export interface PerplexityClientOptions {
  apiKey?: string;
  baseURL: string;
  researchLog?: ResearchLog;
  transport?: CompletionTransport;
  now?: () => Date;
}

/**
 * Ad-hoc research against the Perplexity chat endpoint. Token and cost
 * figures are estimated before the call and replaced by the reported usage
 * when the API returns it.
 */
export class PerplexityClient {
  private transport: CompletionTransport | null;
  private readonly now: () => Date;

  constructor(private readonly options: PerplexityClientOptions) {
    this.transport = options.transport ?? null;
    this.now = options.now ?? (() => new Date());
  }

  private resolveTransport(): CompletionTransport | null {
    if (this.transport) return this.transport;
    if (!this.options.apiKey) return null;
    this.transport = openAiTransport(this.options.apiKey, this.options.baseURL);
    return this.transport;
  }

  async search(req: PerplexityRequest, errors: ErrorLog): Promise<PerplexityResult> {
    const linkTokens = Math.max(0, Math.floor(req.linkTokens ?? 0));
    const tokensIn = approxTokens(req.prompt) + linkTokens;
    const estimate = estimateCost(tokensIn, req.maxTokens, req);
    const result: PerplexityResult = {
      summary: '',
      links: [],
      tokens_in: tokensIn,
      estimated_cost_usd: estimate.usd,
      estimated_cost_brl: estimate.brl,
      error: null,
    };

    const transport = this.resolveTransport();
    if (!transport) {
      result.error = 'PERPLEXITY_API_KEY is not configured';
      return result;
    }

    console.log(`\n🔎 [Perplexity] ${req.modeLabel} (${req.model}, ~${tokensIn} tokens in)`);

    let data: unknown;
    try {
      data = await transport({
        model: req.model,
        temperature: req.temperature,
        max_tokens: req.maxTokens,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: req.prompt },
        ],
      });
    } catch (err) {
      errors.push('perplexity search', err);
      result.error = err instanceof Error ? err.message : String(err);
      return result;
    }

    const parsed = CompletionSchema.safeParse(data);
    if (!parsed.success) {
      errors.push('perplexity search', parsed.error);
      result.error = `Unexpected response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`;
      result.raw = data;
      return result;
    }

    const completion = parsed.data;
    result.summary = completion.choices[0]?.message?.content ?? '';
    result.links = extractLinks(result.summary, completion.citations);
    result.raw = data;

    const promptTokens = completion.usage?.prompt_tokens;
    const completionTokens = completion.usage?.completion_tokens;
    if (
      typeof promptTokens === 'number' &&
      typeof completionTokens === 'number' &&
      Number.isInteger(promptTokens) &&
      Number.isInteger(completionTokens)
    ) {
      const reported = estimateCost(promptTokens, completionTokens, req);
      result.tokens_in = promptTokens;
      result.estimated_cost_usd = reported.usd;
      result.estimated_cost_brl = reported.brl;
    }
    const usd = result.estimated_cost_usd.toFixed(6);
    console.log(`   [Perplexity] ✓ ${result.links.length} link(s), US$ ${usd}`);

    if (req.save && this.options.researchLog) {
      try {
        await this.options.researchLog.save({
          timestamp: this.now(),
          mode: req.modeLabel,
          model: req.model,
          prompt: req.prompt,
          params: {
            temperatura: req.temperature,
            max_tokens: req.maxTokens,
            pricing_in: req.pricingIn,
            pricing_out: req.pricingOut,
            usd_brl: req.usdBrl,
            link_tokens: linkTokens,
            edital_link: req.editalLink ?? null,
          },
          tokensIn: result.tokens_in,
          tokensOut: req.maxTokens,
          costUsd: result.estimated_cost_usd,
          costBrl: result.estimated_cost_brl,
          summary: result.summary,
          links: result.links,
          response: data,
          error: '',
        });
      } catch (err) {
        errors.push('perplexity save', err);
      }
    }

    return result;
  }
}
