import type { ErrorLog } from './errors.js';
import { cleanHTML } from './htmlScraper.js';
import { request, type HttpOptions } from './http.js';
import { approxTokens } from './perplexityClient.js';

export interface TokenCount {
  ok: boolean;
  tokens: number;
  characters: number;
  error: string | null;
}

/**
 * Downloads a document and estimates its token count. HTML is reduced to its
 * visible text; PDFs are sized by byte length.
 */
export async function countTokensFromUrl(
  url: string,
  http: HttpOptions,
  errors: ErrorLog,
): Promise<TokenCount> {
  let res: Response;
  try {
    res = await request(url, { method: 'GET' }, http);
  } catch (err) {
    errors.push('count tokens', err);
    const error = err instanceof Error ? err.message : String(err);
    return { ok: false, tokens: 0, characters: 0, error };
  }

  const contentType = (res.headers.get('content-type') ?? '').toLowerCase();

  if (contentType.includes('pdf') || url.toLowerCase().endsWith('.pdf')) {
    const bytes = (await res.arrayBuffer()).byteLength;
    const tokens = bytes > 0 ? Math.max(1, Math.floor(bytes / 4)) : 0;
    return { ok: true, tokens, characters: bytes, error: null };
  }

  const raw = await res.text();
  const isHtml = contentType.includes('html') || raw.toLowerCase().includes('<html');
  const text = isHtml ? cleanHTML(raw) : raw;
  return { ok: true, tokens: approxTokens(text), characters: text.length, error: null };
}
