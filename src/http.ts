import { FetchError } from './errors.js';

export type FetchLike = typeof fetch;

export interface RequestSpec {
  method?: 'GET' | 'POST' | 'HEAD';
  body?: string;
  headers?: Record<string, string>;
  redirect?: 'follow' | 'manual';
}

export interface HttpOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
}

export const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'pt-BR,pt;q=0.9,en-US;q=0.8,en;q=0.7',
};

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Runs `fetch` with a timeout, also aborting when the caller's signal fires.
 * Non-2xx responses become a FetchError carrying the status.
 */
export async function request(
  url: string,
  init: RequestSpec = {},
  options: HttpOptions = {},
): Promise<Response> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  const onAbort = () => controller.abort();

  if (options.signal?.aborted) {
    clearTimeout(timeout);
    throw new FetchError(`Request to ${url} was cancelled`, url);
  }
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const res = await fetchImpl(url, {
      ...init,
      signal: controller.signal,
      headers: { ...BROWSER_HEADERS, ...options.headers, ...init.headers },
    });

    if (!res.ok) {
      throw new FetchError(`HTTP ${res.status} ${res.statusText}`.trim(), url, {
        status: res.status,
      });
    }

    return res;
  } catch (err) {
    if (err instanceof FetchError) throw err;
    if (controller.signal.aborted) {
      const reason = options.signal?.aborted ? 'cancelled' : 'timeout';
      const outcome = reason === 'timeout' ? 'timed out' : 'was cancelled';
      throw new FetchError(`Request to ${url} ${outcome}`, url, { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new FetchError(`Error fetching ${url}: ${message}`, url, { cause: err });
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener('abort', onAbort);
  }
}

export async function fetchHtml(url: string, options: HttpOptions = {}): Promise<string> {
  const res = await request(url, { method: 'GET' }, options);
  return res.text();
}

export async function fetchJson(
  url: string,
  init: RequestSpec = {},
  options: HttpOptions = {},
): Promise<unknown> {
  const headers = {
    Accept: 'application/json',
    'Content-Type': 'application/json',
    ...options.headers,
  };
  const res = await request(url, init, { ...options, headers });
  const text = await res.text();
  if (!text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new FetchError(`Could not parse JSON from ${url}`, url, { cause: err });
  }
}
