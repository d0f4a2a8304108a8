import { request, type HttpOptions } from './http.js';
import { absolutize, isAbsoluteHttpUrl, normalizeLink } from './normalizer.js';
import type { Item } from './types.js';

export interface LinkRepairOptions {
  /** Base URL per source name, used for links stored without a scheme. */
  baseUrls: Map<string, string>;
  /** Request http(s) links and store where they redirect to. */
  resolveRedirects: boolean;
  http: HttpOptions;
}

/**
 * Follows redirects with a HEAD request and returns the final URL.
 */
export async function resolveRedirect(link: string, http: HttpOptions): Promise<string> {
  const res = await request(link, { method: 'HEAD', redirect: 'follow' }, http);
  return res.url || link;
}

/**
 * Works out the corrected link for each stored row that needs one. Only rows
 * whose link actually changes end up in the returned map (uid → link).
 */
export async function planLinkRepairs(
  items: Item[],
  options: LinkRepairOptions,
): Promise<Map<string, string>> {
  const fixes = new Map<string, string>();

  for (const item of items) {
    const current = item.link.trim();
    if (!current) continue;

    let next = current;
    if (!isAbsoluteHttpUrl(next)) {
      next = absolutize(next, options.baseUrls.get(item.source));
    }

    if (options.resolveRedirects && isAbsoluteHttpUrl(next)) {
      try {
        next = await resolveRedirect(next, options.http);
      } catch (err) {
        if (options.http.signal?.aborted) throw err;
        const reason = err instanceof Error ? err.message : String(err);
        console.warn(`   [links] ⚠️  Could not resolve ${next}: ${reason}`);
      }
    }

    if (next !== current && normalizeLink(next) !== normalizeLink(current)) {
      fixes.set(item.uid, next);
    }
  }

  return fixes;
}
