import { extractLinks, scrapeDeadlineFromPage, type PageLink } from '../htmlScraper.js';
import { fetchHtml } from '../http.js';
import { normalizeWhitespace } from '../normalizer.js';
import type { RawItem } from '../types.js';
import type { Provider, ProviderContext, ProviderMeta } from './types.js';

const MAX_TITLE_LENGTH = 180;
const PAGER_TEXT = /^(\d{1,3}|próxima|proxima|seguinte|next|›|»)$/i;

export interface ListingSource extends ProviderMeta {
  /** One or more listing pages; all are scanned. */
  urls: string[];
  linkSelector?: string;
  /** Href must contain one of these (case-sensitive, as printed by the site). */
  hrefKeywords?: string[];
  /** Lower-cased title must contain one of these. */
  titleKeywords?: string[];
  /** Either keyword list may satisfy the filter instead of both. */
  keywordsMatchAny?: boolean;
  /** Decoded, lower-cased absolute href must match. */
  hrefPattern?: RegExp;
  /**
   * Anchors carry a topic code rather than a usable href; `{code}` is
   * replaced by the lower-cased, encoded anchor text.
   */
  topicUrl?: string;
  scrapeDeadline: boolean;
  /** Follow numbered / "next" pager links up to this depth. */
  maxPagerDepth?: number;
  urlHint?: string;
  baseUrl?: string;
}

export function topicLink(template: string, code: string): string {
  return template.replace('{code}', encodeURIComponent(code.toLowerCase()));
}

/**
 * Scrapes anchors off institutional listing pages, keeping those whose href
 * or text look like a call for proposals.
 */
export class ListingProvider implements Provider {
  readonly name: string;
  readonly group: ListingSource['group'];
  readonly baseUrl: string;
  readonly urlHint: string;

  constructor(private readonly source: ListingSource) {
    this.name = source.name;
    this.group = source.group;
    this.baseUrl = source.baseUrl ?? source.urls[0] ?? '';
    this.urlHint = source.urlHint ?? source.urls[0] ?? '';
  }

  accepts(link: PageLink): boolean {
    const { hrefKeywords, titleKeywords, hrefPattern, keywordsMatchAny } = this.source;
    const title = link.text.toLowerCase();

    if (hrefPattern) {
      let decoded = link.href;
      try {
        decoded = decodeURIComponent(link.href);
      } catch {
        // keep the raw href when it is not valid percent-encoding
      }
      if (!hrefPattern.test(decoded.toLowerCase())) return false;
    }

    const hrefOk = hrefKeywords
      ? hrefKeywords.some((keyword) => link.href.includes(keyword))
      : null;
    const titleOk = titleKeywords ? titleKeywords.some((keyword) => title.includes(keyword)) : null;

    if (hrefOk === null && titleOk === null) return true;
    if (keywordsMatchAny) return hrefOk === true || titleOk === true;
    return hrefOk !== false && titleOk !== false;
  }

  async fetch(ctx: ProviderContext): Promise<RawItem[]> {
    const links = await this.collectLinks(ctx);
    const seen = new Set<string>();
    const out: RawItem[] = [];

    for (const link of links) {
      if (!this.accepts(link)) continue;

      const title = normalizeWhitespace(link.text).slice(0, MAX_TITLE_LENGTH);
      if (ctx.regex && !ctx.regex.test(title)) continue;

      const target = this.source.topicUrl ? topicLink(this.source.topicUrl, title) : link.href;
      const key = `${title}|${target}`;
      if (seen.has(key)) continue;
      seen.add(key);

      const deadline = this.source.scrapeDeadline
        ? await scrapeDeadlineFromPage(target, ctx.timeZone, ctx.http)
        : null;

      out.push({
        source: this.name,
        title,
        link: target,
        deadline,
        published: null,
        agency: this.source.agency,
        region: this.source.region,
        raw: this.source.topicUrl ? { topic_code: title } : {},
      });
    }

    console.log(`   [${this.name}] ▸ ${out.length} candidate(s) from ${links.length} link(s)`);
    return out;
  }

  private async collectLinks(ctx: ProviderContext): Promise<PageLink[]> {
    const visited = new Set<string>();
    const links: PageLink[] = [];
    let lastError: unknown = null;
    let pagesRead = 0;

    const visit = async (url: string, depth: number): Promise<void> => {
      if (visited.has(url)) return;
      visited.add(url);

      let html: string;
      try {
        html = await fetchHtml(url, ctx.http);
      } catch (err) {
        if (ctx.http.signal?.aborted) throw err;
        lastError = err;
        const reason = err instanceof Error ? err.message : String(err);
        console.warn(`   [${this.name}] ⚠️  ${reason}`);
        return;
      }
      pagesRead++;

      const pageLinks = extractLinks(html, url, this.source.linkSelector ?? 'a');
      links.push(...pageLinks);

      if (depth >= (this.source.maxPagerDepth ?? 0)) return;
      for (const pager of pageLinks.filter((link) => PAGER_TEXT.test(link.text))) {
        await visit(pager.href, depth + 1);
      }
    };

    for (const url of this.source.urls) {
      await visit(url, 0);
    }

    if (pagesRead === 0 && lastError !== null) {
      throw lastError;
    }
    return links;
  }
}
