import Parser from 'rss-parser';
import { findDeadlineNearKeyword } from '../dates.js';
import { scrapeDeadlineFromPage } from '../htmlScraper.js';
import { fetchHtml } from '../http.js';
import { normalizeWhitespace } from '../normalizer.js';
import type { RawItem } from '../types.js';
import type { Provider, ProviderContext, ProviderMeta } from './types.js';

export interface RssSource extends ProviderMeta {
  feedUrl: string;
  /** Open the entry page when the feed text carries no deadline. */
  scrapeDeadline: boolean;
  limit?: number;
}

export class RssProvider implements Provider {
  readonly name: string;
  readonly group: RssSource['group'];
  readonly baseUrl: string;
  readonly urlHint: string;
  private readonly parser = new Parser();

  constructor(private readonly source: RssSource) {
    this.name = source.name;
    this.group = source.group;
    this.baseUrl = new URL(source.feedUrl).origin;
    this.urlHint = source.feedUrl;
  }

  async fetch(ctx: ProviderContext): Promise<RawItem[]> {
    const xml = await fetchHtml(this.source.feedUrl, {
      ...ctx.http,
      headers: { Accept: 'application/rss+xml, application/xml;q=0.9, */*;q=0.8' },
    });
    const feed = await this.parser.parseString(xml);
    const entries = (feed.items ?? []).slice(0, this.source.limit ?? Number.MAX_SAFE_INTEGER);
    const out: RawItem[] = [];

    for (const entry of entries) {
      const title = normalizeWhitespace(entry.title);
      const link = (entry.link ?? '').trim();
      if (!title && !link) continue;
      if (ctx.regex && !ctx.regex.test(title)) continue;

      const body = entry.contentSnippet ?? entry.content ?? '';
      const text = normalizeWhitespace(`${entry.title ?? ''} ${body}`);
      let deadline = findDeadlineNearKeyword(text, ctx.timeZone);
      if (!deadline && this.source.scrapeDeadline && link) {
        deadline = await scrapeDeadlineFromPage(link, ctx.timeZone, ctx.http);
      }

      out.push({
        source: this.name,
        title,
        link,
        deadline,
        published: entry.isoDate ?? entry.pubDate ?? null,
        agency: this.source.agency,
        region: this.source.region,
        raw: { rss: this.source.feedUrl, guid: entry.guid ?? '' },
      });
    }

    const noun = out.length === 1 ? 'entry' : 'entries';
    console.log(`   [${this.name}] ▸ ${out.length} feed ${noun} kept of ${entries.length}`);
    return out;
  }
}
