import * as cheerio from 'cheerio';
import { findDeadlineInText } from './dates.js';
import { fetchHtml, type HttpOptions } from './http.js';
import { absolutize, normalizeWhitespace } from './normalizer.js';

export interface PageLink {
  text: string;
  href: string;
}

/**
 * Visible text of a page: scripts, styles and navigation chrome removed,
 * whitespace collapsed.
 */
export function cleanHTML(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript, nav, footer, header, .menu, .navigation, .sidebar').remove();
  const body = $('body');
  const text = body.length > 0 ? body.text() : $.root().text();
  return normalizeWhitespace(text);
}

/**
 * Every anchor with both text and href, hrefs made absolute against the page
 * URL. `#` and `javascript:` links are dropped.
 */
export function extractLinks(html: string, pageUrl: string, selector = 'a'): PageLink[] {
  const $ = cheerio.load(html);
  const links: PageLink[] = [];

  $(selector).each((_, element) => {
    const text = normalizeWhitespace($(element).text());
    const rawHref = ($(element).attr('href') ?? '').trim();
    if (!text || !rawHref) return;
    if (rawHref.startsWith('#') || rawHref.toLowerCase().startsWith('javascript:')) return;

    links.push({ text, href: absolutize(rawHref, pageUrl) });
  });

  return links;
}

/**
 * Opens a detail page and looks for its deadline. A page that cannot be read
 * yields null rather than failing the listing it came from.
 */
export async function scrapeDeadlineFromPage(
  url: string,
  timeZone: string,
  options: HttpOptions = {},
): Promise<string | null> {
  try {
    const html = await fetchHtml(url, options);
    return findDeadlineInText(cleanHTML(html), timeZone);
  } catch (err) {
    if (options.signal?.aborted) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`   [scraper] ⚠️  No deadline from ${url}: ${reason}`);
    return null;
  }
}
