import { JSDOM } from 'jsdom';
import Parser from 'rss-parser';
import { z } from 'zod';
import { toFetchWarning, type CandidateItem, type FetchContext, type Fetcher, type FetchWarning, type Source } from './adapter.js';
import { getJsonWithRetry, getWithRetry, type HttpOptions } from './http.js';
import { normalizeUrl, resolveLink } from './dedup.js';
import { ParseError, SourceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep, toIsoTimestamp } from '../shared/utils.js';

const TITLE_SELECTORS = ['h1.entry-title', 'article h1', 'header h1', 'h1'];

const DATE_SELECTORS: Array<[selector: string, attr: string]> = [
  ["meta[property='article:published_time']", 'content'],
  ["meta[name='pubdate']", 'content'],
  ['time[datetime]', 'datetime'],
];

const PREV_LINK_SELECTORS = [
  "a[rel='prev']",
  "link[rel='prev']",
  "nav.post-navigation a[rel='prev']",
  '.post-navigation .nav-previous a',
  'a.previous-post',
  'a.prev-post',
];

// Where post-to-post links live; labelled anchors elsewhere (comment paging, sidebars) are ignored.
const POST_NAV_ANCHORS = 'nav a[href], .post-navigation a[href], .post-nav a[href], .entry-nav a[href], .nav-links a[href]';

const LISTING_SELECTORS = ['h2.entry-title a[href]', 'article header h2 a[href]', 'article h2 a[href]', 'main a[href]'];

// Dated permalinks, e.g. /2025/08/18/some-title/
const PERMALINK_PATH = /^\/\d{4}\/\d{2}\/\d{2}\/[^/]+/;

export interface BlogPage {
  url: string;
  title: string | null;
  publishedAt: string | null;
  prevUrl: string | null;
}

function textOf(el: Element | null): string | null {
  const text = el?.textContent?.replace(/\s+/g, ' ').trim();
  return text ? text : null;
}

export function parsePostPage(html: string, pageUrl: string): BlogPage {
  const doc = new JSDOM(html).window.document;

  let title: string | null = null;
  for (const sel of TITLE_SELECTORS) {
    title = textOf(doc.querySelector(sel));
    if (title) break;
  }
  title ??= textOf(doc.querySelector('title'));

  let publishedAt: string | null = null;
  for (const [sel, attr] of DATE_SELECTORS) {
    publishedAt = toIsoTimestamp(doc.querySelector(sel)?.getAttribute(attr));
    if (publishedAt) break;
  }
  if (!publishedAt) {
    for (const t of Array.from(doc.querySelectorAll('time'))) {
      publishedAt = toIsoTimestamp(t.getAttribute('datetime') ?? t.textContent);
      if (publishedAt) break;
    }
  }

  let prevHref: string | null = null;
  for (const sel of PREV_LINK_SELECTORS) {
    prevHref = doc.querySelector(sel)?.getAttribute('href') ?? null;
    if (prevHref) break;
  }
  if (!prevHref) {
    // Themes without rel=prev: fall back to post-navigation anchors labelled as the older post.
    for (const a of Array.from(doc.querySelectorAll(POST_NAV_ANCHORS))) {
      const label = (a.textContent ?? '').trim().toLowerCase();
      if (label.includes('previous') || label.includes('older') || label.includes('←')) {
        prevHref = a.getAttribute('href');
        break;
      }
    }
  }

  const prevUrl = resolveLink(pageUrl, prevHref);
  const sameSite = prevUrl !== null && new URL(prevUrl).hostname === new URL(pageUrl).hostname;
  return { url: pageUrl, title, publishedAt, prevUrl: sameSite ? prevUrl : null };
}

/**
 * Newest post permalink on a blog home page, or null when the listing has no recognisable links.
 */
export function findLatestPostUrl(html: string, homeUrl: string): string | null {
  const doc = new JSDOM(html).window.document;
  const home = new URL(homeUrl);

  const sameSite = (href: string | null): string | null => {
    const u = resolveLink(homeUrl, href);
    return u && new URL(u).hostname === home.hostname ? u : null;
  };

  for (const a of Array.from(doc.querySelectorAll('a[href]'))) {
    const u = sameSite(a.getAttribute('href'));
    if (u && PERMALINK_PATH.test(new URL(u).pathname)) return u;
  }

  for (const sel of LISTING_SELECTORS) {
    for (const a of Array.from(doc.querySelectorAll(sel))) {
      const u = sameSite(a.getAttribute('href'));
      if (u && normalizeUrl(u) !== normalizeUrl(homeUrl)) return u;
    }
  }
  return null;
}

/**
 * RSS/Atom link advertised in the page head, else the WordPress default /feed/.
 */
export function discoverFeedUrl(html: string, homeUrl: string): string {
  const doc = new JSDOM(html).window.document;
  for (const link of Array.from(doc.querySelectorAll("link[rel~='alternate']"))) {
    const type = (link.getAttribute('type') ?? '').toLowerCase();
    if (['rss', 'atom', 'xml'].some((t) => type.includes(t))) {
      const u = resolveLink(homeUrl, link.getAttribute('href'));
      if (u) return u;
    }
  }
  return new URL('/feed/', homeUrl).toString();
}

const feedParser = new Parser();

export async function feedLatestEntryLink(xml: string): Promise<string | null> {
  const feed = await feedParser.parseString(xml);
  const first = feed.items.find((entry) => entry.link?.trim());
  return first?.link?.trim() ?? null;
}

const WpPostsSchema = z.array(z.object({ link: z.string().url() }).passthrough());

export class BlogFetcher implements Fetcher {
  readonly kind = 'Blog' as const;

  constructor(private readonly http: HttpOptions = {}) {}

  /**
   * First post of the walk: explicit override, newest permalink on the home page,
   * newest feed entry, then the WordPress posts API.
   */
  async resolveStartUrl(source: Source, ctx: FetchContext): Promise<string> {
    if (ctx.startUrl) return ctx.startUrl;

    const homeUrl = source.url.endsWith('/') ? source.url : `${source.url}/`;
    const home = await getWithRetry(homeUrl, ctx.policy, this.http);
    const fromHome = findLatestPostUrl(home.body, homeUrl);
    if (fromHome) return fromHome;

    const feedUrl = discoverFeedUrl(home.body, homeUrl);
    try {
      const feed = await getWithRetry(feedUrl, ctx.policy, {
        ...this.http,
        accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml',
      });
      const link = await feedLatestEntryLink(feed.body);
      if (link) return link;
    } catch (err) {
      logger.debug({ sourceId: source.id, feedUrl, error: errorMessage(err) }, 'Feed fallback failed');
    }

    const apiUrl = new URL('/wp-json/wp/v2/posts?per_page=1&_fields=link,date', homeUrl).toString();
    try {
      const parsed = WpPostsSchema.safeParse(await getJsonWithRetry(apiUrl, ctx.policy, this.http));
      if (parsed.success && parsed.data.length > 0) return parsed.data[0].link;
    } catch (err) {
      logger.debug({ sourceId: source.id, apiUrl, error: errorMessage(err) }, 'WP JSON fallback failed');
    }

    throw new SourceError(`Could not locate latest post URL for ${homeUrl}`, { sourceId: source.id, url: homeUrl });
  }

  async *fetchCandidates(source: Source, ctx: FetchContext): AsyncGenerator<CandidateItem | FetchWarning> {
    const start = await this.resolveStartUrl(source, ctx);
    const visited = new Set<string>();
    let current: string | null = start;
    let yielded = 0;
    let pages = 0;

    while (current) {
      const externalId = normalizeUrl(current);
      if (visited.has(externalId)) {
        logger.warn({ sourceId: source.id, url: current }, 'Previous-link chain loops, stopping');
        return;
      }
      visited.add(externalId);

      if (ctx.isKnown(externalId)) {
        logger.debug({ sourceId: source.id, url: current }, 'Reached already-stored post');
        return;
      }

      if (pages > 0) await sleep(ctx.policy.interRequestMs);
      const res = await getWithRetry(current, ctx.policy, this.http);
      pages++;
      const page = parsePostPage(res.body, current);

      if (ctx.since && page.publishedAt && page.publishedAt < ctx.since) {
        logger.debug({ sourceId: source.id, url: current, since: ctx.since }, 'Post older than since, stopping');
        return;
      }

      if (page.title) {
        yield {
          externalId,
          title: page.title,
          url: current,
          publishedAt: page.publishedAt ?? undefined,
        };
        yielded++;
        if (ctx.maxItems && yielded >= ctx.maxItems) {
          logger.info({ sourceId: source.id, maxItems: ctx.maxItems }, 'Reached max items for source');
          return;
        }
      } else {
        yield toFetchWarning(new ParseError('Post page has no title', { sourceId: source.id, url: current }));
      }

      current = page.prevUrl;
    }
  }
}
