import { setTimeout as sleep } from 'node:timers/promises';
import type { CrawlContext } from './context.js';
import { createCrawlContext } from './context.js';
import { FetchError, ValidationError } from './errors.js';
import { fetchPage, logFetchError } from './fetcher.js';
import type { Logger } from './logger.js';
import { parseHtml } from './parser.js';
import type { PageLink } from './parser.js';

export const MIN_PAGES = 1;
export const MAX_PAGES = 50;
export const DEFAULT_MAX_PAGES = 10;
export const DEFAULT_DELAY_MS = 250;

export interface Page {
  readonly url: string;
  readonly text: readonly string[];
  readonly links: readonly Readonly<PageLink>[];
}

export interface CrawlOptions {
  maxPages?: number;
  delayMs?: number;
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
}

export function clampMaxPages(maxPages: number): number {
  return Math.max(MIN_PAGES, Math.min(Math.trunc(maxPages), MAX_PAGES));
}

// `host` keeps a non-default port, so a port change counts as another host
// while http and https on the same host:port do not.
function hostOf(url: string): string | null {
  return URL.canParse(url) ? new URL(url).host : null;
}

function createPage(url: string, text: string[], links: PageLink[]): Page {
  return Object.freeze({
    url,
    text: Object.freeze(text),
    links: Object.freeze(links.map(link => Object.freeze(link))),
  });
}

/**
 * Breadth-first crawl from `startUrl`, following only links on the seed's
 * host. Sequential: one request in flight, `delayMs` pause after each page
 * that was fetched successfully.
 *
 * URLs are deduplicated by exact string, so `/a`, `/a/` and `/a#x` are
 * three different pages. Failed fetches are logged and skipped along with
 * everything only reachable through them.
 */
export async function crawlSite(startUrl: string, options: CrawlOptions = {}): Promise<Page[]> {
  if (!startUrl || !startUrl.trim()) {
    throw new ValidationError('start URL must not be empty');
  }
  const host = hostOf(startUrl);
  if (host === null) {
    throw new ValidationError(`Invalid start URL: ${startUrl}`);
  }
  const requested = options.maxPages ?? DEFAULT_MAX_PAGES;
  if (!Number.isFinite(requested)) {
    throw new ValidationError(`max pages must be a finite number, got ${requested}`);
  }

  const maxPages = clampMaxPages(requested);
  const delayMs = options.delayMs ?? DEFAULT_DELAY_MS;
  const context: CrawlContext = createCrawlContext({
    logger: options.logger,
    timeoutMs: options.timeoutMs,
    userAgent: options.userAgent,
  });

  const visited = new Set<string>();
  const frontier: string[] = [startUrl];
  const pages: Page[] = [];

  while (frontier.length > 0 && pages.length < maxPages) {
    const url = frontier.shift();
    if (url === undefined || visited.has(url)) continue;
    visited.add(url);

    let html: string;
    try {
      html = await fetchPage(url, context);
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;
      logFetchError(err, context);
      continue;
    }

    const { text, links } = parseHtml(url, html);
    pages.push(createPage(url, text, links));

    for (const link of links) {
      if (hostOf(link.href) === host && !visited.has(link.href)) {
        frontier.push(link.href);
      }
    }

    if (delayMs > 0) await sleep(delayMs);
  }

  context.logger.info(`Crawled ${pages.length} page(s) from ${startUrl}`);
  return pages;
}
