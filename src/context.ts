import type { Logger } from './logger.js';
import { createStderrLogger } from './logger.js';

export const DEFAULT_USER_AGENT = 'site-query/0.1';
export const DEFAULT_TIMEOUT_MS = 15000;

/**
 * Settings and logger for a single crawl. Built fresh by every
 * `crawlSite` call and handed down to the fetcher, so nothing about
 * logging or request headers lives in module state.
 */
export interface CrawlContext {
  logger: Logger;
  timeoutMs: number;
  userAgent: string;
}

export function createCrawlContext(overrides: Partial<CrawlContext> = {}): CrawlContext {
  return {
    logger: overrides.logger ?? createStderrLogger(),
    timeoutMs: overrides.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    userAgent: overrides.userAgent ?? DEFAULT_USER_AGENT,
  };
}
