export { crawlSite, clampMaxPages, MIN_PAGES, MAX_PAGES, DEFAULT_MAX_PAGES, DEFAULT_DELAY_MS } from './crawler.js';
export type { Page, CrawlOptions } from './crawler.js';
export { answerPrompt, PROMPT_HANDLERS, findScholarLink, extractPublications, isPublicationCandidate } from './answer.js';
export type { PromptHandler, ScholarLink, Publication } from './answer.js';
export { parseHtml } from './parser.js';
export type { PageLink, ParsedHtml } from './parser.js';
export { fetchPage } from './fetcher.js';
export { createCrawlContext } from './context.js';
export type { CrawlContext } from './context.js';
export { FetchError, ValidationError } from './errors.js';
export type { FetchFailureReason } from './errors.js';
export { createStderrLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { buildSiteMap, querySite, validateMaxPages, validatePrompt } from './site.js';
export { toSiteMap, formatSiteMap } from './formatter.js';
export type { SiteMap, SiteMapPage, SiteMapFormat } from './formatter.js';
