import { answerPrompt } from './answer.js';
import { crawlSite, MAX_PAGES, MIN_PAGES } from './crawler.js';
import type { CrawlOptions } from './crawler.js';
import { ValidationError } from './errors.js';
import { toSiteMap } from './formatter.js';
import type { SiteMap } from './formatter.js';

export function validateMaxPages(maxPages: number): number {
  if (!Number.isInteger(maxPages) || maxPages < MIN_PAGES || maxPages > MAX_PAGES) {
    throw new ValidationError(`max pages must be an integer between ${MIN_PAGES} and ${MAX_PAGES}, got ${maxPages}`);
  }
  return maxPages;
}

export function validatePrompt(prompt: string): string {
  const trimmed = prompt.trim();
  if (!trimmed) throw new ValidationError('prompt must not be empty');
  return trimmed;
}

function validateOptions(options: CrawlOptions): CrawlOptions {
  if (options.maxPages !== undefined) validateMaxPages(options.maxPages);
  return options;
}

export async function buildSiteMap(startUrl: string, options: CrawlOptions = {}): Promise<SiteMap> {
  const pages = await crawlSite(startUrl, validateOptions(options));
  return toSiteMap(startUrl, pages);
}

export async function querySite(startUrl: string, prompt: string, options: CrawlOptions = {}): Promise<string> {
  const question = validatePrompt(prompt);
  const pages = await crawlSite(startUrl, validateOptions(options));
  return answerPrompt(pages, question);
}
