import { loadConfig } from './config.js';
import type { SiteQueryConfig } from './config.js';
import type { CrawlOptions } from './crawler.js';
import { ValidationError } from './errors.js';
import { formatSiteMap } from './formatter.js';
import type { SiteMapFormat } from './formatter.js';
import { createStderrLogger, silentLogger } from './logger.js';
import { buildSiteMap, querySite } from './site.js';

export interface CrawlCliOptions {
  maxPages?: string;
  delay?: string;
  timeout?: string;
  userAgent?: string;
  config: string;
  quiet?: boolean;
}

export interface MapCliOptions extends CrawlCliOptions {
  format: string;
}

export interface AskCliOptions extends CrawlCliOptions {
  url?: string;
}

function parseNumberOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new ValidationError(`${flag} must be a number, got "${value}"`);
  }
  return n;
}

function parseFormat(format: string): SiteMapFormat {
  if (format === 'json' || format === 'text') return format;
  throw new ValidationError(`--format must be "json" or "text", got "${format}"`);
}

export function resolveStartUrl(url: string | undefined, config: SiteQueryConfig): string {
  const raw = url ?? config.startUrl;
  if (!raw || !raw.trim()) {
    throw new ValidationError('No URL given and no startUrl in config');
  }
  const trimmed = raw.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

// Flags win over the config file; anything left unset falls to crawlSite's defaults.
export function resolveCrawlOptions(opts: CrawlCliOptions, config: SiteQueryConfig): CrawlOptions {
  const delayMs = parseNumberOption(opts.delay, '--delay') ?? config.delayMs;
  if (delayMs !== undefined && delayMs < 0) {
    throw new ValidationError(`--delay must not be negative, got ${delayMs}`);
  }
  const timeoutMs = parseNumberOption(opts.timeout, '--timeout') ?? config.timeoutMs;
  if (timeoutMs !== undefined && timeoutMs <= 0) {
    throw new ValidationError(`--timeout must be positive, got ${timeoutMs}`);
  }
  return {
    maxPages: parseNumberOption(opts.maxPages, '--max-pages') ?? config.maxPages,
    delayMs,
    timeoutMs,
    userAgent: opts.userAgent ?? config.userAgent,
    logger: opts.quiet ? silentLogger : createStderrLogger(),
  };
}

export async function runMap(url: string | undefined, opts: MapCliOptions): Promise<string> {
  const format = parseFormat(opts.format);
  const config = await loadConfig(opts.config);
  const startUrl = resolveStartUrl(url, config);
  const siteMap = await buildSiteMap(startUrl, resolveCrawlOptions(opts, config));
  return formatSiteMap(siteMap, format);
}

export async function runAsk(prompt: string, opts: AskCliOptions): Promise<string> {
  const config = await loadConfig(opts.config);
  const startUrl = resolveStartUrl(opts.url, config);
  const answer = await querySite(startUrl, prompt, resolveCrawlOptions(opts, config));
  return answer.endsWith('\n') ? answer : `${answer}\n`;
}
