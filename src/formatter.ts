import type { Page } from './crawler.js';
import type { PageLink } from './parser.js';

export interface SiteMapPage {
  url: string;
  links: PageLink[];
}

export interface SiteMap {
  base: string;
  pages: SiteMapPage[];
}

export type SiteMapFormat = 'json' | 'text';

// Page text is internal to answering and is not part of the site map.
export function toSiteMap(base: string, pages: readonly Page[]): SiteMap {
  return {
    base,
    pages: pages.map(page => ({
      url: page.url,
      links: page.links.map(({ href, text }) => ({ href, text })),
    })),
  };
}

export function formatSiteMapJson(siteMap: SiteMap): string {
  return JSON.stringify(siteMap, null, 2) + '\n';
}

export function formatSiteMapText({ base, pages }: SiteMap): string {
  const lines: string[] = [`# Site map for ${base}`, ''];
  for (const page of pages) {
    lines.push(`## ${page.url}`, '');
    if (page.links.length === 0) {
      lines.push('(no links)');
    }
    for (const { href, text } of page.links) {
      lines.push(`- [${text || href}](${href})`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

export function formatSiteMap(siteMap: SiteMap, format: SiteMapFormat): string {
  return format === 'json' ? formatSiteMapJson(siteMap) : formatSiteMapText(siteMap);
}
